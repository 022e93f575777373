import { Service } from 'typedi';
import { Logger } from '../logging/Logger';

export type UiTask = () => void;

interface QueuedUiTask {
    readonly id: number;
    readonly label: string;
    readonly task: UiTask;
}

export interface UiQueueOptions {
    readonly schedule?: (callback: () => void) => void;
}

function defaultSchedule(callback: () => void): void {
    setImmediate(callback);
}

/**
 * Single logical execution context for list, selection and display state.
 *
 * Background work never touches that state directly; it posts a task here and
 * the task runs later, in order, one at a time.
 */
@Service()
export class UiQueue {
    private readonly logger: Logger;
    private readonly schedule: (callback: () => void) => void;
    private readonly pending: QueuedUiTask[] = [];
    private readonly drainWaiters: Array<() => void> = [];
    private nextId = 1;
    private pumpScheduled = false;
    private running = false;

    constructor(logger: Logger, options: UiQueueOptions = {}) {
        this.logger = logger.child('ui-queue');
        this.schedule = options.schedule ?? defaultSchedule;
    }

    post(task: UiTask, label = 'ui-task'): void {
        this.pending.push({ id: this.nextId, label, task });
        this.nextId += 1;
        this.schedulePump();
    }

    /** Posts `task` and resolves with its result once it has run. */
    run<T>(task: () => T, label = 'ui-call'): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            this.post(() => {
                try {
                    resolve(task());
                } catch (error: unknown) {
                    reject(error);
                }
            }, label);
        });
    }

    async waitForDrain(): Promise<void> {
        if (this.isIdle()) {
            return;
        }
        await new Promise<void>((resolve) => {
            this.drainWaiters.push(resolve);
        });
    }

    get size(): number {
        return this.pending.length;
    }

    private isIdle(): boolean {
        return !this.running && !this.pumpScheduled && this.pending.length === 0;
    }

    private schedulePump(): void {
        if (this.pumpScheduled) {
            return;
        }
        this.pumpScheduled = true;
        this.schedule(() => {
            this.pumpScheduled = false;
            this.pump();
        });
    }

    private pump(): void {
        if (this.running) {
            return;
        }
        this.running = true;
        try {
            let next = this.pending.shift();
            while (next !== undefined) {
                try {
                    next.task();
                } catch (error: unknown) {
                    this.logger.error(`Task ${next.label}#${next.id} failed`, error);
                }
                next = this.pending.shift();
            }
        } finally {
            this.running = false;
        }
        this.resolveDrainIfIdle();
    }

    private resolveDrainIfIdle(): void {
        if (!this.isIdle()) {
            return;
        }
        while (this.drainWaiters.length > 0) {
            const resolve = this.drainWaiters.shift();
            resolve?.();
        }
    }
}
