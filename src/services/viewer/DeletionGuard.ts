import { Inject, Service } from 'typedi';
import { MessageNotFoundError } from '../../errors/ViewerErrors';
import { MessageEntry } from '../../types/message';
import { Logger } from '../logging/Logger';
import { UiQueue } from '../queue/UiQueue';
import { MessageRepository, MessageRepositoryToken } from '../repository/MessageRepository';
import { ListSynchronizer } from './ListSynchronizer';

export interface DeletionOutcome {
    deleted: string[];
    missing: string[];
    failed: string[];
}

/**
 * Serializes "delete the current selection". A second request waits for the
 * first to finish and then captures whatever is selected at that point, so two
 * requests never act on the same captured selection.
 */
@Service()
export class DeletionGuard {
    private readonly logger: Logger;
    private tail: Promise<void> = Promise.resolve();

    constructor(
        @Inject(MessageRepositoryToken) private readonly repository: MessageRepository,
        private readonly list: ListSynchronizer,
        private readonly queue: UiQueue,
        logger: Logger,
    ) {
        this.logger = logger.child('deletion');
    }

    deleteSelected(): Promise<DeletionOutcome> {
        return this.exclusive(() => this.deleteCaptured());
    }

    private exclusive<T>(work: () => Promise<T>): Promise<T> {
        const run = this.tail.then(work);
        this.tail = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }

    private async deleteCaptured(): Promise<DeletionOutcome> {
        const outcome: DeletionOutcome = { deleted: [], missing: [], failed: [] };
        const captured = await this.queue.run(() => this.list.captureSelection(), 'capture-selection');
        if (captured.entries.length === 0) {
            return outcome;
        }

        const removed: MessageEntry[] = [];
        for (const entry of captured.entries) {
            try {
                await this.repository.delete(entry);
                outcome.deleted.push(entry.id);
                removed.push(entry);
            } catch (error: unknown) {
                if (error instanceof MessageNotFoundError) {
                    outcome.missing.push(entry.id);
                    removed.push(entry);
                } else {
                    this.logger.error(`Failed to delete message ${entry.id}`, error);
                    outcome.failed.push(entry.id);
                }
            }
        }

        await this.queue.run(() => this.list.remove(removed, captured.anchorIndex), 'remove-deleted');

        if (outcome.missing.length > 0) {
            await this.resync();
        }
        return outcome;
    }

    private async resync(): Promise<void> {
        const ticket = await this.queue.run(() => this.list.beginRefresh(), 'resync-begin');
        try {
            const entries = await this.repository.loadAll();
            await this.queue.run(() => this.list.reset(entries, ticket), 'resync-after-delete');
        } catch (error: unknown) {
            this.logger.error('Failed to resync message list after delete', error);
            this.queue.post(() => this.list.endRefresh(ticket), 'resync-abandon');
        }
    }
}
