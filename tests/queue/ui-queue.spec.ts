import { Logger } from '../../src/services/logging/Logger';
import { UiQueue } from '../../src/services/queue/UiQueue';
import { silentLogger } from '../helpers/fakes';

describe('UiQueue', () => {
    it('runs posted tasks in order on a later turn', async () => {
        const queue = new UiQueue(silentLogger());
        const ran: string[] = [];

        queue.post(() => ran.push('first'));
        queue.post(() => ran.push('second'));

        expect(ran).toEqual([]);
        await queue.waitForDrain();
        expect(ran).toEqual(['first', 'second']);
    });

    it('schedules a single pump for a burst of posts', () => {
        const scheduled: Array<() => void> = [];
        const queue = new UiQueue(silentLogger(), { schedule: (callback) => scheduled.push(callback) });
        const ran: number[] = [];

        queue.post(() => ran.push(1));
        queue.post(() => ran.push(2));

        expect(scheduled).toHaveLength(1);
        expect(queue.size).toBe(2);
        scheduled[0]();
        expect(ran).toEqual([1, 2]);
    });

    it('runs tasks posted by a running task in the same drain', async () => {
        const queue = new UiQueue(silentLogger());
        const ran: string[] = [];

        queue.post(() => {
            ran.push('outer');
            queue.post(() => ran.push('inner'));
        });
        await queue.waitForDrain();

        expect(ran).toEqual(['outer', 'inner']);
    });

    it('resolves run() with the task result', async () => {
        const queue = new UiQueue(silentLogger());

        await expect(queue.run(() => 21 * 2)).resolves.toBe(42);
    });

    it('rejects run() when the task throws', async () => {
        const queue = new UiQueue(silentLogger());

        await expect(
            queue.run(() => {
                throw new Error('boom');
            }),
        ).rejects.toThrow('boom');
    });

    it('logs a failing task and keeps going', async () => {
        const errors: unknown[][] = [];
        const logger = new Logger({
            level: 'error',
            sink: { log: () => undefined, warn: () => undefined, error: (...args) => errors.push(args) },
        });
        const queue = new UiQueue(logger);
        const ran: string[] = [];

        queue.post(() => {
            throw new Error('bad task');
        }, 'broken');
        queue.post(() => ran.push('after'));
        await queue.waitForDrain();

        expect(ran).toEqual(['after']);
        expect(errors).toHaveLength(1);
        expect(errors[0][0]).toBe('[ui-queue] Task broken#1 failed');
    });

    it('resolves waitForDrain immediately when idle', async () => {
        const queue = new UiQueue(silentLogger(), {
            schedule: () => {
                throw new Error('schedule should not be called for idle wait');
            },
        });

        await expect(queue.waitForDrain()).resolves.toBeUndefined();
    });
});
