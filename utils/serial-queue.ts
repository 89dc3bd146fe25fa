import { describeError } from '@/utils/errors';
import { logger } from '@/utils/logger';

type Work<T> = () => T | Promise<T>;

/**
 * FIFO work queue acting as a serialization point.
 *
 * Exactly one work item runs at a time, in enqueue order, and always after the
 * enqueuing call has returned. A failing item never blocks the items behind it.
 */
export class SerialQueue {
    private tail: Promise<void> = Promise.resolve();
    private pendingCount = 0;

    constructor(public readonly label: string) {}

    /** Fire-and-forget. Failures are logged, never surfaced to the caller. */
    public enqueue(work: Work<void>): void {
        this.run(work).catch((error: unknown) => {
            logger.error(`[${this.label}] queued work failed`, { error: describeError(error) });
        });
    }

    /** Round-trip: resolves with the work's result once everything queued before it has run. */
    public run<T>(work: Work<T>): Promise<T> {
        this.pendingCount += 1;
        const result = this.tail.then(work);
        const settle = () => {
            this.pendingCount -= 1;
        };
        this.tail = result.then(settle, settle);
        return result;
    }

    /** Resolves once the queue is empty, including work enqueued while waiting. */
    public async whenIdle(): Promise<void> {
        let observed: Promise<void>;
        do {
            observed = this.tail;
            await observed;
        } while (observed !== this.tail);
    }

    public get pending(): number {
        return this.pendingCount;
    }
}
