/**
 * Context Snapshot Store
 *
 * Aggregates several published values into one immutable snapshot that any caller
 * can read synchronously. Field updates are applied one at a time on the store's
 * queue, each producing a new frozen snapshot.
 */

import type { ContextSnapshot, ContextSnapshotSources } from '@/context/types';
import { describeError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { SerialQueue } from '@/utils/serial-queue';
import type { ValueObservable, ValueObserver } from '@/utils/value-publisher';

type SnapshotField = keyof ContextSnapshot;

export type ContextSnapshotStoreOptions = {
    onSnapshotChange?: (snapshot: ContextSnapshot) => void;
};

/** Forwards a value change onto the store's queue as a single-field update. */
class ContextFieldUpdater<K extends SnapshotField> implements ValueObserver<ContextSnapshot[K]> {
    constructor(
        private readonly queue: SerialQueue,
        private readonly apply: (value: ContextSnapshot[K]) => void,
    ) {}

    onValueChanged(_oldValue: ContextSnapshot[K], newValue: ContextSnapshot[K]): void {
        this.queue.enqueue(() => this.apply(newValue));
    }
}

export class ContextSnapshotStore {
    /** Invoked on the store's queue with the whole snapshot after every field update. */
    public onSnapshotChange: ((snapshot: ContextSnapshot) => void) | undefined;
    private readonly queue = new SerialQueue('context-snapshot');
    private snapshot: ContextSnapshot;

    constructor(sources: ContextSnapshotSources, options: ContextSnapshotStoreOptions = {}) {
        this.onSnapshotChange = options.onSnapshotChange;
        this.snapshot = Object.freeze({
            trackingConsent: sources.trackingConsent.currentValue,
            userInfo: sources.userInfo.currentValue,
            networkConnectionInfo: sources.networkConnectionInfo.currentValue,
            carrierInfo: sources.carrierInfo.currentValue,
            lastViewEvent: sources.lastViewEvent.currentValue,
        });

        this.observe(sources.trackingConsent, 'trackingConsent');
        this.observe(sources.userInfo, 'userInfo');
        this.observe(sources.networkConnectionInfo, 'networkConnectionInfo');
        this.observe(sources.carrierInfo, 'carrierInfo');
        this.observe(sources.lastViewEvent, 'lastViewEvent');
    }

    /** The last fully applied snapshot. Never a partially updated one. */
    public currentSnapshot(): ContextSnapshot {
        return this.snapshot;
    }

    /** Reads on the store's queue, after every update enqueued before this call. */
    public readSnapshot(): Promise<ContextSnapshot> {
        return this.queue.run(() => this.snapshot);
    }

    public whenIdle(): Promise<void> {
        return this.queue.whenIdle();
    }

    private observe<K extends SnapshotField>(source: ValueObservable<ContextSnapshot[K]>, field: K) {
        source.subscribe(new ContextFieldUpdater<K>(this.queue, (value) => this.update(field, value)));
    }

    private update<K extends SnapshotField>(field: K, value: ContextSnapshot[K]) {
        const next: ContextSnapshot = Object.freeze({ ...this.snapshot, [field]: value });
        this.snapshot = next;

        if (!this.onSnapshotChange) {
            return;
        }
        try {
            this.onSnapshotChange(next);
        } catch (error) {
            logger.warn('Context snapshot listener failed', { field, error: describeError(error) });
        }
    }
}
