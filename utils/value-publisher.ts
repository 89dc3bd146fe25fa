import { describeError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { SerialQueue } from '@/utils/serial-queue';

export interface ValueObserver<T> {
    onValueChanged(oldValue: T, newValue: T): void;
}

/** Read side of a {@link ValuePublisher}: the current value plus change subscription. */
export interface ValueObservable<T> {
    readonly currentValue: T;
    subscribe(observer: ValueObserver<T>): void;
}

/**
 * Holds a single value and notifies observers after each replacement.
 *
 * Observers are registered once, by their owner, and never removed. They are called
 * synchronously after the new value is visible, so an observer with real work to do
 * should hand it to its own queue rather than run it inline.
 */
export class ValuePublisher<T> implements ValueObservable<T> {
    private value: T;
    private readonly observers: ValueObserver<T>[] = [];
    private readonly queue: SerialQueue;

    constructor(initialValue: T, label = 'value-publisher') {
        this.value = initialValue;
        this.queue = new SerialQueue(label);
    }

    public get currentValue(): T {
        return this.value;
    }

    public publishSync(newValue: T): void {
        const oldValue = this.value;
        this.value = newValue;
        this.notify(oldValue, newValue);
    }

    /** Applies the value on the publisher's queue; async publications keep their call order. */
    public publishAsync(newValue: T): void {
        this.queue.enqueue(() => this.publishSync(newValue));
    }

    public subscribe(observer: ValueObserver<T>): void {
        this.observers.push(observer);
    }

    public whenIdle(): Promise<void> {
        return this.queue.whenIdle();
    }

    private notify(oldValue: T, newValue: T) {
        for (const observer of this.observers) {
            try {
                observer.onValueChanged(oldValue, newValue);
            } catch (error) {
                logger.warn('Value observer failed', {
                    publisher: this.queue.label,
                    error: describeError(error),
                });
            }
        }
    }
}
