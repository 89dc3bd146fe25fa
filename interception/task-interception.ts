import { randomUUID } from 'node:crypto';
import type { ResourceMetrics } from '@/interception/resource-metrics';
import type { SpanContext } from '@/interception/tracer';
import type { HttpRequest, HttpResponse } from '@/interception/types';

/** How a task ended: the response head, the transport error, or both. */
export type ResourceCompletion = {
    readonly response?: HttpResponse;
    readonly error?: Error;
};

/** Frozen view of a {@link TaskInterception}, the only form handlers ever receive. */
export type InterceptionRecord = {
    readonly identifier: string;
    readonly request: HttpRequest;
    readonly isFirstParty: boolean;
    readonly spanContext?: SpanContext;
    readonly metrics?: ResourceMetrics;
    readonly completion?: ResourceCompletion;
    readonly isDone: boolean;
};

/**
 * Accumulates everything known about one intercepted task.
 *
 * Metrics and completion arrive independently and in either order; the interception is
 * done once both are present. Mutated only from the interceptor's queue.
 */
export class TaskInterception {
    public readonly identifier: string;
    private spanContextValue: SpanContext | undefined;
    private metricsValue: ResourceMetrics | undefined;
    private completionValue: ResourceCompletion | undefined;

    constructor(
        public readonly request: HttpRequest,
        public readonly isFirstParty: boolean,
        identifier: string = randomUUID(),
    ) {
        this.identifier = identifier;
    }

    get spanContext(): SpanContext | undefined {
        return this.spanContextValue;
    }

    get metrics(): ResourceMetrics | undefined {
        return this.metricsValue;
    }

    get completion(): ResourceCompletion | undefined {
        return this.completionValue;
    }

    get isDone(): boolean {
        return this.metricsValue !== undefined && this.completionValue !== undefined;
    }

    /** Accepted at most once and only before completion; returns whether it was stored. */
    registerSpanContext(spanContext: SpanContext): boolean {
        if (this.spanContextValue !== undefined || this.completionValue !== undefined) {
            return false;
        }
        this.spanContextValue = spanContext;
        return true;
    }

    // A repeated registration replaces the previous value; it cannot flip `isDone` back.
    registerMetrics(metrics: ResourceMetrics): void {
        this.metricsValue = metrics;
    }

    registerCompletion(completion: ResourceCompletion): void {
        this.completionValue = completion;
    }

    toRecord(): InterceptionRecord {
        return Object.freeze({
            identifier: this.identifier,
            request: this.request,
            isFirstParty: this.isFirstParty,
            spanContext: this.spanContextValue,
            metrics: this.metricsValue,
            completion: this.completionValue,
            isDone: this.isDone,
        });
    }
}
