/**
 * Request Interceptor
 *
 * Classifies outgoing requests, injects trace context into first-party ones and
 * correlates each task's creation, metrics and completion callbacks into a single
 * interception reported to the handler.
 *
 * `modify` runs on the caller. The three lifecycle calls only enqueue work on the
 * interceptor's serial queue and return immediately; work for one task runs in the
 * order it was enqueued.
 */

import { type ResourceMetrics, resourceMetricsFromTaskMetrics, type TaskMetrics } from '@/interception/resource-metrics';
import { type InterceptionRecord, TaskInterception } from '@/interception/task-interception';
import { type SpanContext, resolveTracer, type TracerSource } from '@/interception/tracer';
import {
    HTTPHeadersReader,
    HTTPHeadersWriter,
    setHeaderValue,
    TRACING_HTTP_HEADERS,
} from '@/interception/tracing-headers';
import type { HttpRequest, NetworkTask, TransportSession, URLClassification } from '@/interception/types';
import { classifyURL, FirstPartyURLsFilter, InternalURLsFilter } from '@/interception/url-filters';
import { describeError } from '@/utils/errors';
import { StructuredInterceptionLogger, UNTRACKED_INTERCEPTION_ID } from '@/utils/logging/structured-logger';
import { SerialQueue } from '@/utils/serial-queue';
import type { InstrumentationConfiguration } from '@/utils/settings';

/** Receives interceptions from the interceptor's queue; implementations should return quickly. */
export interface InterceptionHandler {
    notifyInterceptionStarted(interception: InterceptionRecord): void;
    notifyInterceptionCompleted(interception: InterceptionRecord): void;
}

export type RequestInterceptorOptions = {
    configuration: InstrumentationConfiguration;
    handler: InterceptionHandler;
    tracer?: TracerSource;
    log?: StructuredInterceptionLogger;
};

export class RequestInterceptor {
    public readonly handler: InterceptionHandler;
    /** True whenever tracing is enabled, whatever the RUM setting. */
    public readonly injectTracingHeadersToFirstPartyRequests: boolean;
    /** The origin marker, present only when tracing and RUM are both enabled. */
    public readonly additionalHeadersForFirstPartyRequests: Readonly<Record<string, string>> | undefined;

    private readonly defaultFirstPartyURLsFilter: FirstPartyURLsFilter;
    private readonly internalURLsFilter: InternalURLsFilter;
    private readonly sessionFilters = new WeakMap<TransportSession, FirstPartyURLsFilter>();
    private readonly interceptionByTask = new Map<NetworkTask, TaskInterception>();
    private readonly queue = new SerialQueue('request-interceptor');
    private readonly tracer: TracerSource | undefined;
    private readonly log: StructuredInterceptionLogger;

    constructor(options: RequestInterceptorOptions) {
        const { configuration } = options;
        this.handler = options.handler;
        this.tracer = options.tracer;
        this.log = options.log ?? new StructuredInterceptionLogger();
        this.defaultFirstPartyURLsFilter = new FirstPartyURLsFilter(configuration.userDefinedFirstPartyHosts);
        this.internalURLsFilter = new InternalURLsFilter(configuration.sdkInternalURLs);
        this.injectTracingHeadersToFirstPartyRequests = configuration.instrumentTracing;
        this.additionalHeadersForFirstPartyRequests =
            configuration.instrumentTracing && configuration.instrumentRUM
                ? Object.freeze({ [TRACING_HTTP_HEADERS.originField]: TRACING_HTTP_HEADERS.rumOriginValue })
                : undefined;
    }

    /**
     * Returns the request to send. First-party requests get trace propagation headers when
     * tracing is enabled and a tracer is available; every other request comes back as the
     * same object. Call exactly once per physically sent request.
     */
    public modify(request: HttpRequest, session?: TransportSession): HttpRequest {
        const classification = this.classify(request.url, session);
        if (classification !== 'first-party' || !this.injectTracingHeadersToFirstPartyRequests) {
            return request;
        }
        return this.injectSpanContext(request);
    }

    public taskCreated(task: NetworkTask, session?: TransportSession): void {
        const request = task.originalRequest;
        if (!request || this.internalURLsFilter.isInternal(request.url)) {
            return;
        }

        this.queue.enqueue(() => {
            if (this.interceptionByTask.has(task)) {
                this.log.emit(
                    UNTRACKED_INTERCEPTION_ID,
                    'debug',
                    'duplicate_task_created',
                    'Task already intercepted',
                    undefined,
                    request.url,
                );
                return;
            }

            const isFirstParty = this.classify(request.url, session) === 'first-party';
            const interception = new TaskInterception(request, isFirstParty);
            this.interceptionByTask.set(task, interception);

            const spanContext = this.extractSpanContext(request);
            if (spanContext) {
                interception.registerSpanContext(spanContext);
            }

            this.log.emit(interception.identifier, 'debug', 'interception_started', 'Interception started', {
                method: request.method,
                isFirstParty,
                traced: spanContext !== undefined,
            });
            this.notify('started', interception);
        });
    }

    public taskMetricsCollected(task: NetworkTask, metrics: TaskMetrics): void {
        if (this.internalURLsFilter.isInternal(task.originalRequest?.url)) {
            return;
        }

        this.queue.enqueue(() => {
            const interception = this.lookup(task, 'metrics');
            if (!interception) {
                return;
            }
            const resourceMetrics: ResourceMetrics = resourceMetricsFromTaskMetrics(metrics);
            interception.registerMetrics(resourceMetrics);
            this.finishIfDone(task, interception);
        });
    }

    public taskCompleted(task: NetworkTask, error?: Error): void {
        if (this.internalURLsFilter.isInternal(task.originalRequest?.url)) {
            return;
        }

        const response = task.response;
        this.queue.enqueue(() => {
            const interception = this.lookup(task, 'completion');
            if (!interception) {
                return;
            }
            interception.registerCompletion({ response, error });
            this.finishIfDone(task, interception);
        });
    }

    /**
     * Interceptions that started but have not completed. Nothing evicts them, so a value that
     * keeps growing points at a transport that never reports metrics or completion.
     */
    public get activeInterceptionsCount(): number {
        return this.interceptionByTask.size;
    }

    /** Resolves once every lifecycle call made so far has been processed. */
    public whenIdle(): Promise<void> {
        return this.queue.whenIdle();
    }

    private classify(url: string, session?: TransportSession): URLClassification {
        const filters = [this.defaultFirstPartyURLsFilter];
        const sessionFilter = this.sessionFilter(session);
        if (sessionFilter) {
            filters.push(sessionFilter);
        }
        return classifyURL(url, { internal: this.internalURLsFilter, firstParty: filters });
    }

    private sessionFilter(session?: TransportSession): FirstPartyURLsFilter | undefined {
        if (!session?.additionalFirstPartyHosts) {
            return undefined;
        }
        let filter = this.sessionFilters.get(session);
        if (!filter) {
            filter = new FirstPartyURLsFilter(session.additionalFirstPartyHosts);
            this.sessionFilters.set(session, filter);
        }
        return filter;
    }

    private lookup(task: NetworkTask, callback: 'metrics' | 'completion'): TaskInterception | undefined {
        const interception = this.interceptionByTask.get(task);
        if (!interception) {
            this.log.emit(
                UNTRACKED_INTERCEPTION_ID,
                'debug',
                'untracked_task_callback',
                'Ignoring callback for untracked task',
                { callback },
                `${callback}:${task.originalRequest?.url ?? ''}`,
            );
        }
        return interception;
    }

    private finishIfDone(task: NetworkTask, interception: TaskInterception) {
        if (!interception.isDone) {
            return;
        }
        this.interceptionByTask.delete(task);
        this.log.emit(interception.identifier, 'debug', 'interception_completed', 'Interception completed', {
            statusCode: interception.completion?.response?.statusCode,
            failed: interception.completion?.error !== undefined,
        });
        this.notify('completed', interception);
        this.log.release(interception.identifier);
    }

    private notify(phase: 'started' | 'completed', interception: TaskInterception) {
        const record = interception.toRecord();
        try {
            if (phase === 'started') {
                this.handler.notifyInterceptionStarted(record);
            } else {
                this.handler.notifyInterceptionCompleted(record);
            }
        } catch (error) {
            this.log.emit(record.identifier, 'warn', 'handler_failed', 'Interception handler failed', {
                phase,
                error: describeError(error),
            });
        }
    }

    private injectSpanContext(request: HttpRequest): HttpRequest {
        const tracer = resolveTracer(this.tracer);
        if (!tracer) {
            return request;
        }

        try {
            const writer = new HTTPHeadersWriter();
            tracer.inject(tracer.createSpanContext(), writer);

            let headers = request.headers;
            const injected = { ...writer.tracePropagationHTTPHeaders, ...this.additionalHeadersForFirstPartyRequests };
            for (const [field, value] of Object.entries(injected)) {
                headers = setHeaderValue(headers, field, value);
            }
            return { ...request, headers };
        } catch (error) {
            this.log.emit(UNTRACKED_INTERCEPTION_ID, 'warn', 'trace_injection_failed', 'Trace context injection skipped', {
                error: describeError(error),
            });
            return request;
        }
    }

    private extractSpanContext(request: HttpRequest): SpanContext | undefined {
        const tracer = resolveTracer(this.tracer);
        if (!tracer) {
            return undefined;
        }
        try {
            return tracer.extract(new HTTPHeadersReader(request.headers));
        } catch (error) {
            this.log.emit(UNTRACKED_INTERCEPTION_ID, 'warn', 'trace_extraction_failed', 'Trace context extraction skipped', {
                error: describeError(error),
            });
            return undefined;
        }
    }
}
