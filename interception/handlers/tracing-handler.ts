import type { InterceptionHandler } from '@/interception/request-interceptor';
import type { InterceptionRecord } from '@/interception/task-interception';
import { resolveTracer, type SpanContext, type TracerSource } from '@/interception/tracer';

export const SPAN_OPERATION_NAME = 'fetch.request';

export type SpanTags = Readonly<Record<string, string>>;

/** A finished client span, handed to the {@link SpanWriter}. */
export type SpanRecord = {
    readonly operationName: string;
    readonly resourceName: string;
    readonly traceId: string;
    readonly spanId: string;
    readonly startMs: number;
    readonly durationMs: number;
    readonly tags: SpanTags;
    readonly isError: boolean;
};

export interface SpanWriter {
    write(span: SpanRecord): void;
}

export type TracingHandlerOptions = {
    writer: SpanWriter;
    tracer?: TracerSource;
};

const errorTags = (interception: InterceptionRecord): Record<string, string> => {
    const error = interception.completion?.error;
    if (error) {
        return {
            'error.type': error.name,
            'error.message': error.message,
            ...(error.stack ? { 'error.stack': error.stack } : {}),
        };
    }
    const statusCode = interception.completion?.response?.statusCode;
    if (statusCode !== undefined && statusCode >= 400) {
        const description = `HTTP ${statusCode}`;
        return { 'error.type': description, 'error.message': description };
    }
    return {};
};

/**
 * Writes one client span per completed first-party interception.
 *
 * The span reuses the context injected into the request when it could be extracted again;
 * otherwise a new context is taken from the tracer. Nothing is written without a tracer.
 */
export class TracingInterceptionHandler implements InterceptionHandler {
    private readonly writer: SpanWriter;
    private readonly tracer: TracerSource | undefined;

    constructor(options: TracingHandlerOptions) {
        this.writer = options.writer;
        this.tracer = options.tracer;
    }

    notifyInterceptionStarted(_interception: InterceptionRecord): void {}

    notifyInterceptionCompleted(interception: InterceptionRecord): void {
        if (!interception.isFirstParty) {
            return;
        }
        const spanContext = this.spanContextFor(interception);
        if (!spanContext) {
            return;
        }

        const { request, metrics, completion } = interception;
        const statusCode = completion?.response?.statusCode;
        const tags: Record<string, string> = {
            'http.url': request.url,
            'http.method': request.method,
            'span.kind': 'client',
            ...(statusCode !== undefined ? { 'http.status_code': String(statusCode) } : {}),
            ...errorTags(interception),
        };
        const fetch = metrics?.fetch;

        this.writer.write({
            operationName: SPAN_OPERATION_NAME,
            resourceName: statusCode === 404 ? '404' : request.url,
            traceId: spanContext.traceId,
            spanId: spanContext.spanId,
            startMs: fetch?.startMs ?? 0,
            durationMs: fetch ? Math.max(0, fetch.endMs - fetch.startMs) : 0,
            tags,
            isError: 'error.type' in tags,
        });
    }

    private spanContextFor(interception: InterceptionRecord): SpanContext | undefined {
        if (interception.spanContext) {
            return interception.spanContext;
        }
        return resolveTracer(this.tracer)?.createSpanContext();
    }
}
