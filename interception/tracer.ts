import { randomBytes } from 'node:crypto';
import { type HTTPHeadersReader, type HTTPHeadersWriter, TRACING_HTTP_HEADERS } from '@/interception/tracing-headers';

/** Identifies a span across process boundaries. Ids are unsigned 64-bit integers in decimal. */
export type SpanContext = {
    readonly traceId: string;
    readonly spanId: string;
};

export interface Tracer {
    createSpanContext(): SpanContext;
    inject(spanContext: SpanContext, writer: HTTPHeadersWriter): void;
    extract(reader: HTTPHeadersReader): SpanContext | undefined;
}

/**
 * Either a fixed tracer or a lookup evaluated on every use, so a tracer registered
 * after the interceptor was built is still picked up. `undefined` means tracing is off.
 */
export type TracerSource = Tracer | (() => Tracer | undefined);

export const resolveTracer = (source: TracerSource | undefined): Tracer | undefined =>
    typeof source === 'function' ? source() : source;

const MAX_GENERATED_ID = (1n << 63n) - 1n;
const MAX_UINT64 = (1n << 64n) - 1n;
const TRACING_ID_PATTERN = /^\d{1,20}$/;

/** Random non-zero 63-bit id, rendered in decimal. */
export const generateTracingId = (): string => {
    const value = randomBytes(8).readBigUInt64BE() & MAX_GENERATED_ID;
    return (value === 0n ? 1n : value).toString(10);
};

export const isTracingId = (value: string | undefined): value is string => {
    if (value === undefined || !TRACING_ID_PATTERN.test(value)) {
        return false;
    }
    const parsed = BigInt(value);
    return parsed > 0n && parsed <= MAX_UINT64;
};

export type HeadersTracerOptions = {
    generateId?: () => string;
};

/** Tracer propagating span contexts through the trace-id and parent-id headers. */
export const createHeadersTracer = (options: HeadersTracerOptions = {}): Tracer => {
    const generateId = options.generateId ?? generateTracingId;

    return {
        createSpanContext: () => ({ traceId: generateId(), spanId: generateId() }),
        inject: (spanContext, writer) => {
            writer.setValue(TRACING_HTTP_HEADERS.traceIDField, spanContext.traceId);
            writer.setValue(TRACING_HTTP_HEADERS.parentSpanIDField, spanContext.spanId);
        },
        extract: (reader) => {
            const traceId = reader.valueForField(TRACING_HTTP_HEADERS.traceIDField)?.trim();
            const spanId = reader.valueForField(TRACING_HTTP_HEADERS.parentSpanIDField)?.trim();
            if (!isTracingId(traceId) || !isTracingId(spanId)) {
                return undefined;
            }
            return { traceId, spanId };
        },
    };
};
