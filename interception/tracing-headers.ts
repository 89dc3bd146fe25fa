import type { HttpHeaders } from '@/interception/types';

/** Header fields understood by the tracing backend. Names are part of the wire contract. */
export const TRACING_HTTP_HEADERS = {
    traceIDField: 'x-datadog-trace-id',
    parentSpanIDField: 'x-datadog-parent-id',
    originField: 'x-datadog-origin',
    rumOriginValue: 'rum',
} as const;

const findHeaderName = (headers: HttpHeaders, field: string): string | undefined => {
    const wanted = field.toLowerCase();
    return Object.keys(headers).find((name) => name.toLowerCase() === wanted);
};

export const getHeaderValue = (headers: HttpHeaders, field: string): string | undefined => {
    const name = findHeaderName(headers, field);
    return name === undefined ? undefined : headers[name];
};

/** Returns a copy with `field` set, replacing any existing header of the same name in any case. */
export const setHeaderValue = (headers: HttpHeaders, field: string, value: string): Record<string, string> => {
    const next: Record<string, string> = { ...headers };
    const existing = findHeaderName(next, field);
    if (existing !== undefined) {
        delete next[existing];
    }
    next[field] = value;
    return next;
};

/** Collects the headers a tracer writes while injecting a span context. */
export class HTTPHeadersWriter {
    private readonly fields = new Map<string, string>();

    setValue(field: string, value: string): void {
        this.fields.set(field.toLowerCase(), value);
    }

    get tracePropagationHTTPHeaders(): Readonly<Record<string, string>> {
        return Object.fromEntries(this.fields);
    }
}

export class HTTPHeadersReader {
    constructor(private readonly headers: HttpHeaders) {}

    valueForField(field: string): string | undefined {
        return getHeaderValue(this.headers, field);
    }
}
