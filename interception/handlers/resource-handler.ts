import type { InterceptionHandler } from '@/interception/request-interceptor';
import type { ResourceMetrics } from '@/interception/resource-metrics';
import type { InterceptionRecord } from '@/interception/task-interception';
import type { SpanContext } from '@/interception/tracer';
import { getHeaderValue } from '@/interception/tracing-headers';

export type ResourceKind = 'image' | 'font' | 'css' | 'js' | 'media' | 'fetch' | 'native';

export type ResourceStart = {
    readonly key: string;
    readonly url: string;
    readonly httpMethod: string;
    readonly spanContext?: SpanContext;
};

export type ResourceStop = {
    readonly key: string;
    readonly statusCode?: number;
    readonly kind: ResourceKind;
    readonly size?: number;
    readonly metrics?: ResourceMetrics;
};

export type ResourceStopWithError = {
    readonly key: string;
    readonly error: Error;
    readonly source: 'network';
    readonly statusCode?: number;
};

/** Sink for resource events, keyed by the interception identifier. */
export interface ResourceOutput {
    startResource(event: ResourceStart): void;
    stopResource(event: ResourceStop): void;
    stopResourceWithError(event: ResourceStopWithError): void;
}

const NATIVE_METHODS = new Set(['GET', 'HEAD']);

const CONTENT_TYPE_KINDS: ReadonlyArray<readonly [RegExp, ResourceKind]> = [
    [/^image\//, 'image'],
    [/^font\/|^application\/(x-)?font/, 'font'],
    [/^text\/css/, 'css'],
    [/javascript|ecmascript/, 'js'],
    [/^(audio|video)\//, 'media'],
];

/**
 * Requests that send data are `fetch`. Reads are typed from the response content type,
 * and fall back to `native`.
 */
export const resolveResourceKind = (httpMethod: string, contentType: string | undefined): ResourceKind => {
    if (!NATIVE_METHODS.has(httpMethod.toUpperCase())) {
        return 'fetch';
    }
    const mime = contentType?.split(';')[0]?.trim().toLowerCase();
    if (!mime) {
        return 'native';
    }
    return CONTENT_TYPE_KINDS.find(([pattern]) => pattern.test(mime))?.[1] ?? 'native';
};

export class ResourceInterceptionHandler implements InterceptionHandler {
    constructor(private readonly output: ResourceOutput) {}

    notifyInterceptionStarted(interception: InterceptionRecord): void {
        this.output.startResource({
            key: interception.identifier,
            url: interception.request.url,
            httpMethod: interception.request.method,
            spanContext: interception.spanContext,
        });
    }

    notifyInterceptionCompleted(interception: InterceptionRecord): void {
        const response = interception.completion?.response;
        const error = interception.completion?.error;

        if (error) {
            this.output.stopResourceWithError({
                key: interception.identifier,
                error,
                source: 'network',
                statusCode: response?.statusCode,
            });
            return;
        }

        this.output.stopResource({
            key: interception.identifier,
            statusCode: response?.statusCode,
            kind: resolveResourceKind(
                interception.request.method,
                response ? getHeaderValue(response.headers, 'content-type') : undefined,
            ),
            size: interception.metrics?.responseSize,
            metrics: interception.metrics,
        });
    }
}
