/**
 * Fetch Instrumentation
 *
 * Drives a {@link RequestInterceptor} from `fetch`: each call is one task whose metrics
 * and completion are reported once the response head arrives or the call fails.
 */

import type { RequestInterceptor } from '@/interception/request-interceptor';
import type { HttpHeaders, HttpRequest, NetworkTask, TransportSession } from '@/interception/types';
import { describeError, toError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export type FetchFunction = typeof fetch;
type FetchInput = Parameters<FetchFunction>[0];
type FetchInit = Parameters<FetchFunction>[1];

export type FetchInstrumentationOptions = {
    /** Hosts treated as first-party for this fetch only, on top of the configured ones. */
    additionalFirstPartyHosts?: Iterable<string>;
    now?: () => number;
};

const resolveRequestUrl = (input: FetchInput): string => {
    if (typeof input === 'string') {
        return input;
    }
    if (input instanceof URL) {
        return input.href;
    }
    return input.url;
};

const resolveRequestMethod = (input: FetchInput, init?: FetchInit): string => {
    if (typeof init?.method === 'string' && init.method.length > 0) {
        return init.method.toUpperCase();
    }
    if (input instanceof Request) {
        return input.method;
    }
    return 'GET';
};

export const headersToRecord = (headers: Headers): HttpHeaders => {
    const record: Record<string, string> = {};
    headers.forEach((value, name) => {
        record[name] = value;
    });
    return record;
};

/** The request as fetch would send it. Init headers replace those of a `Request` input. */
export const toHttpRequest = (input: FetchInput, init?: FetchInit): HttpRequest => {
    const headerSource = init?.headers ?? (input instanceof Request ? input.headers : undefined);
    const body = init?.body;
    return {
        method: resolveRequestMethod(input, init),
        url: resolveRequestUrl(input),
        headers: headersToRecord(new Headers(headerSource)),
        ...(typeof body === 'string' ? { body } : {}),
    };
};

export const instrumentFetch = (
    fetchImpl: FetchFunction,
    interceptor: RequestInterceptor,
    options: FetchInstrumentationOptions = {},
): FetchFunction => {
    const now = options.now ?? Date.now;
    const session: TransportSession | undefined = options.additionalFirstPartyHosts
        ? { additionalFirstPartyHosts: [...options.additionalFirstPartyHosts] }
        : undefined;

    const prepare = (input: FetchInput, init?: FetchInit): { task: NetworkTask; sendInit: FetchInit } | undefined => {
        try {
            const request = toHttpRequest(input, init);
            const modified = interceptor.modify(request, session);
            return {
                task: { originalRequest: modified },
                sendInit: modified === request ? init : { ...init, headers: { ...modified.headers } },
            };
        } catch (error) {
            logger.debug('fetch instrumentation fallback', {
                requestUrl: resolveRequestUrl(input),
                error: describeError(error),
            });
            return undefined;
        }
    };

    return async (input: FetchInput, init?: FetchInit): Promise<Response> => {
        const prepared = prepare(input, init);
        if (!prepared) {
            return fetchImpl(input, init);
        }

        const { task, sendInit } = prepared;
        interceptor.taskCreated(task, session);
        const startMs = now();
        // Fetch only says whether it followed redirects, not how many.
        const reportMetrics = (redirected: boolean) => {
            interceptor.taskMetricsCollected(task, {
                taskInterval: { startMs, endMs: now() },
                redirectCount: redirected ? 1 : 0,
                transactionMetrics: [],
            });
        };

        try {
            const response = await fetchImpl(input, sendInit);
            task.response = { statusCode: response.status, headers: headersToRecord(response.headers) };
            reportMetrics(response.redirected);
            interceptor.taskCompleted(task);
            return response;
        } catch (error) {
            reportMetrics(false);
            interceptor.taskCompleted(task, toError(error));
            throw error;
        }
    };
};

export type InstallFetchOptions = FetchInstrumentationOptions & {
    target?: { fetch: FetchFunction };
};

/**
 * Replaces `target.fetch` (the global one by default) and returns a function restoring it.
 * Restoring leaves a fetch installed later by someone else in place.
 */
export const installFetchInstrumentation = (
    interceptor: RequestInterceptor,
    options: InstallFetchOptions = {},
): (() => void) => {
    const { target = globalThis, ...instrumentationOptions } = options;
    const original = target.fetch;
    const instrumented = instrumentFetch(original, interceptor, instrumentationOptions);
    target.fetch = instrumented;

    return () => {
        if (target.fetch === instrumented) {
            target.fetch = original;
        }
    };
};
