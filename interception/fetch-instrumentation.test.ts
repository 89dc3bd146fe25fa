import { describe, expect, it, vi } from 'vitest';
import {
    type FetchFunction,
    installFetchInstrumentation,
    instrumentFetch,
    toHttpRequest,
} from '@/interception/fetch-instrumentation';
import { RequestInterceptor } from '@/interception/request-interceptor';
import { logger } from '@/utils/logger';
import { parseInstrumentationConfiguration } from '@/utils/settings';
import { RecordingInterceptionHandler } from '@/tests/helpers/recording-handler';
import { createSequentialTracer } from '@/tests/helpers/sequential-tracer';

const createInterceptor = () => {
    const handler = new RecordingInterceptionHandler();
    const interceptor = new RequestInterceptor({
        configuration: parseInstrumentationConfiguration({
            userDefinedFirstPartyHosts: ['example.com'],
            instrumentTracing: true,
        }),
        handler,
        tracer: createSequentialTracer(),
    });
    return { handler, interceptor };
};

const steppingClock = (startMs: number, stepMs: number) => {
    let next = startMs;
    return () => {
        const value = next;
        next += stepMs;
        return value;
    };
};

describe('toHttpRequest', () => {
    it('normalizes a string input with init', () => {
        expect(
            toHttpRequest('https://api.example.com/items', {
                method: 'post',
                headers: { 'X-Request-Id': 'req-1' },
                body: '{"name":"test"}',
            }),
        ).toEqual({
            method: 'POST',
            url: 'https://api.example.com/items',
            headers: { 'x-request-id': 'req-1' },
            body: '{"name":"test"}',
        });
    });

    it('reads method and headers from a Request input', () => {
        const request = new Request('https://api.example.com/items/1', {
            method: 'PUT',
            headers: { Accept: 'text/plain' },
        });

        expect(toHttpRequest(request)).toEqual({
            method: 'PUT',
            url: 'https://api.example.com/items/1',
            headers: { accept: 'text/plain' },
        });
    });

    it('defaults to GET for a URL input', () => {
        expect(toHttpRequest(new URL('https://example.com/path?q=1'))).toEqual({
            method: 'GET',
            url: 'https://example.com/path?q=1',
            headers: {},
        });
    });
});

describe('instrumentFetch', () => {
    it('sends injected headers and reports the completed interception', async () => {
        const { handler, interceptor } = createInterceptor();
        const fetchImpl = vi.fn<FetchFunction>(
            async () => new Response('created', { status: 201, headers: { 'content-type': 'text/plain' } }),
        );
        const instrumented = instrumentFetch(fetchImpl, interceptor, { now: steppingClock(100, 50) });

        const response = await instrumented('https://api.example.com/items', {
            headers: { accept: 'application/json' },
        });
        await interceptor.whenIdle();

        expect(response.status).toBe(201);
        expect(fetchImpl).toHaveBeenCalledWith('https://api.example.com/items', {
            headers: {
                accept: 'application/json',
                'x-datadog-trace-id': '1',
                'x-datadog-parent-id': '2',
            },
        });
        expect(handler.completed).toHaveLength(1);
        const [record] = handler.completed;
        expect(record?.spanContext).toEqual({ traceId: '1', spanId: '2' });
        expect(record?.metrics).toEqual({ fetch: { startMs: 100, endMs: 150 } });
        expect(record?.completion?.response).toEqual({
            statusCode: 201,
            headers: { 'content-type': 'text/plain' },
        });
    });

    it('marks redirected responses in the metrics', async () => {
        const { handler, interceptor } = createInterceptor();
        const redirected = new Response('moved here');
        Object.defineProperty(redirected, 'redirected', { value: true });
        const fetchImpl = vi.fn<FetchFunction>(async () => redirected);

        await instrumentFetch(fetchImpl, interceptor, { now: steppingClock(100, 50) })('https://example.com/old');
        await interceptor.whenIdle();

        expect(handler.completed[0]?.metrics).toEqual({ fetch: { startMs: 100, endMs: 150 }, redirectCount: 1 });
    });

    it('passes the caller init through for requests it leaves alone', async () => {
        const { handler, interceptor } = createInterceptor();
        const fetchImpl = vi.fn<FetchFunction>(async () => new Response(null, { status: 204 }));
        const init = { headers: { accept: '*/*' } };

        await instrumentFetch(fetchImpl, interceptor)('https://cdn.other.io/lib.js', init);
        await interceptor.whenIdle();

        expect(fetchImpl.mock.calls[0]?.[1]).toBe(init);
        expect(handler.completed[0]?.isFirstParty).toBe(false);
    });

    it('reports transport failures and rethrows them', async () => {
        const { handler, interceptor } = createInterceptor();
        const failure = new TypeError('fetch failed');
        const fetchImpl = vi.fn<FetchFunction>(async () => {
            throw failure;
        });

        await expect(instrumentFetch(fetchImpl, interceptor)('https://example.com/')).rejects.toBe(failure);
        await interceptor.whenIdle();

        expect(handler.completed[0]?.completion?.error).toBe(failure);
        expect(handler.completed[0]?.completion?.response).toBeUndefined();
    });

    it('treats per-call hosts as first-party', async () => {
        const { interceptor } = createInterceptor();
        const fetchImpl = vi.fn<FetchFunction>(async () => new Response('ok'));

        await instrumentFetch(fetchImpl, interceptor, { additionalFirstPartyHosts: ['partner.org'] })(
            'https://partner.org/feed',
        );

        expect(fetchImpl).toHaveBeenCalledWith('https://partner.org/feed', {
            headers: { 'x-datadog-trace-id': '1', 'x-datadog-parent-id': '2' },
        });
    });

    it('falls back to the original fetch when the request cannot be read', async () => {
        const { handler, interceptor } = createInterceptor();
        const fetchImpl = vi.fn<FetchFunction>(async () => new Response('ok'));
        const init = { headers: { 'bad header': 'value' } };

        const response = await instrumentFetch(fetchImpl, interceptor)('https://example.com/', init);
        await interceptor.whenIdle();

        expect(response.status).toBe(200);
        expect(fetchImpl).toHaveBeenCalledWith('https://example.com/', init);
        expect(handler.started).toHaveLength(0);
        expect(logger.debug).toHaveBeenCalledWith('fetch instrumentation fallback', {
            requestUrl: 'https://example.com/',
            error: expect.any(String),
        });
    });
});

describe('installFetchInstrumentation', () => {
    it('replaces and restores the target fetch', () => {
        const { interceptor } = createInterceptor();
        const original = vi.fn<FetchFunction>(async () => new Response('ok'));
        const target: { fetch: FetchFunction } = { fetch: original };

        const restore = installFetchInstrumentation(interceptor, { target });
        expect(target.fetch).not.toBe(original);

        restore();
        expect(target.fetch).toBe(original);
    });

    it('leaves a fetch installed later in place', () => {
        const { interceptor } = createInterceptor();
        const original = vi.fn<FetchFunction>(async () => new Response('ok'));
        const later = vi.fn<FetchFunction>(async () => new Response('later'));
        const target: { fetch: FetchFunction } = { fetch: original };

        const restore = installFetchInstrumentation(interceptor, { target });
        target.fetch = later;
        restore();

        expect(target.fetch).toBe(later);
    });
});
