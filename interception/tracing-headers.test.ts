import { describe, expect, it } from 'vitest';
import {
    getHeaderValue,
    HTTPHeadersReader,
    HTTPHeadersWriter,
    setHeaderValue,
    TRACING_HTTP_HEADERS,
} from '@/interception/tracing-headers';

describe('tracing-headers', () => {
    it('uses the wire header names', () => {
        expect(TRACING_HTTP_HEADERS).toEqual({
            traceIDField: 'x-datadog-trace-id',
            parentSpanIDField: 'x-datadog-parent-id',
            originField: 'x-datadog-origin',
            rumOriginValue: 'rum',
        });
    });

    it('reads headers case-insensitively', () => {
        expect(getHeaderValue({ 'Content-Type': 'text/css' }, 'content-type')).toBe('text/css');
        expect(getHeaderValue({ accept: '*/*' }, 'content-type')).toBeUndefined();
    });

    it('replaces a header of the same name in any case without touching the input', () => {
        const original = { 'X-Datadog-Trace-Id': '999', accept: '*/*' };

        const next = setHeaderValue(original, 'x-datadog-trace-id', '1');

        expect(next).toEqual({ accept: '*/*', 'x-datadog-trace-id': '1' });
        expect(original).toEqual({ 'X-Datadog-Trace-Id': '999', accept: '*/*' });
    });

    it('collects written fields in lowercase', () => {
        const writer = new HTTPHeadersWriter();
        writer.setValue('X-Datadog-Trace-Id', '10');
        writer.setValue('x-datadog-parent-id', '20');

        expect(writer.tracePropagationHTTPHeaders).toEqual({
            'x-datadog-trace-id': '10',
            'x-datadog-parent-id': '20',
        });
    });

    it('looks fields up through the reader', () => {
        const reader = new HTTPHeadersReader({ 'X-DATADOG-PARENT-ID': '42' });

        expect(reader.valueForField('x-datadog-parent-id')).toBe('42');
        expect(reader.valueForField('x-datadog-trace-id')).toBeUndefined();
    });
});
