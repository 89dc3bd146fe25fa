import { describe, expect, it } from 'vitest';
import { createRequestInterceptor } from '@/interception/create-interceptor';
import {
    createInterceptionHandler,
    ResourceInterceptionHandler,
    type ResourceOutput,
    type SpanWriter,
    TracingInterceptionHandler,
} from '@/interception/handlers';
import { ConfigurationError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { parseInstrumentationConfiguration } from '@/utils/settings';
import { createSequentialTracer } from '@/tests/helpers/sequential-tracer';

const spanWriter: SpanWriter = { write: () => {} };
const resourceOutput: ResourceOutput = {
    startResource: () => {},
    stopResource: () => {},
    stopResourceWithError: () => {},
};

describe('createInterceptionHandler', () => {
    it('selects the resource handler when RUM is enabled', () => {
        const configuration = parseInstrumentationConfiguration({ instrumentRUM: true, instrumentTracing: true });

        expect(createInterceptionHandler(configuration, { spanWriter, resourceOutput })).toBeInstanceOf(
            ResourceInterceptionHandler,
        );
    });

    it('selects the tracing handler otherwise', () => {
        const configuration = parseInstrumentationConfiguration({ instrumentTracing: true });

        expect(createInterceptionHandler(configuration, { spanWriter, resourceOutput })).toBeInstanceOf(
            TracingInterceptionHandler,
        );
    });

    it('rejects a missing output for the selected handler', () => {
        expect(() =>
            createInterceptionHandler(parseInstrumentationConfiguration({ instrumentRUM: true }), { spanWriter }),
        ).toThrow(ConfigurationError);
        expect(() => createInterceptionHandler(parseInstrumentationConfiguration({}), { resourceOutput })).toThrow(
            'Tracing handler selected but no span writer was provided',
        );
    });
});

describe('createRequestInterceptor', () => {
    it('builds an interceptor from a raw configuration', () => {
        const interceptor = createRequestInterceptor({
            configuration: { userDefinedFirstPartyHosts: ['example.com'], instrumentTracing: true },
            tracer: createSequentialTracer(),
            outputs: { spanWriter },
        });

        expect(interceptor.handler).toBeInstanceOf(TracingInterceptionHandler);
        expect(interceptor.injectTracingHeadersToFirstPartyRequests).toBe(true);
        expect(logger.info).toHaveBeenCalledWith('Request interception configured', {
            firstPartyHosts: 1,
            internalURLs: 0,
            tracing: true,
            rum: false,
        });
    });

    it('rejects an invalid configuration', () => {
        expect(() =>
            createRequestInterceptor({
                configuration: { sdkInternalURLs: ['intake'] },
                outputs: { spanWriter },
            }),
        ).toThrow('Invalid instrumentation configuration: sdkInternalURLs.0: Invalid url');
    });
});
