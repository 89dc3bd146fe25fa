import { createInterceptionHandler, type HandlerOutputs } from '@/interception/handlers';
import { RequestInterceptor } from '@/interception/request-interceptor';
import type { TracerSource } from '@/interception/tracer';
import { logger } from '@/utils/logger';
import { type InstrumentationConfigurationInput, parseInstrumentationConfiguration } from '@/utils/settings';

export type CreateRequestInterceptorOptions = {
    configuration: InstrumentationConfigurationInput;
    tracer?: TracerSource;
    outputs: Omit<HandlerOutputs, 'tracer'>;
};

/**
 * Validates the configuration, picks the handler it calls for and builds the interceptor.
 * Throws a `ConfigurationError` when either step is rejected.
 */
export const createRequestInterceptor = (options: CreateRequestInterceptorOptions): RequestInterceptor => {
    const configuration = parseInstrumentationConfiguration(options.configuration);
    const handler = createInterceptionHandler(configuration, { ...options.outputs, tracer: options.tracer });

    logger.info('Request interception configured', {
        firstPartyHosts: configuration.userDefinedFirstPartyHosts.size,
        internalURLs: configuration.sdkInternalURLs.size,
        tracing: configuration.instrumentTracing,
        rum: configuration.instrumentRUM,
    });

    return new RequestInterceptor({ configuration, handler, tracer: options.tracer });
};
