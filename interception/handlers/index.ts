import { ResourceInterceptionHandler, type ResourceOutput } from '@/interception/handlers/resource-handler';
import { type SpanWriter, TracingInterceptionHandler } from '@/interception/handlers/tracing-handler';
import type { InterceptionHandler } from '@/interception/request-interceptor';
import type { TracerSource } from '@/interception/tracer';
import { ConfigurationError } from '@/utils/errors';
import type { InstrumentationConfiguration } from '@/utils/settings';

export type HandlerOutputs = {
    spanWriter?: SpanWriter;
    resourceOutput?: ResourceOutput;
    tracer?: TracerSource;
};

/** Resource tracking takes precedence; without it, completions become trace spans. */
export const createInterceptionHandler = (
    configuration: InstrumentationConfiguration,
    outputs: HandlerOutputs,
): InterceptionHandler => {
    if (configuration.instrumentRUM) {
        if (!outputs.resourceOutput) {
            throw new ConfigurationError('Resource tracking is enabled but no resource output was provided', [
                { path: 'resourceOutput', message: 'required when instrumentRUM is true' },
            ]);
        }
        return new ResourceInterceptionHandler(outputs.resourceOutput);
    }

    if (!outputs.spanWriter) {
        throw new ConfigurationError('Tracing handler selected but no span writer was provided', [
            { path: 'spanWriter', message: 'required when instrumentRUM is false' },
        ]);
    }
    return new TracingInterceptionHandler({ writer: outputs.spanWriter, tracer: outputs.tracer });
};

export * from '@/interception/handlers/resource-handler';
export * from '@/interception/handlers/tracing-handler';
