export { ContextSnapshotStore, type ContextSnapshotStoreOptions } from '@/context/context-snapshot-store';
export type * from '@/context/types';
export { type CreateRequestInterceptorOptions, createRequestInterceptor } from '@/interception/create-interceptor';
export {
    type FetchFunction,
    type FetchInstrumentationOptions,
    type InstallFetchOptions,
    installFetchInstrumentation,
    instrumentFetch,
    toHttpRequest,
} from '@/interception/fetch-instrumentation';
export * from '@/interception/handlers';
export {
    type InterceptionHandler,
    RequestInterceptor,
    type RequestInterceptorOptions,
} from '@/interception/request-interceptor';
export * from '@/interception/resource-metrics';
export * from '@/interception/task-interception';
export * from '@/interception/tracer';
export * from '@/interception/tracing-headers';
export type * from '@/interception/types';
export * from '@/interception/url-filters';
export { ConfigurationError, type ConfigurationIssue, NetworkTelemetryError } from '@/utils/errors';
export { logger, TelemetryLogger } from '@/utils/logger';
export { SerialQueue } from '@/utils/serial-queue';
export {
    configurationFromEnv,
    type InstrumentationConfiguration,
    type InstrumentationConfigurationInput,
    type LogLevel,
    parseInstrumentationConfiguration,
} from '@/utils/settings';
export { type ValueObservable, type ValueObserver, ValuePublisher } from '@/utils/value-publisher';
