/**
 * Settings Utilities
 *
 * Environment keys, defaults and the validated instrumentation configuration.
 *
 * @module utils/settings
 */

import { z } from 'zod';
import { ConfigurationError } from '@/utils/errors';

export const ENV_KEYS = {
    LOG_LEVEL: 'NETWORK_TELEMETRY_LOG_LEVEL',
    FIRST_PARTY_HOSTS: 'NETWORK_TELEMETRY_FIRST_PARTY_HOSTS',
    INTAKE_URLS: 'NETWORK_TELEMETRY_INTAKE_URLS',
    TRACING: 'NETWORK_TELEMETRY_TRACING',
    RUM: 'NETWORK_TELEMETRY_RUM',
} as const;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

const hostSchema = z.string().trim().toLowerCase().min(1, 'host must not be empty');

const intakeUrlSchema = z.string().trim().url();

const configurationSchema = z.object({
    userDefinedFirstPartyHosts: z.array(hostSchema).default([]),
    sdkInternalURLs: z.array(intakeUrlSchema).default([]),
    instrumentTracing: z.boolean().default(false),
    instrumentRUM: z.boolean().default(false),
});

export type InstrumentationConfigurationInput = z.input<typeof configurationSchema>;

/**
 * Immutable configuration for request interception.
 * `instrumentTracing` turns on header injection for first-party requests;
 * `instrumentRUM` turns on resource tracking (and, together with tracing, the origin header).
 */
export type InstrumentationConfiguration = {
    readonly userDefinedFirstPartyHosts: ReadonlySet<string>;
    readonly sdkInternalURLs: ReadonlySet<string>;
    readonly instrumentTracing: boolean;
    readonly instrumentRUM: boolean;
};

export const parseInstrumentationConfiguration = (input: InstrumentationConfigurationInput): InstrumentationConfiguration => {
    const result = configurationSchema.safeParse(input);
    if (!result.success) {
        throw ConfigurationError.fromZodError(result.error);
    }
    return Object.freeze({
        userDefinedFirstPartyHosts: new Set(result.data.userDefinedFirstPartyHosts),
        sdkInternalURLs: new Set(result.data.sdkInternalURLs),
        instrumentTracing: result.data.instrumentTracing,
        instrumentRUM: result.data.instrumentRUM,
    });
};

const envListSchema = z
    .string()
    .optional()
    .transform((value) =>
        (value ?? '')
            .split(',')
            .map((item) => item.trim())
            .filter((item) => item.length > 0),
    );

const envFlagSchema = z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0']))
    .optional()
    .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
    NETWORK_TELEMETRY_FIRST_PARTY_HOSTS: envListSchema,
    NETWORK_TELEMETRY_INTAKE_URLS: envListSchema,
    NETWORK_TELEMETRY_TRACING: envFlagSchema,
    NETWORK_TELEMETRY_RUM: envFlagSchema,
});

type Environment = Readonly<Record<string, string | undefined>>;

export const configurationFromEnv = (env: Environment = process.env): InstrumentationConfiguration => {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        throw ConfigurationError.fromZodError(result.error, 'instrumentation environment');
    }
    return parseInstrumentationConfiguration({
        userDefinedFirstPartyHosts: result.data[ENV_KEYS.FIRST_PARTY_HOSTS],
        sdkInternalURLs: result.data[ENV_KEYS.INTAKE_URLS],
        instrumentTracing: result.data[ENV_KEYS.TRACING],
        instrumentRUM: result.data[ENV_KEYS.RUM],
    });
};

const logLevelSchema = z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS));

/** Unknown or missing values fall back to {@link DEFAULT_LOG_LEVEL}. */
export const resolveLogLevel = (env: Environment = process.env): LogLevel => {
    const result = logLevelSchema.safeParse(env[ENV_KEYS.LOG_LEVEL]);
    return result.success ? result.data : DEFAULT_LOG_LEVEL;
};
