import type { ZodError } from 'zod';

/**
 * Base class for errors raised by this package. Only configuration parsing throws;
 * interception itself absorbs failures.
 */
export class NetworkTelemetryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NetworkTelemetryError';
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

export type ConfigurationIssue = {
    path: string;
    message: string;
};

/**
 * Raised when an instrumentation configuration (or the environment it was read from)
 * does not validate.
 */
export class ConfigurationError extends NetworkTelemetryError {
    constructor(
        message: string,
        public readonly issues: readonly ConfigurationIssue[] = [],
    ) {
        super(message);
        this.name = 'ConfigurationError';
    }

    static fromZodError(error: ZodError, subject = 'instrumentation configuration'): ConfigurationError {
        const issues = error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
        }));
        const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
        return new ConfigurationError(`Invalid ${subject}: ${summary}`, issues);
    }
}

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));
