import { type ILogObj, Logger } from 'tslog';
import { type LogLevel, resolveLogLevel } from '@/utils/settings';

export type { LogLevel };

// tslog level ids: 0 silly, 1 trace, 2 debug, 3 info, 4 warn, 5 error, 6 fatal
const MIN_LEVEL_BY_NAME: Record<LogLevel, number> = {
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
};

/**
 * Package Logger
 *
 * A singleton wrapping a tslog JSON logger. The starting level comes from
 * `NETWORK_TELEMETRY_LOG_LEVEL` and can be changed at runtime with {@link TelemetryLogger.setLevel}.
 */
export class TelemetryLogger {
    private static instance: TelemetryLogger | undefined;
    private readonly logger: Logger<ILogObj>;
    private level: LogLevel;

    private constructor(level: LogLevel) {
        this.level = level;
        this.logger = new Logger({
            name: 'network-telemetry',
            minLevel: MIN_LEVEL_BY_NAME[level],
            hideLogPositionForProduction: true,
            type: 'json',
        });
    }

    public static getInstance(): TelemetryLogger {
        if (!TelemetryLogger.instance) {
            TelemetryLogger.instance = new TelemetryLogger(resolveLogLevel());
        }
        return TelemetryLogger.instance;
    }

    public debug(message: string, ...args: unknown[]) {
        this.logger.debug(message, ...args);
    }

    public info(message: string, ...args: unknown[]) {
        this.logger.info(message, ...args);
    }

    public warn(message: string, ...args: unknown[]) {
        this.logger.warn(message, ...args);
    }

    public error(message: string, ...args: unknown[]) {
        this.logger.error(message, ...args);
    }

    public setLevel(level: LogLevel) {
        this.level = level;
        this.logger.settings.minLevel = MIN_LEVEL_BY_NAME[level];
    }

    public getLevel(): LogLevel {
        return this.level;
    }

    /** Exposed for tests that need to observe what reaches tslog. */
    public attachTransport(transport: (logObj: ILogObj) => void) {
        this.logger.attachTransport(transport);
    }
}

export const logger = TelemetryLogger.getInstance();
