/**
 * Run Logger
 *
 * Builds the per-run winston logger. One instance is created by the CLI and
 * passed down through the run context; nothing in the project logs through a
 * module-level logger.
 */

import winston from 'winston';

export const LOG_LEVELS = {
    critical: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * The subset of the winston API the tracker relies on, plus the custom
 * `critical` level.
 */
export interface RunLogger {
    critical(message: string, ...meta: unknown[]): RunLogger;
    error(message: string, ...meta: unknown[]): RunLogger;
    warn(message: string, ...meta: unknown[]): RunLogger;
    info(message: string, ...meta: unknown[]): RunLogger;
    debug(message: string, ...meta: unknown[]): RunLogger;
}

export interface LoggerOptions {
    level?: LogLevel;
    /** Log file path; omitted means console only */
    logFile?: string;
    /** Drop every line (tests) */
    silent?: boolean;
}

export const LOG_LINE_FORMAT = winston.format.printf(({ timestamp, level, message, stack }) => {
    const line = `${String(timestamp)} - ${level.toUpperCase()} - ${String(message)}`;
    return typeof stack === 'string' ? `${line}\n${stack}` : line;
});

export type WinstonRunLogger = winston.Logger & RunLogger;

function hasCriticalLevel(logger: winston.Logger): logger is WinstonRunLogger {
    return typeof Reflect.get(logger, 'critical') === 'function';
}

export function createRunLogger(options: LoggerOptions = {}): WinstonRunLogger {
    const transports: winston.transport[] = [new winston.transports.Console()];
    if (options.logFile) {
        transports.push(new winston.transports.File({ filename: options.logFile }));
    }

    const logger = winston.createLogger({
        levels: LOG_LEVELS,
        level: options.level ?? 'info',
        silent: options.silent ?? false,
        format: winston.format.combine(
            winston.format.errors({ stack: true }),
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            LOG_LINE_FORMAT
        ),
        transports
    });

    // winston adds one method per configured level at runtime
    if (!hasCriticalLevel(logger)) {
        throw new Error('winston logger is missing the critical level');
    }
    return logger;
}

/**
 * End the logger and resolve once every file transport has finished writing.
 */
export function closeRunLogger(logger: winston.Logger): Promise<void> {
    const flushed = logger.transports
        .filter(transport => transport instanceof winston.transports.File)
        .map(transport => new Promise<void>(resolve => transport.once('finish', () => resolve())));
    logger.end();
    return Promise.all(flushed).then(() => undefined);
}
