/**
 * Centralized Error Handler
 *
 * Consistent severity handling for the tracker's try/catch sites. Reports
 * through the run logger it was constructed with.
 */

import type { RunLogger } from '../logging/Logger.js';

export enum ErrorSeverity {
    /** No logging - for non-critical optional operations */
    SILENT = 'silent',
    /** Warning only - for recoverable failures */
    WARNING = 'warning',
    /** Error logging - for significant failures with recovery */
    ERROR = 'error',
    /** Critical - re-throws after logging */
    CRITICAL = 'critical'
}

export interface ErrorContext {
    /** Component or function name */
    component: string;
    /** Operation being performed */
    operation?: string;
    /** Additional context data */
    data?: Record<string, unknown>;
}

/**
 * Standardized error information
 */
export interface ErrorInfo {
    message: string;
    stack?: string;
    code?: string;
    context: ErrorContext;
    timestamp: string;
}

function errorCode(err: Error): string | undefined {
    const code: unknown = Reflect.get(err, 'code');
    return typeof code === 'string' ? code : undefined;
}

export class ErrorHandler {
    constructor(private readonly logger: RunLogger) { }

    private static formatContext(ctx: ErrorContext): string {
        const parts = [ctx.component];
        if (ctx.operation) parts.push(ctx.operation);
        return `[${parts.join('.')}]`;
    }

    /**
     * Handle an error with specified severity
     */
    handle(
        error: unknown,
        context: ErrorContext,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): ErrorInfo {
        const err = error instanceof Error ? error : new Error(String(error));
        const prefix = ErrorHandler.formatContext(context);

        const errorInfo: ErrorInfo = {
            message: err.message,
            stack: err.stack,
            code: errorCode(err),
            context,
            timestamp: new Date().toISOString()
        };

        switch (severity) {
            case ErrorSeverity.SILENT:
                break;

            case ErrorSeverity.WARNING:
                this.logger.warn(`${prefix} ${err.message}`);
                break;

            case ErrorSeverity.ERROR:
                this.logger.error(`${prefix} ${err.message}`);
                if (context.data) {
                    this.logger.error(`${prefix} Context: ${JSON.stringify(context.data)}`);
                }
                break;

            case ErrorSeverity.CRITICAL:
                this.logger.critical(`${prefix} ${err.message}`);
                this.logger.critical(`${prefix} Stack: ${err.stack ?? '(no stack)'}`);
                if (context.data) {
                    this.logger.critical(`${prefix} Context: ${JSON.stringify(context.data)}`);
                }
                throw err;
        }

        return errorInfo;
    }

    /**
     * Safely execute an async function with error handling
     */
    async safeExecute<T>(
        fn: () => Promise<T>,
        context: ErrorContext,
        defaultValue: T,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            this.handle(error, context, severity);
            return defaultValue;
        }
    }

    /**
     * Safely execute a sync function with error handling
     */
    safeExecuteSync<T>(
        fn: () => T,
        context: ErrorContext,
        defaultValue: T,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): T {
        try {
            return fn();
        } catch (error) {
            this.handle(error, context, severity);
            return defaultValue;
        }
    }
}

export default ErrorHandler;
