/**
 * Centralized Error Handler
 *
 * Consistent severity-based handling for failures that should be logged and
 * absorbed (optional artifacts, warnings) versus ones that must abort.
 */

import type { Logger } from '../../core/Logger.js';
import { ContractError, describeError } from './errors.js';

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
    /** Where to report; console when absent */
    logger?: Logger;
}

export interface ErrorInfo {
    message: string;
    name: string;
    context: ErrorContext;
    timestamp: string;
}

export class ErrorHandler {
    private static formatContext(ctx: ErrorContext): string {
        const parts = [ctx.component];
        if (ctx.operation) parts.push(ctx.operation);
        return `[${parts.join('.')}]`;
    }

    private static formatData(ctx: ErrorContext): string {
        if (!ctx.data) return '';
        return ` ${JSON.stringify(ctx.data)}`;
    }

    /**
     * Handle an error with specified severity
     */
    static handle(
        error: unknown,
        context: ErrorContext,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): ErrorInfo {
        const err = error instanceof Error ? error : new Error(describeError(error));
        const prefix = this.formatContext(context);
        const info: ErrorInfo = {
            message: err.message,
            name: err.name,
            context,
            timestamp: new Date().toISOString()
        };

        const warn = (line: string) => context.logger ? context.logger.warn(line) : console.warn(line);
        const fail = (line: string) => context.logger ? context.logger.error(line) : console.error(line);

        switch (severity) {
            case ErrorSeverity.SILENT:
                break;

            case ErrorSeverity.WARNING:
                warn(`${prefix} ${err.message}`);
                break;

            case ErrorSeverity.ERROR:
                fail(`${prefix} ${err.message}${this.formatData(context)}`);
                break;

            case ErrorSeverity.CRITICAL:
                fail(`${prefix} CRITICAL: ${err.message}${this.formatData(context)}`);
                throw err;
        }

        return info;
    }

    /**
     * Safely execute an async function with error handling
     */
    static async safeExecute<T>(
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
    static safeExecuteSync<T>(
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

    /**
     * Assert a precondition; a broken one is a ContractError.
     */
    static assert(
        condition: boolean,
        message: string,
        context: ErrorContext
    ): asserts condition {
        if (!condition) {
            this.handle(new ContractError(message, context.data), context, ErrorSeverity.CRITICAL);
        }
    }
}

export default ErrorHandler;
