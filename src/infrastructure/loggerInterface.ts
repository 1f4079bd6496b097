export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Common interface for all logger implementations
 */
export interface ILogger {
    info(message: string, context?: Record<string, unknown>): void;

    error(message: string, context?: Record<string, unknown>): void;

    warn(message: string, context?: Record<string, unknown>): void;

    debug(message: string, context?: Record<string, unknown>): void;
}
