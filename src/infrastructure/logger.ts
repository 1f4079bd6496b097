// src/infrastructure/logger.ts
import util from "node:util";
import type { ILogger, LogLevel } from "./loggerInterface";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export interface LoggerOptions {
    pretty?: boolean;
    level?: LogLevel;
    component?: string;
}

/**
 * Structured logger writing one line per entry to stdout
 */
export class Logger implements ILogger {
    private readonly pretty: boolean;
    private readonly level: LogLevel;
    private readonly component: string | undefined;

    constructor(options: LoggerOptions = {}) {
        this.pretty = options.pretty ?? false;
        this.level = options.level ?? "debug";
        this.component = options.component;
    }

    public info(message: string, context?: Record<string, unknown>): void {
        this.log("info", message, context);
    }

    public error(message: string, context?: Record<string, unknown>): void {
        this.log("error", message, context);
    }

    public warn(message: string, context?: Record<string, unknown>): void {
        this.log("warn", message, context);
    }

    public debug(message: string, context?: Record<string, unknown>): void {
        this.log("debug", message, context);
    }

    private log(
        level: LogLevel,
        message: string,
        context?: Record<string, unknown>
    ): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
            return;
        }
        const label = level.toUpperCase();

        if (this.pretty) {
            const prefix = this.component
                ? `[${label}] [${this.component}]`
                : `[${label}]`;
            console.log(
                `${prefix} ${message}`,
                context
                    ? util.inspect(context, {
                          colors: true,
                          depth: null,
                          compact: false,
                      })
                    : ""
            );
            return;
        }

        console.log(
            JSON.stringify({
                timestamp: new Date().toISOString(),
                level: label,
                component: this.component,
                message,
                ...context,
            })
        );
    }
}

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_ORDER, value);
}
