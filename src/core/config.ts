// src/core/config.ts
import dotenv from "dotenv";
dotenv.config();
import { z } from "zod";
import { Logger, isLogLevel } from "../infrastructure/logger";
import type { ILogger, LogLevel } from "../infrastructure/loggerInterface";
import type { NumericKind } from "../stats/numericKind";
import { RunningStats } from "../stats/runningStats";

const BooleanFlagSchema = z
    .enum(["true", "false", "1", "0"])
    .transform((flag) => flag === "true" || flag === "1");

export const RunningStatsOptionsSchema = z.object({
    threshold: z.number().optional(),
    trackMode: z.boolean().default(true),
});

export type RunningStatsConfig = z.infer<typeof RunningStatsOptionsSchema>;

/**
 * Validates accumulator options coming from outside the type system
 * (parsed JSON, environment). Throws a ZodError on invalid input.
 */
export function parseOptions(input: unknown): RunningStatsConfig {
    return RunningStatsOptionsSchema.parse(input);
}

const EnvSchema = z.object({
    RUNNING_STATS_THRESHOLD: z.coerce.number().optional(),
    RUNNING_STATS_TRACK_MODE: BooleanFlagSchema.optional(),
    LOG_PRETTY: BooleanFlagSchema.optional(),
    LOG_LEVEL: z
        .string()
        .refine(isLogLevel, { message: "LOG_LEVEL must be debug|info|warn|error" })
        .optional(),
});

function readEnv(): z.infer<typeof EnvSchema> {
    return EnvSchema.parse({
        RUNNING_STATS_THRESHOLD: process.env["RUNNING_STATS_THRESHOLD"] || undefined,
        RUNNING_STATS_TRACK_MODE: process.env["RUNNING_STATS_TRACK_MODE"] || undefined,
        LOG_PRETTY: process.env["LOG_PRETTY"] || undefined,
        LOG_LEVEL: process.env["LOG_LEVEL"] || undefined,
    });
}

export class Config {
    static get THRESHOLD(): number | undefined {
        return readEnv().RUNNING_STATS_THRESHOLD;
    }

    static get TRACK_MODE(): boolean {
        return readEnv().RUNNING_STATS_TRACK_MODE ?? true;
    }

    static get LOG_PRETTY(): boolean {
        return readEnv().LOG_PRETTY ?? false;
    }

    static get LOG_LEVEL(): LogLevel {
        return readEnv().LOG_LEVEL ?? "info";
    }

    static get STATS_OPTIONS(): RunningStatsConfig {
        return parseOptions({
            threshold: Config.THRESHOLD,
            trackMode: Config.TRACK_MODE,
        });
    }

    /**
     * Throws when any environment setting is malformed
     */
    static validate(): void {
        readEnv();
    }
}

/**
 * Builds an accumulator from the environment settings. A logger is
 * created from LOG_PRETTY and LOG_LEVEL unless one is passed in.
 */
export function statsFromEnv<T extends number | bigint>(
    kind: NumericKind<T>,
    logger?: ILogger
): RunningStats<T> {
    return new RunningStats(kind, {
        ...Config.STATS_OPTIONS,
        logger:
            logger ??
            new Logger({
                pretty: Config.LOG_PRETTY,
                level: Config.LOG_LEVEL,
                component: "RunningStats",
            }),
    });
}
