// src/index.ts
export { RunningStats } from "./stats/runningStats";
export { ModeTracker } from "./stats/modeTracker";
export {
    RunningStatsError,
    RunningStatsErrorKind,
    isRunningStatsError,
} from "./stats/errors";
export type { ErrorContext } from "./stats/errors";
export {
    compareMeans,
    compareStats,
    isMeanSource,
    meanOf,
} from "./stats/comparison";
export type { Comparand, MeanSource, Ordering } from "./stats/comparison";
export * from "./stats/numericKind";
export type {
    AddResult,
    RunningStatsOptions,
    RunningStatsSnapshot,
} from "./types/statsTypes";
export { Logger, isLogLevel } from "./infrastructure/logger";
export type { LoggerOptions } from "./infrastructure/logger";
export type { ILogger, LogLevel } from "./infrastructure/loggerInterface";
