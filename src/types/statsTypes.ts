// src/types/statsTypes.ts
import type { ILogger } from "../infrastructure/loggerInterface";
import type { RunningStatsError } from "../stats/errors";

export type AddResult =
    | { success: true; data: number }
    | { success: false; error: RunningStatsError };

export interface RunningStatsOptions {
    /** Mean at or above which accepted values report ThresholdReached */
    threshold?: number;
    /** Keep a frequency table for mode(); defaults to true */
    trackMode?: boolean;
    logger?: ILogger;
}

export interface RunningStatsSnapshot {
    kind: string;
    count: number;
    mean: number;
    mode: number;
    threshold: number;
}
