// src/stats/errors.ts

export enum RunningStatsErrorKind {
    /** A negative value reached an accumulator over an unsigned kind. */
    NegativeValueToUnsignedType = "NegativeValueToUnsignedType",
    /** Reserved for bounded accumulator variants. */
    Overflow = "Overflow",
    /** Reserved for bounded accumulator variants. */
    Underflow = "Underflow",
    /** Reserved for bounded-count variants. */
    CountOverflow = "CountOverflow",
    /**
     * The running mean reached or exceeded the configured threshold.
     * The value that caused it has already been committed.
     */
    ThresholdReached = "ThresholdReached",
}

export interface ErrorContext {
    operation: string;
    component: string;
    metadata?: Record<string, unknown>;
}

export class RunningStatsError extends Error {
    constructor(
        public readonly kind: RunningStatsErrorKind,
        public readonly context: ErrorContext
    ) {
        super(kind);
        this.name = "RunningStatsError";
    }

    /**
     * True when the value was accepted despite the error being raised
     */
    get committed(): boolean {
        return this.kind === RunningStatsErrorKind.ThresholdReached;
    }
}

export function isRunningStatsError(
    value: unknown
): value is RunningStatsError {
    return value instanceof RunningStatsError;
}
