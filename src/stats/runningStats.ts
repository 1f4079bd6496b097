// src/stats/runningStats.ts
import type { ILogger } from "../infrastructure/loggerInterface";
import type {
    AddResult,
    RunningStatsOptions,
    RunningStatsSnapshot,
} from "../types/statsTypes";
import { compareStats, type Comparand, type Ordering } from "./comparison";
import { RunningStatsError, RunningStatsErrorKind } from "./errors";
import { ModeTracker } from "./modeTracker";
import type { NumericKind } from "./numericKind";

const COMPONENT = "RunningStats";

/**
 * Running mean, mode and count over a stream of values of one numeric kind.
 *
 * The mean is updated incrementally (`mean += (x - mean) / n`), so no
 * running sum is stored and large integer inputs never overflow. When a
 * threshold is set, every accepted value that leaves the mean at or above
 * it is reported as `ThresholdReached`; the value still counts.
 *
 * Not safe for interleaved mutation from several owners; callers sharing
 * an instance across workers must serialize `add` themselves.
 *
 * @example
 * const stats = new RunningStats(NumericKinds.u32);
 * stats.add(10).add(10).add(10).add(20);
 * stats.mean(); // 12.5
 * stats.mode(); // 10
 */
export class RunningStats<T extends number | bigint> {
    private n = 0;
    private runningMean = 0;
    private readonly modes: ModeTracker | undefined;
    private readonly limit: number;
    private readonly logger: ILogger | undefined;

    constructor(
        public readonly kind: NumericKind<T>,
        options: RunningStatsOptions = {}
    ) {
        this.limit = options.threshold ?? Number.MAX_VALUE;
        this.modes = options.trackMode === false ? undefined : new ModeTracker();
        this.logger = options.logger;
    }

    static withThreshold<T extends number | bigint>(
        kind: NumericKind<T>,
        threshold: number,
        options: Omit<RunningStatsOptions, "threshold"> = {}
    ): RunningStats<T> {
        return new RunningStats(kind, { ...options, threshold });
    }

    addWithResult(value: T): AddResult {
        const asFloat = this.kind.toFloat(value);

        if (!this.kind.signed && asFloat < 0) {
            this.logger?.warn("Rejected negative value for unsigned kind", {
                component: COMPONENT,
                kind: this.kind.name,
                value: asFloat,
            });
            return {
                success: false,
                error: new RunningStatsError(
                    RunningStatsErrorKind.NegativeValueToUnsignedType,
                    {
                        operation: "add",
                        component: COMPONENT,
                        metadata: { kind: this.kind.name, value: asFloat },
                    }
                ),
            };
        }

        this.modes?.record(asFloat);
        this.n++;
        this.runningMean += (asFloat - this.runningMean) / this.n;

        if (this.runningMean >= this.limit) {
            this.logger?.debug("Threshold reached", {
                component: COMPONENT,
                mean: this.runningMean,
                threshold: this.limit,
                count: this.n,
            });
            return {
                success: false,
                error: new RunningStatsError(
                    RunningStatsErrorKind.ThresholdReached,
                    {
                        operation: "add",
                        component: COMPONENT,
                        metadata: {
                            mean: this.runningMean,
                            threshold: this.limit,
                        },
                    }
                ),
            };
        }

        return { success: true, data: this.runningMean };
    }

    /**
     * Adds a value and drops the outcome. Returns this for chaining.
     */
    add(value: T): this {
        this.addWithResult(value);
        return this;
    }

    extend(values: Iterable<T>): this {
        for (const value of values) {
            this.addWithResult(value);
        }
        return this;
    }

    mean(): number {
        return this.runningMean;
    }

    count(): number {
        return this.n;
    }

    mode(): number {
        if (!this.modes) {
            return this.runningMean;
        }
        return this.modes.resolve(this.runningMean);
    }

    get threshold(): number {
        return this.limit;
    }

    get tracksMode(): boolean {
        return this.modes !== undefined;
    }

    /**
     * Occurrences of a value so far; 0 when mode tracking is off
     */
    frequencyOf(value: T): number {
        return this.modes?.frequencyOf(this.kind.toFloat(value)) ?? 0;
    }

    frequencies(): ReadonlyMap<number, number> {
        return this.modes?.frequencies() ?? new Map<number, number>();
    }

    compareTo(other: Comparand<T>): Ordering | undefined {
        return compareStats<T>(this, other, this.kind);
    }

    equals(other: Comparand<T>): boolean {
        return this.compareTo(other) === 0;
    }

    lessThan(other: Comparand<T>): boolean {
        return this.compareTo(other) === -1;
    }

    lessThanOrEqual(other: Comparand<T>): boolean {
        const ordering = this.compareTo(other);
        return ordering === -1 || ordering === 0;
    }

    greaterThan(other: Comparand<T>): boolean {
        return this.compareTo(other) === 1;
    }

    greaterThanOrEqual(other: Comparand<T>): boolean {
        const ordering = this.compareTo(other);
        return ordering === 1 || ordering === 0;
    }

    snapshot(): RunningStatsSnapshot {
        return {
            kind: this.kind.name,
            count: this.n,
            mean: this.runningMean,
            mode: this.mode(),
            threshold: this.limit,
        };
    }

    valueOf(): number {
        return this.runningMean;
    }

    toString(): string {
        return String(this.runningMean);
    }
}
