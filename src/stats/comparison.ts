// src/stats/comparison.ts
import type { NumericKind } from "./numericKind";

export interface MeanSource {
    mean(): number;
}

/** Either an accumulator or a raw value of the accumulator's kind */
export type Comparand<T> = MeanSource | T;

export type Ordering = -1 | 0 | 1;

export function isMeanSource(value: unknown): value is MeanSource {
    return (
        typeof value === "object" &&
        value !== null &&
        "mean" in value &&
        typeof value.mean === "function"
    );
}

export function meanOf<T>(
    side: Comparand<NoInfer<T>>,
    kind: NumericKind<T>
): number {
    if (isMeanSource(side)) {
        return side.mean();
    }
    return kind.toFloat(side);
}

/**
 * Partial ordering of two floats; undefined when either is NaN
 */
export function compareMeans(a: number, b: number): Ordering | undefined {
    if (Number.isNaN(a) || Number.isNaN(b)) {
        return undefined;
    }
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Orders two sides by mean, where either side may be an accumulator or a
 * raw value converted through `kind`.
 */
export function compareStats<T>(
    a: Comparand<NoInfer<T>>,
    b: Comparand<NoInfer<T>>,
    kind: NumericKind<T>
): Ordering | undefined {
    return compareMeans(meanOf(a, kind), meanOf(b, kind));
}
