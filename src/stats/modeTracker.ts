// src/stats/modeTracker.ts

/**
 * Occurrence counts per distinct value, keyed by the value widened to a
 * float. Map keys compare with SameValueZero, so every NaN shares one
 * entry and so do -0 and +0.
 */
export class ModeTracker {
    private readonly counts = new Map<number, number>();
    private recorded = 0;

    record(value: number): void {
        this.counts.set(value, (this.counts.get(value) ?? 0) + 1);
        this.recorded++;
    }

    frequencyOf(value: number): number {
        return this.counts.get(value) ?? 0;
    }

    /** Sum of all frequencies */
    total(): number {
        return this.recorded;
    }

    distinct(): number {
        return this.counts.size;
    }

    frequencies(): ReadonlyMap<number, number> {
        return new Map(this.counts);
    }

    /**
     * Resolves the mode against the current mean.
     *
     * - nothing recorded: 0
     * - no value seen more than once: the mean
     * - one value at the highest frequency: that value
     * - several values tied at the highest frequency: the one closest to
     *   the mean, and the smallest of those if the distances tie too
     */
    resolve(mean: number): number {
        if (this.counts.size === 0) {
            return 0;
        }

        let maxCount = 0;
        for (const count of this.counts.values()) {
            if (count > maxCount) maxCount = count;
        }
        if (maxCount <= 1) {
            return mean;
        }

        let best: number | undefined;
        let bestDistance = Infinity;
        for (const [value, count] of this.counts) {
            if (count !== maxCount) continue;
            const distance = Math.abs(value - mean);
            if (
                best === undefined ||
                distance < bestDistance ||
                (distance === bestDistance && value < best)
            ) {
                best = value;
                bestDistance = distance;
            }
        }
        return best ?? mean;
    }
}
