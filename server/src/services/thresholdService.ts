import { ConfigError } from '../errors';

/**
 * Ordered cutpoints that split continuous values into categories.
 * An event at threshold `t` means `value >= t`, for forecasts and observations alike.
 */
export class ThresholdSet {
    readonly values: readonly number[];

    constructor(values: readonly number[]) {
        if (values.length === 0) {
            throw new ConfigError('Threshold set must not be empty');
        }
        values.forEach((v, i) => {
            if (!Number.isFinite(v)) {
                throw new ConfigError(`Threshold ${i} is not finite (${v})`);
            }
            if (i > 0 && v <= values[i - 1]) {
                throw new ConfigError(`Thresholds must be strictly increasing (${values[i - 1]} then ${v})`);
            }
        });
        this.values = Object.freeze([...values]);
    }

    static single(threshold: number): ThresholdSet {
        return new ThresholdSet([threshold]);
    }

    get size(): number {
        return this.values.length;
    }

    /** Number of categories, one more than the number of cutpoints. */
    get categories(): number {
        return this.values.length + 1;
    }

    /**
     * Index of the first threshold the value does not reach, or `size` when it
     * reaches all of them (right-open buckets).
     */
    categorize(value: number): number {
        let lo = 0;
        let hi = this.values.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (value < this.values[mid]) {
                hi = mid;
            } else {
                lo = mid + 1;
            }
        }
        return lo;
    }
}

export const isEvent = (value: number, threshold: number): boolean => value >= threshold;
