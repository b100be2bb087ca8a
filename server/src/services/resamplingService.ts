import { MAX_BOOTSTRAP_RESAMPLES } from '../constants';
import { ConfigError, InsufficientDataError } from '../errors';
import { deriveSeed, forkRng } from '../random';
import type { ConfidenceInterval } from '../types';

/**
 * Bootstrap Resampling
 *
 * Items are resampled with replacement as whole units (a verification unit, or a
 * group of them), so any dependence inside an item survives the resampling.
 * Replicate b draws from its own generator, derived from (seed, b); the interval
 * therefore does not depend on how replicates are scheduled.
 */

export interface BootstrapOptions {
    resamples: number;
    confidence_level: number;
    seed: number;
}

export function validateBootstrapOptions(opts: BootstrapOptions): void {
    if (!Number.isInteger(opts.resamples) || opts.resamples < 1 || opts.resamples > MAX_BOOTSTRAP_RESAMPLES) {
        throw new ConfigError(`Bootstrap resamples must be an integer in [1, ${MAX_BOOTSTRAP_RESAMPLES}] (${opts.resamples})`);
    }
    if (!(opts.confidence_level > 0 && opts.confidence_level < 1)) {
        throw new ConfigError(`Confidence level must lie in (0, 1) (${opts.confidence_level})`);
    }
}

/**
 * Quantile q of ascending values, interpolating linearly between order statistics.
 */
export function percentile(sorted: readonly number[], q: number): number {
    if (sorted.length === 0) return NaN;
    const index = q * (sorted.length - 1);
    const lower = Math.floor(index);
    const upper = Math.ceil(index);
    if (lower === upper) return sorted[lower];
    const weight = index - lower;
    return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

export function resample<T>(items: readonly T[], seed: number, replicate: number): T[] {
    const rng = forkRng(seed, replicate);
    return Array.from({ length: items.length }, () => items[rng.int(items.length)]);
}

/**
 * Statistic of each replicate, in replicate order. Undefined scores are kept as NaN.
 */
export function bootstrapReplicates<T>(
    items: readonly T[],
    statistic: (sample: readonly T[]) => number,
    opts: BootstrapOptions
): number[] {
    validateBootstrapOptions(opts);
    if (items.length < 2) {
        throw new InsufficientDataError('Bootstrap needs at least two verification units', 2, items.length);
    }
    const out: number[] = [];
    for (let b = 0; b < opts.resamples; b++) {
        out.push(statistic(resample(items, opts.seed, b)));
    }
    return out;
}

/**
 * Empirical percentile interval at (1 - c) / 2 and 1 - (1 - c) / 2.
 */
export function bootstrapInterval<T>(
    items: readonly T[],
    statistic: (sample: readonly T[]) => number,
    opts: BootstrapOptions
): ConfidenceInterval {
    const scores = bootstrapReplicates(items, statistic, opts)
        .filter(s => !Number.isNaN(s))
        .sort((a, b) => a - b);
    const tail = (1 - opts.confidence_level) / 2;
    return {
        lower: percentile(scores, tail),
        upper: percentile(scores, 1 - tail),
        level: opts.confidence_level,
        method: 'bootstrap',
        resamples: scores.length,
    };
}

/** Seed for scope `index` of a run. */
export const scopeSeed = (runSeed: number, index: number): number => deriveSeed(runSeed, index);

/**
 * Inverse of the standard normal CDF (Acklam's rational approximation,
 * relative error below 1.2e-9).
 */
export function normalQuantile(p: number): number {
    if (!(p > 0 && p < 1)) return NaN;

    const a = [-3.969683028665376e1, 2.209460984245205e2, -2.759285104469687e2, 1.38357751867269e2, -3.066479806614716e1, 2.506628277459239];
    const b = [-5.447609879822406e1, 1.615858368580409e2, -1.556989798598866e2, 6.680131188771972e1, -1.328068155288572e1];
    const c = [-7.784894002430293e-3, -3.223964580411365e-1, -2.400758277161838, -2.549732539343734, 4.374664141464968, 2.938163982698783];
    const d = [7.784695709041462e-3, 3.224671290700398e-1, 2.445134137142996, 3.754408661907416];
    const pLow = 0.02425;

    if (p < pLow) {
        const q = Math.sqrt(-2 * Math.log(p));
        return (((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
            ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1);
    }
    if (p > 1 - pLow) {
        return -normalQuantile(1 - p);
    }
    const q = p - 0.5;
    const r = q * q;
    return (((((a[0] * r + a[1]) * r + a[2]) * r + a[3]) * r + a[4]) * r + a[5]) * q /
        (((((b[0] * r + b[1]) * r + b[2]) * r + b[3]) * r + b[4]) * r + 1);
}

/**
 * Standard normal CDF through erf (Abramowitz and Stegun 7.1.26, absolute error
 * below 1.5e-7).
 */
export function normalCdf(x: number): number {
    const z = Math.abs(x) / Math.SQRT2;
    const t = 1 / (1 + 0.3275911 * z);
    const poly = ((((1.061405429 * t - 1.453152027) * t + 1.421413741) * t - 0.284496736) * t + 0.254829592) * t;
    const erf = 1 - poly * Math.exp(-z * z);
    return x >= 0 ? 0.5 * (1 + erf) : 0.5 * (1 - erf);
}

/**
 * Wilson score interval for a proportion p observed over n trials.
 * Returns null when the proportion is undefined or n is 0.
 */
export function wilsonInterval(p: number, n: number, level: number): ConfidenceInterval | null {
    if (Number.isNaN(p) || n <= 0) return null;
    const z = normalQuantile(1 - (1 - level) / 2);
    const z2 = z * z;
    const centre = p + z2 / (2 * n);
    const half = z * Math.sqrt((p * (1 - p) + z2 / (4 * n)) / n);
    const scale = 1 + z2 / n;
    return {
        lower: (centre - half) / scale,
        upper: (centre + half) / scale,
        level,
        method: 'wilson',
        resamples: null,
    };
}
