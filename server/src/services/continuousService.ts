import type { ContinuousUnit, NumericPair } from '../types';

export const toPairs = (units: readonly ContinuousUnit[]): NumericPair[] =>
    units.map(u => ({ forecast: u.forecast_value, observed: u.observed_value }));

const mean = (values: readonly number[]): number =>
    values.length === 0 ? NaN : values.reduce((s, v) => s + v, 0) / values.length;

/** Mean error (additive bias), mean of F - O. Defined for n >= 1. */
export const meanError = (pairs: readonly NumericPair[]): number =>
    mean(pairs.map(p => p.forecast - p.observed));

export const meanAbsoluteError = (pairs: readonly NumericPair[]): number =>
    mean(pairs.map(p => Math.abs(p.forecast - p.observed)));

/** Requires n >= 2, like RMSE. */
export function meanSquaredError(pairs: readonly NumericPair[]): number {
    if (pairs.length < 2) return NaN;
    return mean(pairs.map(p => (p.forecast - p.observed) ** 2));
}

export const rootMeanSquaredError = (pairs: readonly NumericPair[]): number =>
    Math.sqrt(meanSquaredError(pairs));

/**
 * Pearson correlation. Undefined below two pairs or when either series is constant.
 */
export function correlation(pairs: readonly NumericPair[]): number {
    const n = pairs.length;
    if (n < 2) return NaN;
    // Constant series are detected on the values; the summed variance may not round to 0
    const [first] = pairs;
    if (pairs.every(p => p.forecast === first.forecast) || pairs.every(p => p.observed === first.observed)) {
        return NaN;
    }

    const meanF = mean(pairs.map(p => p.forecast));
    const meanO = mean(pairs.map(p => p.observed));

    let cov = 0;
    let varF = 0;
    let varO = 0;
    for (const { forecast, observed } of pairs) {
        const df = forecast - meanF;
        const dO = observed - meanO;
        cov += df * dO;
        varF += df * df;
        varO += dO * dO;
    }

    if (varF === 0 || varO === 0) return NaN;
    return cov / Math.sqrt(varF * varO);
}

/** Multiplicative bias, sum F / sum O. */
export function multiplicativeBias(pairs: readonly NumericPair[]): number {
    let sumF = 0;
    let sumO = 0;
    for (const p of pairs) {
        sumF += p.forecast;
        sumO += p.observed;
    }
    return sumO === 0 ? NaN : sumF / sumO;
}
