import { DEFAULT_RELIABILITY_BINS } from '../constants';
import { ConfigError, DomainError } from '../errors';
import type { ErrorDiagramPoint, NumericPair, ProbabilisticUnit, ReliabilityBin, RocPoint } from '../types';
import { wilsonInterval } from './resamplingService';

export const toProbabilityPairs = (units: readonly ProbabilisticUnit[]): NumericPair[] =>
    units.map(u => ({ forecast: u.forecast_value, observed: u.observed_value }));

/**
 * Throws DomainError unless every forecast is a probability in [0, 1] and every
 * observation is 0 or 1.
 */
export function assertProbabilityPairs(pairs: readonly NumericPair[]): void {
    for (const { forecast, observed } of pairs) {
        if (!(forecast >= 0 && forecast <= 1)) {
            throw new DomainError(`Forecast probability ${forecast} is outside [0, 1]`);
        }
        if (observed !== 0 && observed !== 1) {
            throw new DomainError(`Observed outcome ${observed} is not binary`);
        }
    }
}

export function brierScore(pairs: readonly NumericPair[]): number {
    assertProbabilityPairs(pairs);
    if (pairs.length === 0) return NaN;
    return pairs.reduce((s, p) => s + (p.forecast - p.observed) ** 2, 0) / pairs.length;
}

/**
 * Skill against the sample climatology: the base rate forecast everywhere, whose
 * Brier score is ō(1 - ō). Undefined when the base rate is 0 or 1.
 */
export function brierSkillScore(pairs: readonly NumericPair[]): number {
    assertProbabilityPairs(pairs);
    if (pairs.length === 0) return NaN;
    const rate = pairs.reduce((s, p) => s + p.observed, 0) / pairs.length;
    const reference = rate * (1 - rate);
    if (reference === 0) return NaN;
    return 1 - brierScore(pairs) / reference;
}

/**
 * Equal-width reliability bins over [0, 1]. Empty bins are left out.
 */
export function reliabilityDiagram(pairs: readonly NumericPair[], bins = DEFAULT_RELIABILITY_BINS): ReliabilityBin[] {
    if (!Number.isInteger(bins) || bins < 1) {
        throw new ConfigError(`Reliability bins must be a positive integer (${bins})`);
    }
    assertProbabilityPairs(pairs);

    const sums = Array.from({ length: bins }, () => ({ forecast: 0, observed: 0, count: 0 }));
    for (const { forecast, observed } of pairs) {
        const i = Math.min(Math.floor(forecast * bins), bins - 1);
        sums[i].forecast += forecast;
        sums[i].observed += observed;
        sums[i].count++;
    }

    const out: ReliabilityBin[] = [];
    sums.forEach((s, i) => {
        if (s.count === 0) return;
        out.push({
            bin_lower: i / bins,
            bin_upper: (i + 1) / bins,
            mean_forecast: s.forecast / s.count,
            observed_frequency: s.observed / s.count,
            count: s.count,
        });
    });
    return out;
}

interface ThresholdCounts {
    threshold: number;
    hits: number;
    false_alarms: number;
}

/**
 * Yes-forecast counts at each probability threshold, highest threshold first.
 * Thresholds default to the distinct forecast probabilities.
 */
function countAtThresholds(pairs: readonly NumericPair[], thresholds?: readonly number[]): ThresholdCounts[] {
    const cuts = thresholds ?? Array.from(new Set(pairs.map(p => p.forecast)));
    const sorted = [...cuts].sort((a, b) => b - a);

    return sorted.map(threshold => {
        let hits = 0;
        let false_alarms = 0;
        for (const p of pairs) {
            if (p.forecast < threshold) continue;
            if (p.observed === 1) hits++;
            else false_alarms++;
        }
        return { threshold, hits, false_alarms };
    });
}

/**
 * Hit rate against false alarm rate, forecasting "yes" when p >= threshold.
 * Returns no points unless the sample holds both events and non-events. With a
 * confidence level each rate carries a Wilson band over its own trial count.
 */
export function rocCurve(pairs: readonly NumericPair[], thresholds?: readonly number[], level?: number): RocPoint[] {
    assertProbabilityPairs(pairs);
    const events = pairs.reduce((s, p) => s + p.observed, 0);
    const nonEvents = pairs.length - events;
    if (events === 0 || nonEvents === 0) return [];

    return countAtThresholds(pairs, thresholds).map(({ threshold, hits, false_alarms }) => {
        const point: RocPoint = { threshold, false_alarm_rate: false_alarms / nonEvents, hit_rate: hits / events };
        if (level !== undefined) {
            point.false_alarm_rate_ci = wilsonInterval(point.false_alarm_rate, nonEvents, level);
            point.hit_rate_ci = wilsonInterval(point.hit_rate, events, level);
        }
        return point;
    });
}

/**
 * Error diagram: fraction of cases under an alarm, (a + b) / n, against the miss
 * rate, c / (a + c), at each threshold. Returns no points without events.
 */
export function errorDiagram(pairs: readonly NumericPair[], thresholds?: readonly number[], level?: number): ErrorDiagramPoint[] {
    assertProbabilityPairs(pairs);
    const events = pairs.reduce((s, p) => s + p.observed, 0);
    if (events === 0) return [];
    const n = pairs.length;

    return countAtThresholds(pairs, thresholds).map(({ threshold, hits, false_alarms }) => {
        const point: ErrorDiagramPoint = {
            threshold,
            alarm_fraction: (hits + false_alarms) / n,
            miss_rate: (events - hits) / events,
        };
        if (level !== undefined) {
            point.alarm_fraction_ci = wilsonInterval(point.alarm_fraction, n, level);
            point.miss_rate_ci = wilsonInterval(point.miss_rate, events, level);
        }
        return point;
    });
}

/**
 * Trapezoidal area under the ROC curve, anchored at (0, 0) and (1, 1).
 */
export function rocArea(pairs: readonly NumericPair[], thresholds?: readonly number[]): number {
    const points = rocCurve(pairs, thresholds);
    if (points.length === 0) return NaN;

    const xy = points
        .map(p => [p.false_alarm_rate, p.hit_rate] as const)
        .sort((a, b) => a[0] - b[0] || a[1] - b[1]);
    const path: (readonly [number, number])[] = [[0, 0], ...xy, [1, 1]];

    let area = 0;
    for (let i = 1; i < path.length; i++) {
        area += 0.5 * (path[i][0] - path[i - 1][0]) * (path[i][1] + path[i - 1][1]);
    }
    return area;
}
