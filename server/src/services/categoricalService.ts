import type { ContingencyTable, MultiCategoryTable } from '../types';
import { normalCdf, normalQuantile } from './resamplingService';

/*
 * Scores derived from a 2x2 contingency table. Notation:
 *   a = hits, b = false alarms, c = misses, d = correct negatives, n = a + b + c + d
 * Each function returns NaN when its own denominator is zero.
 */

const ratio = (num: number, den: number): number => (den === 0 ? NaN : num / den);

/** Probability of detection (hit rate), a / (a + c). */
export const probabilityOfDetection = (t: ContingencyTable): number => ratio(t.hits, t.hits + t.misses);

/** False alarm ratio, b / (a + b). */
export const falseAlarmRatio = (t: ContingencyTable): number => ratio(t.false_alarms, t.hits + t.false_alarms);

/** Critical success index (threat score), a / (a + b + c). */
export const criticalSuccessIndex = (t: ContingencyTable): number =>
    ratio(t.hits, t.hits + t.misses + t.false_alarms);

/** Frequency bias, (a + b) / (a + c). */
export const frequencyBias = (t: ContingencyTable): number =>
    ratio(t.hits + t.false_alarms, t.hits + t.misses);

export function heidkeSkillScore(t: ContingencyTable): number {
    const a = t.hits, b = t.false_alarms, c = t.misses, d = t.correct_negatives;
    return ratio(2 * (a * d - b * c), (a + c) * (c + d) + (a + b) * (b + d));
}

/** Equitable threat score (Gilbert skill score). */
export function equitableThreatScore(t: ContingencyTable): number {
    if (t.total === 0) return NaN;
    const a = t.hits, b = t.false_alarms, c = t.misses;
    const randomHits = (a + b) * (a + c) / t.total;
    return ratio(a - randomHits, a + b + c - randomHits);
}

export const baseRate = (t: ContingencyTable): number => ratio(t.hits + t.misses, t.total);

/** Probability of a forecast of occurrence, (a + b) / n. */
export const forecastRate = (t: ContingencyTable): number => ratio(t.hits + t.false_alarms, t.total);

export const percentCorrect = (t: ContingencyTable): number => ratio(t.hits + t.correct_negatives, t.total);

/** Probability of false detection (false alarm rate), b / (b + d). */
export const probabilityOfFalseDetection = (t: ContingencyTable): number =>
    ratio(t.false_alarms, t.false_alarms + t.correct_negatives);

/** Peirce skill score (Hanssen-Kuipers, true skill statistic), POD - POFD. */
export const peirceSkillScore = (t: ContingencyTable): number =>
    probabilityOfDetection(t) - probabilityOfFalseDetection(t);

export const oddsRatio = (t: ContingencyTable): number =>
    ratio(t.hits * t.correct_negatives, t.misses * t.false_alarms);

/** Odds ratio skill score (Yule's Q), (ad - bc) / (ad + bc). */
export function oddsRatioSkillScore(t: ContingencyTable): number {
    const ad = t.hits * t.correct_negatives;
    const bc = t.false_alarms * t.misses;
    return ratio(ad - bc, ad + bc);
}

/**
 * Extreme dependency score, 2 ln((a + c) / n) / ln(a / n) - 1.
 * Undefined without hits, and when every case is a hit.
 */
export function extremeDependencyScore(t: ContingencyTable): number {
    if (t.total === 0 || t.hits === 0) return NaN;
    return ratio(2 * Math.log((t.hits + t.misses) / t.total), Math.log(t.hits / t.total)) - 1;
}

/**
 * Discrimination distance, the separation of the event and non-event
 * distributions under the binormal model: Φ⁻¹(POD) - Φ⁻¹(POFD).
 * Undefined when either rate is 0 or 1.
 */
export const discriminationDistance = (t: ContingencyTable): number =>
    normalQuantile(probabilityOfDetection(t)) - normalQuantile(probabilityOfFalseDetection(t));

/** Area under the binormal ROC curve through this table's point, Φ(D / √2). */
export function modelledRocArea(t: ContingencyTable): number {
    const d = discriminationDistance(t);
    return Number.isNaN(d) ? NaN : normalCdf(d / Math.SQRT2);
}

// --- Multi-category ---

function marginals(t: MultiCategoryTable) {
    const forecast = t.counts.map(row => row.reduce((s, n) => s + n, 0));
    const observed = t.counts[0].map((_, j) => t.counts.reduce((s, row) => s + row[j], 0));
    const correct = t.counts.reduce((s, row, i) => s + row[i], 0);
    return { forecast, observed, correct };
}

export function multiPercentCorrect(t: MultiCategoryTable): number {
    return ratio(marginals(t).correct, t.total);
}

/** Heidke skill score generalised to k categories. */
export function multiHeidkeSkillScore(t: MultiCategoryTable): number {
    if (t.total === 0) return NaN;
    const { forecast, observed, correct } = marginals(t);
    const n2 = t.total * t.total;
    const chance = forecast.reduce((s, f, i) => s + f * observed[i], 0) / n2;
    return ratio(correct / t.total - chance, 1 - chance);
}

/** Peirce skill score generalised to k categories. */
export function multiPeirceSkillScore(t: MultiCategoryTable): number {
    if (t.total === 0) return NaN;
    const { forecast, observed, correct } = marginals(t);
    const n2 = t.total * t.total;
    const chance = forecast.reduce((s, f, i) => s + f * observed[i], 0) / n2;
    const observedSq = observed.reduce((s, o) => s + o * o, 0) / n2;
    return ratio(correct / t.total - chance, 1 - observedSq);
}
