import { DomainError } from '../errors';
import type { Rng } from '../random';
import type { EnsemblePair, EnsembleUnit, NumericPair, RankHistogram } from '../types';
import { meanAbsoluteError, meanError, rootMeanSquaredError } from './continuousService';

export const toEnsemblePairs = (units: readonly EnsembleUnit[]): EnsemblePair[] =>
    units.map(u => ({ members: u.forecast_value, observed: u.observed_value }));

function assertMembers(members: readonly number[]): void {
    if (members.length < 1) {
        throw new DomainError('Ensemble forecast needs at least one member');
    }
}

export function ensembleMean(members: readonly number[]): number {
    assertMembers(members);
    return members.reduce((s, m) => s + m, 0) / members.length;
}

/** Treats the ensemble mean as a deterministic forecast. */
export const toMeanPairs = (pairs: readonly EnsemblePair[]): NumericPair[] =>
    pairs.map(p => ({ forecast: ensembleMean(p.members), observed: p.observed }));

export const ensembleMeanError = (pairs: readonly EnsemblePair[]): number => meanError(toMeanPairs(pairs));

export const ensembleMeanAbsoluteError = (pairs: readonly EnsemblePair[]): number =>
    meanAbsoluteError(toMeanPairs(pairs));

export const ensembleRootMeanSquaredError = (pairs: readonly EnsemblePair[]): number =>
    rootMeanSquaredError(toMeanPairs(pairs));

/**
 * Ensemble CRPS estimator for one case:
 *   (1/M) Σ|x_i - y| - (1/(2M²)) ΣΣ|x_i - x_j|
 * The double sum is taken over sorted members in O(M log M).
 */
export function crps(members: readonly number[], observed: number): number {
    assertMembers(members);
    const m = members.length;
    const sorted = [...members].sort((a, b) => a - b);

    let absError = 0;
    let spread = 0;
    sorted.forEach((x, i) => {
        absError += Math.abs(x - observed);
        spread += x * (2 * i - m + 1);
    });

    // spread holds half of ΣΣ|x_i - x_j|
    return absError / m - spread / (m * m);
}

export function meanCrps(pairs: readonly EnsemblePair[]): number {
    if (pairs.length === 0) return NaN;
    return pairs.reduce((s, p) => s + crps(p.members, p.observed), 0) / pairs.length;
}

/** Square root of the mean member variance about the ensemble mean. */
export function ensembleSpread(pairs: readonly EnsemblePair[]): number {
    if (pairs.length === 0) return NaN;
    let total = 0;
    for (const { members } of pairs) {
        const mu = ensembleMean(members);
        total += members.reduce((s, x) => s + (x - mu) ** 2, 0) / members.length;
    }
    return Math.sqrt(total / pairs.length);
}

/**
 * Rank of the observation among the members, 0..M. Members equal to the
 * observation share their positions; one of them is drawn uniformly.
 */
export function observationRank(members: readonly number[], observed: number, rng: Rng): number {
    let below = 0;
    let ties = 0;
    for (const x of members) {
        if (x < observed) below++;
        else if (x === observed) ties++;
    }
    return ties === 0 ? below : below + rng.int(ties + 1);
}

export function rankHistogram(pairs: readonly EnsemblePair[], rng: Rng): RankHistogram {
    if (pairs.length === 0) {
        return { counts: [], total: 0, chi_square: NaN };
    }
    assertMembers(pairs[0].members);
    const bins = pairs[0].members.length + 1;
    const counts = new Array<number>(bins).fill(0);
    for (const p of pairs) {
        if (p.members.length + 1 !== bins) {
            throw new DomainError(`Ensemble size changed within the scope (${p.members.length} vs ${bins - 1})`);
        }
        counts[observationRank(p.members, p.observed, rng)]++;
    }
    return { counts, total: pairs.length, chi_square: flatnessChiSquare(counts) };
}

/** Chi-square statistic of the counts against a uniform histogram. */
export function flatnessChiSquare(counts: readonly number[]): number {
    const total = counts.reduce((s, c) => s + c, 0);
    if (total === 0 || counts.length === 0) return NaN;
    const expected = total / counts.length;
    return counts.reduce((s, c) => s + (c - expected) ** 2 / expected, 0);
}
