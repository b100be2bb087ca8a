import { ALL_SCOPE } from '../constants';
import { DomainError } from '../errors';
import type {
    AggregationPolicy,
    ContingencyTable,
    CoordinateKey,
    MultiCategoryTable,
    ScopeDimension,
} from '../types';

export interface AggregationScope {
    policy: AggregationPolicy;
    /** Dimensions that split a run into separately reported scopes. */
    group_by: ScopeDimension[];
    /** Dimensions that define the independently scored units under per-unit averaging. */
    unit_by: ScopeDimension[];
}

export interface UnitGroup<U> {
    /** Grouping identity; distinct for values that print alike (`1` and `'1'`). */
    id: string;
    /** Display label. */
    scope: string;
    units: U[];
}

export interface Reduction {
    value: number;
    /** Per-unit scores that entered the average (1 for pooled). */
    used: number;
    /** Per-unit scores left out of the average because they were undefined. */
    excluded: number;
}

export function scopeLabel(key: Readonly<CoordinateKey>, dims: readonly ScopeDimension[]): string {
    if (dims.length === 0) return ALL_SCOPE;
    return dims.map(d => `${d}=${key[d]}`).join(',');
}

export const scopeId = (key: Readonly<CoordinateKey>, dims: readonly ScopeDimension[]): string =>
    JSON.stringify(dims.map(d => [typeof key[d], key[d]]));

/**
 * Groups units by the given dimensions, keeping the order in which each group
 * first appears.
 */
export function groupUnits<U extends { key: Readonly<CoordinateKey> }>(
    units: readonly U[],
    dims: readonly ScopeDimension[]
): UnitGroup<U>[] {
    const groups = new Map<string, UnitGroup<U>>();
    for (const unit of units) {
        const id = scopeId(unit.key, dims);
        const group = groups.get(id);
        if (group) {
            group.units.push(unit);
        } else {
            groups.set(id, { id, scope: scopeLabel(unit.key, dims), units: [unit] });
        }
    }
    return Array.from(groups.values());
}

export function poolTables(tables: readonly ContingencyTable[]): ContingencyTable {
    const pooled = { hits: 0, misses: 0, false_alarms: 0, correct_negatives: 0, total: 0 };
    for (const t of tables) {
        pooled.hits += t.hits;
        pooled.misses += t.misses;
        pooled.false_alarms += t.false_alarms;
        pooled.correct_negatives += t.correct_negatives;
        pooled.total += t.total;
    }
    return Object.freeze(pooled);
}

export function poolMultiCategoryTables(tables: readonly MultiCategoryTable[], categories: number): MultiCategoryTable {
    const counts = Array.from({ length: categories }, () => new Array<number>(categories).fill(0));
    let total = 0;
    for (const t of tables) {
        if (t.categories !== categories) {
            throw new DomainError(`Cannot pool a ${t.categories}-category table into ${categories} categories`);
        }
        t.counts.forEach((row, i) => row.forEach((n, j) => { counts[i][j] += n; }));
        total += t.total;
    }
    return Object.freeze({ categories, counts: counts.map(row => Object.freeze(row)), total });
}

export const poolSamples = <T>(samples: readonly (readonly T[])[]): T[] => samples.flat();

/**
 * Mean of the defined scores. Undefined (NaN) scores are left out and counted.
 */
export function averageScores(scores: readonly number[]): Reduction {
    let sum = 0;
    let used = 0;
    for (const s of scores) {
        if (Number.isNaN(s)) continue;
        sum += s;
        used++;
    }
    return {
        value: used > 0 ? sum / used : NaN,
        used,
        excluded: scores.length - used,
    };
}

/**
 * Reduces per-unit scorer inputs under one policy. Pooled merges the inputs and
 * scores once; per-unit-averaged scores each input and averages the defined ones.
 */
export function reduce<I>(
    perUnit: readonly I[],
    policy: AggregationPolicy,
    pool: (inputs: readonly I[]) => I,
    score: (input: I) => number
): Reduction {
    if (policy === 'pooled') {
        return { value: score(pool(perUnit)), used: 1, excluded: 0 };
    }
    return averageScores(perUnit.map(score));
}
