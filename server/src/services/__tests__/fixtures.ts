import type {
    CategoricalUnit,
    ContinuousUnit,
    CoordinateKey,
    EnsembleUnit,
    ProbabilisticUnit,
    SeriesEntry,
} from '../../types';
import type { Rng } from '../../random';

export const key = (space: string, lead = 24, time: string | number = '2024-06-01T00:00Z'): CoordinateKey => ({
    space,
    time,
    lead,
});

/** Units at successive epoch times for one station. */
export const continuousUnits = (pairs: [number, number][], space = 'STN1'): ContinuousUnit[] =>
    pairs.map(([f, o], i): ContinuousUnit => ({ kind: 'continuous', key: key(space, 24, i), forecast_value: f, observed_value: o }));

export const categoricalUnits = (pairs: [number, number][], space = 'STN1'): CategoricalUnit[] =>
    pairs.map(([f, o], i): CategoricalUnit => ({ kind: 'categorical', key: key(space, 24, i), forecast_value: f, observed_value: o }));

export const probabilityUnits = (pairs: [number, number][], space = 'STN1'): ProbabilisticUnit[] =>
    pairs.map(([f, o], i): ProbabilisticUnit => ({ kind: 'probabilistic', key: key(space, 24, i), forecast_value: f, observed_value: o }));

export const ensembleUnits = (pairs: [number[], number][], space = 'STN1'): EnsembleUnit[] =>
    pairs.map(([members, o], i): EnsembleUnit => ({ kind: 'ensemble', key: key(space, 24, i), forecast_value: members, observed_value: o }));

/**
 * Forecast and observation series sharing the given keys.
 */
export function series<V>(rows: [CoordinateKey, V | null, number | null][]): {
    forecasts: SeriesEntry<V>[];
    observations: SeriesEntry<number>[];
} {
    return {
        forecasts: rows.map(([k, value]) => ({ key: k, value })),
        observations: rows.map(([k, , value]) => ({ key: k, value })),
    };
}

/** Normal draw (Box-Muller). */
export function normal(rng: Rng, mean = 0, sd = 1): number {
    let u1 = rng.next();
    while (u1 === 0) u1 = rng.next();
    const u2 = rng.next();
    return mean + sd * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}
