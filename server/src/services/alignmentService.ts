import { AlignmentError } from '../errors';
import { log } from '../logger';
import type {
    CoordinateKey,
    ForecastKind,
    ForecastValueMap,
    KeyPolicy,
    MissingPolicy,
    SeriesEntry,
    VerificationUnit,
} from '../types';

export interface AlignmentOptions {
    keyPolicy?: KeyPolicy;
    missingPolicy?: MissingPolicy;
}

export interface AlignmentResult<K extends ForecastKind> {
    units: VerificationUnit<K>[];
    /** Units removed because a value was missing. */
    dropped: number;
    droppedKeys: CoordinateKey[];
    /** Entries discarded by the intersect policy, counted over both series. */
    unmatched: number;
}

/** Identity of a key. The time's type is part of it, so `1` and `'1'` differ. */
export const coordinateId = (key: CoordinateKey): string =>
    JSON.stringify([key.space, typeof key.time, key.time, key.lead]);

/** Readable form for messages. */
export const describeKey = (key: CoordinateKey): string => `${key.space}|${key.time}|${key.lead}`;

const isPresent = (v: number | null | undefined): v is number => typeof v === 'number' && Number.isFinite(v);

function indexSeries<V>(series: readonly SeriesEntry<V>[], label: string): Map<string, SeriesEntry<V>> {
    const index = new Map<string, SeriesEntry<V>>();
    for (const entry of series) {
        const id = coordinateId(entry.key);
        if (index.has(id)) {
            throw new AlignmentError(`Duplicate ${label} key ${describeKey(entry.key)}`);
        }
        index.set(id, entry);
    }
    return index;
}

function hasForecast<K extends ForecastKind>(
    kind: K,
    value: ForecastValueMap[K] | null
): value is ForecastValueMap[K] {
    if (value === null || value === undefined) return false;
    if (kind === 'ensemble') {
        return Array.isArray(value) && value.every((m: unknown) => typeof m === 'number' && Number.isFinite(m));
    }
    return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Pairs forecasts with observations by (space, time, lead).
 *
 * Under the strict key policy both series must carry exactly the same keys; under
 * `intersect` the leftovers are discarded and counted. Units with a missing value on
 * either side are dropped and tallied, or rejected when `missingPolicy` is `error`.
 */
export function alignSeries<K extends ForecastKind>(
    kind: K,
    forecasts: readonly SeriesEntry<ForecastValueMap[K]>[],
    observations: readonly SeriesEntry<number>[],
    options: AlignmentOptions = {}
): AlignmentResult<K> {
    const keyPolicy = options.keyPolicy ?? 'strict';
    const missingPolicy = options.missingPolicy ?? 'drop';

    const fcstIndex = indexSeries(forecasts, 'forecast');
    const obsIndex = indexSeries(observations, 'observation');

    if (keyPolicy === 'strict') {
        if (forecasts.length !== observations.length) {
            throw new AlignmentError(
                `Series lengths differ: ${forecasts.length} forecasts vs ${observations.length} observations`
            );
        }
        for (const [id, fcst] of fcstIndex) {
            if (!obsIndex.has(id)) {
                throw new AlignmentError(`Forecast key ${describeKey(fcst.key)} has no matching observation`);
            }
        }
    }

    const units: VerificationUnit<K>[] = [];
    const droppedKeys: CoordinateKey[] = [];
    let matched = 0;
    let memberCount: number | null = null;

    for (const [id, fcst] of fcstIndex) {
        const obs = obsIndex.get(id);
        if (!obs) continue;
        matched++;

        if (!hasForecast(kind, fcst.value) || !isPresent(obs.value)) {
            if (missingPolicy === 'error') {
                throw new AlignmentError(`Missing value at ${describeKey(fcst.key)}`);
            }
            droppedKeys.push(fcst.key);
            continue;
        }

        const forecastValue = fcst.value;
        if (Array.isArray(forecastValue)) {
            if (memberCount === null) {
                memberCount = forecastValue.length;
            } else if (forecastValue.length !== memberCount) {
                throw new AlignmentError(
                    `Ensemble at ${describeKey(fcst.key)} has ${forecastValue.length} members, expected ${memberCount}`
                );
            }
        }

        units.push(Object.freeze({
            kind,
            key: Object.freeze({ ...fcst.key }),
            forecast_value: forecastValue,
            observed_value: obs.value,
        }));
    }

    const unmatched = (forecasts.length - matched) + (observations.length - matched);
    if (unmatched > 0) {
        log(`[ALIGN] Intersect policy discarded ${unmatched} unmatched entries`);
    }
    const dropped = droppedKeys.length;
    if (dropped > 0) {
        log(`[ALIGN] Dropped ${dropped} units with missing values`);
    }

    return { units, dropped, droppedKeys, unmatched };
}
