import type { ForecastKind } from './types';

export const FORECAST_KINDS: readonly ForecastKind[] = ['categorical', 'continuous', 'probabilistic', 'ensemble'];

// Scope label used when a run is not split by any dimension
export const ALL_SCOPE = 'all';

export const DEFAULT_CONFIDENCE_LEVEL = 0.95;
export const DEFAULT_RELIABILITY_BINS = 10;
export const DEFAULT_SEED = 42;
// Seeds are 32-bit unsigned
export const MAX_SEED = 0xffffffff;
export const DEFAULT_WORKERS = 1;

export const MAX_BOOTSTRAP_RESAMPLES = 100000;
