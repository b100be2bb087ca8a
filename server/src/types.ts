export type ForecastKind = 'categorical' | 'continuous' | 'probabilistic' | 'ensemble';

export type AggregationPolicy = 'pooled' | 'per-unit-averaged';

export type ScopeDimension = 'space' | 'time' | 'lead';

export type MissingPolicy = 'drop' | 'error';

export type KeyPolicy = 'strict' | 'intersect';

/**
 * Identifies one comparable forecast/observation pair.
 * `time` is whatever the producer uses (ISO string or epoch millis).
 */
export interface CoordinateKey {
    space: string;
    time: string | number;
    lead: number;
}

/**
 * Forecast value carried by each kind.
 */
export interface ForecastValueMap {
    categorical: number;
    continuous: number;
    probabilistic: number;
    ensemble: readonly number[];
}

export interface SeriesEntry<V> {
    key: CoordinateKey;
    value: V | null;
}

export interface VerificationUnit<K extends ForecastKind = ForecastKind> {
    readonly kind: K;
    readonly key: Readonly<CoordinateKey>;
    readonly forecast_value: ForecastValueMap[K];
    readonly observed_value: number;
}

export type CategoricalUnit = VerificationUnit<'categorical'>;
export type ContinuousUnit = VerificationUnit<'continuous'>;
export type ProbabilisticUnit = VerificationUnit<'probabilistic'>;
export type EnsembleUnit = VerificationUnit<'ensemble'>;

export interface NumericPair {
    forecast: number;
    observed: number;
}

export interface EnsemblePair {
    members: readonly number[];
    observed: number;
}

export interface ContingencyTable {
    readonly hits: number;
    readonly misses: number;
    readonly false_alarms: number;
    readonly correct_negatives: number;
    readonly total: number;
}

/**
 * k x k table, rows are forecast categories and columns observed categories.
 */
export interface MultiCategoryTable {
    readonly categories: number;
    readonly counts: readonly (readonly number[])[];
    readonly total: number;
}

export interface ConfidenceInterval {
    lower: number;
    upper: number;
    level: number;
    method: 'bootstrap' | 'wilson';
    /** Bootstrap replicates that produced a defined score. */
    resamples: number | null;
}

export type ScoreStatus = 'defined' | 'undefined';

export interface ScoreResult {
    metric: string;
    scope: string;
    threshold: number | null;
    value: number;
    status: ScoreStatus;
    ci: ConfidenceInterval | null;
    n: number;
    dropped: number;
    excluded: number;
    policy: AggregationPolicy;
}

export interface ScoreFailure {
    metric: string;
    scope: string;
    threshold: number | null;
    stage: 'score' | 'interval';
    code: string;
    message: string;
}

export interface AlignmentSummary {
    units: number;
    dropped: number;
    unmatched: number;
}

export interface ReliabilityBin {
    bin_lower: number;
    bin_upper: number;
    mean_forecast: number;
    observed_frequency: number;
    count: number;
}

export interface RocPoint {
    threshold: number;
    false_alarm_rate: number;
    hit_rate: number;
    /** Binomial (Wilson) bands, present when a confidence level was asked for. */
    false_alarm_rate_ci?: ConfidenceInterval | null;
    hit_rate_ci?: ConfidenceInterval | null;
}

/** Point of an error diagram: share of cases with an alarm against the miss rate. */
export interface ErrorDiagramPoint {
    threshold: number;
    alarm_fraction: number;
    miss_rate: number;
    alarm_fraction_ci?: ConfidenceInterval | null;
    miss_rate_ci?: ConfidenceInterval | null;
}

export interface RankHistogram {
    counts: number[];
    total: number;
    chi_square: number;
}

export interface ContingencyDiagnostic {
    threshold: number;
    table: ContingencyTable;
    /** Plain-text rendering with marginal totals. */
    text: string;
}

export interface ScopeDiagnostics {
    scope: string;
    reliability?: ReliabilityBin[];
    rank_histogram?: RankHistogram;
    roc?: RocPoint[];
    error_diagram?: ErrorDiagramPoint[];
    contingency?: ContingencyDiagnostic[];
}

export interface VerificationReport {
    kind: ForecastKind;
    policy: AggregationPolicy;
    results: ScoreResult[];
    failures: ScoreFailure[];
    diagnostics: ScopeDiagnostics[];
    alignment: AlignmentSummary;
}

/**
 * One row of the flat score table. `value` is null for undefined scores;
 * the `status` column keeps them apart from absent entries.
 */
export interface FlatScoreRow {
    metric: string;
    scope: string;
    threshold: number | null;
    value: number | null;
    status: ScoreStatus;
    ci_low: number | null;
    ci_high: number | null;
    n: number;
    dropped: number;
}
