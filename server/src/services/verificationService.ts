import { ALL_SCOPE } from '../constants';
import { resolveConfig } from '../config';
import type { VerificationConfig } from '../config';
import { ConfigError, isVerificationError } from '../errors';
import { log, timed } from '../logger';
import { runPool } from '../pool';
import { mulberry32 } from '../random';
import type {
    AlignmentSummary,
    CategoricalUnit,
    ConfidenceInterval,
    ContinuousUnit,
    CoordinateKey,
    EnsembleUnit,
    FlatScoreRow,
    ForecastKind,
    ForecastValueMap,
    ProbabilisticUnit,
    ScopeDiagnostics,
    ScoreFailure,
    ScoreResult,
    SeriesEntry,
    VerificationReport,
} from '../types';
import { groupUnits, poolMultiCategoryTables, poolSamples, poolTables, reduce, scopeId } from './aggregationService';
import type { Reduction } from './aggregationService';
import { alignSeries } from './alignmentService';
import { buildContingencyTable, buildContingencyTables, buildMultiCategoryTable, formatTable } from './contingencyService';
import type { ThresholdableUnit } from './contingencyService';
import { toPairs } from './continuousService';
import { rankHistogram, toEnsemblePairs } from './ensembleService';
import { errorDiagram, reliabilityDiagram, rocCurve, toProbabilityPairs } from './probabilisticService';
import { bootstrapInterval, scopeSeed, wilsonInterval } from './resamplingService';
import type { MetricDefinition } from './scoreRegistry';

export type VerificationInput = {
    [K in ForecastKind]: {
        kind: K;
        forecasts: readonly SeriesEntry<ForecastValueMap[K]>[];
        observations: readonly SeriesEntry<number>[];
    };
}[ForecastKind];

export interface RunOptions {
    signal?: AbortSignal;
}

type AlignedUnits =
    | { kind: 'categorical'; units: CategoricalUnit[] }
    | { kind: 'continuous'; units: ContinuousUnit[] }
    | { kind: 'probabilistic'; units: ProbabilisticUnit[] }
    | { kind: 'ensemble'; units: EnsembleUnit[] };

interface Scope {
    label: string;
    index: number;
    data: AlignedUnits;
    /** Units of this scope lost to missing values. */
    dropped: number;
}

interface ScopeOutcome {
    results: ScoreResult[];
    failures: ScoreFailure[];
    diagnostics: ScopeDiagnostics | null;
}

/**
 * How one metric turns a block of units into a scorer input, merges inputs under
 * pooling, and scores an input.
 */
interface Pipeline<U, I> {
    toInput: (block: readonly U[]) => I;
    pool: (inputs: readonly I[]) => I;
    score: (input: I) => number;
    proportionBase?: (input: I) => number;
}

interface Evaluation {
    reduction: Reduction;
    ci: ConfidenceInterval | null;
    intervalError: unknown;
}

interface Aligned {
    data: AlignedUnits;
    summary: AlignmentSummary;
    droppedKeys: CoordinateKey[];
}

function align(input: VerificationInput, cfg: VerificationConfig): Aligned {
    const options = { keyPolicy: cfg.key_policy, missingPolicy: cfg.missing_policy };
    const finish = (data: AlignedUnits, r: { dropped: number; droppedKeys: CoordinateKey[]; unmatched: number }): Aligned => ({
        data,
        summary: { units: data.units.length, dropped: r.dropped, unmatched: r.unmatched },
        droppedKeys: r.droppedKeys,
    });
    switch (input.kind) {
        case 'categorical': {
            const r = alignSeries('categorical', input.forecasts, input.observations, options);
            return finish({ kind: 'categorical', units: r.units }, r);
        }
        case 'continuous': {
            const r = alignSeries('continuous', input.forecasts, input.observations, options);
            return finish({ kind: 'continuous', units: r.units }, r);
        }
        case 'probabilistic': {
            const r = alignSeries('probabilistic', input.forecasts, input.observations, options);
            return finish({ kind: 'probabilistic', units: r.units }, r);
        }
        case 'ensemble': {
            const r = alignSeries('ensemble', input.forecasts, input.observations, options);
            return finish({ kind: 'ensemble', units: r.units }, r);
        }
    }
}

/**
 * Splits the aligned units into reporting scopes. A run that is not grouped
 * always reports the `all` scope, even when no unit survived alignment.
 */
function splitScopes({ data, droppedKeys }: Aligned, cfg: VerificationConfig): Scope[] {
    const drops = new Map<string, number>();
    for (const key of droppedKeys) {
        const id = scopeId(key, cfg.group_by);
        drops.set(id, (drops.get(id) ?? 0) + 1);
    }

    const split = <U extends AlignedUnits['units'][number]>(units: U[], wrap: (subset: U[]) => AlignedUnits): Scope[] => {
        const groups = groupUnits(units, cfg.group_by);
        if (groups.length === 0 && cfg.group_by.length === 0) {
            return [{ label: ALL_SCOPE, index: 0, data: wrap([]), dropped: droppedKeys.length }];
        }
        return groups.map((g, index) => ({ label: g.scope, index, data: wrap(g.units), dropped: drops.get(g.id) ?? 0 }));
    };
    switch (data.kind) {
        case 'categorical': return split(data.units, units => ({ kind: 'categorical', units }));
        case 'continuous': return split(data.units, units => ({ kind: 'continuous', units }));
        case 'probabilistic': return split(data.units, units => ({ kind: 'probabilistic', units }));
        case 'ensemble': return split(data.units, units => ({ kind: 'ensemble', units }));
    }
}

/**
 * Resampling items for one scope: single units when pooling, unit_by groups when
 * averaging per unit.
 */
function toBlocks<U extends AlignedUnits['units'][number]>(units: readonly U[], cfg: VerificationConfig): U[][] {
    if (cfg.aggregation_scope === 'pooled') {
        return units.map(u => [u]);
    }
    return groupUnits(units, cfg.unit_by).map(g => g.units);
}

function evaluate<U, I>(blocks: readonly (readonly U[])[], pipeline: Pipeline<U, I>, cfg: VerificationConfig, seed: number): Evaluation {
    const statistic = (sample: readonly (readonly U[])[]): Reduction =>
        reduce(sample.map(pipeline.toInput), cfg.aggregation_scope, pipeline.pool, pipeline.score);

    const reduction = statistic(blocks);
    let ci: ConfidenceInterval | null = null;
    let intervalError: unknown = null;

    try {
        if (cfg.ci_method === 'wilson') {
            // Wilson needs a single proportion over a known trial count
            if (pipeline.proportionBase && cfg.aggregation_scope === 'pooled') {
                const pooled = pipeline.pool(blocks.map(pipeline.toInput));
                ci = wilsonInterval(reduction.value, pipeline.proportionBase(pooled), cfg.confidence_level);
            }
        } else if (cfg.bootstrap_resamples > 0) {
            ci = bootstrapInterval(blocks, sample => statistic(sample).value, {
                resamples: cfg.bootstrap_resamples,
                confidence_level: cfg.confidence_level,
                seed,
            });
        }
    } catch (e) {
        intervalError = e;
    }

    return { reduction, ci, intervalError };
}

function thresholdUnits(data: AlignedUnits, metric: MetricDefinition): readonly ThresholdableUnit[] {
    if (data.kind === 'categorical' || data.kind === 'continuous') {
        return data.units;
    }
    throw new ConfigError(`Metric '${metric.name}' does not apply to ${data.kind} forecasts`);
}

function evaluateMetric(
    metric: MetricDefinition,
    data: AlignedUnits,
    threshold: number | null,
    cfg: VerificationConfig,
    seed: number
): Evaluation {
    const mismatch = () => new ConfigError(`Metric '${metric.name}' does not apply to ${data.kind} forecasts`);

    switch (metric.family) {
        case 'contingency': {
            if (threshold === null) throw new ConfigError(`Metric '${metric.name}' needs a threshold`);
            const t = threshold;
            const blocks = toBlocks(thresholdUnits(data, metric), cfg);
            return evaluate(blocks, {
                toInput: block => buildContingencyTable(block, t),
                pool: poolTables,
                score: metric.score,
                proportionBase: metric.proportionBase,
            }, cfg, seed);
        }
        case 'multicategory': {
            const thresholds = cfg.threshold_set;
            if (!thresholds) throw new ConfigError(`Metric '${metric.name}' needs a threshold_set`);
            const blocks = toBlocks(thresholdUnits(data, metric), cfg);
            return evaluate(blocks, {
                toInput: block => buildMultiCategoryTable(block, thresholds),
                pool: tables => poolMultiCategoryTables(tables, thresholds.categories),
                score: metric.score,
            }, cfg, seed);
        }
        case 'continuous': {
            if (data.kind !== 'continuous') throw mismatch();
            return evaluate(toBlocks(data.units, cfg), { toInput: toPairs, pool: poolSamples, score: metric.score }, cfg, seed);
        }
        case 'probabilistic': {
            if (data.kind !== 'probabilistic') throw mismatch();
            const ctx = { roc_thresholds: cfg.roc_thresholds };
            const score = metric.score;
            return evaluate(toBlocks(data.units, cfg), {
                toInput: toProbabilityPairs,
                pool: poolSamples,
                score: pairs => score(pairs, ctx),
            }, cfg, seed);
        }
        case 'ensemble': {
            if (data.kind !== 'ensemble') throw mismatch();
            return evaluate(toBlocks(data.units, cfg), { toInput: toEnsemblePairs, pool: poolSamples, score: metric.score }, cfg, seed);
        }
    }
}

function describeFailure(e: unknown): { code: string; message: string } {
    if (isVerificationError(e)) return { code: e.code, message: e.message };
    return { code: 'INTERNAL', message: e instanceof Error ? e.message : String(e) };
}

function scopeDiagnostics(scope: Scope, cfg: VerificationConfig, seed: number): ScopeDiagnostics | null {
    if (cfg.diagnostics.length === 0) return null;
    const out: ScopeDiagnostics = { scope: scope.label };
    const { data } = scope;

    if (data.kind === 'probabilistic') {
        const pairs = toProbabilityPairs(data.units);
        if (cfg.diagnostics.includes('reliability')) {
            out.reliability = reliabilityDiagram(pairs, cfg.reliability_bins);
        }
        if (cfg.diagnostics.includes('roc')) {
            out.roc = rocCurve(pairs, cfg.roc_thresholds, cfg.confidence_level);
        }
        if (cfg.diagnostics.includes('error_diagram')) {
            out.error_diagram = errorDiagram(pairs, cfg.roc_thresholds, cfg.confidence_level);
        }
    }
    if ((data.kind === 'categorical' || data.kind === 'continuous') && cfg.diagnostics.includes('contingency') && cfg.threshold_set) {
        // A scope is already a single group
        out.contingency = buildContingencyTables(data.units, cfg.threshold_set, { group_by: [] })
            .map(({ threshold, table }) => ({ threshold, table, text: formatTable(table) }));
    }
    if (data.kind === 'ensemble' && cfg.diagnostics.includes('rank_histogram') && data.units.length > 0) {
        out.rank_histogram = rankHistogram(toEnsemblePairs(data.units), mulberry32(seed));
    }
    return out;
}

function scoreScope(scope: Scope, cfg: VerificationConfig): ScopeOutcome {
    const seed = scopeSeed(cfg.random_seed, scope.index);
    const outcome: ScopeOutcome = { results: [], failures: [], diagnostics: null };
    const n = scope.data.units.length;
    if (cfg.ci_method === 'bootstrap' && cfg.bootstrap_resamples > 0) {
        log(`[BOOT] ${scope.label}: ${cfg.bootstrap_resamples} resamples, seed ${seed}`);
    }

    for (const metric of cfg.metrics) {
        const thresholds: (number | null)[] = metric.family === 'contingency' && cfg.threshold_set
            ? [...cfg.threshold_set.values]
            : [null];

        for (const threshold of thresholds) {
            const where = { metric: metric.name, scope: scope.label, threshold };
            try {
                const { reduction, ci, intervalError } = evaluateMetric(metric, scope.data, threshold, cfg, seed);
                if (intervalError !== null) {
                    if (!isVerificationError(intervalError)) throw intervalError;
                    outcome.failures.push({ ...where, stage: 'interval', ...describeFailure(intervalError) });
                }
                const defined = !Number.isNaN(reduction.value);
                outcome.results.push({
                    ...where,
                    value: reduction.value,
                    status: defined ? 'defined' : 'undefined',
                    ci,
                    n,
                    dropped: scope.dropped,
                    excluded: reduction.excluded,
                    policy: cfg.aggregation_scope,
                });
            } catch (e) {
                if (!isVerificationError(e)) throw e;
                log(`[VERIFY] ${metric.name} failed for scope ${scope.label}: ${e.message}`);
                outcome.failures.push({ ...where, stage: 'score', ...describeFailure(e) });
            }
        }
    }

    try {
        outcome.diagnostics = scopeDiagnostics(scope, cfg, seed);
    } catch (e) {
        if (!isVerificationError(e)) throw e;
        outcome.failures.push({ metric: 'diagnostics', scope: scope.label, threshold: null, stage: 'score', ...describeFailure(e) });
    }
    return outcome;
}

/**
 * Aligns the two series, scores every configured metric for every scope and
 * threshold, and attaches intervals and diagnostics.
 *
 * Configuration and alignment problems reject the whole run. A failure while
 * scoring one (metric, scope, threshold) lands in `failures` and its siblings
 * still run.
 */
export async function runVerification(
    input: VerificationInput,
    config: unknown,
    options: RunOptions = {}
): Promise<VerificationReport> {
    const cfg = resolveConfig(input.kind, config);

    return timed(`verify ${input.kind}`, async () => {
        const aligned = align(input, cfg);
        const { summary } = aligned;
        const scopes = splitScopes(aligned, cfg);
        log(`[VERIFY] ${input.kind}: ${summary.units} units in ${scopes.length} scope(s), ${cfg.metrics.length} metric(s), policy ${cfg.aggregation_scope}`);

        const outcomes = await runPool(
            scopes.map(scope => () => scoreScope(scope, cfg)),
            cfg.workers,
            options.signal
        );

        const report: VerificationReport = {
            kind: input.kind,
            policy: cfg.aggregation_scope,
            results: outcomes.flatMap(o => o.results),
            failures: outcomes.flatMap(o => o.failures),
            diagnostics: outcomes.flatMap(o => (o.diagnostics ? [o.diagnostics] : [])),
            alignment: summary,
        };
        if (report.failures.length > 0) {
            log(`[VERIFY] ${report.failures.length} failure(s) recorded`);
        }
        return report;
    });
}

const finiteOrNull = (v: number | undefined): number | null =>
    v === undefined || Number.isNaN(v) ? null : v;

/**
 * Flattens a report into one row per (metric, scope, threshold).
 */
export function toFlatTable(report: VerificationReport): FlatScoreRow[] {
    return report.results.map(r => ({
        metric: r.metric,
        scope: r.scope,
        threshold: r.threshold,
        value: r.status === 'defined' ? r.value : null,
        status: r.status,
        ci_low: finiteOrNull(r.ci?.lower),
        ci_high: finiteOrNull(r.ci?.upper),
        n: r.n,
        dropped: r.dropped,
    }));
}
