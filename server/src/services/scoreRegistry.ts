import { ConfigError } from '../errors';
import type {
    ContingencyTable,
    EnsemblePair,
    ForecastKind,
    MultiCategoryTable,
    NumericPair,
} from '../types';
import * as categorical from './categoricalService';
import * as continuous from './continuousService';
import * as ensemble from './ensembleService';
import * as probabilistic from './probabilisticService';

export type MetricFamily = 'contingency' | 'multicategory' | 'continuous' | 'probabilistic' | 'ensemble';

export interface ScoreContext {
    roc_thresholds?: readonly number[];
}

interface MetricBase {
    name: string;
    description: string;
}

export interface ContingencyMetric extends MetricBase {
    family: 'contingency';
    score: (table: ContingencyTable) => number;
    /** Trials behind the score when it is a proportion; enables the Wilson interval. */
    proportionBase?: (table: ContingencyTable) => number;
}

export interface MultiCategoryMetric extends MetricBase {
    family: 'multicategory';
    score: (table: MultiCategoryTable) => number;
}

export interface ContinuousMetric extends MetricBase {
    family: 'continuous';
    score: (pairs: readonly NumericPair[]) => number;
}

export interface ProbabilisticMetric extends MetricBase {
    family: 'probabilistic';
    score: (pairs: readonly NumericPair[], ctx: ScoreContext) => number;
}

export interface EnsembleMetric extends MetricBase {
    family: 'ensemble';
    score: (pairs: readonly EnsemblePair[]) => number;
}

export type MetricDefinition =
    | ContingencyMetric
    | MultiCategoryMetric
    | ContinuousMetric
    | ProbabilisticMetric
    | EnsembleMetric;

export const FAMILY_KINDS: Record<MetricFamily, readonly ForecastKind[]> = {
    contingency: ['categorical', 'continuous'],
    multicategory: ['categorical', 'continuous'],
    continuous: ['continuous'],
    probabilistic: ['probabilistic'],
    ensemble: ['ensemble'],
};

const METRICS: MetricDefinition[] = [
    // --- Contingency table (one threshold) ---
    {
        family: 'contingency', name: 'pod', description: 'Probability of detection',
        score: categorical.probabilityOfDetection, proportionBase: t => t.hits + t.misses,
    },
    {
        family: 'contingency', name: 'far', description: 'False alarm ratio',
        score: categorical.falseAlarmRatio, proportionBase: t => t.hits + t.false_alarms,
    },
    {
        family: 'contingency', name: 'csi', description: 'Critical success index',
        score: categorical.criticalSuccessIndex, proportionBase: t => t.hits + t.misses + t.false_alarms,
    },
    { family: 'contingency', name: 'hss', description: 'Heidke skill score', score: categorical.heidkeSkillScore },
    { family: 'contingency', name: 'ets', description: 'Equitable threat score', score: categorical.equitableThreatScore },
    { family: 'contingency', name: 'frequency_bias', description: 'Frequency bias', score: categorical.frequencyBias },
    {
        family: 'contingency', name: 'base_rate', description: 'Observed event frequency',
        score: categorical.baseRate, proportionBase: t => t.total,
    },
    {
        family: 'contingency', name: 'forecast_rate', description: 'Forecast event frequency',
        score: categorical.forecastRate, proportionBase: t => t.total,
    },
    {
        family: 'contingency', name: 'percent_correct', description: 'Fraction of correct forecasts',
        score: categorical.percentCorrect, proportionBase: t => t.total,
    },
    {
        family: 'contingency', name: 'pofd', description: 'Probability of false detection',
        score: categorical.probabilityOfFalseDetection, proportionBase: t => t.false_alarms + t.correct_negatives,
    },
    { family: 'contingency', name: 'pss', description: 'Peirce skill score', score: categorical.peirceSkillScore },
    { family: 'contingency', name: 'odds_ratio', description: 'Odds ratio', score: categorical.oddsRatio },
    { family: 'contingency', name: 'orss', description: 'Odds ratio skill score', score: categorical.oddsRatioSkillScore },
    { family: 'contingency', name: 'eds', description: 'Extreme dependency score', score: categorical.extremeDependencyScore },
    { family: 'contingency', name: 'discrimination_distance', description: 'Binormal discrimination distance', score: categorical.discriminationDistance },
    { family: 'contingency', name: 'modelled_roc_area', description: 'Area under the binormal ROC curve', score: categorical.modelledRocArea },

    // --- Multi-category table (all thresholds) ---
    { family: 'multicategory', name: 'multi_pc', description: 'Multi-category percent correct', score: categorical.multiPercentCorrect },
    { family: 'multicategory', name: 'multi_hss', description: 'Multi-category Heidke skill score', score: categorical.multiHeidkeSkillScore },
    { family: 'multicategory', name: 'multi_pss', description: 'Multi-category Peirce skill score', score: categorical.multiPeirceSkillScore },

    // --- Continuous ---
    { family: 'continuous', name: 'me', description: 'Mean error', score: continuous.meanError },
    { family: 'continuous', name: 'mae', description: 'Mean absolute error', score: continuous.meanAbsoluteError },
    { family: 'continuous', name: 'mse', description: 'Mean squared error', score: continuous.meanSquaredError },
    { family: 'continuous', name: 'rmse', description: 'Root mean squared error', score: continuous.rootMeanSquaredError },
    { family: 'continuous', name: 'correlation', description: 'Pearson correlation', score: continuous.correlation },
    { family: 'continuous', name: 'multiplicative_bias', description: 'Sum of forecasts over sum of observations', score: continuous.multiplicativeBias },

    // --- Probabilistic ---
    { family: 'probabilistic', name: 'brier', description: 'Brier score', score: pairs => probabilistic.brierScore(pairs) },
    { family: 'probabilistic', name: 'bss', description: 'Brier skill score against climatology', score: pairs => probabilistic.brierSkillScore(pairs) },
    {
        family: 'probabilistic', name: 'roc_area', description: 'Area under the ROC curve',
        score: (pairs, ctx) => probabilistic.rocArea(pairs, ctx.roc_thresholds),
    },

    // --- Ensemble ---
    { family: 'ensemble', name: 'ensemble_me', description: 'Mean error of the ensemble mean', score: ensemble.ensembleMeanError },
    { family: 'ensemble', name: 'ensemble_mae', description: 'Mean absolute error of the ensemble mean', score: ensemble.ensembleMeanAbsoluteError },
    { family: 'ensemble', name: 'ensemble_rmse', description: 'RMSE of the ensemble mean', score: ensemble.ensembleRootMeanSquaredError },
    { family: 'ensemble', name: 'crps', description: 'Continuous ranked probability score', score: ensemble.meanCrps },
    { family: 'ensemble', name: 'ensemble_spread', description: 'Root mean ensemble variance', score: ensemble.ensembleSpread },
];

const registry = new Map<string, MetricDefinition>(METRICS.map(m => [m.name, m]));

export function getMetric(name: string): MetricDefinition {
    const metric = registry.get(name);
    if (!metric) {
        throw new ConfigError(`Unknown metric '${name}'`);
    }
    return metric;
}

export const hasMetric = (name: string): boolean => registry.has(name);

export const listMetrics = (): MetricDefinition[] => [...registry.values()];

export const supportsKind = (metric: MetricDefinition, kind: ForecastKind): boolean =>
    FAMILY_KINDS[metric.family].includes(kind);

export const metricsForKind = (kind: ForecastKind): MetricDefinition[] =>
    listMetrics().filter(m => supportsKind(m, kind));

export const requiresThresholds = (metric: MetricDefinition): boolean =>
    metric.family === 'contingency' || metric.family === 'multicategory';
