import { z } from 'zod';
import {
    DEFAULT_CONFIDENCE_LEVEL,
    DEFAULT_RELIABILITY_BINS,
    DEFAULT_SEED,
    DEFAULT_WORKERS,
    MAX_BOOTSTRAP_RESAMPLES,
    MAX_SEED,
} from './constants';
import { ConfigError } from './errors';
import { getMetric, hasMetric, requiresThresholds, supportsKind } from './services/scoreRegistry';
import type { MetricDefinition } from './services/scoreRegistry';
import { ThresholdSet } from './services/thresholdService';
import type { ForecastKind } from './types';

const dimension = z.enum(['space', 'time', 'lead']);

export const DIAGNOSTICS = ['reliability', 'rank_histogram', 'roc', 'error_diagram', 'contingency'] as const;
export type Diagnostic = (typeof DIAGNOSTICS)[number];

const DIAGNOSTIC_KINDS: Record<Diagnostic, readonly ForecastKind[]> = {
    reliability: ['probabilistic'],
    roc: ['probabilistic'],
    error_diagram: ['probabilistic'],
    rank_histogram: ['ensemble'],
    contingency: ['categorical', 'continuous'],
};

export const verificationConfigSchema = z.object({
    metrics: z.array(z.string().min(1)).default([]),
    threshold_set: z.union([z.instanceof(ThresholdSet), z.array(z.number())]).optional(),
    // No default: callers must say which reduction they mean
    aggregation_scope: z.enum(['pooled', 'per-unit-averaged']),
    group_by: z.array(dimension).default([]),
    unit_by: z.array(dimension).min(1).default(['space']),
    bootstrap_resamples: z.number().int().min(0).max(MAX_BOOTSTRAP_RESAMPLES).default(0),
    confidence_level: z.number().gt(0).lt(1).default(DEFAULT_CONFIDENCE_LEVEL),
    ci_method: z.enum(['bootstrap', 'wilson']).default('bootstrap'),
    random_seed: z.number().int().min(0).max(MAX_SEED).default(DEFAULT_SEED),
    missing_policy: z.enum(['drop', 'error']).default('drop'),
    key_policy: z.enum(['strict', 'intersect']).default('strict'),
    reliability_bins: z.number().int().min(1).default(DEFAULT_RELIABILITY_BINS),
    roc_thresholds: z.array(z.number().min(0).max(1)).min(1).optional(),
    diagnostics: z.array(z.enum(DIAGNOSTICS)).default([]),
    workers: z.number().int().min(1).default(DEFAULT_WORKERS),
}).strict();

export type VerificationConfigInput = z.input<typeof verificationConfigSchema>;

export type VerificationConfig = Omit<z.output<typeof verificationConfigSchema>, 'threshold_set' | 'metrics'> & {
    metrics: MetricDefinition[];
    threshold_set: ThresholdSet | null;
};

/**
 * Parses and cross-checks a run configuration against the forecast kind.
 * Every problem found is reported in a single ConfigError.
 */
export function resolveConfig(kind: ForecastKind, input: unknown): VerificationConfig {
    const parsed = verificationConfigSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new ConfigError('Invalid verification config', issues);
    }
    const cfg = parsed.data;
    const issues: string[] = [];

    const names = Array.from(new Set(cfg.metrics));
    names.filter(name => !hasMetric(name)).forEach(name => issues.push(`metrics: unknown metric '${name}'`));
    const metrics = names.filter(name => hasMetric(name)).map(name => getMetric(name));

    for (const metric of metrics) {
        if (!supportsKind(metric, kind)) {
            issues.push(`metrics: '${metric.name}' does not apply to ${kind} forecasts`);
        }
    }
    for (const d of cfg.diagnostics) {
        if (!DIAGNOSTIC_KINDS[d].includes(kind)) {
            issues.push(`diagnostics: '${d}' does not apply to ${kind} forecasts`);
        }
    }
    if (metrics.length === 0 && cfg.diagnostics.length === 0) {
        issues.push('metrics: nothing to compute');
    }

    let thresholds: ThresholdSet | null = null;
    if (cfg.threshold_set instanceof ThresholdSet) {
        thresholds = cfg.threshold_set;
    } else if (cfg.threshold_set) {
        try {
            thresholds = new ThresholdSet(cfg.threshold_set);
        } catch (e) {
            issues.push(`threshold_set: ${e instanceof Error ? e.message : String(e)}`);
        }
    }
    if (!cfg.threshold_set && metrics.some(requiresThresholds)) {
        issues.push('threshold_set: required by the requested categorical metrics');
    }
    if (!cfg.threshold_set && cfg.diagnostics.includes('contingency')) {
        issues.push('threshold_set: required by the contingency diagnostic');
    }

    if (issues.length > 0) {
        throw new ConfigError('Invalid verification config', issues);
    }

    return { ...cfg, metrics, threshold_set: thresholds };
}

const coordinateKey = z.object({
    space: z.string(),
    time: z.union([z.string(), z.number()]),
    lead: z.number(),
});

const scalarSeries = z.array(z.object({ key: coordinateKey, value: z.number().nullable() }));
const ensembleSeries = z.array(z.object({ key: coordinateKey, value: z.array(z.number()).nullable() }));

/** Body of a verification request; `config` is checked later by resolveConfig. */
export const verificationRequestSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('categorical'), forecasts: scalarSeries, observations: scalarSeries, config: z.unknown() }),
    z.object({ kind: z.literal('continuous'), forecasts: scalarSeries, observations: scalarSeries, config: z.unknown() }),
    z.object({ kind: z.literal('probabilistic'), forecasts: scalarSeries, observations: scalarSeries, config: z.unknown() }),
    z.object({ kind: z.literal('ensemble'), forecasts: ensembleSeries, observations: scalarSeries, config: z.unknown() }),
]);

export type VerificationRequest = z.infer<typeof verificationRequestSchema>;

export function parseVerificationRequest(body: unknown): VerificationRequest {
    const parsed = verificationRequestSchema.safeParse(body);
    if (!parsed.success) {
        throw new ConfigError(
            'Invalid verification request',
            parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
        );
    }
    return parsed.data;
}
