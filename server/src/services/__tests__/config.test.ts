import { describe, it, expect } from 'vitest';
import { parseVerificationRequest, resolveConfig } from '../../config';
import { ConfigError } from '../../errors';
import { getMetric, hasMetric, metricsForKind, supportsKind } from '../scoreRegistry';
import { ThresholdSet } from '../thresholdService';

const issuesOf = (fn: () => unknown): string[] => {
    try {
        fn();
    } catch (e) {
        if (e instanceof ConfigError) return e.issues;
        throw e;
    }
    throw new Error('expected a ConfigError');
};

describe('score registry', () => {
    it('should look metrics up by name', () => {
        expect(getMetric('crps').family).toBe('ensemble');
        expect(hasMetric('pod')).toBe(true);
        expect(() => getMetric('skill')).toThrow("Unknown metric 'skill'");
    });

    it('should list the metrics of a forecast kind', () => {
        expect(metricsForKind('ensemble').map(m => m.name)).toEqual([
            'ensemble_me',
            'ensemble_mae',
            'ensemble_rmse',
            'crps',
            'ensemble_spread',
        ]);
        expect(metricsForKind('probabilistic').map(m => m.name)).toEqual(['brier', 'bss', 'roc_area']);
    });

    it('should let contingency metrics score both categorical and continuous forecasts', () => {
        expect(supportsKind(getMetric('csi'), 'categorical')).toBe(true);
        expect(supportsKind(getMetric('csi'), 'continuous')).toBe(true);
        expect(supportsKind(getMetric('csi'), 'ensemble')).toBe(false);
        expect(supportsKind(getMetric('rmse'), 'categorical')).toBe(false);
    });
});

describe('resolveConfig', () => {
    it('should fill in defaults', () => {
        const cfg = resolveConfig('continuous', { metrics: ['mae'], aggregation_scope: 'pooled' });

        expect(cfg.metrics.map(m => m.name)).toEqual(['mae']);
        expect(cfg.confidence_level).toBe(0.95);
        expect(cfg.random_seed).toBe(42);
        expect(cfg.bootstrap_resamples).toBe(0);
        expect(cfg.unit_by).toEqual(['space']);
        expect(cfg.group_by).toEqual([]);
        expect(cfg.missing_policy).toBe('drop');
        expect(cfg.key_policy).toBe('strict');
        expect(cfg.workers).toBe(1);
        expect(cfg.threshold_set).toBeNull();
    });

    it('should require an explicit aggregation scope', () => {
        const issues = issuesOf(() => resolveConfig('continuous', { metrics: ['mae'] }));
        expect(issues).toHaveLength(1);
        expect(issues[0].startsWith('aggregation_scope:')).toBe(true);
    });

    it('should reject unrecognised options', () => {
        const issues = issuesOf(() => resolveConfig('continuous', { metrics: ['mae'], aggregation_scope: 'pooled', bogus: 1 }));
        expect(issues[0].startsWith('(root):')).toBe(true);
    });

    it('should report every cross-field problem at once', () => {
        const issues = issuesOf(() => resolveConfig('categorical', {
            metrics: ['pod', 'brier', 'nope'],
            aggregation_scope: 'pooled',
            diagnostics: ['rank_histogram'],
        }));
        expect(issues).toEqual([
            "metrics: unknown metric 'nope'",
            "metrics: 'brier' does not apply to categorical forecasts",
            "diagnostics: 'rank_histogram' does not apply to categorical forecasts",
            'threshold_set: required by the requested categorical metrics',
        ]);
    });

    it('should need thresholds for the contingency diagnostic', () => {
        expect(issuesOf(() => resolveConfig('continuous', { aggregation_scope: 'pooled', diagnostics: ['contingency'] })))
            .toEqual(['threshold_set: required by the contingency diagnostic']);
        expect(issuesOf(() => resolveConfig('probabilistic', { aggregation_scope: 'pooled', diagnostics: ['contingency'] })))
            .toEqual([
                "diagnostics: 'contingency' does not apply to probabilistic forecasts",
                'threshold_set: required by the contingency diagnostic',
            ]);
    });

    it('should reject an empty run', () => {
        expect(issuesOf(() => resolveConfig('ensemble', { aggregation_scope: 'pooled' }))).toEqual([
            'metrics: nothing to compute',
        ]);
    });

    it('should range-check numeric options', () => {
        const issues = issuesOf(() => resolveConfig('continuous', {
            metrics: ['mae'],
            aggregation_scope: 'pooled',
            bootstrap_resamples: -1,
            confidence_level: 1.5,
        }));
        expect(issues.map(i => i.split(':')[0])).toEqual(['bootstrap_resamples', 'confidence_level']);
    });

    it('should keep the random seed within 32 bits', () => {
        const base = { metrics: ['mae'], aggregation_scope: 'pooled' };
        expect(resolveConfig('continuous', { ...base, random_seed: 0xffffffff }).random_seed).toBe(4294967295);
        expect(issuesOf(() => resolveConfig('continuous', { ...base, random_seed: 2 ** 32 })).map(i => i.split(':')[0]))
            .toEqual(['random_seed']);
        expect(issuesOf(() => resolveConfig('continuous', { ...base, random_seed: -1 })).map(i => i.split(':')[0]))
            .toEqual(['random_seed']);
    });

    it('should build a threshold set from a plain array', () => {
        const cfg = resolveConfig('continuous', { metrics: ['pod'], aggregation_scope: 'pooled', threshold_set: [1, 5] });
        expect(cfg.threshold_set?.values).toEqual([1, 5]);
    });

    it('should accept a ready-made threshold set', () => {
        const thresholds = new ThresholdSet([2]);
        const cfg = resolveConfig('categorical', { metrics: ['csi'], aggregation_scope: 'pooled', threshold_set: thresholds });
        expect(cfg.threshold_set).toBe(thresholds);
    });

    it('should report an invalid threshold array', () => {
        expect(issuesOf(() => resolveConfig('continuous', {
            metrics: ['pod'],
            aggregation_scope: 'pooled',
            threshold_set: [5, 1],
        }))).toEqual(['threshold_set: Thresholds must be strictly increasing (5 then 1)']);
    });

    it('should ignore repeated metric names', () => {
        const cfg = resolveConfig('continuous', { metrics: ['mae', 'rmse', 'mae'], aggregation_scope: 'per-unit-averaged' });
        expect(cfg.metrics.map(m => m.name)).toEqual(['mae', 'rmse']);
    });
});

describe('parseVerificationRequest', () => {
    it('should accept an ensemble request', () => {
        const request = parseVerificationRequest({
            kind: 'ensemble',
            forecasts: [{ key: { space: 'A', time: 0, lead: 6 }, value: [1, 2] }],
            observations: [{ key: { space: 'A', time: 0, lead: 6 }, value: 1.5 }],
            config: { metrics: ['crps'], aggregation_scope: 'pooled' },
        });
        expect(request.kind).toBe('ensemble');
    });

    it('should reject scalar forecasts for an ensemble request', () => {
        expect(() => parseVerificationRequest({
            kind: 'ensemble',
            forecasts: [{ key: { space: 'A', time: 0, lead: 6 }, value: 1 }],
            observations: [],
        })).toThrow(ConfigError);
    });

    it('should reject an unknown kind', () => {
        expect(() => parseVerificationRequest({ kind: 'spatial', forecasts: [], observations: [] })).toThrow(
            'Invalid verification request'
        );
    });
});
