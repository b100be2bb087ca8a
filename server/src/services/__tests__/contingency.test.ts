import { describe, it, expect } from 'vitest';
import { DomainError } from '../../errors';
import * as cat from '../categoricalService';
import {
    buildContingencyTable,
    buildContingencyTables,
    buildMultiCategoryTable,
    createTable,
    formatTable,
} from '../contingencyService';
import { ThresholdSet } from '../thresholdService';
import { continuousUnits, key } from './fixtures';
import type { ContinuousUnit } from '../../types';

// Threshold 5: hit, miss, false alarm, correct negative, hit
const UNITS = continuousUnits([[6, 7], [3, 8], [7, 2], [1, 1], [9, 9]]);

describe('buildContingencyTable', () => {
    it('should classify each unit against the threshold', () => {
        expect(buildContingencyTable(UNITS, 5)).toEqual({
            hits: 2,
            misses: 1,
            false_alarms: 1,
            correct_negatives: 1,
            total: 5,
        });
    });

    it('should return an all-zero table for no units', () => {
        expect(buildContingencyTable([], 5).total).toBe(0);
    });

    it('should build one table per scope and threshold', () => {
        const units: ContinuousUnit[] = [
            { kind: 'continuous', key: key('A', 24), forecast_value: 6, observed_value: 6 },
            { kind: 'continuous', key: key('A', 48), forecast_value: 6, observed_value: 0 },
        ];
        const tables = buildContingencyTables(units, new ThresholdSet([1, 5]), { group_by: ['lead'] });

        expect(tables.map(t => [t.scope, t.threshold, t.table.hits, t.table.false_alarms])).toEqual([
            ['lead=24', 1, 1, 0],
            ['lead=24', 5, 1, 0],
            ['lead=48', 1, 0, 1],
            ['lead=48', 5, 0, 1],
        ]);
    });
});

describe('createTable', () => {
    it('should reject negative or fractional counts', () => {
        expect(() => createTable({ hits: -1, misses: 0, false_alarms: 0, correct_negatives: 0 })).toThrow(DomainError);
        expect(() => createTable({ hits: 0, misses: 0.5, false_alarms: 0, correct_negatives: 0 })).toThrow(
            'Contingency count misses must be a non-negative integer (0.5)'
        );
    });
});

describe('categorical scores', () => {
    const table = createTable({ hits: 2, misses: 1, false_alarms: 1, correct_negatives: 1 });

    it('should compute the 2x2 scores', () => {
        expect(cat.probabilityOfDetection(table)).toBeCloseTo(2 / 3, 12);
        expect(cat.falseAlarmRatio(table)).toBeCloseTo(1 / 3, 12);
        expect(cat.criticalSuccessIndex(table)).toBe(0.5);
        expect(cat.frequencyBias(table)).toBe(1);
        expect(cat.heidkeSkillScore(table)).toBeCloseTo(1 / 6, 12);
        expect(cat.equitableThreatScore(table)).toBeCloseTo(1 / 11, 12);
    });

    it('should compute the supplementary scores', () => {
        expect(cat.baseRate(table)).toBe(0.6);
        expect(cat.forecastRate(table)).toBe(0.6);
        expect(cat.percentCorrect(table)).toBe(0.6);
        expect(cat.probabilityOfFalseDetection(table)).toBe(0.5);
        expect(cat.peirceSkillScore(table)).toBeCloseTo(1 / 6, 12);
        expect(cat.oddsRatio(table)).toBe(2);
        expect(cat.oddsRatioSkillScore(table)).toBeCloseTo(1 / 3, 12);
        expect(cat.extremeDependencyScore(table)).toBeCloseTo(0.114985901, 8);
    });

    it('should score a perfect forecast', () => {
        const perfect = createTable({ hits: 4, misses: 0, false_alarms: 0, correct_negatives: 6 });
        expect(cat.probabilityOfDetection(perfect)).toBe(1);
        expect(cat.falseAlarmRatio(perfect)).toBe(0);
        expect(cat.criticalSuccessIndex(perfect)).toBe(1);
        expect(cat.heidkeSkillScore(perfect)).toBe(1);
    });

    it('should score an all-miss forecast as zero detection', () => {
        const allMiss = createTable({ hits: 0, misses: 5, false_alarms: 0, correct_negatives: 3 });
        expect(cat.probabilityOfDetection(allMiss)).toBe(0);
        expect(cat.criticalSuccessIndex(allMiss)).toBe(0);
        expect(cat.falseAlarmRatio(allMiss)).toBeNaN();
    });

    it('should leave scores undefined when their denominator is zero', () => {
        const quiet = createTable({ hits: 0, misses: 0, false_alarms: 0, correct_negatives: 7 });
        expect(cat.probabilityOfDetection(quiet)).toBeNaN();
        expect(cat.criticalSuccessIndex(quiet)).toBeNaN();
        expect(cat.frequencyBias(quiet)).toBeNaN();
        expect(cat.extremeDependencyScore(quiet)).toBeNaN();
        expect(cat.probabilityOfFalseDetection(quiet)).toBe(0);
    });

    it('should leave every score undefined for an empty table', () => {
        const empty = createTable({ hits: 0, misses: 0, false_alarms: 0, correct_negatives: 0 });
        expect(cat.percentCorrect(empty)).toBeNaN();
        expect(cat.equitableThreatScore(empty)).toBeNaN();
        expect(cat.heidkeSkillScore(empty)).toBeNaN();
    });
});

describe('multi-category table', () => {
    const thresholds = new ThresholdSet([0, 10]);
    const units = continuousUnits([[-5, -3], [5, 12], [15, 15], [5, 5]]);

    it('should count forecast rows against observed columns', () => {
        const table = buildMultiCategoryTable(units, thresholds);
        expect(table.counts).toEqual([
            [1, 0, 0],
            [0, 1, 1],
            [0, 0, 1],
        ]);
        expect(table.total).toBe(4);
    });

    it('should compute percent correct and the generalised skill scores', () => {
        const table = buildMultiCategoryTable(units, thresholds);
        expect(cat.multiPercentCorrect(table)).toBe(0.75);
        expect(cat.multiHeidkeSkillScore(table)).toBeCloseTo(7 / 11, 12);
        expect(cat.multiPeirceSkillScore(table)).toBeCloseTo(0.7, 12);
    });

    it('should leave scores undefined for an empty table', () => {
        const table = buildMultiCategoryTable([], thresholds);
        expect(cat.multiPercentCorrect(table)).toBeNaN();
        expect(cat.multiHeidkeSkillScore(table)).toBeNaN();
    });
});

describe('binormal scores', () => {
    it('should measure the separation of hit and false alarm rates', () => {
        // POD 0.8, POFD 0.2
        const table = createTable({ hits: 4, misses: 1, false_alarms: 1, correct_negatives: 4 });
        expect(cat.discriminationDistance(table)).toBeCloseTo(1.683242, 5);
        expect(cat.modelledRocArea(table)).toBeCloseTo(0.883, 3);
    });

    it('should give no discrimination and an area of one half when POD equals POFD', () => {
        const table = createTable({ hits: 1, misses: 1, false_alarms: 1, correct_negatives: 1 });
        expect(cat.discriminationDistance(table)).toBe(0);
        expect(cat.modelledRocArea(table)).toBeCloseTo(0.5, 6);
    });

    it('should leave both undefined when a rate is 0 or 1', () => {
        const table = createTable({ hits: 2, misses: 0, false_alarms: 1, correct_negatives: 1 });
        expect(cat.discriminationDistance(table)).toBeNaN();
        expect(cat.modelledRocArea(table)).toBeNaN();
    });
});

describe('formatTable', () => {
    it('should render the table with marginal totals', () => {
        const table = createTable({ hits: 2, misses: 1, false_alarms: 1, correct_negatives: 1 });
        expect(formatTable(table)).toBe([
            '    2    1 |    3',
            '    1    1 |    2',
            '-----------------',
            '    3    2 |    5',
        ].join('\n'));
    });
});
