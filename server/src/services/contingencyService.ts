import { DomainError } from '../errors';
import { groupUnits } from './aggregationService';
import type { AggregationScope } from './aggregationService';
import { isEvent } from './thresholdService';
import type { ThresholdSet } from './thresholdService';
import type { CategoricalUnit, ContingencyTable, ContinuousUnit, MultiCategoryTable } from '../types';

/** Units whose forecast and observation share one numeric scale. */
export type ThresholdableUnit = CategoricalUnit | ContinuousUnit;

export interface TableCounts {
    hits: number;
    misses: number;
    false_alarms: number;
    correct_negatives: number;
}

export interface ScopedTable {
    scope: string;
    threshold: number;
    table: ContingencyTable;
}

export function createTable(counts: TableCounts): ContingencyTable {
    const { hits, misses, false_alarms, correct_negatives } = counts;
    for (const [name, value] of Object.entries(counts)) {
        if (!Number.isInteger(value) || value < 0) {
            throw new DomainError(`Contingency count ${name} must be a non-negative integer (${value})`);
        }
    }
    return Object.freeze({
        hits,
        misses,
        false_alarms,
        correct_negatives,
        total: hits + misses + false_alarms + correct_negatives,
    });
}

export function buildContingencyTable(units: readonly ThresholdableUnit[], threshold: number): ContingencyTable {
    let hits = 0;
    let misses = 0;
    let false_alarms = 0;
    let correct_negatives = 0;

    for (const unit of units) {
        const forecastYes = isEvent(unit.forecast_value, threshold);
        const observedYes = isEvent(unit.observed_value, threshold);
        if (forecastYes && observedYes) hits++;
        else if (!forecastYes && observedYes) misses++;
        else if (forecastYes && !observedYes) false_alarms++;
        else correct_negatives++;
    }

    return createTable({ hits, misses, false_alarms, correct_negatives });
}

/**
 * One table per (scope group, threshold). Groups come back in scope order and
 * thresholds in ascending order within each group.
 */
export function buildContingencyTables(
    units: readonly ThresholdableUnit[],
    thresholds: ThresholdSet,
    scope: Pick<AggregationScope, 'group_by'>
): ScopedTable[] {
    const tables: ScopedTable[] = [];
    for (const group of groupUnits(units, scope.group_by)) {
        for (const threshold of thresholds.values) {
            tables.push({ scope: group.scope, threshold, table: buildContingencyTable(group.units, threshold) });
        }
    }
    return tables;
}

export function buildMultiCategoryTable(units: readonly ThresholdableUnit[], thresholds: ThresholdSet): MultiCategoryTable {
    const k = thresholds.categories;
    const counts = Array.from({ length: k }, () => new Array<number>(k).fill(0));
    for (const unit of units) {
        counts[thresholds.categorize(unit.forecast_value)][thresholds.categorize(unit.observed_value)]++;
    }
    return Object.freeze({
        categories: k,
        counts: counts.map(row => Object.freeze(row)),
        total: units.length,
    });
}

/**
 * Text rendering with forecast rows (yes, no), observed columns and marginal totals.
 */
export function formatTable(table: ContingencyTable): string {
    const rows = [
        [table.hits, table.false_alarms],
        [table.misses, table.correct_negatives],
    ];
    const width = Math.max(5, String(table.total).length + 1);
    const cell = (n: number) => String(n).padStart(width);

    const lines = rows.map(([a, b]) => `${cell(a)}${cell(b)} |${cell(a + b)}`);
    lines.push('-'.repeat(width * 3 + 2));
    lines.push(`${cell(table.hits + table.misses)}${cell(table.false_alarms + table.correct_negatives)} |${cell(table.total)}`);
    return lines.join('\n');
}
