import { FORECAST_KINDS } from '../constants';
import type { DB } from '../db';
import { log } from '../logger';
import type { FlatScoreRow, ForecastKind, AggregationPolicy, ScoreStatus, VerificationReport } from '../types';
import { toFlatTable } from './verificationService';

export interface RunSummary {
    id: number;
    kind: ForecastKind;
    policy: AggregationPolicy;
    created_at: number;
    units: number;
    dropped: number;
    unmatched: number;
    failures: number;
}

interface RunRow {
    id: number;
    kind: string;
    policy: string;
    created_at: number;
    units: number;
    dropped: number;
    unmatched: number;
    failures: number;
}

interface ScoreRow {
    metric: string;
    scope: string;
    threshold: number | null;
    value: number | null;
    status: string;
    ci_low: number | null;
    ci_high: number | null;
    n: number;
    dropped: number;
}

const isKind = (v: string): v is ForecastKind => FORECAST_KINDS.some(k => k === v);
const isPolicy = (v: string): v is AggregationPolicy => v === 'pooled' || v === 'per-unit-averaged';
const isStatus = (v: string): v is ScoreStatus => v === 'defined' || v === 'undefined';

function toRunSummary(r: RunRow): RunSummary {
    if (!isKind(r.kind) || !isPolicy(r.policy)) {
        throw new Error(`Run ${r.id} has an unreadable kind or policy (${r.kind}, ${r.policy})`);
    }
    return { ...r, kind: r.kind, policy: r.policy };
}

/**
 * Writes a report's flat table under a new run. Returns the run id.
 */
export function storeReport(db: DB, report: VerificationReport, createdAt = Date.now()): number {
    const insertRun = db.prepare<[string, string, number, number, number, number, number]>(`
        INSERT INTO runs (kind, policy, created_at, units, dropped, unmatched, failures)
        VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    const insertScore = db.prepare<[number, string, string, number | null, number | null, string, number | null, number | null, number, number]>(`
        INSERT INTO score_results (run_id, metric, scope, threshold, value, status, ci_low, ci_high, n, dropped)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const rows = toFlatTable(report);
    const store = db.transaction(() => {
        const { alignment } = report;
        const info = insertRun.run(
            report.kind, report.policy, createdAt,
            alignment.units, alignment.dropped, alignment.unmatched, report.failures.length
        );
        const runId = Number(info.lastInsertRowid);
        for (const r of rows) {
            insertScore.run(runId, r.metric, r.scope, r.threshold, r.value, r.status, r.ci_low, r.ci_high, r.n, r.dropped);
        }
        return runId;
    });

    const runId = store();
    log(`[DB] Stored run ${runId}: ${rows.length} score rows`);
    return runId;
}

export function listRuns(db: DB, limit = 50): RunSummary[] {
    const rows = db.prepare<[number], RunRow>('SELECT * FROM runs ORDER BY id DESC LIMIT ?').all(limit);
    return rows.map(toRunSummary);
}

export function getRun(db: DB, id: number): RunSummary | null {
    const row = db.prepare<[number], RunRow>('SELECT * FROM runs WHERE id = ?').get(id);
    return row ? toRunSummary(row) : null;
}

/**
 * Flat table of a stored run, in insertion order. An undefined score comes back
 * with a NULL value and status 'undefined'; a score that was never computed has
 * no row at all.
 */
export function getRunResults(db: DB, id: number): FlatScoreRow[] {
    const rows = db.prepare<[number], ScoreRow>(`
        SELECT metric, scope, threshold, value, status, ci_low, ci_high, n, dropped
        FROM score_results
        WHERE run_id = ?
        ORDER BY rowid
    `).all(id);

    return rows.map(r => {
        if (!isStatus(r.status)) {
            throw new Error(`Run ${id} has an unreadable status '${r.status}'`);
        }
        return { ...r, status: r.status };
    });
}
