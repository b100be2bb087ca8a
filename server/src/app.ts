import express from 'express';
import type { Response } from 'express';
import cors from 'cors';
import { parseVerificationRequest } from './config';
import type { DB } from './db';
import { isVerificationError } from './errors';
import { FORECAST_KINDS } from './constants';
import { log } from './logger';
import { listMetrics, metricsForKind } from './services/scoreRegistry';
import * as statsService from './services/statsService';
import { runVerification, toFlatTable } from './services/verificationService';

const sendError = (res: Response, e: unknown) => {
    if (isVerificationError(e)) {
        res.status(400).json({ error: e.message, code: e.code });
        return;
    }
    log(`[SERVER] Request failed: ${String(e)}`);
    res.status(500).json({ error: String(e) });
};

export function createApp(db: DB) {
    const app = express();

    app.use(cors());
    app.use(express.json({ limit: '20mb' }));

    // --- API Routes ---

    app.get('/api/status', (req, res) => {
        res.json({ status: 'online', server_time: Date.now() });
    });

    app.get('/api/metrics', (req, res) => {
        const kind = FORECAST_KINDS.find(k => k === req.query.kind);
        if (req.query.kind !== undefined && !kind) {
            res.status(400).json({ error: `Unknown forecast kind '${String(req.query.kind)}'`, code: 'CONFIG' });
            return;
        }
        const list = kind ? metricsForKind(kind) : listMetrics();
        res.json(list.map(m => ({ name: m.name, family: m.family, description: m.description })));
    });

    app.post('/api/verify', async (req, res) => {
        try {
            const request = parseVerificationRequest(req.body);
            const report = await runVerification(request, request.config);
            const runId = statsService.storeReport(db, report);
            res.json({
                run_id: runId,
                rows: toFlatTable(report),
                failures: report.failures,
                diagnostics: report.diagnostics,
                alignment: report.alignment,
            });
        } catch (e) {
            sendError(res, e);
        }
    });

    app.get('/api/runs', (req, res) => {
        try {
            res.json(statsService.listRuns(db));
        } catch (e) {
            sendError(res, e);
        }
    });

    app.get('/api/runs/:id', (req, res) => {
        try {
            const id = parseInt(req.params.id, 10);
            const run = Number.isNaN(id) ? null : statsService.getRun(db, id);
            if (!run) {
                res.status(404).json({ error: `Run ${req.params.id} not found` });
                return;
            }
            res.json({ ...run, rows: statsService.getRunResults(db, id) });
        } catch (e) {
            sendError(res, e);
        }
    });

    return app;
}
