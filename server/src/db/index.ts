import Database from 'better-sqlite3';
import path from 'path';
import { log } from '../logger';

export type DB = Database.Database;

export const DEFAULT_DB_PATH = path.resolve(process.cwd(), 'verification.db');

export const openDatabase = (file: string = process.env.VERIFY_DB_PATH || DEFAULT_DB_PATH): DB => {
    const db = new Database(file);
    if (file !== ':memory:') {
        // Enable WAL mode for better concurrency
        db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    return db;
};

export const initDB = (db: DB) => {
    db.exec(`
        CREATE TABLE IF NOT EXISTS runs (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            kind TEXT NOT NULL,
            policy TEXT NOT NULL,
            created_at INTEGER NOT NULL,
            units INTEGER NOT NULL,
            dropped INTEGER NOT NULL,
            unmatched INTEGER NOT NULL,
            failures INTEGER NOT NULL
        );

        CREATE TABLE IF NOT EXISTS score_results (
            run_id INTEGER NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
            metric TEXT NOT NULL,
            scope TEXT NOT NULL,
            threshold REAL,
            value REAL,
            status TEXT NOT NULL,
            ci_low REAL,
            ci_high REAL,
            n INTEGER NOT NULL,
            dropped INTEGER NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_score_results_run ON score_results(run_id);
        CREATE INDEX IF NOT EXISTS idx_score_results_metric ON score_results(metric, scope);
    `);
    log('[DB] Initialized SQLite database');
};
