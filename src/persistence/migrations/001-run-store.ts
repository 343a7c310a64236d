/**
 * Migration 001: run store schema.
 *
 * Creates tables for finished run reports and the arbitration decisions
 * recorded while resolving conflicts.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const migration001RunStore: Migration = {
  version: 1,
  name: '001-run-store',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id            TEXT PRIMARY KEY,
        graph_name    TEXT,
        status        TEXT NOT NULL,
        request       TEXT NOT NULL,
        domains_json  TEXT NOT NULL DEFAULT '[]',
        report_json   TEXT NOT NULL,
        started_at    TEXT NOT NULL,
        completed_at  TEXT NOT NULL,
        created_at    TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_runs_started_at ON runs(started_at);
      CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status);

      CREATE TABLE IF NOT EXISTS decisions (
        id          TEXT PRIMARY KEY,
        run_id      TEXT NOT NULL,
        phase       TEXT NOT NULL,
        category    TEXT NOT NULL,
        key         TEXT NOT NULL,
        value       TEXT NOT NULL,
        rationale   TEXT,
        created_at  TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_decisions_run ON decisions(run_id);
      CREATE INDEX IF NOT EXISTS idx_decisions_key ON decisions(run_id, key);
    `)
  },
}
