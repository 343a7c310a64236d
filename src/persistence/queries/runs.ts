/**
 * Run store queries: persist and read back finished run reports.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import {
  ListRunsOptionsSchema,
  RunRowSchema,
  SaveRunInputSchema,
  type ListRunsOptions,
  type RunRow,
  type RunSummary,
  type SaveRunInput,
  type StoredRun,
} from '../schemas/runs.js'

export type { ListRunsOptions, RunSummary, SaveRunInput, StoredRun }

const DomainsSchema = z.array(z.string())
const ReportSchema = z.record(z.string(), z.unknown())

function toSummary(row: RunRow): RunSummary {
  return {
    id: row.id,
    graphName: row.graph_name,
    status: row.status,
    request: row.request,
    domains: DomainsSchema.parse(JSON.parse(row.domains_json)),
    startedAt: row.started_at,
    completedAt: row.completed_at,
  }
}

/**
 * Insert a run, replacing any earlier row with the same id.
 */
export function saveRunReport(db: BetterSqlite3Database, input: SaveRunInput): void {
  const validated = SaveRunInputSchema.parse(input)
  db.prepare(`
    INSERT OR REPLACE INTO runs (id, graph_name, status, request, domains_json, report_json, started_at, completed_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    validated.id,
    validated.graph_name ?? null,
    validated.status,
    validated.request,
    JSON.stringify(validated.domains),
    JSON.stringify(validated.report),
    validated.started_at,
    validated.completed_at,
  )
}

export function getRunReport(db: BetterSqlite3Database, id: string): StoredRun | undefined {
  const raw: unknown = db.prepare('SELECT * FROM runs WHERE id = ?').get(id)
  if (raw === undefined) return undefined
  const row = RunRowSchema.parse(raw)
  return {
    ...toSummary(row),
    report: ReportSchema.parse(JSON.parse(row.report_json)),
  }
}

/**
 * Most recent runs first.
 */
export function listRuns(db: BetterSqlite3Database, options: ListRunsOptions = {}): RunSummary[] {
  const { limit, status } = ListRunsOptionsSchema.parse(options)
  const rows: unknown[] =
    status !== undefined
      ? db.prepare('SELECT * FROM runs WHERE status = ? ORDER BY started_at DESC, id ASC LIMIT ?').all(status, limit)
      : db.prepare('SELECT * FROM runs ORDER BY started_at DESC, id ASC LIMIT ?').all(limit)
  return z.array(RunRowSchema).parse(rows).map(toSummary)
}
