/**
 * Report assembly and run-store persistence for finished runs.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TaskId, TaskResult } from '../../core/types.js'
import { saveRunReport } from '../../persistence/queries/runs.js'
import { createLogger } from '../../utils/logger.js'
import type { Conflict } from '../conflict/types.js'
import type { PhaseReport, RunAbort, RunReport, RunStatus, ValidationEntry } from './types.js'

const logger = createLogger('phase-orchestrator:report')

export interface ReportParts {
  runId: string
  graphName?: string
  request: string
  domains: string[]
  startedAt: string
  completedAt: string
  phases: PhaseReport[]
  results: ReadonlyMap<TaskId, TaskResult>
  conflicts: Conflict[]
  validations: ValidationEntry[]
  warnings: string[]
  abort?: RunAbort
}

export function runStatusOf(abort: RunAbort | undefined): RunStatus {
  if (abort === undefined) return 'completed'
  return `aborted:${abort.taskId ?? 'cancelled'}`
}

/** Assemble a report; result keys are inserted in sorted order */
export function buildRunReport(parts: ReportParts): RunReport {
  const results: Record<TaskId, TaskResult> = {}
  for (const taskId of [...parts.results.keys()].sort()) {
    const result = parts.results.get(taskId)
    if (result !== undefined) results[taskId] = result
  }

  return {
    runId: parts.runId,
    ...(parts.graphName !== undefined ? { graphName: parts.graphName } : {}),
    status: runStatusOf(parts.abort),
    request: parts.request,
    domains: [...parts.domains],
    startedAt: parts.startedAt,
    completedAt: parts.completedAt,
    phases: parts.phases,
    results,
    conflicts: parts.conflicts,
    validations: parts.validations,
    warnings: parts.warnings,
    ...(parts.abort !== undefined ? { abort: parts.abort } : {}),
  }
}

/**
 * Save a finished report to the run store. A storage failure is logged and
 * does not change the outcome of the run.
 */
export function persistRunReport(db: BetterSqlite3Database, report: RunReport): boolean {
  try {
    saveRunReport(db, {
      id: report.runId,
      graph_name: report.graphName ?? null,
      status: report.status,
      request: report.request,
      domains: report.domains,
      started_at: report.startedAt,
      completed_at: report.completedAt,
      report: { ...report },
    })
    return true
  } catch (err) {
    logger.warn({ err, runId: report.runId }, 'Failed to persist run report')
    return false
  }
}
