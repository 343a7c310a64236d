/**
 * Types for the phase orchestrator: run input, the run report and options.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { PhaseId, TaskId, TaskResult, ValidationRecord } from '../../core/types.js'
import type { ConflictDetector } from '../conflict/conflict-detector.js'
import type { ConflictResolver } from '../conflict/conflict-resolver.js'
import type { Conflict } from '../conflict/types.js'
import type { ValidationGate } from '../validation-gate/validation-gate.js'

// ---------------------------------------------------------------------------
// Run input
// ---------------------------------------------------------------------------

/**
 * What the upstream trigger hands the engine: the request text and the
 * domain tags it detected.
 */
export interface RunContext {
  request: string
  domains?: Iterable<string>
  /** Aborting cancels the run; the report status becomes "aborted:cancelled" */
  signal?: AbortSignal
}

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

/** "completed", or "aborted:<taskId>" / "aborted:cancelled" */
export type RunStatus = 'completed' | `aborted:${string}`

export interface StepReport {
  id: string
  kind: 'sequential' | 'parallel'
  taskIds: TaskId[]
  /** Attempts used; 0 when every member was skipped */
  attempts: number
}

export interface PhaseReport {
  phaseId: PhaseId
  status: 'completed' | 'aborted'
  steps: StepReport[]
}

export interface ValidationEntry extends ValidationRecord {
  taskId: TaskId
}

export interface RunAbort {
  phaseId: PhaseId
  /** Absent when the run was cancelled */
  taskId?: TaskId
  reason: string
}

/**
 * Structured hand-off document for one run. Results are keyed by task id
 * with sorted keys, so the report does not depend on completion order.
 */
export interface RunReport {
  runId: string
  graphName?: string
  status: RunStatus
  request: string
  domains: string[]
  startedAt: string
  completedAt: string
  /** Executed phases only; phases after an abort are absent */
  phases: PhaseReport[]
  results: Record<TaskId, TaskResult>
  conflicts: Conflict[]
  validations: ValidationEntry[]
  warnings: string[]
  abort?: RunAbort
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface PhaseOrchestratorOptions {
  /** Required when any task declares a validation requirement */
  gate?: ValidationGate
  detector?: ConflictDetector
  resolver?: ConflictResolver
  eventBus?: TypedEventBus
  /** Finished reports are saved to the run store when present */
  db?: BetterSqlite3Database
  /** Concurrent tasks per parallel group (default 4) */
  maxConcurrency?: number
  /** Whole-group retries after a transient failure (default 1) */
  groupRetryLimit?: number
  /** Timeout for tasks without their own (default 120000) */
  defaultTimeoutMs?: number
  /** Recorded on the report and in the run store */
  graphName?: string
  generateRunId?: () => string
  now?: () => number
}
