/**
 * Core types for Waymark
 * Shared type definitions used across all modules
 */

/** Unique identifier for a task in the phase graph */
export type TaskId = string

/** Unique identifier for a phase */
export type PhaseId = string

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** Opaque structured output of a task */
export type TaskPayload = Record<string, unknown>

/** Terminal state of a single task invocation */
export type TaskResultStatus =
  | 'success'
  | 'failure'
  | 'skipped-by-condition'
  | 'cancelled'

/** Serializable description of a task failure */
export interface TaskErrorInfo {
  name: string
  code: string
  message: string
  transient: boolean
}

/**
 * Outcome of exactly one task invocation.
 * Results are frozen before they are stored on a run.
 */
export interface TaskResult {
  taskId: TaskId
  phaseId: PhaseId
  resultType: string
  status: TaskResultStatus
  payload?: TaskPayload
  error?: TaskErrorInfo
  /** 1-based attempt number; 0 for tasks never invoked */
  attempt: number
  durationMs: number
  timestamp: string
}

/** Risk assigned to an external validation report */
export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH'

/** Gate verdict derived from risk or from degraded operation */
export type GateDecision = 'ALLOW' | 'WARN' | 'BLOCK'

/** Outcome of one ValidationGate evaluation */
export interface ValidationRecord {
  resourceId: string
  /** null when no assessment could be made (rate limited, unavailable) */
  risk: RiskLevel | null
  decision: GateDecision
  cacheHit: boolean
  stale: boolean
  note?: string
  timestamp: string
}
