/**
 * EngineEvents interface — defines all typed events for the event bus.
 *
 * Event naming convention: {scope}:{action} (e.g., "task:completed", "group:retry")
 */

import type { PhaseId, TaskId, TaskResult, ValidationRecord } from './types.js'

/**
 * Complete typed map of all events emitted on the engine event bus.
 * Use `keyof EngineEvents` to constrain event keys.
 */
export interface EngineEvents {
  // -------------------------------------------------------------------------
  // Run lifecycle
  // -------------------------------------------------------------------------

  /** A run has begun executing its first phase */
  'run:started': {
    runId: string
    request: string
    domains: string[]
    phaseCount: number
  }

  /** A run finished; status is "completed" or "aborted:<taskId | cancelled>" */
  'run:completed': {
    runId: string
    status: string
    durationMs: number
  }

  /** A critical failure or a cancellation stopped the run */
  'run:aborted': {
    runId: string
    phaseId: PhaseId
    /** Absent when the run was cancelled from outside */
    taskId?: TaskId
    reason: string
  }

  // -------------------------------------------------------------------------
  // Phase lifecycle
  // -------------------------------------------------------------------------

  'phase:started': {
    runId: string
    phaseId: PhaseId
  }

  'phase:completed': {
    runId: string
    phaseId: PhaseId
    status: 'completed' | 'aborted'
    taskIds: TaskId[]
  }

  // -------------------------------------------------------------------------
  // Task lifecycle
  // -------------------------------------------------------------------------

  'task:started': {
    runId: string
    phaseId: PhaseId
    taskId: TaskId
    attempt: number
  }

  /**
   * A task reached a terminal state. groupId is set for members of a
   * parallel group and absent for sequential tasks.
   */
  'task:completed': {
    runId: string
    phaseId: PhaseId
    groupId?: string
    result: TaskResult
  }

  /** A parallel group (or singleton) is being re-run after a transient failure */
  'group:retry': {
    runId: string
    phaseId: PhaseId
    groupId: string
    attempt: number
    failedTaskIds: TaskId[]
  }

  // -------------------------------------------------------------------------
  // Conflicts and validation
  // -------------------------------------------------------------------------

  'conflict:detected': {
    runId: string
    phaseId: PhaseId
    groupId: string
    conflictId: string
    taskIds: TaskId[]
  }

  'conflict:resolved': {
    runId: string
    conflictId: string
    status: 'resolved' | 'unresolved'
  }

  'validation:evaluated': {
    runId: string
    taskId: TaskId
    record: ValidationRecord
  }
}
