/**
 * Phase graph types: the Task contract, task specs, phases and parallel groups.
 */

import type {
  PhaseId,
  TaskId,
  TaskPayload,
  TaskResult,
  ValidationRecord,
} from '../../core/types.js'
import type { ExternalValidator } from '../validation-gate/validation-gate.js'

// ---------------------------------------------------------------------------
// Task contract
// ---------------------------------------------------------------------------

/**
 * Read-only view of a run handed to every task.
 * `results` holds every TaskResult recorded before the current step. Each
 * task receives its own copy of the map, and the results in it are frozen.
 */
export interface ExecutionContext {
  readonly runId: string
  readonly request: string
  readonly domains: ReadonlySet<string>
  readonly results: ReadonlyMap<TaskId, TaskResult>
}

export interface TaskContext extends ExecutionContext {
  readonly taskId: TaskId
  readonly phaseId: PhaseId
  /** 1-based; greater than 1 when the enclosing group is retried */
  readonly attempt: number
  /** Fires when a critical sibling fails, the run is cancelled or the task times out */
  readonly signal: AbortSignal
  /** Present for tasks that declare a validation requirement */
  readonly validation?: ValidationRecord
  /** Extra structured input (arbitration tasks receive the conflict here) */
  readonly input?: Readonly<Record<string, unknown>>
}

/**
 * A unit of analysis work. Returns a payload or throws; a thrown
 * TaskExecutionError with `transient: true` makes its group retryable.
 * Implementations must be safe to run again and must honour `signal`.
 */
export interface Task {
  run(context: TaskContext): Promise<TaskPayload>
}

// ---------------------------------------------------------------------------
// Task specs
// ---------------------------------------------------------------------------

export type Activation =
  | { kind: 'always' }
  | { kind: 'domains'; anyOf: readonly string[] }

export interface TaskValidationRequirement {
  /** Cache / rate-limit key of the resource to validate */
  resourceId: string
  validator: ExternalValidator
}

/** A task as declared by callers; defaults are filled in by buildPhaseGraph */
export interface TaskSpecInput {
  id: TaskId
  task: Task
  activation?: Activation
  /** A permanent failure of a critical task aborts the run */
  critical?: boolean
  /** Selects conflict rules; defaults to the task id */
  resultType?: string
  timeoutMs?: number
  validation?: TaskValidationRequirement
  description?: string
}

/** Immutable task spec owned by a built PhaseGraph */
export interface TaskSpec {
  readonly id: TaskId
  readonly task: Task
  readonly activation: Activation
  readonly critical: boolean
  readonly resultType: string
  readonly timeoutMs?: number
  readonly validation?: TaskValidationRequirement
  readonly description?: string
}

// ---------------------------------------------------------------------------
// Phases and groups
// ---------------------------------------------------------------------------

export interface ParallelGroupDefinition {
  id: string
  tasks: TaskId[]
}

export interface PhaseDefinition {
  id: PhaseId
  description?: string
  /** Predecessor phases; defaults to the previously declared phase */
  after?: PhaseId[]
  tasks: TaskSpecInput[]
  groups?: ParallelGroupDefinition[]
}

export interface ParallelGroup {
  readonly id: string
  readonly taskIds: readonly TaskId[]
}

export interface Phase {
  readonly id: PhaseId
  readonly description?: string
  readonly predecessors: readonly PhaseId[]
  readonly tasks: readonly TaskSpec[]
  readonly groups: readonly ParallelGroup[]
}

/**
 * One schedulable unit within a phase. Sequential steps hold a single task
 * and use the task id as step id; parallel steps use the group id.
 */
export interface PhaseStep {
  readonly kind: 'sequential' | 'parallel'
  readonly id: string
  readonly taskIds: readonly TaskId[]
}

/** Validated, immutable phase graph. Phases are in topological order. */
export interface PhaseGraph {
  readonly phases: readonly Phase[]
  getPhase(id: PhaseId): Phase | undefined
  getTask(id: TaskId): TaskSpec | undefined
  /** Phase owning a task */
  getPhaseOf(taskId: TaskId): Phase | undefined
  taskIds(): TaskId[]
}
