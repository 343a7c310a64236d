/**
 * Error definitions for Waymark
 * Structured error hierarchy shared by the graph builder, orchestrator and gate
 */

/** Base error class for all Waymark errors */
export class WaymarkError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'WaymarkError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WaymarkError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/**
 * Error thrown when a phase graph definition is structurally invalid.
 * Carries every violation found, not only the first.
 */
export class GraphDefinitionError extends WaymarkError {
  public readonly violations: readonly string[]

  constructor(violations: string[], context: Record<string, unknown> = {}) {
    const lines = violations.map((v) => `  • ${v}`).join('\n')
    super(
      `Invalid phase graph (${String(violations.length)} violation(s)):\n${lines}`,
      'GRAPH_DEFINITION_ERROR',
      { ...context, violations }
    )
    this.name = 'GraphDefinitionError'
    this.violations = [...violations]
  }
}

/** Options accepted by TaskExecutionError */
export interface TaskExecutionErrorOptions {
  /** Transient failures make the enclosing group eligible for retry */
  transient?: boolean
  code?: string
  context?: Record<string, unknown>
}

/** Error a task throws (or is wrapped in) when its invocation fails */
export class TaskExecutionError extends WaymarkError {
  public readonly transient: boolean

  constructor(message: string, options: TaskExecutionErrorOptions = {}) {
    const transient = options.transient ?? false
    super(message, options.code ?? 'TASK_EXECUTION_ERROR', {
      ...options.context,
      transient,
    })
    this.name = 'TaskExecutionError'
    this.transient = transient
  }
}

/** Error recorded when a task exceeds its timeout */
export class TaskTimeoutError extends TaskExecutionError {
  constructor(taskId: string, timeoutMs: number) {
    super(`Task "${taskId}" timed out after ${String(timeoutMs)}ms`, {
      transient: true,
      code: 'TASK_TIMEOUT',
      context: { taskId, timeoutMs },
    })
    this.name = 'TaskTimeoutError'
  }
}

/** Error recorded for a task cancelled because a sibling failed or the run was aborted */
export class TaskCancelledError extends WaymarkError {
  constructor(taskId: string, reason: string) {
    super(`Task "${taskId}" cancelled: ${reason}`, 'TASK_CANCELLED', {
      taskId,
      reason,
    })
    this.name = 'TaskCancelledError'
  }
}

/** Error describing why a run stopped at a phase; taskId is absent for cancellations */
export class PhaseAbortedError extends WaymarkError {
  public readonly phaseId: string
  public readonly taskId: string | undefined
  public readonly reason: string

  constructor(phaseId: string, taskId: string | undefined, reason: string) {
    super(
      taskId !== undefined
        ? `Phase "${phaseId}" aborted by task "${taskId}": ${reason}`
        : `Phase "${phaseId}" aborted: ${reason}`,
      'PHASE_ABORTED',
      { phaseId, taskId, reason }
    )
    this.name = 'PhaseAbortedError'
    this.phaseId = phaseId
    this.taskId = taskId
    this.reason = reason
  }
}

/** Error thrown when an external validator cannot produce a usable report */
export class ValidationUnavailableError extends WaymarkError {
  public readonly reason: string

  constructor(resourceId: string, reason: string) {
    super(
      `Validation unavailable for "${resourceId}": ${reason}`,
      'VALIDATION_UNAVAILABLE',
      { resourceId, reason }
    )
    this.name = 'ValidationUnavailableError'
    this.reason = reason
  }
}

/** Error describing why arbitration left a conflict unresolved */
export class ConflictUnresolvedError extends WaymarkError {
  constructor(conflictId: string, reason: string) {
    super(
      `Conflict "${conflictId}" unresolved: ${reason}`,
      'CONFLICT_UNRESOLVED',
      { conflictId, reason }
    )
    this.name = 'ConflictUnresolvedError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends WaymarkError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a graph definition file cannot be read or parsed */
export class ParseError extends WaymarkError {
  public readonly filePath?: string
  public readonly format?: string
  public readonly originalError?: Error

  constructor(
    message: string,
    options: {
      filePath?: string
      format?: string
      originalError?: Error
    } = {}
  ) {
    super(message, 'PARSE_ERROR', {
      filePath: options.filePath,
      format: options.format,
    })
    this.name = 'ParseError'
    this.filePath = options.filePath
    this.format = options.format
    this.originalError = options.originalError
  }
}

/** Normalize an unknown thrown value into an Error */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}
