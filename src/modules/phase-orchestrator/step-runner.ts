/**
 * Step runner — executes one phase step (a sequential task or a parallel
 * group) with timeouts, validation gating, cooperative cancellation and
 * whole-group retry.
 *
 * A sequential task is run as a group of one, so both kinds share the
 * same retry and failure rules:
 *  - a permanent failure of a critical member, or a BLOCK from the gate,
 *    cancels the in-flight siblings and aborts the run
 *  - a transient failure re-runs the whole group while retries remain
 *  - any failure on the final retry aborts the run
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import {
  TaskCancelledError,
  TaskExecutionError,
  TaskTimeoutError,
  WaymarkError,
  toError,
} from '../../core/errors.js'
import type { PhaseId, TaskErrorInfo, TaskId, TaskPayload, TaskResult, ValidationRecord } from '../../core/types.js'
import { deepFreeze, isPlainObject, withTimeout } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'
import type { ExecutionContext, PhaseStep, TaskSpec } from '../phase-graph/types.js'
import type { ValidationGate } from '../validation-gate/validation-gate.js'
import type { ValidationEntry } from './types.js'

const logger = createLogger('phase-orchestrator:step-runner')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StepRunnerDeps {
  runId: string
  gate?: ValidationGate
  eventBus?: TypedEventBus
  maxConcurrency: number
  groupRetryLimit: number
  defaultTimeoutMs: number
  now: () => number
}

/** Why a step stopped the run; `taskId` is absent for cancellations */
export interface StepAbort {
  taskId?: TaskId
  reason: string
}

export interface StepOutcome {
  /** Results of the last attempt, in member order */
  results: TaskResult[]
  /** Every attempt's validations and warnings, retried ones included */
  validations: ValidationEntry[]
  warnings: string[]
  attempts: number
  abort?: StepAbort
}

interface Invocation {
  result: TaskResult
  validation?: ValidationRecord
}

interface AttemptOutcome {
  invocations: Invocation[]
  fatal?: { taskId: TaskId; reason: string }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Promise pool: run `worker` over `items` with at most `maxConcurrency`
 * in flight. Each promise removes itself from `running` once settled.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  maxConcurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  const queue = [...items]
  const running: Promise<void>[] = []

  function enqueue(): void {
    const item = queue.shift()
    if (item === undefined) return
    const p: Promise<void> = worker(item).finally(() => {
      const idx = running.indexOf(p)
      if (idx !== -1) running.splice(idx, 1)
    })
    running.push(p)
  }

  const initial = Math.min(Math.max(1, maxConcurrency), queue.length)
  for (let i = 0; i < initial; i++) {
    enqueue()
  }
  while (queue.length > 0) {
    await Promise.race(running)
    enqueue()
  }
  await Promise.all(running)
}

/** Serializable error summary; messages are scrubbed of credentials */
export function toErrorInfo(err: unknown): TaskErrorInfo {
  const error = toError(err)
  const message = maskSecrets(error.message)
  if (error instanceof TaskExecutionError) {
    return { name: error.name, code: error.code, message, transient: error.transient }
  }
  if (error instanceof WaymarkError) {
    return { name: error.name, code: error.code, message, transient: false }
  }
  return { name: error.name, code: 'TASK_FAILED', message, transient: false }
}

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason
  return reason instanceof Error ? reason.message : 'aborted'
}

function isFatal(spec: TaskSpec, result: TaskResult): boolean {
  if (result.status !== 'failure' || result.error === undefined) return false
  if (result.error.code === 'VALIDATION_BLOCKED') return true
  return spec.critical && !result.error.transient
}

// ---------------------------------------------------------------------------
// StepRunner
// ---------------------------------------------------------------------------

export class StepRunner {
  private readonly _deps: StepRunnerDeps

  constructor(deps: StepRunnerDeps) {
    this._deps = deps
  }

  /**
   * Run the activated members of a step until they settle without a
   * retryable failure, or the step aborts the run.
   */
  async runStep(
    phaseId: PhaseId,
    step: PhaseStep,
    members: readonly TaskSpec[],
    context: ExecutionContext,
    runSignal: AbortSignal,
  ): Promise<StepOutcome> {
    const groupId = step.kind === 'parallel' ? step.id : undefined
    // validations and warnings of attempts that were retried
    const earlier: Pick<StepOutcome, 'validations' | 'warnings'> = { validations: [], warnings: [] }

    for (let attempt = 1; ; attempt++) {
      const outcome = await this._runAttempt(phaseId, groupId, members, attempt, context, runSignal)
      const current = this._collect(outcome)
      const results = current.results
      const collected = {
        results,
        validations: [...earlier.validations, ...current.validations],
        warnings: [...earlier.warnings, ...current.warnings],
      }

      if (runSignal.aborted) {
        return { ...collected, attempts: attempt, abort: { reason: abortReason(runSignal) } }
      }
      if (outcome.fatal !== undefined) {
        return { ...collected, attempts: attempt, abort: outcome.fatal }
      }

      const failures = results.filter((r) => r.status === 'failure')
      const transient = failures.filter((r) => r.error?.transient === true)
      if (transient.length > 0 && attempt <= this._deps.groupRetryLimit) {
        const failedTaskIds = transient.map((r) => r.taskId)
        logger.warn({ phaseId, stepId: step.id, attempt, failedTaskIds }, 'Transient failure; retrying group')
        this._deps.eventBus?.emit('group:retry', {
          runId: this._deps.runId,
          phaseId,
          groupId: step.id,
          attempt: attempt + 1,
          failedTaskIds,
        })
        const retried = this._collect(outcome, attempt)
        earlier.validations.push(...retried.validations)
        earlier.warnings.push(...retried.warnings)
        continue
      }

      const [firstFailure] = [...failures].sort((a, b) => (a.taskId < b.taskId ? -1 : 1))
      if (attempt > 1 && firstFailure !== undefined) {
        return {
          ...collected,
          attempts: attempt,
          abort: {
            taskId: firstFailure.taskId,
            reason: `failed again after group retry: ${firstFailure.error?.message ?? 'unknown error'}`,
          },
        }
      }

      const criticalFailure = failures.find((r) => members.some((m) => m.id === r.taskId && m.critical))
      if (criticalFailure !== undefined) {
        return {
          ...collected,
          attempts: attempt,
          abort: { taskId: criticalFailure.taskId, reason: criticalFailure.error?.message ?? 'unknown error' },
        }
      }

      return { ...collected, attempts: attempt }
    }
  }

  /**
   * Gather results, validations and warnings of one attempt. `retriedAttempt`
   * marks failures of an attempt that is about to be retried.
   */
  private _collect(outcome: AttemptOutcome, retriedAttempt?: number): Omit<StepOutcome, 'attempts' | 'abort'> {
    const results: TaskResult[] = []
    const validations: ValidationEntry[] = []
    const warnings: string[] = []
    for (const { result, validation } of outcome.invocations) {
      results.push(result)
      if (validation !== undefined) {
        validations.push({ ...validation, taskId: result.taskId })
        if (validation.decision === 'WARN' && result.status !== 'cancelled') {
          const note = validation.note !== undefined ? `: ${validation.note}` : ''
          warnings.push(
            `Task "${result.taskId}" proceeded with a validation warning for "${validation.resourceId}"${note}`,
          )
        }
      }
      if (result.status === 'failure' && result.error !== undefined) {
        warnings.push(
          retriedAttempt !== undefined
            ? `Task "${result.taskId}" failed on attempt ${String(retriedAttempt)} (retried): ${result.error.message}`
            : `Task "${result.taskId}" failed: ${result.error.message}`,
        )
      }
    }
    return { results, validations, warnings }
  }

  private async _runAttempt(
    phaseId: PhaseId,
    groupId: string | undefined,
    members: readonly TaskSpec[],
    attempt: number,
    context: ExecutionContext,
    runSignal: AbortSignal,
  ): Promise<AttemptOutcome> {
    const controller = new AbortController()
    const onRunAbort = (): void => {
      controller.abort(runSignal.reason)
    }
    if (runSignal.aborted) onRunAbort()
    else runSignal.addEventListener('abort', onRunAbort, { once: true })

    const invocations = new Map<TaskId, Invocation>()
    const outcome: AttemptOutcome = { invocations: [] }

    try {
      await runWithConcurrency(members, this._deps.maxConcurrency, async (spec) => {
        const invocation = controller.signal.aborted
          ? { result: this._finish(spec, phaseId, attempt, this._deps.now(), undefined, this._cancelled(spec, controller.signal)) }
          : await this._invoke(spec, phaseId, groupId, attempt, context, controller.signal)
        invocations.set(spec.id, invocation)

        if (outcome.fatal === undefined && isFatal(spec, invocation.result)) {
          const reason = invocation.result.error?.message ?? 'unknown error'
          outcome.fatal = { taskId: spec.id, reason }
          logger.error({ phaseId, taskId: spec.id, reason }, 'Critical task failed; cancelling group')
          controller.abort(new Error(`critical task "${spec.id}" failed`))
        }
      })
    } finally {
      runSignal.removeEventListener('abort', onRunAbort)
    }

    for (const spec of members) {
      const invocation = invocations.get(spec.id)
      if (invocation !== undefined) outcome.invocations.push(invocation)
    }
    return outcome
  }

  private async _invoke(
    spec: TaskSpec,
    phaseId: PhaseId,
    groupId: string | undefined,
    attempt: number,
    context: ExecutionContext,
    signal: AbortSignal,
  ): Promise<Invocation> {
    const { eventBus, runId, gate, now } = this._deps
    const startedAt = now()
    eventBus?.emit('task:started', { runId, phaseId, taskId: spec.id, attempt })

    const timeoutMs = spec.timeoutMs ?? this._deps.defaultTimeoutMs
    const observed: { validation?: ValidationRecord } = {}
    let payload: TaskPayload | undefined
    let error: unknown

    try {
      const output: unknown = await withTimeout(
        async (taskSignal) => {
          const requirement = spec.validation
          let validation: ValidationRecord | undefined
          if (requirement !== undefined) {
            if (gate === undefined) {
              throw new TaskExecutionError(`Task "${spec.id}" requires validation but no gate is configured`, {
                code: 'VALIDATION_GATE_MISSING',
              })
            }
            validation = await gate.evaluate(
              requirement.resourceId,
              (callSignal) => requirement.validator.validate(requirement.resourceId, callSignal),
              { signal: taskSignal },
            )
            observed.validation = validation
            eventBus?.emit('validation:evaluated', { runId, taskId: spec.id, record: validation })
            if (validation.decision === 'BLOCK') {
              throw new TaskExecutionError(
                `Validation blocked task "${spec.id}": "${requirement.resourceId}" rated ${validation.risk ?? 'unknown'} risk`,
                { code: 'VALIDATION_BLOCKED', context: { resourceId: requirement.resourceId } },
              )
            }
          }
          return spec.task.run({
            ...context,
            results: new Map(context.results),
            taskId: spec.id,
            phaseId,
            attempt,
            signal: taskSignal,
            ...(validation !== undefined ? { validation } : {}),
          })
        },
        timeoutMs,
        () => new TaskTimeoutError(spec.id, timeoutMs),
        signal,
      )
      if (!isPlainObject(output)) {
        throw new TaskExecutionError(`Task "${spec.id}" returned a non-object payload`, { code: 'INVALID_PAYLOAD' })
      }
      payload = structuredClone(output)
    } catch (err) {
      error = signal.aborted ? this._cancelled(spec, signal) : err
    }

    const result = this._finish(spec, phaseId, attempt, startedAt, payload, error)
    if (result.status === 'failure') {
      logger.warn({ phaseId, taskId: spec.id, attempt, error: result.error }, 'Task failed')
    }
    eventBus?.emit('task:completed', { runId, phaseId, ...(groupId !== undefined ? { groupId } : {}), result })
    return { result, ...(observed.validation !== undefined ? { validation: observed.validation } : {}) }
  }

  private _cancelled(spec: TaskSpec, signal: AbortSignal): TaskCancelledError {
    return new TaskCancelledError(spec.id, abortReason(signal))
  }

  private _finish(
    spec: TaskSpec,
    phaseId: PhaseId,
    attempt: number,
    startedAt: number,
    payload: TaskPayload | undefined,
    error: unknown,
  ): TaskResult {
    const finishedAt = this._deps.now()
    const base = {
      taskId: spec.id,
      phaseId,
      resultType: spec.resultType,
      attempt,
      durationMs: Math.max(0, finishedAt - startedAt),
      timestamp: new Date(finishedAt).toISOString(),
    }
    const result: TaskResult =
      payload !== undefined
        ? { ...base, status: 'success', payload }
        : {
            ...base,
            status: error instanceof TaskCancelledError ? 'cancelled' : 'failure',
            error: toErrorInfo(error),
          }
    return deepFreeze(result)
  }
}

/** Result recorded for a member whose activation condition did not match */
export function skippedResult(spec: TaskSpec, phaseId: PhaseId, timestamp: string): TaskResult {
  const result: TaskResult = {
    taskId: spec.id,
    phaseId,
    resultType: spec.resultType,
    status: 'skipped-by-condition',
    attempt: 0,
    durationMs: 0,
    timestamp,
  }
  return deepFreeze(result)
}
