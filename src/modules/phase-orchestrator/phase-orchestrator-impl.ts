/**
 * PhaseOrchestrator implementation.
 *
 * Factory: createPhaseOrchestrator(options) → PhaseOrchestrator
 *
 * Phases run one after another in declaration order, which the graph
 * builder guarantees is a topological order. Within a phase each step
 * (sequential task or parallel group) runs behind a barrier. After a
 * parallel step succeeds its results go through conflict detection and
 * arbitration.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TypedEventBus } from '../../core/event-bus.js'
import { GraphDefinitionError, PhaseAbortedError } from '../../core/errors.js'
import type { TaskId, TaskResult } from '../../core/types.js'
import { generateId } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { WaymarkConfig } from '../config/config-schema.js'
import type { ConflictDetector } from '../conflict/conflict-detector.js'
import { createConflictDetectorFromConfig } from '../conflict/conflict-detector-impl.js'
import type { ConflictResolver } from '../conflict/conflict-resolver.js'
import { createConflictResolver } from '../conflict/conflict-resolver-impl.js'
import type { Conflict } from '../conflict/types.js'
import { isActivated, planPhase } from '../phase-graph/execution-plan.js'
import type { ExecutionContext, PhaseGraph, Task, TaskSpec } from '../phase-graph/types.js'
import type { ValidationGate } from '../validation-gate/validation-gate.js'
import { createValidationGateFromConfig } from '../validation-gate/validation-gate-impl.js'
import type { PhaseOrchestrator } from './phase-orchestrator.js'
import { buildRunReport, persistRunReport } from './report-builder.js'
import { StepRunner, skippedResult } from './step-runner.js'
import type {
  PhaseOrchestratorOptions,
  PhaseReport,
  RunAbort,
  RunContext,
  RunReport,
  ValidationEntry,
} from './types.js'

const logger = createLogger('phase-orchestrator')

export const DEFAULT_MAX_CONCURRENCY = 4
export const DEFAULT_GROUP_RETRY_LIMIT = 1
export const DEFAULT_TASK_TIMEOUT_MS = 120_000

// ---------------------------------------------------------------------------
// PhaseOrchestratorImpl
// ---------------------------------------------------------------------------

export class PhaseOrchestratorImpl implements PhaseOrchestrator {
  private readonly _gate: ValidationGate | undefined
  private readonly _detector: ConflictDetector
  private readonly _resolver: ConflictResolver
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _db: BetterSqlite3Database | undefined
  private readonly _maxConcurrency: number
  private readonly _groupRetryLimit: number
  private readonly _defaultTimeoutMs: number
  private readonly _graphName: string | undefined
  private readonly _generateRunId: () => string
  private readonly _now: () => number

  constructor(options: PhaseOrchestratorOptions = {}) {
    this._gate = options.gate
    this._detector = options.detector ?? createConflictDetectorFromConfig()
    this._resolver = options.resolver ?? createConflictResolver()
    this._eventBus = options.eventBus
    this._db = options.db
    this._maxConcurrency = options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY
    this._groupRetryLimit = options.groupRetryLimit ?? DEFAULT_GROUP_RETRY_LIMIT
    this._defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TASK_TIMEOUT_MS
    this._graphName = options.graphName
    this._generateRunId = options.generateRunId ?? (() => generateId('run'))
    this._now = options.now ?? Date.now
  }

  async run(graph: PhaseGraph, context: RunContext): Promise<RunReport> {
    this._assertGateAvailable(graph)

    const runId = this._generateRunId()
    const startedMs = this._now()
    const domains = [...new Set(context.domains ?? [])].sort()
    const domainSet: ReadonlySet<string> = new Set(domains)

    const results = new Map<TaskId, TaskResult>()
    const phases: PhaseReport[] = []
    const conflicts: Conflict[] = []
    const validations: ValidationEntry[] = []
    const warnings: string[] = []
    let abort: RunAbort | undefined

    const runController = new AbortController()
    const external = context.signal
    const onCancel = (): void => {
      runController.abort(new Error('run cancelled'))
    }
    if (external?.aborted === true) onCancel()
    else external?.addEventListener('abort', onCancel, { once: true })

    const snapshot = (): ExecutionContext => ({
      runId,
      request: context.request,
      domains: domainSet,
      results: new Map(results),
    })

    const runner = new StepRunner({
      runId,
      ...(this._gate !== undefined ? { gate: this._gate } : {}),
      ...(this._eventBus !== undefined ? { eventBus: this._eventBus } : {}),
      maxConcurrency: this._maxConcurrency,
      groupRetryLimit: this._groupRetryLimit,
      defaultTimeoutMs: this._defaultTimeoutMs,
      now: this._now,
    })

    logger.info({ runId, phaseCount: graph.phases.length, domains }, 'Run started')
    this._eventBus?.emit('run:started', {
      runId,
      request: context.request,
      domains,
      phaseCount: graph.phases.length,
    })

    try {
      for (const phase of graph.phases) {
        if (runController.signal.aborted) {
          abort = { phaseId: phase.id, reason: 'run cancelled' }
          break
        }

        this._eventBus?.emit('phase:started', { runId, phaseId: phase.id })
        const phaseReport: PhaseReport = { phaseId: phase.id, status: 'completed', steps: [] }
        phases.push(phaseReport)

        for (const step of planPhase(phase)) {
          if (runController.signal.aborted) {
            abort = { phaseId: phase.id, reason: 'run cancelled' }
            break
          }

          const members = step.taskIds
            .map((id) => graph.getTask(id))
            .filter((spec): spec is TaskSpec => spec !== undefined)
          const active: TaskSpec[] = []
          for (const spec of members) {
            if (isActivated(spec.activation, domainSet)) {
              active.push(spec)
              continue
            }
            const skipped = skippedResult(spec, phase.id, new Date(this._now()).toISOString())
            results.set(spec.id, skipped)
            this._eventBus?.emit('task:completed', {
              runId,
              phaseId: phase.id,
              ...(step.kind === 'parallel' ? { groupId: step.id } : {}),
              result: skipped,
            })
          }

          const stepReport = { id: step.id, kind: step.kind, taskIds: [...step.taskIds], attempts: 0 }
          phaseReport.steps.push(stepReport)
          if (active.length === 0) continue

          const outcome = await runner.runStep(phase.id, step, active, snapshot(), runController.signal)
          stepReport.attempts = outcome.attempts
          for (const result of outcome.results) results.set(result.taskId, result)
          validations.push(...outcome.validations)
          warnings.push(...outcome.warnings)

          if (outcome.abort !== undefined) {
            abort = { phaseId: phase.id, ...outcome.abort }
            break
          }

          if (step.kind === 'parallel') {
            const found = this._detector.detect({ phaseId: phase.id, groupId: step.id }, outcome.results)
            if (found.length > 0) {
              conflicts.push(...(await this._arbitrate(found, runId, snapshot(), runController.signal, warnings)))
            }
          }
        }

        if (abort !== undefined) phaseReport.status = 'aborted'
        this._eventBus?.emit('phase:completed', {
          runId,
          phaseId: phase.id,
          status: phaseReport.status,
          taskIds: phase.tasks.map((t) => t.id),
        })
        if (abort !== undefined) break
      }
    } finally {
      external?.removeEventListener('abort', onCancel)
    }

    const completedMs = this._now()
    const report = buildRunReport({
      runId,
      ...(this._graphName !== undefined ? { graphName: this._graphName } : {}),
      request: context.request,
      domains,
      startedAt: new Date(startedMs).toISOString(),
      completedAt: new Date(completedMs).toISOString(),
      phases,
      results,
      conflicts,
      validations,
      warnings,
      ...(abort !== undefined ? { abort } : {}),
    })

    if (abort !== undefined) {
      const err = new PhaseAbortedError(abort.phaseId, abort.taskId, abort.reason)
      logger.error({ runId, err }, 'Run aborted')
      this._eventBus?.emit('run:aborted', { runId, ...abort })
    } else {
      logger.info({ runId, conflicts: conflicts.length, warnings: warnings.length }, 'Run completed')
    }
    this._eventBus?.emit('run:completed', { runId, status: report.status, durationMs: completedMs - startedMs })

    if (this._db !== undefined) persistRunReport(this._db, report)
    return report
  }

  private _assertGateAvailable(graph: PhaseGraph): void {
    if (this._gate !== undefined) return
    const gated = graph.phases.flatMap((p) => p.tasks.filter((t) => t.validation !== undefined))
    if (gated.length > 0) {
      throw new GraphDefinitionError(
        gated.map((t) => `Task "${t.id}" requires validation but no validation gate is configured`),
      )
    }
  }

  private async _arbitrate(
    found: Conflict[],
    runId: string,
    context: ExecutionContext,
    signal: AbortSignal,
    warnings: string[],
  ): Promise<Conflict[]> {
    for (const conflict of found) {
      this._eventBus?.emit('conflict:detected', {
        runId,
        phaseId: conflict.phaseId,
        groupId: conflict.groupId,
        conflictId: conflict.id,
        taskIds: conflict.taskIds,
      })
    }
    const resolved = await this._resolver.resolve(found, { ...context, signal })
    for (const conflict of resolved) {
      this._eventBus?.emit('conflict:resolved', { runId, conflictId: conflict.id, status: conflict.status })
      if (conflict.status === 'unresolved') {
        warnings.push(conflict.error ?? `Conflict "${conflict.id}" unresolved: ${conflict.note ?? 'no resolution'}`)
      }
    }
    return resolved
  }
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function createPhaseOrchestrator(options: PhaseOrchestratorOptions = {}): PhaseOrchestrator {
  return new PhaseOrchestratorImpl(options)
}

export interface OrchestratorFromConfigOptions {
  gate?: ValidationGate
  eventBus?: TypedEventBus
  db?: BetterSqlite3Database
  arbiter?: Task
  arbiterTimeoutMs?: number
  graphName?: string
}

/**
 * Wire an orchestrator from loaded configuration: concurrency, retry and
 * timeout limits, the compared conflict fields and a validation gate built
 * from the `validation` section unless one is supplied.
 */
export function createPhaseOrchestratorFromConfig(
  config: WaymarkConfig,
  options: OrchestratorFromConfigOptions = {},
): PhaseOrchestrator {
  return new PhaseOrchestratorImpl({
    gate: options.gate ?? createValidationGateFromConfig(config.validation),
    detector: createConflictDetectorFromConfig(config.conflicts),
    resolver: createConflictResolver({
      ...(options.arbiter !== undefined ? { arbiter: options.arbiter } : {}),
      ...(options.arbiterTimeoutMs !== undefined ? { timeoutMs: options.arbiterTimeoutMs } : {}),
      ...(options.db !== undefined ? { db: options.db } : {}),
    }),
    ...(options.eventBus !== undefined ? { eventBus: options.eventBus } : {}),
    ...(options.db !== undefined ? { db: options.db } : {}),
    ...(options.graphName !== undefined ? { graphName: options.graphName } : {}),
    maxConcurrency: config.global.max_concurrency,
    groupRetryLimit: config.global.group_retry_limit,
    defaultTimeoutMs: config.global.task_timeout_ms,
  })
}
