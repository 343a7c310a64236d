/**
 * ConflictResolverImpl — runs the arbitration task once per conflict.
 *
 * The arbiter goes through the ordinary Task contract. Its `input` carries
 * `{ conflict, payloads }` and its output must parse as
 * `{ decision, rationale }`. Failures never fabricate a resolution.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import type { TaskId, TaskPayload } from '../../core/types.js'
import { ConflictUnresolvedError, TaskTimeoutError, toError } from '../../core/errors.js'
import { createDecision } from '../../persistence/queries/decisions.js'
import { withTimeout } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'
import type { Task } from '../phase-graph/types.js'
import type { ConflictResolver, ResolveContext } from './conflict-resolver.js'
import type { Conflict } from './types.js'

const logger = createLogger('conflict:resolver')

export const DEFAULT_ARBITER_TIMEOUT_MS = 60_000

const ArbiterOutputSchema = z
  .object({
    decision: z.string().min(1),
    rationale: z.string(),
  })
  .passthrough()

export interface ConflictResolverOptions {
  /** Arbitration task; without one every conflict stays unresolved */
  arbiter?: Task
  arbiterTaskId?: string
  timeoutMs?: number
  /** Resolutions are recorded as decisions when present */
  db?: BetterSqlite3Database
}

export class ConflictResolverImpl implements ConflictResolver {
  private readonly _arbiter: Task | undefined
  private readonly _arbiterTaskId: string
  private readonly _timeoutMs: number
  private readonly _db: BetterSqlite3Database | undefined

  constructor(options: ConflictResolverOptions = {}) {
    this._arbiter = options.arbiter
    this._arbiterTaskId = options.arbiterTaskId ?? 'arbiter'
    this._timeoutMs = options.timeoutMs ?? DEFAULT_ARBITER_TIMEOUT_MS
    this._db = options.db
  }

  async resolve(conflicts: readonly Conflict[], context: ResolveContext): Promise<Conflict[]> {
    const resolved: Conflict[] = []
    for (const conflict of conflicts) {
      if (conflict.status !== 'unresolved') {
        resolved.push(conflict)
        continue
      }
      resolved.push(await this._resolveOne(conflict, context))
    }
    return resolved
  }

  private async _resolveOne(conflict: Conflict, context: ResolveContext): Promise<Conflict> {
    const arbiter = this._arbiter
    if (arbiter === undefined) {
      return { ...conflict, note: 'no arbitration task configured' }
    }

    const payloads: Record<TaskId, TaskPayload> = {}
    for (const taskId of conflict.taskIds) {
      const payload = context.results.get(taskId)?.payload
      if (payload !== undefined) payloads[taskId] = payload
    }

    let output: unknown
    try {
      output = await withTimeout(
        (signal) =>
          arbiter.run({
            runId: context.runId,
            request: context.request,
            domains: context.domains,
            results: context.results,
            taskId: this._arbiterTaskId,
            phaseId: conflict.phaseId,
            attempt: 1,
            signal,
            input: { conflict, payloads },
          }),
        this._timeoutMs,
        () => new TaskTimeoutError(this._arbiterTaskId, this._timeoutMs),
        context.signal,
      )
    } catch (err) {
      return this._unresolved(conflict, maskSecrets(toError(err).message))
    }

    const parsed = ArbiterOutputSchema.safeParse(output)
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ')
      return this._unresolved(conflict, `arbiter returned malformed output (${detail})`)
    }

    const resolution = {
      decision: parsed.data.decision,
      rationale: parsed.data.rationale,
      arbiterTaskId: this._arbiterTaskId,
    }
    logger.info({ conflictId: conflict.id, decision: resolution.decision }, 'Conflict resolved')
    this._recordDecision(conflict, resolution.decision, resolution.rationale, context.runId)

    return { ...conflict, status: 'resolved', resolution }
  }

  private _unresolved(conflict: Conflict, reason: string): Conflict {
    const error = new ConflictUnresolvedError(conflict.id, reason)
    logger.warn({ conflictId: conflict.id, reason }, 'Arbitration failed; conflict left unresolved')
    return { ...conflict, status: 'unresolved', error: error.message }
  }

  private _recordDecision(conflict: Conflict, decision: string, rationale: string, runId: string): void {
    if (this._db === undefined) return
    try {
      createDecision(this._db, {
        run_id: runId,
        phase: conflict.phaseId,
        category: 'conflict-resolution',
        key: conflict.id,
        value: decision,
        rationale,
      })
    } catch (err) {
      logger.warn({ err, conflictId: conflict.id }, 'Failed to persist conflict resolution')
    }
  }
}

export function createConflictResolver(options: ConflictResolverOptions = {}): ConflictResolver {
  return new ConflictResolverImpl(options)
}
