/**
 * Weighted-vote arbiter — settles a conflict by a confidence-weighted vote
 * over the contested values.
 *
 * Each disagreeing payload votes for its value with weight `confidence`
 * (0..1, default 0.5). The vote fails when the winner's margin over the
 * runner-up, as a share of the total weight, is below the tie-break margin,
 * unless a preferred task took part: the first one listed in
 * `preferredTasks` then settles the tie with its own value.
 */

import { z } from 'zod'
import type { TaskPayload } from '../../core/types.js'
import { TaskCancelledError, TaskExecutionError } from '../../core/errors.js'
import { stableStringify } from '../../utils/helpers.js'
import type { TaskRegistry } from '../phase-graph/task-registry.js'
import type { Task, TaskContext } from '../phase-graph/types.js'

export const DEFAULT_CONFIDENCE = 0.5
export const DEFAULT_TIE_BREAK_MARGIN = 0.1

const ArbiterInputSchema = z.object({
  conflict: z
    .object({
      id: z.string(),
      field: z.string(),
      taskIds: z.array(z.string()).min(2),
      values: z.record(z.string(), z.unknown()),
    })
    .passthrough(),
  payloads: z.record(z.string(), z.record(z.string(), z.unknown())),
})

export interface Vote {
  taskId: string
  value: string
  weight: number
}

export interface WeightedVoteResult {
  winner: string
  margin: number
  votes: Vote[]
}

/** Tally votes. Ties keep the value whose first vote came first. */
export function computeWeightedVote(votes: readonly Vote[]): WeightedVoteResult {
  const scores = new Map<string, number>()
  let totalWeight = 0
  for (const vote of votes) {
    scores.set(vote.value, (scores.get(vote.value) ?? 0) + vote.weight)
    totalWeight += vote.weight
  }

  const ranked = Array.from(scores.entries()).sort((a, b) => b[1] - a[1])
  const winner = ranked[0]?.[0] ?? ''
  const winnerScore = ranked[0]?.[1] ?? 0
  const runnerUpScore = ranked[1]?.[1] ?? 0
  const margin = totalWeight > 0 ? (winnerScore - runnerUpScore) / totalWeight : 1.0

  return { winner, margin, votes: [...votes] }
}

function confidenceOf(payload: TaskPayload | undefined): number {
  const value = payload?.['confidence']
  return typeof value === 'number' && value >= 0 && value <= 1 ? value : DEFAULT_CONFIDENCE
}

function asChoice(value: unknown): string {
  return typeof value === 'string' ? value : stableStringify(value)
}

const PreferredTasksSchema = z.array(z.string().min(1))

export class WeightedVoteArbiter implements Task {
  private readonly _tieBreakMargin: number
  private readonly _preferredTasks: readonly string[]

  constructor(tieBreakMargin = DEFAULT_TIE_BREAK_MARGIN, preferredTasks: readonly string[] = []) {
    this._tieBreakMargin = tieBreakMargin
    this._preferredTasks = [...preferredTasks]
  }

  run(context: TaskContext): Promise<TaskPayload> {
    if (context.signal.aborted) {
      return Promise.reject(new TaskCancelledError(context.taskId, 'aborted before start'))
    }
    const parsed = ArbiterInputSchema.safeParse(context.input)
    if (!parsed.success) {
      return Promise.reject(
        new TaskExecutionError('weighted-vote arbiter received malformed input', { code: 'ARBITER_INPUT' }),
      )
    }
    const { conflict, payloads } = parsed.data

    const votes: Vote[] = conflict.taskIds.map((taskId) => ({
      taskId,
      value: asChoice(conflict.values[taskId]),
      weight: confidenceOf(payloads[taskId]),
    }))
    const { winner, margin } = computeWeightedVote(votes)
    const marginPct = `${(margin * 100).toFixed(1)}%`

    if (margin < this._tieBreakMargin) {
      const preferred = this._preferredTasks.find((taskId) => conflict.taskIds.includes(taskId))
      if (preferred !== undefined) {
        const decision = asChoice(conflict.values[preferred])
        return Promise.resolve({
          decision,
          rationale: `Confidence-weighted vote over ${String(votes.length)} results was too close to call (margin: ${marginPct}). Settled by preference for task "${preferred}": ${decision}.`,
          margin,
          votes,
        })
      }
      return Promise.reject(
        new TaskExecutionError(`weighted vote on "${conflict.field}" is too close to call (margin: ${marginPct})`, {
          code: 'ARBITRATION_TIE',
          context: { conflictId: conflict.id, margin },
        }),
      )
    }

    const supporters = votes.filter((v) => v.value === winner).map((v) => v.taskId)
    return Promise.resolve({
      decision: winner,
      rationale: `Confidence-weighted vote over ${String(votes.length)} results. Winner: ${winner} (margin: ${marginPct}), backed by ${supporters.join(', ')}.`,
      margin,
      votes,
    })
  }
}

/**
 * Register the "weighted-vote" kind. `params.tie_break_margin` overrides the
 * default margin; `params.preferred_tasks` lists the task ids that settle ties.
 */
export function registerConflictTasks(registry: TaskRegistry, defaultMargin = DEFAULT_TIE_BREAK_MARGIN): TaskRegistry {
  return registry.register('weighted-vote', (def) => {
    const margin = def.params['tie_break_margin']
    const preferred = PreferredTasksSchema.safeParse(def.params['preferred_tasks'] ?? [])
    if (!preferred.success) {
      throw new TaskExecutionError(`Task "${def.id}" has an invalid preferred_tasks list`, {
        code: 'ARBITER_PARAMS',
      })
    }
    return new WeightedVoteArbiter(typeof margin === 'number' ? margin : defaultMargin, preferred.data)
  })
}
