/**
 * Token estimation heuristics for task output and execution plans.
 *
 * The base count is chars/4, scaled by a per-task multiplier, plus a context
 * overhead of 20% of the base capped at 500 tokens. Parallel groups add a
 * coordination overhead on top of their members' total.
 */

import type { PhaseId, TaskId } from '../../core/types.js'
import type { PlannedPhase } from '../phase-graph/execution-plan.js'

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const CHARS_PER_TOKEN = 4
const CONTEXT_OVERHEAD_RATIO = 0.2
const MAX_CONTEXT_OVERHEAD = 500
const DEFAULT_MULTIPLIER = 1

// ---------------------------------------------------------------------------
// estimateTaskTokens
// ---------------------------------------------------------------------------

/**
 * Estimate the tokens one task spends on `text`. Empty text costs nothing.
 */
export function estimateTaskTokens(
  taskId: TaskId,
  text: string,
  multipliers: Readonly<Record<string, number>> = {},
): number {
  if (text.length === 0) return 0

  const base = Math.floor(text.length / CHARS_PER_TOKEN)
  const multiplier = Object.hasOwn(multipliers, taskId)
    ? (multipliers[taskId] ?? DEFAULT_MULTIPLIER)
    : DEFAULT_MULTIPLIER
  const contextOverhead = Math.min(base * CONTEXT_OVERHEAD_RATIO, MAX_CONTEXT_OVERHEAD)
  return Math.floor(base * multiplier + contextOverhead)
}

/** Coordination overhead of a parallel group whose members spent `total` */
export function groupOverhead(total: number, ratio: number): number {
  return Math.floor(total * ratio)
}

// ---------------------------------------------------------------------------
// estimatePlanTokens
// ---------------------------------------------------------------------------

export interface PlanTokenEstimate {
  byTask: Record<TaskId, number>
  byPhase: Record<PhaseId, number>
  /** Coordination overhead included in the phase totals */
  overhead: number
  total: number
}

/**
 * Estimate a whole plan up front, charging every activated task for reading
 * the request. Skipped tasks cost nothing.
 */
export function estimatePlanTokens(
  plan: readonly PlannedPhase[],
  request: string,
  settings: { multipliers: Readonly<Record<string, number>>; parallel_overhead: number },
): PlanTokenEstimate {
  const byTask: Record<TaskId, number> = {}
  const byPhase: Record<PhaseId, number> = {}
  let overhead = 0
  let total = 0

  for (const phase of plan) {
    let phaseTokens = 0
    for (const step of phase.steps) {
      let stepTokens = 0
      for (const taskId of step.activated) {
        const tokens = estimateTaskTokens(taskId, request, settings.multipliers)
        byTask[taskId] = tokens
        stepTokens += tokens
      }
      if (step.kind === 'parallel') {
        const extra = groupOverhead(stepTokens, settings.parallel_overhead)
        overhead += extra
        stepTokens += extra
      }
      phaseTokens += stepTokens
    }
    byPhase[phase.phaseId] = phaseTokens
    total += phaseTokens
  }

  return { byTask, byPhase, overhead, total }
}
