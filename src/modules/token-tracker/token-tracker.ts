/**
 * TokenTracker — subscribes to run and task events and accumulates token
 * estimates per task and per phase.
 *
 *  - run:started resets the tally; events of other runs are ignored
 *  - every invoked attempt counts, retries included
 *  - skipped tasks cost nothing; failed and cancelled attempts count zero
 *  - members of a parallel group add the group's coordination overhead
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { EngineEvents } from '../../core/event-bus.types.js'
import type { PhaseId, TaskId } from '../../core/types.js'
import { stableStringify } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { TokenSettings } from '../config/config-schema.js'
import { DEFAULT_CONFIG } from '../config/defaults.js'
import { estimateTaskTokens, groupOverhead } from './token-estimator.js'

const logger = createLogger('token-tracker')

// ---------------------------------------------------------------------------
// TokenReport
// ---------------------------------------------------------------------------

export interface TokenReport {
  runId?: string
  /** Tokens including parallel coordination overhead */
  total: number
  overhead: number
  /** What the same work would have cost without parallel coordination */
  sequentialEstimate: number
  /** Overhead relative to the sequential estimate, one decimal */
  overheadPercent: number
  byTask: Record<TaskId, number>
  /** Phase totals, overhead included */
  byPhase: Record<PhaseId, number>
  mostExpensivePhase?: { phaseId: PhaseId; tokens: number }
}

interface GroupTally {
  phaseId: PhaseId
  tokens: number
}

// ---------------------------------------------------------------------------
// TokenTracker
// ---------------------------------------------------------------------------

/**
 * Lifecycle: call initialize() to subscribe, shutdown() to unsubscribe.
 */
export class TokenTracker {
  private readonly _eventBus: TypedEventBus
  private readonly _settings: TokenSettings
  private _runId: string | undefined
  private readonly _byTask = new Map<TaskId, number>()
  /** Phase totals without overhead, in first-seen order */
  private readonly _byPhase = new Map<PhaseId, number>()
  private readonly _groups = new Map<string, GroupTally>()

  // Bound handlers for clean unsubscription
  private readonly _onRunStarted: (payload: EngineEvents['run:started']) => void
  private readonly _onTaskCompleted: (payload: EngineEvents['task:completed']) => void

  constructor(eventBus: TypedEventBus, settings: TokenSettings = DEFAULT_CONFIG.tokens) {
    this._eventBus = eventBus
    this._settings = settings

    this._onRunStarted = ({ runId }) => {
      this.reset()
      this._runId = runId
    }

    this._onTaskCompleted = ({ runId, phaseId, groupId, result }) => {
      if (this._runId !== undefined && runId !== this._runId) return
      if (result.status === 'skipped-by-condition') return

      const tokens =
        result.status === 'success' && result.payload !== undefined
          ? estimateTaskTokens(result.taskId, stableStringify(result.payload), this._settings.multipliers)
          : 0

      this._byTask.set(result.taskId, (this._byTask.get(result.taskId) ?? 0) + tokens)
      this._byPhase.set(phaseId, (this._byPhase.get(phaseId) ?? 0) + tokens)
      if (groupId !== undefined) {
        const key = `${phaseId}/${groupId}`
        const tally = this._groups.get(key) ?? { phaseId, tokens: 0 }
        tally.tokens += tokens
        this._groups.set(key, tally)
      }
      logger.debug({ runId, taskId: result.taskId, tokens }, 'Recorded task tokens')
    }
  }

  async initialize(): Promise<void> {
    this._eventBus.on('run:started', this._onRunStarted)
    this._eventBus.on('task:completed', this._onTaskCompleted)
    logger.debug('TokenTracker initialized')
  }

  async shutdown(): Promise<void> {
    this._eventBus.off('run:started', this._onRunStarted)
    this._eventBus.off('task:completed', this._onTaskCompleted)
    logger.debug('TokenTracker shut down')
  }

  reset(): void {
    this._runId = undefined
    this._byTask.clear()
    this._byPhase.clear()
    this._groups.clear()
  }

  getReport(): TokenReport {
    const phaseTotals = new Map(this._byPhase)
    let overhead = 0
    for (const group of this._groups.values()) {
      const extra = groupOverhead(group.tokens, this._settings.parallel_overhead)
      overhead += extra
      phaseTotals.set(group.phaseId, (phaseTotals.get(group.phaseId) ?? 0) + extra)
    }

    let total = 0
    let mostExpensive: { phaseId: PhaseId; tokens: number } | undefined
    for (const [phaseId, tokens] of phaseTotals) {
      total += tokens
      if (mostExpensive === undefined || tokens > mostExpensive.tokens) {
        mostExpensive = { phaseId, tokens }
      }
    }

    const sequentialEstimate = total - overhead
    const overheadPercent =
      sequentialEstimate > 0 ? Math.round((overhead / sequentialEstimate) * 1000) / 10 : 0

    return {
      ...(this._runId !== undefined ? { runId: this._runId } : {}),
      total,
      overhead,
      sequentialEstimate,
      overheadPercent,
      byTask: Object.fromEntries(this._byTask),
      byPhase: Object.fromEntries(phaseTotals),
      ...(mostExpensive !== undefined ? { mostExpensivePhase: mostExpensive } : {}),
    }
  }
}

export function createTokenTracker(eventBus: TypedEventBus, settings?: TokenSettings): TokenTracker {
  return new TokenTracker(eventBus, settings)
}
