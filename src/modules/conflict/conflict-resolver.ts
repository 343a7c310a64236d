/**
 * ConflictResolver interface — hands each unresolved conflict to an
 * arbitration task.
 */

import type { ExecutionContext } from '../phase-graph/types.js'
import type { Conflict } from './types.js'

export interface ResolveContext extends ExecutionContext {
  /** Run cancellation; aborts an in-flight arbitration */
  signal?: AbortSignal
}

export interface ConflictResolver {
  /**
   * Returns one entry per input conflict, in input order. A conflict the
   * arbiter could not settle stays `unresolved` with an `error`.
   */
  resolve(conflicts: readonly Conflict[], context: ResolveContext): Promise<Conflict[]>
}
