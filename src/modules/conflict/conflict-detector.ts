/**
 * ConflictDetector interface — finds contradictions between the results of
 * one completed parallel group.
 */

import type { TaskResult } from '../../core/types.js'
import type { Conflict, ConflictScope } from './types.js'

export interface ConflictDetector {
  /**
   * Only successful results are compared. The output depends on the set of
   * results, never on their order.
   */
  detect(scope: ConflictScope, results: readonly TaskResult[]): Conflict[]
}
