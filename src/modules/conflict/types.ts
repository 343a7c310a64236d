/**
 * Conflict types: rule findings, detected conflicts and their resolutions.
 */

import type { PhaseId, TaskId, TaskResult } from '../../core/types.js'

/** One disagreement a rule found between two results */
export interface ConflictFinding {
  /** Payload field the results disagree on */
  field: string
}

/**
 * Pairwise comparison rule. `resultTypes` restricts the rule to one
 * unordered pair of result types; without it the rule applies to every pair.
 */
export interface ConflictRule {
  readonly name: string
  readonly resultTypes?: readonly [string, string]
  compare(a: TaskResult, b: TaskResult): ConflictFinding[]
}

export type ConflictStatus = 'unresolved' | 'resolved'

export interface ConflictResolution {
  decision: string
  rationale: string
  arbiterTaskId: string
}

export interface Conflict {
  /** `<phase>/<group>/<rule>:<field>` */
  id: string
  phaseId: PhaseId
  groupId: string
  rule: string
  field: string
  /** Disagreeing tasks, sorted */
  taskIds: TaskId[]
  /** The contested field value of each task */
  values: Record<TaskId, unknown>
  status: ConflictStatus
  resolution?: ConflictResolution
  /** Why arbitration failed */
  error?: string
  note?: string
}

/** Where a group's results came from */
export interface ConflictScope {
  phaseId: PhaseId
  groupId: string
}
