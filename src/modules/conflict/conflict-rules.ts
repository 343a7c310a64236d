/**
 * Built-in conflict rules.
 */

import type { TaskResult } from '../../core/types.js'
import { isDeepEqual } from '../../utils/helpers.js'
import type { ConflictFinding, ConflictRule } from './types.js'

export interface FieldDisagreementOptions {
  resultTypes?: readonly [string, string]
  equals?: (a: unknown, b: unknown) => boolean
}

/**
 * Two payloads that both carry `field` with unequal values conflict.
 * Payloads where only one side (or neither) carries the field do not.
 */
export function fieldDisagreementRule(field: string, options: FieldDisagreementOptions = {}): ConflictRule {
  const equals = options.equals ?? isDeepEqual
  return {
    name: 'field-disagreement',
    ...(options.resultTypes !== undefined ? { resultTypes: options.resultTypes } : {}),
    compare(a: TaskResult, b: TaskResult): ConflictFinding[] {
      const left = a.payload
      const right = b.payload
      if (left === undefined || right === undefined) return []
      if (!Object.hasOwn(left, field) || !Object.hasOwn(right, field)) return []
      return equals(left[field], right[field]) ? [] : [{ field }]
    },
  }
}

/** Whether a rule applies to a pair of results */
export function ruleApplies(rule: ConflictRule, a: TaskResult, b: TaskResult): boolean {
  if (rule.resultTypes === undefined) return true
  const [x, y] = rule.resultTypes
  return (a.resultType === x && b.resultType === y) || (a.resultType === y && b.resultType === x)
}
