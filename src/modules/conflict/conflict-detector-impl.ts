/**
 * ConflictDetectorImpl — deterministic pairwise comparison of group results.
 */

import type { TaskId, TaskResult } from '../../core/types.js'
import type { ConflictSettings } from '../config/config-schema.js'
import { DEFAULT_CONFIG } from '../config/defaults.js'
import { createLogger } from '../../utils/logger.js'
import type { ConflictDetector } from './conflict-detector.js'
import { fieldDisagreementRule, ruleApplies } from './conflict-rules.js'
import type { Conflict, ConflictRule, ConflictScope } from './types.js'

const logger = createLogger('conflict:detector')

interface PendingConflict {
  rule: string
  field: string
  taskIds: Set<TaskId>
}

export class ConflictDetectorImpl implements ConflictDetector {
  private readonly _rules: readonly ConflictRule[]

  constructor(rules: readonly ConflictRule[]) {
    this._rules = [...rules]
  }

  detect(scope: ConflictScope, results: readonly TaskResult[]): Conflict[] {
    const candidates = results
      .filter((r) => r.status === 'success')
      .sort((a, b) => (a.taskId < b.taskId ? -1 : a.taskId > b.taskId ? 1 : 0))

    const pending = new Map<string, PendingConflict>()
    for (let i = 0; i < candidates.length; i++) {
      for (let j = i + 1; j < candidates.length; j++) {
        const a = candidates[i]
        const b = candidates[j]
        if (a === undefined || b === undefined) continue
        for (const rule of this._rules) {
          if (!ruleApplies(rule, a, b)) continue
          for (const finding of rule.compare(a, b)) {
            const key = `${rule.name}:${finding.field}`
            const entry = pending.get(key) ?? { rule: rule.name, field: finding.field, taskIds: new Set<TaskId>() }
            entry.taskIds.add(a.taskId)
            entry.taskIds.add(b.taskId)
            pending.set(key, entry)
          }
        }
      }
    }

    const byId = new Map(candidates.map((r) => [r.taskId, r]))
    const conflicts: Conflict[] = [...pending.values()].map((entry) => {
      const taskIds = [...entry.taskIds].sort()
      const values: Record<TaskId, unknown> = {}
      for (const id of taskIds) {
        values[id] = byId.get(id)?.payload?.[entry.field]
      }
      return {
        id: `${scope.phaseId}/${scope.groupId}/${entry.rule}:${entry.field}`,
        phaseId: scope.phaseId,
        groupId: scope.groupId,
        rule: entry.rule,
        field: entry.field,
        taskIds,
        values,
        status: 'unresolved',
      }
    })
    conflicts.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))

    if (conflicts.length > 0) {
      logger.info(
        { phaseId: scope.phaseId, groupId: scope.groupId, conflicts: conflicts.map((c) => c.id) },
        'Conflicts detected',
      )
    }
    return conflicts
  }
}

export function createConflictDetector(rules: readonly ConflictRule[]): ConflictDetector {
  return new ConflictDetectorImpl(rules)
}

/** Detector with one field-disagreement rule per configured field */
export function createConflictDetectorFromConfig(
  settings: ConflictSettings = DEFAULT_CONFIG.conflicts,
): ConflictDetector {
  return new ConflictDetectorImpl(settings.compared_fields.map((field) => fieldDisagreementRule(field)))
}
