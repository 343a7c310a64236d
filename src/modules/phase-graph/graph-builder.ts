/**
 * buildPhaseGraph — validates phase definitions and produces an immutable
 * PhaseGraph.
 *
 * Every violation is collected before failing, so a single
 * GraphDefinitionError describes everything wrong with a definition.
 */

import { GraphDefinitionError } from '../../core/errors.js'
import type { PhaseId, TaskId } from '../../core/types.js'
import { MAX_TIMER_DELAY_MS } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { detectCycle } from './dependency-resolver.js'
import type {
  Activation,
  ParallelGroup,
  Phase,
  PhaseDefinition,
  PhaseGraph,
  TaskSpec,
  TaskSpecInput,
} from './types.js'

const logger = createLogger('phase-graph')

// ---------------------------------------------------------------------------
// PhaseGraphImpl
// ---------------------------------------------------------------------------

class PhaseGraphImpl implements PhaseGraph {
  readonly phases: readonly Phase[]
  private readonly _phaseById: ReadonlyMap<PhaseId, Phase>
  private readonly _taskById: ReadonlyMap<TaskId, TaskSpec>
  private readonly _phaseByTask: ReadonlyMap<TaskId, Phase>

  constructor(phases: Phase[]) {
    this.phases = Object.freeze(phases)
    this._phaseById = new Map(phases.map((p) => [p.id, p]))
    this._taskById = new Map(phases.flatMap((p) => p.tasks.map((t) => [t.id, t] as const)))
    this._phaseByTask = new Map(phases.flatMap((p) => p.tasks.map((t) => [t.id, p] as const)))
    Object.freeze(this)
  }

  getPhase(id: PhaseId): Phase | undefined {
    return this._phaseById.get(id)
  }

  getTask(id: TaskId): TaskSpec | undefined {
    return this._taskById.get(id)
  }

  getPhaseOf(taskId: TaskId): Phase | undefined {
    return this._phaseByTask.get(taskId)
  }

  taskIds(): TaskId[] {
    return [...this._taskById.keys()]
  }
}

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

function validatePredecessors(
  definitions: PhaseDefinition[],
  errors: string[]
): Map<PhaseId, PhaseId[]> {
  const declaredAt = new Map<PhaseId, number>()
  definitions.forEach((def, index) => {
    if (!declaredAt.has(def.id)) declaredAt.set(def.id, index)
  })

  const edges = new Map<PhaseId, PhaseId[]>()
  definitions.forEach((def, index) => {
    const previous = definitions[index - 1]
    const predecessors = def.after ?? (previous !== undefined ? [previous.id] : [])
    edges.set(def.id, predecessors)

    for (const pred of predecessors) {
      const predIndex = declaredAt.get(pred)
      if (pred === def.id) {
        errors.push(`Phase "${def.id}" lists itself as a predecessor`)
      } else if (predIndex === undefined) {
        errors.push(`Phase "${def.id}" references unknown predecessor "${pred}"`)
      } else if (predIndex > index) {
        errors.push(`Phase "${def.id}" references predecessor "${pred}" declared after it`)
      }
    }
  })

  const cycle = detectCycle(edges)
  if (cycle !== null) {
    errors.push(`Circular phase dependency detected: ${cycle.join(' -> ')}`)
  }
  return edges
}

function validateTask(
  input: TaskSpecInput,
  phaseId: PhaseId,
  errors: string[]
): void {
  if (input.id.trim() === '') {
    errors.push(`Phase "${phaseId}" declares a task with an empty id`)
  }
  if (input.activation?.kind === 'domains' && input.activation.anyOf.length === 0) {
    errors.push(`Task "${input.id}" is activated by domains but lists none`)
  }
  if (
    input.timeoutMs !== undefined &&
    (!Number.isFinite(input.timeoutMs) || input.timeoutMs <= 0 || input.timeoutMs > MAX_TIMER_DELAY_MS)
  ) {
    errors.push(`Task "${input.id}" has an invalid timeout of ${String(input.timeoutMs)}ms`)
  }
  if (input.validation !== undefined && input.validation.resourceId.trim() === '') {
    errors.push(`Task "${input.id}" requires validation of an empty resource id`)
  }
}

function validateGroups(def: PhaseDefinition, errors: string[]): void {
  const phaseTaskIds = new Set(def.tasks.map((t) => t.id))
  const groupIds = new Set<string>()
  const owner = new Map<TaskId, string>()

  for (const group of def.groups ?? []) {
    if (groupIds.has(group.id)) {
      errors.push(`Duplicate group id "${group.id}" in phase "${def.id}"`)
    }
    groupIds.add(group.id)

    if (group.tasks.length === 0) {
      errors.push(`Group "${group.id}" in phase "${def.id}" has no members`)
    }
    const seen = new Set<TaskId>()
    for (const taskId of group.tasks) {
      if (seen.has(taskId)) {
        errors.push(`Group "${group.id}" lists task "${taskId}" more than once`)
        continue
      }
      seen.add(taskId)
      if (!phaseTaskIds.has(taskId)) {
        errors.push(
          `Group "${group.id}" in phase "${def.id}" references task "${taskId}" that is not in the phase`
        )
        continue
      }
      const existing = owner.get(taskId)
      if (existing !== undefined) {
        errors.push(`Task "${taskId}" belongs to groups "${existing}" and "${group.id}"`)
      } else {
        owner.set(taskId, group.id)
      }
    }
  }
}

/**
 * Copy and freeze a caller's task input. The Task and validator objects are
 * shared, not frozen.
 */
function toTaskSpec(input: TaskSpecInput): TaskSpec {
  const activation: Activation =
    input.activation?.kind === 'domains'
      ? Object.freeze({ kind: 'domains', anyOf: Object.freeze([...input.activation.anyOf]) })
      : Object.freeze({ kind: 'always' })
  return Object.freeze({
    id: input.id,
    task: input.task,
    activation,
    critical: input.critical ?? false,
    resultType: input.resultType ?? input.id,
    ...(input.timeoutMs !== undefined ? { timeoutMs: input.timeoutMs } : {}),
    ...(input.validation !== undefined ? { validation: Object.freeze({ ...input.validation }) } : {}),
    ...(input.description !== undefined ? { description: input.description } : {}),
  })
}

// ---------------------------------------------------------------------------
// buildPhaseGraph
// ---------------------------------------------------------------------------

/**
 * Validate phase definitions and build an immutable PhaseGraph.
 *
 * Checks:
 *  - at least one phase; unique phase ids
 *  - predecessors reference earlier-declared phases (no self, forward or unknown refs)
 *  - task ids unique across the whole graph; no empty phases
 *  - group members belong to the phase and to at most one group
 *  - domain activations list at least one tag; timeouts are positive
 *
 * @throws {GraphDefinitionError} listing every violation
 */
export function buildPhaseGraph(definitions: PhaseDefinition[]): PhaseGraph {
  const errors: string[] = []

  if (definitions.length === 0) {
    errors.push('Phase graph declares no phases')
  }

  const phaseIds = new Set<PhaseId>()
  for (const def of definitions) {
    if (def.id.trim() === '') errors.push('Phase id must be a non-empty string')
    if (phaseIds.has(def.id)) errors.push(`Duplicate phase id "${def.id}"`)
    phaseIds.add(def.id)
  }

  const edges = validatePredecessors(definitions, errors)

  const taskOwner = new Map<TaskId, PhaseId>()
  for (const def of definitions) {
    if (def.tasks.length === 0) {
      errors.push(`Phase "${def.id}" declares no tasks`)
    }
    for (const input of def.tasks) {
      const existing = taskOwner.get(input.id)
      if (existing !== undefined) {
        errors.push(
          existing === def.id
            ? `Duplicate task id "${input.id}" in phase "${def.id}"`
            : `Duplicate task id "${input.id}" in phases "${existing}" and "${def.id}"`
        )
      } else {
        taskOwner.set(input.id, def.id)
      }
      validateTask(input, def.id, errors)
    }
    validateGroups(def, errors)
  }

  if (errors.length > 0) {
    logger.debug({ violations: errors.length }, 'Phase graph rejected')
    throw new GraphDefinitionError(errors)
  }

  const phases: Phase[] = definitions.map((def) =>
    Object.freeze({
      id: def.id,
      ...(def.description !== undefined ? { description: def.description } : {}),
      predecessors: Object.freeze([...(edges.get(def.id) ?? [])]),
      tasks: Object.freeze(def.tasks.map(toTaskSpec)),
      groups: Object.freeze(
        (def.groups ?? []).map(
          (g): ParallelGroup => Object.freeze({ id: g.id, taskIds: Object.freeze([...g.tasks]) })
        )
      ),
    })
  )

  logger.debug({ phases: phases.length, tasks: taskOwner.size }, 'Phase graph built')
  return new PhaseGraphImpl(phases)
}
