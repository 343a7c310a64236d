/**
 * Execution planning: phase steps and task activation.
 */

import type { TaskId } from '../../core/types.js'
import type { Activation, Phase, PhaseGraph, PhaseStep } from './types.js'

/**
 * Whether a task with this activation runs for the given domain tags.
 */
export function isActivated(activation: Activation, domains: ReadonlySet<string>): boolean {
  if (activation.kind === 'always') return true
  return activation.anyOf.some((tag) => domains.has(tag))
}

/**
 * Derive the ordered steps of a phase. Tasks outside any group become
 * sequential steps in declaration order; a group becomes one parallel step
 * positioned at its first member's declaration.
 */
export function planPhase(phase: Phase): PhaseStep[] {
  const groupOf = new Map<TaskId, Phase['groups'][number]>()
  for (const group of phase.groups) {
    for (const taskId of group.taskIds) groupOf.set(taskId, group)
  }

  const steps: PhaseStep[] = []
  const emittedGroups = new Set<string>()
  for (const spec of phase.tasks) {
    const group = groupOf.get(spec.id)
    if (group === undefined) {
      steps.push({ kind: 'sequential', id: spec.id, taskIds: [spec.id] })
    } else if (!emittedGroups.has(group.id)) {
      emittedGroups.add(group.id)
      // members run in phase declaration order, not group listing order
      const members = phase.tasks.map((t) => t.id).filter((id) => groupOf.get(id) === group)
      steps.push({ kind: 'parallel', id: group.id, taskIds: members })
    }
  }
  return steps
}

// ---------------------------------------------------------------------------
// Whole-graph plan (used by `graph plan`)
// ---------------------------------------------------------------------------

export interface PlannedStep extends PhaseStep {
  /** Members that will run for the given domains */
  activated: TaskId[]
  /** Members skipped by their activation condition */
  skipped: TaskId[]
}

export interface PlannedPhase {
  phaseId: string
  predecessors: string[]
  steps: PlannedStep[]
}

/**
 * Plan every phase of a graph for a domain tag set, without running anything.
 */
export function planGraph(graph: PhaseGraph, domains: ReadonlySet<string>): PlannedPhase[] {
  return graph.phases.map((phase) => ({
    phaseId: phase.id,
    predecessors: [...phase.predecessors],
    steps: planPhase(phase).map((step) => {
      const activated: TaskId[] = []
      const skipped: TaskId[] = []
      for (const taskId of step.taskIds) {
        const spec = graph.getTask(taskId)
        if (spec !== undefined && isActivated(spec.activation, domains)) activated.push(taskId)
        else skipped.push(taskId)
      }
      return { ...step, taskIds: [...step.taskIds], activated, skipped }
    }),
  }))
}

/** Whether any task in the graph declares a validation requirement */
export function requiresValidation(graph: PhaseGraph): boolean {
  return graph.phases.some((p) => p.tasks.some((t) => t.validation !== undefined))
}
