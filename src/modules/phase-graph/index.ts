/**
 * Barrel exports for the phase-graph module.
 */

export type {
  ExecutionContext,
  TaskContext,
  Task,
  Activation,
  TaskValidationRequirement,
  TaskSpecInput,
  TaskSpec,
  ParallelGroupDefinition,
  PhaseDefinition,
  ParallelGroup,
  Phase,
  PhaseStep,
  PhaseGraph,
} from './types.js'
export { buildPhaseGraph } from './graph-builder.js'
export { detectCycle } from './dependency-resolver.js'
export { isActivated, planPhase, planGraph, requiresValidation } from './execution-plan.js'
export type { PlannedStep, PlannedPhase } from './execution-plan.js'
export { PhaseGraphFileSchema, SUPPORTED_GRAPH_VERSIONS } from './graph-schema.js'
export type { PhaseGraphFile, TaskEntry, PhaseEntry, ArbiterEntry } from './graph-schema.js'
export { parseGraphString, parseGraphFile, detectFormat } from './graph-parser.js'
export type { GraphFormat } from './graph-parser.js'
export { TaskRegistry, StaticTask, createTaskRegistry } from './task-registry.js'
export type { TaskDefinition, TaskFactory } from './task-registry.js'
export { loadGraph, loadGraphFile } from './graph-loader.js'
export type { LoadGraphOptions, LoadedGraph } from './graph-loader.js'
