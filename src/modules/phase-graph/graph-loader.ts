/**
 * Graph loader — turns a parsed graph file into a PhaseGraph.
 *
 * Schema issues, unknown task kinds and structural violations are all
 * reported through GraphDefinitionError.
 */

import { GraphDefinitionError } from '../../core/errors.js'
import type { ExternalValidator } from '../validation-gate/validation-gate.js'
import { UnavailableValidator } from '../validation-gate/http-validator.js'
import { buildPhaseGraph } from './graph-builder.js'
import { parseGraphFile } from './graph-parser.js'
import { PhaseGraphFileSchema, type TaskEntry } from './graph-schema.js'
import { createTaskRegistry, type TaskRegistry } from './task-registry.js'
import type { PhaseDefinition, PhaseGraph, Task, TaskSpecInput } from './types.js'

export interface LoadGraphOptions {
  /** Task kinds available to the file (default: built-in kinds only) */
  registry?: TaskRegistry
  /** Collaborator for tasks that declare `validation` */
  validator?: ExternalValidator
}

export interface LoadedGraph {
  name: string
  description?: string
  graph: PhaseGraph
  /** Arbitration task built from the file's `arbiter` entry */
  arbiter?: Task
  arbiterTimeoutMs?: number
}

const unresolvedTask: Task = {
  run: () => Promise.reject(new Error('task kind is not registered')),
}

/**
 * Validate and build a graph from a raw parsed object.
 * @throws {GraphDefinitionError} listing every violation
 */
export function loadGraph(raw: unknown, options: LoadGraphOptions = {}): LoadedGraph {
  const parsed = PhaseGraphFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new GraphDefinitionError(
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    )
  }
  const file = parsed.data
  const registry = options.registry ?? createTaskRegistry()
  const validator = options.validator ?? new UnavailableValidator()
  const kindErrors: string[] = []

  const toInput = (entry: TaskEntry): TaskSpecInput => {
    let task = unresolvedTask
    if (registry.has(entry.kind)) {
      task = registry.create({ id: entry.id, kind: entry.kind, params: entry.params })
    } else {
      kindErrors.push(`Task "${entry.id}" uses unknown kind "${entry.kind}"`)
    }
    return {
      id: entry.id,
      task,
      critical: entry.critical,
      activation: entry.when !== undefined ? { kind: 'domains', anyOf: entry.when.domains } : { kind: 'always' },
      ...(entry.result_type !== undefined ? { resultType: entry.result_type } : {}),
      ...(entry.timeout_ms !== undefined ? { timeoutMs: entry.timeout_ms } : {}),
      ...(entry.validation !== undefined
        ? { validation: { resourceId: entry.validation.resource, validator } }
        : {}),
      ...(entry.description !== undefined ? { description: entry.description } : {}),
    }
  }

  const definitions: PhaseDefinition[] = file.phases.map((phase) => ({
    id: phase.id,
    ...(phase.description !== undefined ? { description: phase.description } : {}),
    ...(phase.after !== undefined ? { after: phase.after } : {}),
    tasks: phase.tasks.map(toInput),
    groups: phase.groups,
  }))

  let arbiter: Task | undefined
  if (file.arbiter !== undefined) {
    if (registry.has(file.arbiter.kind)) {
      arbiter = registry.create({ id: 'arbiter', kind: file.arbiter.kind, params: file.arbiter.params })
    } else {
      kindErrors.push(`Arbiter uses unknown kind "${file.arbiter.kind}"`)
    }
  }

  let graph: PhaseGraph
  try {
    graph = buildPhaseGraph(definitions)
  } catch (err) {
    if (err instanceof GraphDefinitionError) {
      throw new GraphDefinitionError([...kindErrors, ...err.violations], { graph: file.name })
    }
    throw err
  }
  if (kindErrors.length > 0) {
    throw new GraphDefinitionError(kindErrors, { graph: file.name })
  }

  return {
    name: file.name,
    ...(file.description !== undefined ? { description: file.description } : {}),
    graph,
    ...(arbiter !== undefined ? { arbiter } : {}),
    ...(file.arbiter?.timeout_ms !== undefined ? { arbiterTimeoutMs: file.arbiter.timeout_ms } : {}),
  }
}

/**
 * Read, parse and load a graph definition file.
 * @throws {ParseError} on read / syntax errors
 * @throws {GraphDefinitionError} on schema or structural violations
 */
export function loadGraphFile(filePath: string, options: LoadGraphOptions = {}): LoadedGraph {
  return loadGraph(parseGraphFile(filePath), options)
}
