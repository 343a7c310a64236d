/**
 * TaskRegistry — binds the `kind` named in a graph file to a Task factory.
 */

import type { TaskPayload } from '../../core/types.js'
import { TaskCancelledError, WaymarkError } from '../../core/errors.js'
import { isPlainObject } from '../../utils/helpers.js'
import type { Task, TaskContext } from './types.js'

/** What a factory receives from a graph file entry */
export interface TaskDefinition {
  id: string
  kind: string
  params: Readonly<Record<string, unknown>>
}

export type TaskFactory = (definition: TaskDefinition) => Task

export class TaskRegistry {
  private readonly _factories = new Map<string, TaskFactory>()

  register(kind: string, factory: TaskFactory): this {
    if (this._factories.has(kind)) {
      throw new WaymarkError(`Task kind "${kind}" is already registered`, 'TASK_KIND_REGISTERED', { kind })
    }
    this._factories.set(kind, factory)
    return this
  }

  has(kind: string): boolean {
    return this._factories.has(kind)
  }

  kinds(): string[] {
    return [...this._factories.keys()].sort()
  }

  create(definition: TaskDefinition): Task {
    const factory = this._factories.get(definition.kind)
    if (factory === undefined) {
      throw new WaymarkError(`Unknown task kind "${definition.kind}"`, 'TASK_KIND_UNKNOWN', {
        kind: definition.kind,
        taskId: definition.id,
      })
    }
    return factory(definition)
  }
}

// ---------------------------------------------------------------------------
// Built-in kinds
// ---------------------------------------------------------------------------

/**
 * "static": resolves with a copy of `params.payload` (or `{}`).
 */
export class StaticTask implements Task {
  private readonly _payload: TaskPayload

  constructor(payload: unknown) {
    this._payload = isPlainObject(payload) ? structuredClone(payload) : {}
  }

  run(context: TaskContext): Promise<TaskPayload> {
    if (context.signal.aborted) {
      return Promise.reject(new TaskCancelledError(context.taskId, 'aborted before start'))
    }
    return Promise.resolve(structuredClone(this._payload))
  }
}

/** Registry pre-loaded with the built-in "static" kind */
export function createTaskRegistry(): TaskRegistry {
  return new TaskRegistry().register('static', (def) => new StaticTask(def.params['payload']))
}
