/**
 * Shared loading steps for CLI commands: configuration, the task registry
 * and graph files. Failures are written to stderr and turned into exit codes.
 */

import { existsSync } from 'node:fs'
import { ConfigError, GraphDefinitionError, ParseError, toError } from '../../core/errors.js'
import type { WaymarkConfig } from '../../modules/config/config-schema.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystemOptions } from '../../modules/config/config-system.js'
import { registerConflictTasks } from '../../modules/conflict/weighted-vote-arbiter.js'
import { loadGraphFile, type LoadGraphOptions, type LoadedGraph } from '../../modules/phase-graph/graph-loader.js'
import { createTaskRegistry, type TaskRegistry } from '../../modules/phase-graph/task-registry.js'
import { setLogLevel } from '../../utils/logger.js'

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE_ERROR = 2

export type OutputFormat = 'human' | 'json'

export type Loaded<T> = { ok: true; value: T } | { ok: false; exitCode: number }

export function parseOutputFormat(value: string | undefined): OutputFormat {
  return value === 'json' ? 'json' : 'human'
}

export function writeError(message: string): void {
  process.stderr.write(`Error: ${message}\n`)
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Load the merged configuration and apply its log level.
 */
export async function loadConfigForCommand(options: ConfigSystemOptions = {}): Promise<Loaded<WaymarkConfig>> {
  const system = createConfigSystem(options)
  try {
    await system.load()
  } catch (err) {
    writeError(toError(err).message)
    return { ok: false, exitCode: err instanceof ConfigError ? EXIT_USAGE_ERROR : EXIT_ERROR }
  }
  const config = system.getConfig()
  setLogLevel(config.global.log_level)
  return { ok: true, value: config }
}

/** Built-in task kinds plus the weighted-vote arbiter */
export function createCommandRegistry(config: WaymarkConfig): TaskRegistry {
  return registerConflictTasks(createTaskRegistry(), config.conflicts.tie_break_margin)
}

// ---------------------------------------------------------------------------
// Graph files
// ---------------------------------------------------------------------------

export function loadGraphForCommand(filePath: string, options: LoadGraphOptions): Loaded<LoadedGraph> {
  if (!existsSync(filePath)) {
    writeError(`Graph file not found: ${filePath}`)
    return { ok: false, exitCode: EXIT_USAGE_ERROR }
  }

  try {
    return { ok: true, value: loadGraphFile(filePath, options) }
  } catch (err) {
    if (err instanceof ParseError) {
      writeError(`Failed to parse graph file: ${filePath}\n${err.message}`)
      return { ok: false, exitCode: EXIT_USAGE_ERROR }
    }
    if (err instanceof GraphDefinitionError) {
      for (const violation of err.violations) writeError(violation)
      return { ok: false, exitCode: EXIT_USAGE_ERROR }
    }
    writeError(toError(err).message)
    return { ok: false, exitCode: EXIT_ERROR }
  }
}
