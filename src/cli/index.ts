#!/usr/bin/env node
/**
 * Waymark CLI - Main entry point
 * Provides the `waymark` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerGraphCommand } from './commands/graph.js'
import { registerRunCommand } from './commands/run.js'
import { registerRunsCommand } from './commands/runs.js'

const logger = createLogger('cli')

/** Resolve the package version from package.json next to src/ or dist/ */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  const candidates = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of candidates) {
    let content: string
    try {
      content = await readFile(pkgPath, 'utf-8')
    } catch {
      continue
    }
    const pkg: unknown = JSON.parse(content)
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('waymark')
    .description('Waymark - phase-graph methodology orchestration')
    .version(version, '-v, --version', 'Output the current version')

  registerGraphCommand(program)
  registerRunCommand(program)
  registerRunsCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
