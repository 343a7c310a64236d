/**
 * `waymark runs` command group — read back reports from a run store.
 *
 * Usage:
 *   waymark runs list --db .waymark/runs.db [--status completed] [--limit 20]
 *   waymark runs show <runId> --db .waymark/runs.db
 *
 * Exit codes:
 *   0  — success
 *   1  — unexpected system error
 *   2  — run store or run not found
 */

import type { Command } from 'commander'
import { existsSync } from 'node:fs'
import { toError } from '../../core/errors.js'
import { openDatabase, type DatabaseWrapper } from '../../persistence/database.js'
import { getDecisionsForRun } from '../../persistence/queries/decisions.js'
import { getRunReport, listRuns } from '../../persistence/queries/runs.js'
import { formatRunList, formatStoredRun } from '../formatters/report-formatter.js'
import {
  EXIT_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  parseOutputFormat,
  writeError,
  type OutputFormat,
} from '../utils/command-context.js'
import { buildJsonOutput } from '../utils/formatting.js'

const DEFAULT_LIST_LIMIT = 20

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunsListOptions {
  dbPath: string
  limit?: number
  status?: string
  outputFormat: OutputFormat
}

export interface RunsShowOptions {
  dbPath: string
  runId: string
  outputFormat: OutputFormat
}

/** Open an existing store; a missing file is reported instead of created */
function openStore(dbPath: string): DatabaseWrapper | number {
  if (!existsSync(dbPath)) {
    writeError(`Run store not found: ${dbPath}`)
    return EXIT_USAGE_ERROR
  }
  try {
    return openDatabase(dbPath)
  } catch (err) {
    writeError(`Cannot open run store at ${dbPath}: ${toError(err).message}`)
    return EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// Actions — testable core logic
// ---------------------------------------------------------------------------

export function runRunsListAction(options: RunsListOptions): number {
  const store = openStore(options.dbPath)
  if (typeof store === 'number') return store

  try {
    const runs = listRuns(store.db, {
      limit: options.limit ?? DEFAULT_LIST_LIMIT,
      ...(options.status !== undefined ? { status: options.status } : {}),
    })
    if (options.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(buildJsonOutput('runs list', runs), null, 2) + '\n')
    } else {
      process.stdout.write(formatRunList(runs) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    writeError(toError(err).message)
    return EXIT_ERROR
  } finally {
    store.close()
  }
}

export function runRunsShowAction(options: RunsShowOptions): number {
  const store = openStore(options.dbPath)
  if (typeof store === 'number') return store

  try {
    const run = getRunReport(store.db, options.runId)
    if (run === undefined) {
      writeError(`Run not found: ${options.runId}`)
      return EXIT_USAGE_ERROR
    }
    const decisions = getDecisionsForRun(store.db, options.runId)
    if (options.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(buildJsonOutput('runs show', { run, decisions }), null, 2) + '\n')
    } else {
      process.stdout.write(formatStoredRun(run, decisions) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    writeError(toError(err).message)
    return EXIT_ERROR
  } finally {
    store.close()
  }
}

// ---------------------------------------------------------------------------
// registerRunsCommand
// ---------------------------------------------------------------------------

export function registerRunsCommand(program: Command): void {
  const runs = program.command('runs').description('Inspect reports saved to a run store')

  runs
    .command('list')
    .description('List recent runs, newest first')
    .requiredOption('--db <path>', 'SQLite run store')
    .option('--status <status>', 'Only runs with this status (e.g. completed)')
    .option('--limit <n>', 'Maximum number of runs', (v: string) => parseInt(v, 10), DEFAULT_LIST_LIMIT)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action((opts: { db: string; status?: string; limit: number; outputFormat: string }) => {
      process.exitCode = runRunsListAction({
        dbPath: opts.db,
        limit: opts.limit,
        ...(opts.status !== undefined ? { status: opts.status } : {}),
        outputFormat: parseOutputFormat(opts.outputFormat),
      })
    })

  runs
    .command('show <runId>')
    .description('Show one stored run and its arbitration decisions')
    .requiredOption('--db <path>', 'SQLite run store')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action((runId: string, opts: { db: string; outputFormat: string }) => {
      process.exitCode = runRunsShowAction({
        dbPath: opts.db,
        runId,
        outputFormat: parseOutputFormat(opts.outputFormat),
      })
    })
}
