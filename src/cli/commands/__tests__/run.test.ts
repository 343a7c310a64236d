/**
 * Unit tests for `src/cli/commands/run.ts`
 *
 * Runs small static graphs end to end through the CLI action and checks
 * the printed report, the exit codes and the optional run store.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { ConfigSystemOptions } from '../../../modules/config/config-system.js'
import { openDatabase } from '../../../persistence/database.js'
import { listRuns } from '../../../persistence/queries/runs.js'
import { EXIT_USAGE_ERROR } from '../../utils/command-context.js'
import { RUN_EXIT_ABORTED, RUN_EXIT_COMPLETED, runRunAction } from '../run.js'

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

let testDir: string
let graphPath: string
let configOptions: ConfigSystemOptions
let stdout: string[]
let stderr: string[]

const GRAPH = `
version: "1"
name: sample-run
phases:
  - id: gather
    tasks:
      - id: query
        critical: true
        params:
          payload:
            summary: gathered
`

interface RunJson {
  command: string
  data: {
    report: { status: string; domains: string[]; results: Record<string, { status: string }> }
    tokens: { total: number; overhead: number }
  }
}

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'waymark-run-'))
  graphPath = join(testDir, 'graph.yaml')
  writeFileSync(graphPath, GRAPH, 'utf-8')
  configOptions = { projectConfigDir: testDir, globalConfigDir: testDir, env: {} }
  stdout = []
  stderr = []
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: unknown) => {
    stdout.push(String(chunk))
    return true
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk: unknown) => {
    stderr.push(String(chunk))
    return true
  })
})

afterEach(() => {
  vi.restoreAllMocks()
  rmSync(testDir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// runRunAction
// ---------------------------------------------------------------------------

describe('runRunAction', () => {
  it('prints the report of a completed run', async () => {
    const code = await runRunAction({
      filePath: graphPath,
      request: 'Summarise',
      domains: [],
      outputFormat: 'human',
      configOptions,
    })

    expect(code).toBe(RUN_EXIT_COMPLETED)
    const lines = stdout.join('').split('\n')
    expect(lines[0]).toMatch(/^Run run-\S+ \(sample-run\): completed$/)
    expect(lines.slice(1)).toEqual([
      'Request: Summarise',
      'Domains: (none)',
      '',
      'Phases:',
      '  gather: completed',
      '',
      'Task  | Phase  | Status  | Attempt',
      '------+--------+---------+--------',
      'query | gather | success | 1',
      '',
      // {"summary":"gathered"} is 22 chars: 5 base + 1 context overhead
      'Tokens: 6 (sequential estimate 6, overhead 0%)',
      '',
    ])
  })

  it('emits report and token totals as JSON', async () => {
    await runRunAction({
      filePath: graphPath,
      request: 'Summarise',
      domains: ['auth'],
      outputFormat: 'json',
      configOptions,
    })

    const parsed = JSON.parse(stdout.join('')) as RunJson
    expect(parsed.command).toBe('run')
    expect(parsed.data.report.status).toBe('completed')
    expect(parsed.data.report.domains).toEqual(['auth'])
    expect(parsed.data.report.results['query']?.status).toBe('success')
    expect(parsed.data.tokens).toMatchObject({ total: 6, overhead: 0 })
  })

  it('returns the aborted exit code for a cancelled run', async () => {
    const code = await runRunAction({
      filePath: graphPath,
      request: 'Summarise',
      domains: [],
      outputFormat: 'json',
      configOptions,
      signal: AbortSignal.abort(),
    })

    expect(code).toBe(RUN_EXIT_ABORTED)
    const parsed = JSON.parse(stdout.join('')) as RunJson
    expect(parsed.data.report.status).toBe('aborted:cancelled')
    expect(parsed.data.report.results).toEqual({})
  })

  it('saves the report to the run store', async () => {
    const dbPath = join(testDir, 'runs.db')

    const code = await runRunAction({
      filePath: graphPath,
      request: 'Summarise',
      domains: ['auth'],
      dbPath,
      outputFormat: 'json',
      configOptions,
    })

    expect(code).toBe(RUN_EXIT_COMPLETED)
    const store = openDatabase(dbPath)
    try {
      const runs = listRuns(store.db)
      expect(runs).toHaveLength(1)
      expect(runs[0]).toMatchObject({
        graphName: 'sample-run',
        status: 'completed',
        request: 'Summarise',
        domains: ['auth'],
      })
    } finally {
      store.close()
    }
  })

  it('rejects an invalid validator URL as a configuration error', async () => {
    const code = await runRunAction({
      filePath: graphPath,
      request: 'Summarise',
      domains: [],
      validatorUrl: 'not-a-url',
      outputFormat: 'human',
      configOptions,
    })

    expect(code).toBe(EXIT_USAGE_ERROR)
    expect(stderr[0]).toMatch(/^Error: Configuration validation failed:\n/)
    expect(stdout).toEqual([])
  })

  it('reports a missing graph file', async () => {
    const missing = join(testDir, 'absent.yaml')

    const code = await runRunAction({
      filePath: missing,
      request: 'Summarise',
      domains: [],
      outputFormat: 'human',
      configOptions,
    })

    expect(code).toBe(EXIT_USAGE_ERROR)
    expect(stderr).toEqual([`Error: Graph file not found: ${missing}\n`])
  })
})
