/**
 * Unit tests for the run store: migrations, run reports and decisions.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from '../migrations/index.js'
import { DatabaseWrapper, openDatabase } from '../database.js'
import { getRunReport, listRuns, saveRunReport } from '../queries/runs.js'
import { createDecision, getDecisionsForRun } from '../queries/decisions.js'
import { CreateDecisionInputSchema } from '../schemas/runs.js'

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

function openTestDb(): BetterSqlite3Database {
  const db = new BetterSqlite3(':memory:')
  runMigrations(db)
  return db
}

function runInput(id: string, startedAt: string, status = 'completed') {
  return {
    id,
    graph_name: 'analysis-methodology',
    status,
    request: `request for ${id}`,
    domains: ['auth'],
    started_at: startedAt,
    completed_at: startedAt,
    report: { runId: id, status },
  }
}

// ---------------------------------------------------------------------------
// Migrations
// ---------------------------------------------------------------------------

describe('runMigrations', () => {
  it('creates the runs and decisions tables', () => {
    const db = openTestDb()
    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all()
      .map((row) => (row as { name: string }).name)
    expect(tables).toContain('runs')
    expect(tables).toContain('decisions')
    expect(tables).toContain('schema_migrations')
    db.close()
  })

  it('is safe to run twice', () => {
    const db = openTestDb()
    runMigrations(db)
    const count = db.prepare('SELECT COUNT(*) AS n FROM schema_migrations').get() as { n: number }
    expect(count.n).toBe(1)
    db.close()
  })
})

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

describe('DatabaseWrapper', () => {
  it('throws when accessed before open()', () => {
    const wrapper = new DatabaseWrapper(':memory:')
    expect(wrapper.isOpen).toBe(false)
    expect(() => wrapper.db).toThrow('database is not open')
  })

  it('opens, migrates and closes idempotently', () => {
    const wrapper = openDatabase(':memory:')
    expect(wrapper.isOpen).toBe(true)
    wrapper.open()
    expect(listRuns(wrapper.db)).toEqual([])
    wrapper.close()
    wrapper.close()
    expect(wrapper.isOpen).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// Runs
// ---------------------------------------------------------------------------

describe('run queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openTestDb()
  })

  afterEach(() => {
    db.close()
  })

  it('saves and reads back a run report', () => {
    saveRunReport(db, runInput('run-1', '2026-01-01T00:00:00.000Z'))
    const stored = getRunReport(db, 'run-1')
    expect(stored).toEqual({
      id: 'run-1',
      graphName: 'analysis-methodology',
      status: 'completed',
      request: 'request for run-1',
      domains: ['auth'],
      startedAt: '2026-01-01T00:00:00.000Z',
      completedAt: '2026-01-01T00:00:00.000Z',
      report: { runId: 'run-1', status: 'completed' },
    })
  })

  it('returns undefined for an unknown run', () => {
    expect(getRunReport(db, 'missing')).toBeUndefined()
  })

  it('replaces a run saved twice under the same id', () => {
    saveRunReport(db, runInput('run-1', '2026-01-01T00:00:00.000Z'))
    saveRunReport(db, runInput('run-1', '2026-01-01T00:00:00.000Z', 'aborted'))
    expect(listRuns(db)).toHaveLength(1)
    expect(getRunReport(db, 'run-1')?.status).toBe('aborted')
  })

  it('lists the most recent runs first and honours limit and status', () => {
    saveRunReport(db, runInput('run-a', '2026-01-01T00:00:00.000Z'))
    saveRunReport(db, runInput('run-b', '2026-01-03T00:00:00.000Z', 'aborted'))
    saveRunReport(db, runInput('run-c', '2026-01-02T00:00:00.000Z'))

    expect(listRuns(db).map((r) => r.id)).toEqual(['run-b', 'run-c', 'run-a'])
    expect(listRuns(db, { limit: 2 }).map((r) => r.id)).toEqual(['run-b', 'run-c'])
    expect(listRuns(db, { status: 'completed' }).map((r) => r.id)).toEqual(['run-c', 'run-a'])
  })

  it('rejects a run without an id', () => {
    expect(() => saveRunReport(db, { ...runInput('x', '2026-01-01T00:00:00.000Z'), id: '' })).toThrow()
  })
})

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

describe('decision queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openTestDb()
  })

  afterEach(() => {
    db.close()
  })

  it('creates a decision with a generated id', () => {
    const decision = createDecision(db, {
      run_id: 'run-1',
      phase: 'analysis',
      category: 'conflict-resolution',
      key: 'analysis/g/field:recommendation',
      value: 'use-oauth',
    })
    expect(decision.id).toMatch(/^[0-9a-f-]{36}$/)
    expect(decision.rationale).toBeNull()
    expect(decision.value).toBe('use-oauth')
  })

  it('returns decisions for one run in insertion order', () => {
    createDecision(db, { run_id: 'run-1', phase: 'p', category: 'c', key: 'k1', value: 'v1' })
    createDecision(db, { run_id: 'run-2', phase: 'p', category: 'c', key: 'k2', value: 'v2' })
    createDecision(db, { run_id: 'run-1', phase: 'p', category: 'c', key: 'k3', value: 'v3', rationale: 'why' })

    const decisions = getDecisionsForRun(db, 'run-1')
    expect(decisions.map((d) => d.key)).toEqual(['k1', 'k3'])
    expect(decisions[1]?.rationale).toBe('why')
  })

  it('schema rejects an empty value', () => {
    const result = CreateDecisionInputSchema.safeParse({
      run_id: 'run-1',
      phase: 'p',
      category: 'c',
      key: 'k',
      value: '',
    })
    expect(result.success).toBe(false)
  })
})
