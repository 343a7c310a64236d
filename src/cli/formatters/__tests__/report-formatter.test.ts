/**
 * Tests for report-formatter.ts
 */

import { describe, it, expect } from 'vitest'
import type { PlannedPhase } from '../../../modules/phase-graph/execution-plan.js'
import type { RunReport } from '../../../modules/phase-orchestrator/types.js'
import type { TokenReport } from '../../../modules/token-tracker/token-tracker.js'
import { formatGraphPlan, formatRunList, formatRunReport, formatStoredRun } from '../report-formatter.js'

const TIMESTAMP = '2026-03-01T10:00:00.000Z'

function makeReport(overrides: Partial<RunReport> = {}): RunReport {
  return {
    runId: 'run-1',
    graphName: 'sample',
    status: 'completed',
    request: 'Explain the login flow',
    domains: [],
    startedAt: TIMESTAMP,
    completedAt: TIMESTAMP,
    phases: [{ phaseId: 'p1', status: 'completed', steps: [] }],
    results: {},
    conflicts: [],
    validations: [],
    warnings: [],
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// formatGraphPlan
// ---------------------------------------------------------------------------

describe('formatGraphPlan', () => {
  it('marks steps with nothing activated', () => {
    const plan: PlannedPhase[] = [
      {
        phaseId: 'p1',
        predecessors: [],
        steps: [{ kind: 'parallel', id: 'g', taskIds: ['a'], activated: [], skipped: ['a'] }],
      },
    ]

    const text = formatGraphPlan('g1', plan, { byTask: {}, byPhase: { p1: 0 }, overhead: 0, total: 0 })

    expect(text).toBe(
      ['Graph: g1', '1. p1 ~0 tokens', '   parallel g: (none) [skipped: a]', '', 'Estimated tokens: 0 (0 coordination overhead)'].join(
        '\n',
      ),
    )
  })
})

// ---------------------------------------------------------------------------
// formatRunReport
// ---------------------------------------------------------------------------

describe('formatRunReport', () => {
  it('renders an aborted run with results, warnings and tokens', () => {
    const report = makeReport({
      status: 'aborted:critical',
      request: 'Explain',
      phases: [{ phaseId: 'p1', status: 'aborted', steps: [] }],
      results: {
        critical: {
          taskId: 'critical',
          phaseId: 'p1',
          resultType: 'critical',
          status: 'failure',
          error: { name: 'TaskExecutionError', code: 'TASK_FAILED', message: 'bad input', transient: false },
          attempt: 1,
          durationMs: 3,
          timestamp: TIMESTAMP,
        },
      },
      warnings: ['Task "x" failed: boom'],
      abort: { phaseId: 'p1', taskId: 'critical', reason: 'bad input' },
    })
    const tokens: TokenReport = {
      total: 6,
      overhead: 0,
      sequentialEstimate: 6,
      overheadPercent: 0,
      byTask: { critical: 6 },
      byPhase: { p1: 6 },
    }

    expect(formatRunReport(report, tokens)).toBe(
      [
        'Run run-1 (sample): aborted:critical',
        'Request: Explain',
        'Domains: (none)',
        '',
        'Phases:',
        '  p1: aborted',
        '',
        'Task     | Phase | Status  | Attempt',
        '---------+-------+---------+--------',
        'critical | p1    | failure | 1',
        '',
        'Warnings:',
        '  - Task "x" failed: boom',
        '',
        'Aborted in phase "p1" at task "critical": bad input',
        '',
        'Tokens: 6 (sequential estimate 6, overhead 0%)',
      ].join('\n'),
    )
  })

  it('lists conflicts with their decisions', () => {
    const report = makeReport({
      domains: ['auth', 'security'],
      conflicts: [
        {
          id: 'p1/g/field-disagreement:recommendation',
          phaseId: 'p1',
          groupId: 'g',
          rule: 'field-disagreement',
          field: 'recommendation',
          taskIds: ['a', 'b'],
          values: { a: 'x', b: 'y' },
          status: 'resolved',
          resolution: { decision: 'x', rationale: 'vote', arbiterTaskId: 'arbiter' },
        },
        {
          id: 'p1/g/field-disagreement:risk',
          phaseId: 'p1',
          groupId: 'g',
          rule: 'field-disagreement',
          field: 'risk',
          taskIds: ['a', 'b'],
          values: { a: 1, b: 2 },
          status: 'unresolved',
        },
      ],
    })

    const lines = formatRunReport(report).split('\n')

    expect(lines[2]).toBe('Domains: auth, security')
    expect(lines.slice(-3)).toEqual([
      'Conflicts:',
      '  p1/g/field-disagreement:recommendation: resolved -> x',
      '  p1/g/field-disagreement:risk: unresolved',
    ])
  })

  it('omits the task for a cancelled run and truncates long requests', () => {
    const report = makeReport({
      status: 'aborted:cancelled',
      request: 'r'.repeat(100),
      abort: { phaseId: 'p1', reason: 'run cancelled' },
    })

    const lines = formatRunReport(report).split('\n')

    expect(lines[1]).toBe(`Request: ${'r'.repeat(77)}...`)
    expect(lines[lines.length - 1]).toBe('Aborted in phase "p1": run cancelled')
  })
})

// ---------------------------------------------------------------------------
// Run store listings
// ---------------------------------------------------------------------------

describe('formatRunList', () => {
  it('prints a placeholder when there are no runs', () => {
    expect(formatRunList([])).toBe('No runs recorded.')
  })

  it('aligns columns and truncates requests', () => {
    const text = formatRunList([
      {
        id: 'run-1',
        graphName: null,
        status: 'completed',
        request: 'q'.repeat(50),
        domains: [],
        startedAt: TIMESTAMP,
        completedAt: TIMESTAMP,
      },
    ])

    expect(text.split('\n')[2]).toBe(`run-1 | -     | completed | ${TIMESTAMP} | ${'q'.repeat(37)}...`)
  })
})

describe('formatStoredRun', () => {
  it('leaves out the decisions section when there are none', () => {
    const text = formatStoredRun(
      {
        id: 'run-1',
        graphName: 'sample',
        status: 'completed',
        request: 'Explain',
        domains: [],
        startedAt: TIMESTAMP,
        completedAt: TIMESTAMP,
        report: {},
      },
      [],
    )

    expect(text.split('\n')).toEqual([
      'Run:       run-1',
      'Graph:     sample',
      'Status:    completed',
      `Started:   ${TIMESTAMP}`,
      `Completed: ${TIMESTAMP}`,
      'Domains:   (none)',
      'Request:   Explain',
    ])
  })
})
