/**
 * Unit tests for step-runner helpers
 */

import { describe, it, expect } from 'vitest'
import { TaskCancelledError, TaskExecutionError, TaskTimeoutError } from '../../../core/errors.js'
import { runWithConcurrency, toErrorInfo } from '../step-runner.js'
import { buildRunReport, runStatusOf } from '../report-builder.js'

describe('runWithConcurrency', () => {
  it('processes every item with bounded parallelism', async () => {
    const started: number[] = []
    let active = 0
    let peak = 0
    await runWithConcurrency([1, 2, 3, 4], 3, async (n) => {
      started.push(n)
      active++
      peak = Math.max(peak, active)
      await new Promise((resolve) => setTimeout(resolve, 2))
      active--
    })
    expect(started).toEqual([1, 2, 3, 4])
    expect(peak).toBe(3)
  })

  it('resolves immediately for an empty list', async () => {
    await expect(runWithConcurrency([], 2, () => Promise.resolve())).resolves.toBeUndefined()
  })
})

describe('toErrorInfo', () => {
  it('keeps the transient flag of task execution errors', () => {
    expect(toErrorInfo(new TaskTimeoutError('t', 50))).toEqual({
      name: 'TaskTimeoutError',
      code: 'TASK_TIMEOUT',
      message: 'Task "t" timed out after 50ms',
      transient: true,
    })
    expect(toErrorInfo(new TaskExecutionError('retry me', { transient: true, code: 'UPSTREAM_BUSY' }))).toMatchObject({
      code: 'UPSTREAM_BUSY',
      transient: true,
    })
  })

  it('treats other errors as permanent', () => {
    expect(toErrorInfo(new TaskCancelledError('t', 'run cancelled'))).toEqual({
      name: 'TaskCancelledError',
      code: 'TASK_CANCELLED',
      message: 'Task "t" cancelled: run cancelled',
      transient: false,
    })
    expect(toErrorInfo('plain string')).toEqual({
      name: 'Error',
      code: 'TASK_FAILED',
      message: 'plain string',
      transient: false,
    })
  })

  it('masks credentials in messages', () => {
    expect(toErrorInfo(new Error('request failed: Bearer test-secret-value')).message).toBe('request failed: ***')
  })
})

describe('buildRunReport', () => {
  it('derives the status from the abort cause', () => {
    expect(runStatusOf(undefined)).toBe('completed')
    expect(runStatusOf({ phaseId: 'p', taskId: 't', reason: 'r' })).toBe('aborted:t')
    expect(runStatusOf({ phaseId: 'p', reason: 'run cancelled' })).toBe('aborted:cancelled')
  })

  it('orders results by task id', () => {
    const result = (taskId: string) => ({
      taskId,
      phaseId: 'p',
      resultType: taskId,
      status: 'success' as const,
      payload: {},
      attempt: 1,
      durationMs: 0,
      timestamp: '2026-01-01T00:00:00.000Z',
    })
    const report = buildRunReport({
      runId: 'run-1',
      request: 'r',
      domains: [],
      startedAt: '2026-01-01T00:00:00.000Z',
      completedAt: '2026-01-01T00:00:00.000Z',
      phases: [],
      results: new Map([
        ['zeta', result('zeta')],
        ['alpha', result('alpha')],
      ]),
      conflicts: [],
      validations: [],
      warnings: [],
    })
    expect(Object.keys(report.results)).toEqual(['alpha', 'zeta'])
    expect(report.status).toBe('completed')
    expect(report).not.toHaveProperty('abort')
  })
})
