/**
 * Unit tests for ConflictResolverImpl
 */

import { describe, it, expect, vi } from 'vitest'
import type { TaskPayload, TaskResult } from '../../../core/types.js'
import { openDatabase } from '../../../persistence/database.js'
import { getDecisionsForRun } from '../../../persistence/queries/decisions.js'
import type { Task, TaskContext } from '../../phase-graph/types.js'
import { ConflictResolverImpl } from '../conflict-resolver-impl.js'
import type { ResolveContext } from '../conflict-resolver.js'
import type { Conflict } from '../types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const CONFLICT_ID = 'analysis/g/field-disagreement:recommendation'

function conflict(): Conflict {
  return {
    id: CONFLICT_ID,
    phaseId: 'analysis',
    groupId: 'g',
    rule: 'field-disagreement',
    field: 'recommendation',
    taskIds: ['a', 'b'],
    values: { a: 'X', b: 'Y' },
    status: 'unresolved',
  }
}

function result(taskId: string, recommendation: string): TaskResult {
  return {
    taskId,
    phaseId: 'analysis',
    resultType: taskId,
    status: 'success',
    payload: { recommendation },
    attempt: 1,
    durationMs: 1,
    timestamp: '2026-01-01T00:00:00.000Z',
  }
}

function context(): ResolveContext {
  return {
    runId: 'run-1',
    request: 'document the auth flow',
    domains: new Set<string>(),
    results: new Map([
      ['a', result('a', 'X')],
      ['b', result('b', 'Y')],
    ]),
  }
}

function arbiterReturning(output: unknown) {
  // malformed outputs are part of what these tests feed the resolver
  const run = vi.fn((_ctx: TaskContext): Promise<TaskPayload> => Promise.resolve(output as TaskPayload))
  return { run }
}

// ---------------------------------------------------------------------------
// resolve
// ---------------------------------------------------------------------------

describe('ConflictResolverImpl.resolve', () => {
  it('records the arbiter decision and rationale', async () => {
    const arbiter = arbiterReturning({ decision: 'X', rationale: 'stronger evidence' })
    const resolver = new ConflictResolverImpl({ arbiter })

    const [resolved] = await resolver.resolve([conflict()], context())

    expect(resolved?.status).toBe('resolved')
    expect(resolved?.resolution).toEqual({
      decision: 'X',
      rationale: 'stronger evidence',
      arbiterTaskId: 'arbiter',
    })
  })

  it('hands the arbiter the conflict and the conflicting payloads', async () => {
    const arbiter = arbiterReturning({ decision: 'X', rationale: 'r' })
    const resolver = new ConflictResolverImpl({ arbiter, arbiterTaskId: 'judge' })

    await resolver.resolve([conflict()], context())

    expect(arbiter.run).toHaveBeenCalledTimes(1)
    const ctx = arbiter.run.mock.calls[0]?.[0]
    expect(ctx?.taskId).toBe('judge')
    expect(ctx?.phaseId).toBe('analysis')
    expect(ctx?.attempt).toBe(1)
    expect(ctx?.input).toEqual({
      conflict: conflict(),
      payloads: { a: { recommendation: 'X' }, b: { recommendation: 'Y' } },
    })
  })

  it('leaves the conflict unresolved when the arbiter throws', async () => {
    const arbiter: Task = { run: () => Promise.reject(new Error('no quorum')) }
    const resolver = new ConflictResolverImpl({ arbiter })

    const [resolved] = await resolver.resolve([conflict()], context())

    expect(resolved?.status).toBe('unresolved')
    expect(resolved?.resolution).toBeUndefined()
    expect(resolved?.error).toBe(`Conflict "${CONFLICT_ID}" unresolved: no quorum`)
  })

  it('clears the arbiter timeout when the arbiter throws synchronously', async () => {
    vi.useFakeTimers()
    try {
      const arbiter: Task = {
        run: () => {
          throw new Error('boom')
        },
      }
      const resolver = new ConflictResolverImpl({ arbiter })

      const [resolved] = await resolver.resolve([conflict()], context())

      expect(resolved?.error).toBe(`Conflict "${CONFLICT_ID}" unresolved: boom`)
      expect(vi.getTimerCount()).toBe(0)
    } finally {
      vi.useRealTimers()
    }
  })

  it('leaves the conflict unresolved when the arbiter output is malformed', async () => {
    const resolver = new ConflictResolverImpl({ arbiter: arbiterReturning({ rationale: 'r' }) })

    const [resolved] = await resolver.resolve([conflict()], context())

    expect(resolved?.status).toBe('unresolved')
    expect(resolved?.error).toBe(
      `Conflict "${CONFLICT_ID}" unresolved: arbiter returned malformed output (decision: Required)`,
    )
  })

  it('leaves the conflict unresolved when the arbiter times out', async () => {
    const arbiter: Task = { run: () => new Promise(() => undefined) }
    const resolver = new ConflictResolverImpl({ arbiter, timeoutMs: 10 })

    const [resolved] = await resolver.resolve([conflict()], context())

    expect(resolved?.error).toBe(`Conflict "${CONFLICT_ID}" unresolved: Task "arbiter" timed out after 10ms`)
  })

  it('notes that no arbiter is configured', async () => {
    const resolver = new ConflictResolverImpl()
    const [resolved] = await resolver.resolve([conflict()], context())
    expect(resolved).toEqual({ ...conflict(), note: 'no arbitration task configured' })
  })

  it('passes already resolved conflicts through without arbitration', async () => {
    const arbiter = arbiterReturning({ decision: 'Y', rationale: 'r' })
    const resolver = new ConflictResolverImpl({ arbiter })
    const done: Conflict = {
      ...conflict(),
      status: 'resolved',
      resolution: { decision: 'X', rationale: 'earlier', arbiterTaskId: 'arbiter' },
    }

    const out = await resolver.resolve([done], context())

    expect(out).toEqual([done])
    expect(arbiter.run).not.toHaveBeenCalled()
  })

  it('stores each resolution as a decision when a database is given', async () => {
    const wrapper = openDatabase(':memory:')
    try {
      const resolver = new ConflictResolverImpl({
        arbiter: arbiterReturning({ decision: 'X', rationale: 'stronger evidence' }),
        db: wrapper.db,
      })
      await resolver.resolve([conflict()], context())

      const decisions = getDecisionsForRun(wrapper.db, 'run-1')
      expect(decisions).toHaveLength(1)
      expect(decisions[0]).toMatchObject({
        phase: 'analysis',
        category: 'conflict-resolution',
        key: CONFLICT_ID,
        value: 'X',
        rationale: 'stronger evidence',
      })
    } finally {
      wrapper.close()
    }
  })
})
