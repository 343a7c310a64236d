/**
 * Unit tests for execution planning
 */

import { describe, it, expect } from 'vitest'
import { buildPhaseGraph } from '../graph-builder.js'
import { isActivated, planGraph, planPhase, requiresValidation } from '../execution-plan.js'
import type { Task } from '../types.js'
import { UnavailableValidator } from '../../validation-gate/http-validator.js'

const noop: Task = { run: () => Promise.resolve({}) }

describe('planPhase', () => {
  it('places a group at the position of its first member', () => {
    const graph = buildPhaseGraph([
      {
        id: 'p1',
        tasks: [
          { id: 'intro', task: noop },
          { id: 'b', task: noop },
          { id: 'mid', task: noop },
          { id: 'a', task: noop },
          { id: 'outro', task: noop },
        ],
        groups: [{ id: 'g', tasks: ['a', 'b'] }],
      },
    ])
    const phase = graph.getPhase('p1')
    if (phase === undefined) throw new Error('phase missing')

    expect(planPhase(phase)).toEqual([
      { kind: 'sequential', id: 'intro', taskIds: ['intro'] },
      { kind: 'parallel', id: 'g', taskIds: ['b', 'a'] },
      { kind: 'sequential', id: 'mid', taskIds: ['mid'] },
      { kind: 'sequential', id: 'outro', taskIds: ['outro'] },
    ])
  })
})

describe('isActivated', () => {
  it('matches any listed domain tag', () => {
    const activation = { kind: 'domains', anyOf: ['auth', 'writing'] } as const
    expect(isActivated(activation, new Set(['writing']))).toBe(true)
    expect(isActivated(activation, new Set(['academic']))).toBe(false)
    expect(isActivated({ kind: 'always' }, new Set())).toBe(true)
  })
})

describe('planGraph', () => {
  it('splits each step into activated and skipped members', () => {
    const graph = buildPhaseGraph([
      {
        id: 'analysis',
        tasks: [
          { id: 'core', task: noop },
          { id: 'auth', task: noop, activation: { kind: 'domains', anyOf: ['auth'] } },
        ],
        groups: [{ id: 'g', tasks: ['core', 'auth'] }],
      },
    ])

    expect(planGraph(graph, new Set())).toEqual([
      {
        phaseId: 'analysis',
        predecessors: [],
        steps: [
          { kind: 'parallel', id: 'g', taskIds: ['core', 'auth'], activated: ['core'], skipped: ['auth'] },
        ],
      },
    ])
  })
})

describe('requiresValidation', () => {
  it('detects tasks with a validation requirement', () => {
    const plain = buildPhaseGraph([{ id: 'p', tasks: [{ id: 'a', task: noop }] }])
    const gated = buildPhaseGraph([
      {
        id: 'p',
        tasks: [{ id: 'a', task: noop, validation: { resourceId: 'r', validator: new UnavailableValidator() } }],
      },
    ])
    expect(requiresValidation(plain)).toBe(false)
    expect(requiresValidation(gated)).toBe(true)
  })
})
