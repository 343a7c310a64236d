/**
 * Unit tests for buildPhaseGraph
 *
 * Tests:
 *  - valid graphs build and are immutable
 *  - every structural violation is reported, all at once
 */

import { describe, it, expect } from 'vitest'
import { GraphDefinitionError } from '../../../core/errors.js'
import { buildPhaseGraph } from '../graph-builder.js'
import type { PhaseDefinition, Task, TaskSpecInput } from '../types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const noop: Task = { run: () => Promise.resolve({}) }

function task(id: string, extra: Partial<TaskSpecInput> = {}): TaskSpecInput {
  return { id, task: noop, ...extra }
}

function violationsOf(definitions: PhaseDefinition[]): readonly string[] {
  try {
    buildPhaseGraph(definitions)
  } catch (err) {
    if (err instanceof GraphDefinitionError) return err.violations
    throw err
  }
  throw new Error('expected buildPhaseGraph to throw')
}

// ---------------------------------------------------------------------------
// Valid graphs
// ---------------------------------------------------------------------------

describe('buildPhaseGraph - valid graphs', () => {
  it('builds a graph with defaults applied', () => {
    const graph = buildPhaseGraph([
      { id: 'p1', tasks: [task('a')] },
      { id: 'p2', tasks: [task('b', { critical: true, resultType: 'analysis' })] },
    ])

    expect(graph.phases.map((p) => p.id)).toEqual(['p1', 'p2'])
    expect(graph.getPhase('p2')?.predecessors).toEqual(['p1'])
    expect(graph.getPhase('p1')?.predecessors).toEqual([])
    expect(graph.getTask('a')).toMatchObject({
      activation: { kind: 'always' },
      critical: false,
      resultType: 'a',
    })
    expect(graph.getTask('b')?.resultType).toBe('analysis')
    expect(graph.getPhaseOf('b')?.id).toBe('p2')
    expect(graph.taskIds()).toEqual(['a', 'b'])
  })

  it('honours explicit predecessor lists', () => {
    const graph = buildPhaseGraph([
      { id: 'p1', tasks: [task('a')] },
      { id: 'p2', after: [], tasks: [task('b')] },
      { id: 'p3', after: ['p1', 'p2'], tasks: [task('c')] },
    ])
    expect(graph.getPhase('p2')?.predecessors).toEqual([])
    expect(graph.getPhase('p3')?.predecessors).toEqual(['p1', 'p2'])
  })

  it('freezes phases, specs and groups', () => {
    const graph = buildPhaseGraph([
      { id: 'p1', tasks: [task('a'), task('b')], groups: [{ id: 'g', tasks: ['a', 'b'] }] },
    ])
    const phase = graph.phases[0]
    expect(Object.isFrozen(graph.phases)).toBe(true)
    expect(Object.isFrozen(phase)).toBe(true)
    expect(Object.isFrozen(phase?.tasks[0])).toBe(true)
    expect(Object.isFrozen(phase?.groups[0]?.taskIds)).toBe(true)
  })

  it('does not freeze caller-owned task objects or keep caller arrays', () => {
    const owned: Task = { run: () => Promise.resolve({}) }
    const groupTasks = ['a']
    const graph = buildPhaseGraph([
      { id: 'p1', tasks: [task('a', { task: owned })], groups: [{ id: 'g', tasks: groupTasks }] },
    ])
    groupTasks.push('b')
    expect(Object.isFrozen(owned)).toBe(false)
    expect(graph.getPhase('p1')?.groups[0]?.taskIds).toEqual(['a'])
  })
})

// ---------------------------------------------------------------------------
// Violations
// ---------------------------------------------------------------------------

describe('buildPhaseGraph - violations', () => {
  it('rejects an empty graph', () => {
    expect(violationsOf([])).toEqual(['Phase graph declares no phases'])
  })

  it('rejects unknown, self and forward predecessor references', () => {
    expect(
      violationsOf([
        { id: 'p1', after: ['p2'], tasks: [task('a')] },
        { id: 'p2', after: ['p2', 'ghost'], tasks: [task('b')] },
      ])
    ).toEqual([
      'Phase "p1" references predecessor "p2" declared after it',
      'Phase "p2" lists itself as a predecessor',
      'Phase "p2" references unknown predecessor "ghost"',
      'Circular phase dependency detected: p2 -> p2',
    ])
  })

  it('reports a predecessor cycle', () => {
    const violations = violationsOf([
      { id: 'p1', after: ['p2'], tasks: [task('a')] },
      { id: 'p2', after: ['p1'], tasks: [task('b')] },
    ])
    expect(violations).toContain('Circular phase dependency detected: p1 -> p2 -> p1')
  })

  it('rejects duplicate phase and task ids', () => {
    expect(
      violationsOf([
        { id: 'p1', tasks: [task('a'), task('a')] },
        { id: 'p1', after: [], tasks: [task('b')] },
        { id: 'p3', tasks: [task('b')] },
      ])
    ).toEqual([
      'Duplicate phase id "p1"',
      'Duplicate task id "a" in phase "p1"',
      'Duplicate task id "b" in phases "p1" and "p3"',
    ])
  })

  it('rejects invalid group membership', () => {
    expect(
      violationsOf([
        {
          id: 'p1',
          tasks: [task('a'), task('b')],
          groups: [
            { id: 'g1', tasks: ['a', 'x'] },
            { id: 'g2', tasks: ['a', 'b', 'b'] },
            { id: 'g2', tasks: [] },
          ],
        },
      ])
    ).toEqual([
      'Group "g1" in phase "p1" references task "x" that is not in the phase',
      'Task "a" belongs to groups "g1" and "g2"',
      'Group "g2" lists task "b" more than once',
      'Duplicate group id "g2" in phase "p1"',
      'Group "g2" in phase "p1" has no members',
    ])
  })

  it('rejects empty phases, empty domain lists and bad timeouts', () => {
    expect(
      violationsOf([
        { id: 'p1', tasks: [] },
        {
          id: 'p2',
          tasks: [
            task('a', { activation: { kind: 'domains', anyOf: [] } }),
            task('b', { timeoutMs: 0 }),
            task('c', { timeoutMs: 2_592_000_000 }),
          ],
        },
      ])
    ).toEqual([
      'Phase "p1" declares no tasks',
      'Task "a" is activated by domains but lists none',
      'Task "b" has an invalid timeout of 0ms',
      'Task "c" has an invalid timeout of 2592000000ms',
    ])
  })

  it('includes every violation in the error message', () => {
    expect(() =>
      buildPhaseGraph([{ id: 'p1', after: ['nope'], tasks: [] }])
    ).toThrow(
      'Invalid phase graph (2 violation(s)):\n' +
        '  • Phase "p1" references unknown predecessor "nope"\n' +
        '  • Phase "p1" declares no tasks'
    )
  })
})
