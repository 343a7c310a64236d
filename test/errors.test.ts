/**
 * Error hierarchy: codes, names, context and serialization.
 */

import { describe, it, expect } from 'vitest'
import {
  WaymarkError,
  GraphDefinitionError,
  TaskExecutionError,
  TaskTimeoutError,
  TaskCancelledError,
  PhaseAbortedError,
  ValidationUnavailableError,
  ConflictUnresolvedError,
  ConfigError,
  ParseError,
  toError,
} from '../src/core/errors.js'

describe('WaymarkError', () => {
  it('carries code and context and serializes them', () => {
    const error = new WaymarkError('boom', 'BOOM', { runId: 'run-1' })
    expect(error).toBeInstanceOf(Error)
    expect(error.toJSON()).toMatchObject({
      name: 'WaymarkError',
      message: 'boom',
      code: 'BOOM',
      context: { runId: 'run-1' },
    })
  })
})

describe('GraphDefinitionError', () => {
  it('lists every violation in the message', () => {
    const error = new GraphDefinitionError(['Duplicate phase id "a"', 'Phase "b" has no tasks'])
    expect(error.code).toBe('GRAPH_DEFINITION_ERROR')
    expect(error.violations).toEqual(['Duplicate phase id "a"', 'Phase "b" has no tasks'])
    expect(error.message).toBe(
      'Invalid phase graph (2 violation(s)):\n  • Duplicate phase id "a"\n  • Phase "b" has no tasks',
    )
  })
})

describe('TaskExecutionError', () => {
  it('defaults to a permanent failure', () => {
    const error = new TaskExecutionError('bad input')
    expect(error.transient).toBe(false)
    expect(error.code).toBe('TASK_EXECUTION_ERROR')
    expect(error.context).toEqual({ transient: false })
  })

  it('keeps an explicit code and transient flag', () => {
    const error = new TaskExecutionError('upstream 503', { transient: true, code: 'UPSTREAM', context: { status: 503 } })
    expect(error.transient).toBe(true)
    expect(error.code).toBe('UPSTREAM')
    expect(error.context).toEqual({ status: 503, transient: true })
  })

  it('TaskTimeoutError is a transient TaskExecutionError', () => {
    const error = new TaskTimeoutError('slow', 250)
    expect(error).toBeInstanceOf(TaskExecutionError)
    expect(error.transient).toBe(true)
    expect(error.code).toBe('TASK_TIMEOUT')
    expect(error.message).toBe('Task "slow" timed out after 250ms')
  })
})

describe('run and arbitration errors', () => {
  it('TaskCancelledError names the task and reason', () => {
    expect(new TaskCancelledError('a', 'run cancelled').message).toBe('Task "a" cancelled: run cancelled')
  })

  it('PhaseAbortedError names the aborting task when there is one', () => {
    expect(new PhaseAbortedError('p1', 'critical', 'bad input').message).toBe(
      'Phase "p1" aborted by task "critical": bad input',
    )
    const cancelled = new PhaseAbortedError('p2', undefined, 'run cancelled')
    expect(cancelled.message).toBe('Phase "p2" aborted: run cancelled')
    expect(cancelled.code).toBe('PHASE_ABORTED')
  })

  it('ValidationUnavailableError exposes its reason', () => {
    const error = new ValidationUnavailableError('lib:oauth', 'HTTP 503')
    expect(error.reason).toBe('HTTP 503')
    expect(error.message).toBe('Validation unavailable for "lib:oauth": HTTP 503')
  })

  it('ConflictUnresolvedError names the conflict', () => {
    expect(new ConflictUnresolvedError('p/g/rule:field', 'tie').message).toBe('Conflict "p/g/rule:field" unresolved: tie')
  })
})

describe('ConfigError and ParseError', () => {
  it('use their own codes', () => {
    expect(new ConfigError('missing').code).toBe('CONFIG_ERROR')
    const parse = new ParseError('YAML parse error: x', { filePath: 'graph.yaml', format: 'yaml' })
    expect(parse.code).toBe('PARSE_ERROR')
    expect(parse.filePath).toBe('graph.yaml')
    expect(parse.context).toEqual({ filePath: 'graph.yaml', format: 'yaml' })
  })
})

describe('toError', () => {
  it('wraps non-Error values', () => {
    const original = new Error('x')
    expect(toError(original)).toBe(original)
    expect(toError('plain').message).toBe('plain')
  })
})
