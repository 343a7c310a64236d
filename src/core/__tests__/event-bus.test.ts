/**
 * Unit tests for TypedEventBus.
 *
 * Covers:
 *  - Emit/subscribe with the typed payload
 *  - Unsubscribe removes the handler
 *  - Multiple handlers for the same event all run, in registration order
 *  - Dispatch is synchronous
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { TypedEventBusImpl, createEventBus } from '../event-bus.js'
import type { TypedEventBus } from '../event-bus.js'
import type { EngineEvents } from '../event-bus.types.js'

function makeHandler<K extends keyof EngineEvents>(_event: K) {
  return vi.fn((_payload: EngineEvents[K]) => undefined)
}

describe('TypedEventBusImpl', () => {
  let bus: TypedEventBus

  beforeEach(() => {
    bus = new TypedEventBusImpl()
  })

  it('invokes the handler with the exact payload emitted', () => {
    const handler = makeHandler('phase:started')
    bus.on('phase:started', handler)

    const payload: EngineEvents['phase:started'] = { runId: 'run-1', phaseId: 'gather' }
    bus.emit('phase:started', payload)

    expect(handler).toHaveBeenCalledOnce()
    expect(handler).toHaveBeenCalledWith(payload)
  })

  it('does not invoke the handler for a different event', () => {
    const handler = makeHandler('phase:started')
    bus.on('phase:started', handler)

    bus.emit('run:completed', { runId: 'run-1', status: 'completed', durationMs: 5 })

    expect(handler).not.toHaveBeenCalled()
  })

  it('runs every handler in registration order', () => {
    const order: string[] = []
    bus.on('conflict:resolved', () => order.push('first'))
    bus.on('conflict:resolved', () => order.push('second'))

    bus.emit('conflict:resolved', { runId: 'run-1', conflictId: 'c', status: 'resolved' })

    expect(order).toEqual(['first', 'second'])
  })

  it('stops delivering after off()', () => {
    const handler = makeHandler('group:retry')
    bus.on('group:retry', handler)
    bus.off('group:retry', handler)

    bus.emit('group:retry', { runId: 'run-1', phaseId: 'p', groupId: 'g', attempt: 2, failedTaskIds: ['a'] })

    expect(handler).not.toHaveBeenCalled()
  })

  it('ignores off() for a handler that was never registered', () => {
    expect(() => bus.off('run:aborted', makeHandler('run:aborted'))).not.toThrow()
  })

  it('dispatches synchronously', () => {
    let seen = false
    bus.on('run:started', () => {
      seen = true
    })
    bus.emit('run:started', { runId: 'run-1', request: 'r', domains: [], phaseCount: 1 })
    expect(seen).toBe(true)
  })
})

describe('createEventBus', () => {
  it('returns a TypedEventBusImpl', () => {
    expect(createEventBus()).toBeInstanceOf(TypedEventBusImpl)
  })
})
