/**
 * TypedEventBus — typed pub/sub for run lifecycle notifications.
 *
 * Built on top of Node.js EventEmitter.
 *
 *  - Dispatch is SYNCHRONOUS: handlers run before emit() returns.
 *  - Subscribers observe; they never influence scheduling.
 *  - EventBus depends on no module other than core types.
 */

import { EventEmitter } from 'node:events'
import type { EngineEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus keyed by the `EngineEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous — all registered handlers run before emit() returns.
   */
  emit<K extends keyof EngineEvents>(event: K, payload: EngineEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof EngineEvents>(
    event: K,
    handler: (payload: EngineEvents[K]) => void
  ): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof EngineEvents>(
    event: K,
    handler: (payload: EngineEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('phase:started', ({ runId, phaseId }) => {
 *   console.log(`${runId}: entering ${phaseId}`)
 * })
 * bus.emit('phase:started', { runId: 'run-1', phaseId: 'gap-analysis' })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof EngineEvents>(event: K, payload: EngineEvents[K]): void {
    this._emitter.emit(event as string, payload)
  }

  on<K extends keyof EngineEvents>(
    event: K,
    handler: (payload: EngineEvents[K]) => void
  ): void {
    // EventEmitter passes arguments as rest params; cast to satisfy TypeScript
    this._emitter.on(event as string, handler as (arg: unknown) => void)
  }

  off<K extends keyof EngineEvents>(
    event: K,
    handler: (payload: EngineEvents[K]) => void
  ): void {
    this._emitter.off(event as string, handler as (arg: unknown) => void)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 *
 * @example
 * const bus = createEventBus()
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
