/**
 * TypedEventBus: typed internal pub/sub for plan lifecycle notifications.
 *
 * Built on top of Node.js EventEmitter.
 *
 * Key constraints:
 *  - Event dispatch is SYNCHRONOUS: handlers run immediately when emit() is called.
 *  - A throwing subscriber propagates to the emitter; subscribers must not throw.
 *  - The bus depends on no module.
 */

import { EventEmitter } from 'node:events'
import type { PlanEvents } from './event-bus.types.js'

/** Event names of the plan event bus */
export type PlanEventName = keyof PlanEvents & string

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `PlanEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous: all registered handlers run before emit() returns.
   */
  emit<K extends PlanEventName>(event: K, payload: PlanEvents[K]): void

  /** Subscribe to an event. The handler is called synchronously on each emit. */
  on<K extends PlanEventName>(event: K, handler: (payload: PlanEvents[K]) => void): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends PlanEventName>(event: K, handler: (payload: PlanEvents[K]) => void): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('plan:phase-changed', ({ planId, to }) => {
 *   console.log(`${planId} entered ${to}`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    // One subscriber per CLI view or test probe; raise the default ceiling of 10
    this._emitter.setMaxListeners(100)
  }

  emit<K extends PlanEventName>(event: K, payload: PlanEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends PlanEventName>(event: K, handler: (payload: PlanEvents[K]) => void): void {
    this._emitter.on(event, handler)
  }

  off<K extends PlanEventName>(event: K, handler: (payload: PlanEvents[K]) => void): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/** Create a new TypedEventBus instance. */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
