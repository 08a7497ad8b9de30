/**
 * Typed progress events for generations and drafts.
 *
 * Dispatch is synchronous, so subscribers run inside the generation loop
 * that emitted the event. A subscriber that throws is logged and skipped;
 * it never fails the attempt that emitted.
 */

import { EventEmitter } from 'node:events'
import type { EngineEvents } from './event-bus.types.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('event-bus')

export type EngineEventName = keyof EngineEvents

export type EngineEventHandler<K extends EngineEventName> = (payload: EngineEvents[K]) => void

/** Removes the subscription it was returned for; calling it twice is harmless */
export type Unsubscribe = () => void

export interface TypedEventBus {
  emit<K extends EngineEventName>(event: K, payload: EngineEvents[K]): void

  on<K extends EngineEventName>(event: K, handler: EngineEventHandler<K>): Unsubscribe

  /** Number of live subscriptions for `event` */
  listenerCount(event: EngineEventName): number
}

/**
 * @example
 * const bus = createEventBus()
 * const stop = bus.on('generation:completed', ({ generationId, attemptCount }) => {
 *   process.stderr.write(`${generationId} finished after ${String(attemptCount)} attempt(s)\n`)
 * })
 * stop()
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter = new EventEmitter()

  constructor() {
    // One subscriber per waiting CLI command or test is normal; fan-out can add many
    this._emitter.setMaxListeners(0)
  }

  emit<K extends EngineEventName>(event: K, payload: EngineEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends EngineEventName>(event: K, handler: EngineEventHandler<K>): Unsubscribe {
    const listener = (payload: EngineEvents[K]): void => {
      try {
        handler(payload)
      } catch (err) {
        logger.error({ err, event }, 'Event subscriber threw')
      }
    }
    this._emitter.on(event, listener)
    return () => {
      this._emitter.off(event, listener)
    }
  }

  listenerCount(event: EngineEventName): number {
    return this._emitter.listenerCount(event)
  }
}

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
