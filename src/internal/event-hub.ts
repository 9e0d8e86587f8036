/**
 * Typed event registry shared by the scheduler and the engine facade.
 * A throwing handler is logged and does not stop the others.
 */

import type { Logger } from '../logger'

export type Handler<T> = (payload: T) => void

type HandlerSets<E> = { [K in keyof E]?: Set<Handler<E[K]>> }

export type EventHub<E> = {
  on<K extends keyof E>(event: K, handler: Handler<E[K]>): () => void
  /** Returns false when at least one handler threw */
  emit<K extends keyof E>(event: K, payload: E[K]): boolean
}

export function createEventHub<E>(logger: Logger): EventHub<E> {
  const handlers: HandlerSets<E> = {}

  function on<K extends keyof E>(event: K, handler: Handler<E[K]>): () => void {
    let set: Set<Handler<E[K]>> | undefined = handlers[event]
    if (!set) {
      set = new Set<Handler<E[K]>>()
      handlers[event] = set
    }
    set.add(handler)
    const registered = set
    return () => {
      registered.delete(handler)
    }
  }

  function emit<K extends keyof E>(event: K, payload: E[K]): boolean {
    const set = handlers[event]
    if (!set) return true
    let ok = true
    for (const handler of [...set]) {
      try {
        handler(payload)
      } catch (err) {
        ok = false
        logger.error(`Event handler error on '${String(event)}':`, err)
      }
    }
    return ok
  }

  return { on, emit }
}
