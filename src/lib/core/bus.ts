import { createNanoEvents } from 'nanoevents'
import { ReductionProgressSchema } from '../reduction/schemas'
import type { ReductionProgress } from '../reduction/types'

type EventMap = {
  progress: (progress: ReductionProgress) => void
}

const nano = createNanoEvents<EventMap>()

export const bus = {
  /**
   * Subscribe to an event
   * @returns Unsubscribe function, call it on unmount
   */
  on<E extends keyof EventMap>(event: E, cb: EventMap[E]) {
    return nano.on(event, cb)
  },

  emit<E extends keyof EventMap>(event: E, ...args: Parameters<EventMap[E]>) {
    nano.emit(event, ...args)
  },
}

/**
 * Runtime listener that turns REDUCE_PROGRESS broadcasts into typed bus events.
 * Never answers, so other listeners keep their response channel.
 */
export function handleRuntimeMessage(msg: unknown): void {
  if (!msg || typeof msg !== 'object' || !('type' in msg) || msg.type !== 'REDUCE_PROGRESS') return
  const payload = 'payload' in msg ? msg.payload : undefined
  const progress = ReductionProgressSchema.safeParse(payload)
  if (progress.success) {
    bus.emit('progress', progress.data)
  }
}

// Shim runtime messages into typed bus events
if (typeof chrome !== 'undefined' && chrome.runtime?.onMessage) {
  chrome.runtime.onMessage.addListener(handleRuntimeMessage)
}
