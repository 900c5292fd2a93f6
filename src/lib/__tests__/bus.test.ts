import { describe, it, expect, vi } from 'vitest'
import { bus, handleRuntimeMessage } from '../core/bus'

describe('handleRuntimeMessage', () => {
  it('emits validated progress broadcasts on the bus', () => {
    const listener = vi.fn()
    const unbind = bus.on('progress', listener)

    const payload = { current: 2, total: 5, failed: 1, message: 'Processing text blocks... (2/5)' }
    handleRuntimeMessage({ type: 'REDUCE_PROGRESS', payload })
    unbind()

    expect(listener).toHaveBeenCalledWith(payload)
  })

  it('ignores other messages and malformed progress', () => {
    const listener = vi.fn()
    const unbind = bus.on('progress', listener)

    handleRuntimeMessage({ type: 'GET_STATUS' })
    handleRuntimeMessage({ type: 'REDUCE_PROGRESS', payload: { current: 'two' } })
    handleRuntimeMessage(null)
    unbind()

    expect(listener).not.toHaveBeenCalled()
  })
})
