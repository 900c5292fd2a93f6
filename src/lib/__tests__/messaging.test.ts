import { describe, it, expect, vi } from 'vitest'
import { z } from 'zod'
import {
  ChromeRuntimeError,
  MessageTimeoutError,
  notify,
  respondAsync,
  sendMessage,
  sendTabMessage,
} from '../core/messaging'
import { getChromeStub } from '../../test/chromeStub'

const DataSchema = z.object({ value: z.number() })

describe('sendMessage', () => {
  it('resolves with validated data', async () => {
    getChromeStub().answerRuntimeWith({ success: true, data: { value: 7 } })
    await expect(sendMessage({ type: 'PING' }, DataSchema)).resolves.toEqual({ value: 7 })
  })

  it('rejects with the error of a failed response', async () => {
    getChromeStub().answerRuntimeWith({ success: false, error: 'nope' })
    await expect(sendMessage({ type: 'PING' }, DataSchema)).rejects.toThrow('nope')
  })

  it('rejects data that does not match the schema', async () => {
    getChromeStub().answerRuntimeWith({ success: true, data: { value: 'seven' } })
    await expect(sendMessage({ type: 'PING' }, DataSchema)).rejects.toThrow(
      "Unexpected response shape for message 'PING'"
    )
  })

  it('rejects with ChromeRuntimeError when lastError is set', async () => {
    const stub = getChromeStub()
    stub.setLastError({ message: 'Could not establish connection' })
    stub.answerRuntimeWith(undefined)
    await expect(sendMessage({ type: 'PING' }, DataSchema)).rejects.toBeInstanceOf(ChromeRuntimeError)
  })

  it('times out when nobody answers', async () => {
    vi.useFakeTimers()
    try {
      getChromeStub().runtime.sendMessage.mockImplementation(() => undefined)
      const pending = sendMessage({ type: 'PING' }, DataSchema, 1000)
      const assertion = expect(pending).rejects.toBeInstanceOf(MessageTimeoutError)
      await vi.advanceTimersByTimeAsync(1000)
      await assertion
    } finally {
      vi.useRealTimers()
    }
  })
})

describe('sendTabMessage', () => {
  it('addresses the given tab', async () => {
    const stub = getChromeStub()
    stub.answerTabWith({ success: true, data: { value: 1 } })
    await expect(sendTabMessage(12, { type: 'GET_STATUS' }, DataSchema)).resolves.toEqual({ value: 1 })
    expect(stub.tabs.sendMessage).toHaveBeenCalledWith(12, { type: 'GET_STATUS' }, expect.any(Function))
  })
})

describe('notify', () => {
  it('ignores a missing receiver', async () => {
    const stub = getChromeStub()
    stub.runtime.sendMessage.mockImplementation(() =>
      Promise.reject(new Error('Could not establish connection. Receiving end does not exist.'))
    )
    const warn = vi.spyOn(console, 'warn')

    notify({ type: 'REDUCE_PROGRESS' })
    await Promise.resolve()
    await Promise.resolve()

    expect(stub.runtime.sendMessage).toHaveBeenCalledWith({ type: 'REDUCE_PROGRESS' })
    expect(warn).not.toHaveBeenCalled()
  })
})

describe('respondAsync', () => {
  it('answers with the task result and keeps the channel open', async () => {
    const sendResponse = vi.fn()
    expect(respondAsync(sendResponse, async () => 5)).toBe(true)
    await vi.waitFor(() => expect(sendResponse).toHaveBeenCalledWith({ success: true, data: 5 }))
  })

  it('answers with the error message when the task fails', async () => {
    const sendResponse = vi.fn()
    respondAsync(sendResponse, async () => {
      throw new Error('bad state')
    })
    await vi.waitFor(() => expect(sendResponse).toHaveBeenCalledWith({ success: false, error: 'bad state' }))
  })
})
