/**
 * In-memory stand-in for the parts of the chrome.* API the extension uses.
 * setup.ts installs a fresh one before every test; tests reach it through
 * getChromeStub() to script responses.
 */

import { vi } from 'vitest'

export type RuntimeListener = (
  message: unknown,
  sender: chrome.runtime.MessageSender,
  sendResponse: (response?: unknown) => void
) => boolean | undefined | void

type Callback = (response: unknown) => void

export function createChromeStub() {
  const memory = new Map<string, unknown>()
  const messageListeners = new Set<RuntimeListener>()
  const installedListeners = new Set<() => void>()
  let lastError: { message?: string } | undefined

  const runtime = {
    id: 'test-extension-id',
    get lastError() {
      return lastError
    },
    sendMessage: vi.fn((_message: unknown, callback?: Callback): Promise<unknown> | undefined => {
      if (callback) {
        callback(undefined)
        return undefined
      }
      return Promise.resolve(undefined)
    }),
    onMessage: {
      addListener: vi.fn((listener: RuntimeListener) => {
        messageListeners.add(listener)
      }),
      removeListener: vi.fn((listener: RuntimeListener) => {
        messageListeners.delete(listener)
      }),
    },
    onInstalled: {
      addListener: vi.fn((listener: () => void) => {
        installedListeners.add(listener)
      }),
    },
  }

  const tabs = {
    query: vi.fn(async (_query: chrome.tabs.QueryInfo) => [{ id: 1, active: true }]),
    sendMessage: vi.fn((_tabId: number, _message: unknown, callback?: Callback) => {
      callback?.(undefined)
    }),
  }

  function pick(keys?: string | string[] | Record<string, unknown> | null): Record<string, unknown> {
    const result: Record<string, unknown> = {}
    if (keys == null) {
      memory.forEach((v, k) => {
        result[k] = v
      })
    } else if (typeof keys === 'string') {
      if (memory.has(keys)) result[keys] = memory.get(keys)
    } else if (Array.isArray(keys)) {
      for (const k of keys) {
        if (memory.has(k)) result[k] = memory.get(k)
      }
    } else {
      for (const [k, fallback] of Object.entries(keys)) {
        result[k] = memory.has(k) ? memory.get(k) : fallback
      }
    }
    return result
  }

  const storage = {
    local: {
      get: vi.fn(async (keys?: string | string[] | Record<string, unknown> | null) => pick(keys)),
      set: vi.fn(async (items: Record<string, unknown>) => {
        for (const [k, v] of Object.entries(items)) memory.set(k, v)
      }),
      remove: vi.fn(async (keys: string | string[]) => {
        for (const k of Array.isArray(keys) ? keys : [keys]) memory.delete(k)
      }),
      clear: vi.fn(async () => {
        memory.clear()
      }),
    },
  }

  return {
    runtime,
    tabs,
    storage,
    /** Raw storage contents, bypassing the mocks */
    memory,
    messageListeners,
    installedListeners,
    setLastError(error: { message?: string } | undefined) {
      lastError = error
    },
    /** Make chrome.runtime.sendMessage answer every callback-style request with response */
    answerRuntimeWith(response: unknown) {
      runtime.sendMessage.mockImplementation((_message: unknown, callback?: Callback) => {
        if (callback) {
          callback(response)
          return undefined
        }
        return Promise.resolve(response)
      })
    },
    /** Make chrome.tabs.sendMessage answer with response */
    answerTabWith(response: unknown) {
      tabs.sendMessage.mockImplementation((_tabId: number, _message: unknown, callback?: Callback) => {
        callback?.(response)
      })
    },
  }
}

export type ChromeStub = ReturnType<typeof createChromeStub>

let current: ChromeStub = createChromeStub()

export function installChromeStub(): ChromeStub {
  current = createChromeStub()
  vi.stubGlobal('chrome', current)
  return current
}

export function getChromeStub(): ChromeStub {
  return current
}
