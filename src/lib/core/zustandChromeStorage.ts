import type { StateStorage } from 'zustand/middleware'
import { DEBOUNCE } from '../config/constants'
import { createLogger } from './debug'

const log = createLogger('ChromeStorage')

const timers = new Map<string, ReturnType<typeof setTimeout>>()
const pending = new Map<string, string>()

async function flush(key: string) {
  const value = pending.get(key)
  if (value === undefined) return
  pending.delete(key)

  await chrome.storage.local.set({ [key]: value })
}

export const debouncedChromeStorage: StateStorage = {
  getItem: async (key) => {
    const res = await chrome.storage.local.get([key])
    const v: unknown = res[key]
    return typeof v === 'string' ? v : v == null ? null : JSON.stringify(v)
  },
  setItem: async (key, value) => {
    pending.set(key, value)
    const prev = timers.get(key)
    if (prev) clearTimeout(prev)
    const t = setTimeout(() => {
      timers.delete(key)
      flush(key).catch((err: unknown) => log.error(`Failed to persist '${key}':`, err))
    }, DEBOUNCE.CHROME_STORAGE_MS)
    timers.set(key, t)
  },
  removeItem: async (key) => {
    const prev = timers.get(key)
    if (prev) clearTimeout(prev)
    timers.delete(key)
    pending.delete(key)
    await chrome.storage.local.remove(key)
  },
}
