/**
 * Background Service Worker (MV3)
 *
 * Owns all traffic to the reduction server. Content scripts send REDUCE_TEXT
 * here; popup and content talk to each other directly through chrome.tabs.
 */

import { z } from 'zod'
import { createLogger } from '../lib/core/debug'
import { respondAsync } from '../lib/core/messaging'
import { checkServerHealth } from '../lib/reduction/client'
import { ReduceTextPayloadSchema } from '../lib/reduction/schemas'
import { getServerUrl, handleReduceText } from './reduce'

const log = createLogger('Background')

/**
 * Validate message sender is from extension context
 *
 * - Checks sender is from our extension
 * - For content scripts, validates the origin
 * - Blocks messages from other extensions masquerading as ours
 */
export function isValidSender(sender: chrome.runtime.MessageSender): boolean {
  if (sender.id !== chrome.runtime.id) {
    return false
  }

  if (sender.tab && sender.url) {
    try {
      const url = new URL(sender.url)
      if (url.protocol === 'chrome-extension:' && url.hostname !== chrome.runtime.id) {
        log.warn('[Security] Blocked message from foreign extension context')
        return false
      }
    } catch {
      /** Invalid URL - block to be safe */
      return false
    }
  }

  return true
}

/**
 * Zod schemas for message payload validation
 */
const MessagePayloadSchemas = {
  REDUCE_TEXT: ReduceTextPayloadSchema,
}

/** Safe payload parser with logging */
function parsePayload<T extends keyof typeof MessagePayloadSchemas>(
  type: T,
  payload: unknown
): z.infer<typeof MessagePayloadSchemas[T]> | null {
  const schema = MessagePayloadSchemas[type]
  const result = schema.safeParse(payload)
  if (!result.success) {
    log.warn(`Invalid payload for ${type}:`, result.error.issues)
    return null
  }
  return result.data
}

const RoutedMessageSchema = z.object({
  type: z.string(),
  payload: z.unknown().optional(),
})

/**
 * Main background message router
 *
 * Handles:
 * - REDUCE_TEXT: Reduce one text segment through the server
 * Everything else (REDUCE_PROGRESS broadcasts included) is left unanswered.
 */
export function handleBackgroundMessage(
  message: unknown,
  sender: chrome.runtime.MessageSender,
  sendResponse: (response: { success: boolean; data?: unknown; error?: string }) => void
): boolean | undefined {
  const msg = RoutedMessageSchema.safeParse(message)
  if (!msg.success || msg.data.type !== 'REDUCE_TEXT') return undefined

  if (!isValidSender(sender)) {
    log.warn('Rejected message from untrusted sender:', msg.data.type)
    sendResponse({ success: false, error: 'Unauthorized sender' })
    return false
  }

  const payload = parsePayload('REDUCE_TEXT', msg.data.payload)
  if (!payload) {
    sendResponse({ success: false, error: 'Invalid REDUCE_TEXT payload' })
    return false
  }

  return respondAsync(sendResponse, () => handleReduceText(payload))
}

/**
 * Probe the configured server once and log the result
 */
export async function logServerHealth(): Promise<void> {
  const serverUrl = await getServerUrl()
  const health = await checkServerHealth(serverUrl)
  if (health.online) {
    log.log(`Reduction server ready at ${serverUrl}`, health.model ? `(model: ${health.model})` : '')
  } else {
    log.warn(`Reduction server not reachable at ${serverUrl}:`, health.error)
  }
}

if (typeof chrome !== 'undefined' && chrome.runtime?.onMessage) {
  /**
   * Initialize Chrome extension on install/update
   */
  chrome.runtime.onInstalled.addListener(() => {
    log.log('Distill installed/updated')
    logServerHealth().catch((err: unknown) => log.error('Health probe failed:', err))
  })

  chrome.runtime.onMessage.addListener(handleBackgroundMessage)
}
