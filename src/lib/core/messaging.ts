/**
 * Chrome Runtime Messaging Utilities
 *
 * Request/response wrappers for chrome.runtime and chrome.tabs messaging
 * with timeout support, plus a fire-and-forget notifier for progress signals.
 */

import { z } from 'zod'
import { createLogger } from './debug'
import { getErrorMessage } from './errors'
import type { RuntimeMessage } from '../../types'

const log = createLogger('Messaging')

/** Default timeout for message operations (5 seconds) */
const DEFAULT_TIMEOUT_MS = 5000

/** Error thrown when a message times out */
export class MessageTimeoutError extends Error {
  constructor(type: string, timeoutMs: number) {
    super(`Message '${type}' timed out after ${timeoutMs}ms`)
    this.name = 'MessageTimeoutError'
  }
}

/** Error thrown when chrome.runtime.lastError is set */
export class ChromeRuntimeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ChromeRuntimeError'
  }
}

/** Standard message response shape */
export interface MessageResponse<T = unknown> {
  success: boolean
  data?: T
  error?: string
}

const MessageResponseSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
})

type Transport = (message: RuntimeMessage, callback: (response: unknown) => void) => void

function request<S extends z.ZodTypeAny>(
  transport: Transport,
  message: RuntimeMessage,
  schema: S,
  timeoutMs: number
): Promise<z.infer<S>> {
  return new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new MessageTimeoutError(message.type, timeoutMs))
    }, timeoutMs)

    try {
      transport(message, (raw) => {
        clearTimeout(timeoutId)

        if (chrome.runtime.lastError) {
          reject(new ChromeRuntimeError(chrome.runtime.lastError.message ?? 'Unknown runtime error'))
          return
        }

        const response = MessageResponseSchema.safeParse(raw)
        if (!response.success) {
          reject(new Error(`No valid response received for message '${message.type}'`))
          return
        }

        if (!response.data.success) {
          reject(new Error(response.data.error ?? `Message '${message.type}' failed`))
          return
        }

        const data = schema.safeParse(response.data.data)
        if (!data.success) {
          reject(new Error(`Unexpected response shape for message '${message.type}'`))
          return
        }

        resolve(data.data)
      })
    } catch (error) {
      clearTimeout(timeoutId)
      reject(error)
    }
  })
}

/**
 * Send a message to the extension's background context and validate the answer.
 *
 * @throws MessageTimeoutError if the message times out
 * @throws ChromeRuntimeError if chrome.runtime.lastError is set
 * @throws Error if the response indicates failure or does not match the schema
 */
export function sendMessage<S extends z.ZodTypeAny>(
  message: RuntimeMessage,
  schema: S,
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<z.infer<S>> {
  return request(
    (msg, callback) => chrome.runtime.sendMessage(msg, callback),
    message,
    schema,
    timeoutMs
  )
}

/**
 * Send a message to the content script of one tab and validate the answer.
 */
export function sendTabMessage<S extends z.ZodTypeAny>(
  tabId: number,
  message: RuntimeMessage,
  schema: S,
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<z.infer<S>> {
  return request(
    (msg, callback) => chrome.tabs.sendMessage(tabId, msg, callback),
    message,
    schema,
    timeoutMs
  )
}

/**
 * Fire-and-forget broadcast to extension pages. A missing receiver
 * (popup closed) is expected and not reported.
 */
export function notify(message: RuntimeMessage): void {
  try {
    chrome.runtime.sendMessage(message).catch((err: unknown) => {
      const errorMsg = getErrorMessage(err)
      if (!errorMsg.includes('Receiving end does not exist')) {
        log.warn(`Notification '${message.type}' failed:`, errorMsg)
      }
    })
  } catch (err) {
    // extension context invalidated (extension reloaded under a live page)
    log.warn(`Notification '${message.type}' not sent:`, getErrorMessage(err))
  }
}

/**
 * Run an async handler for an incoming message and answer with a MessageResponse.
 * Returns true so chrome keeps the channel open for the async answer.
 */
export function respondAsync<T>(
  sendResponse: (response: MessageResponse<T>) => void,
  task: () => Promise<T>
): true {
  task()
    .then((data) => sendResponse({ success: true, data }))
    .catch((err: unknown) => sendResponse({ success: false, error: getErrorMessage(err) }))
  return true
}

/**
 * Check if the extension context is still valid.
 * Useful before sending messages to avoid errors.
 */
export function isExtensionContextValid(): boolean {
  try {
    return typeof chrome !== 'undefined' && !!chrome.runtime?.id
  } catch {
    return false
  }
}
