/**
 * Content-script message router for the popup's page controls.
 */

import { createLogger } from '../lib/core/debug'
import { getErrorMessage } from '../lib/core/errors'
import { respondAsync, type MessageResponse } from '../lib/core/messaging'
import { ContentMessageSchema } from '../lib/reduction/schemas'
import type { PageReducer } from './reducer'

const log = createLogger('ContentMessages')

const CONTENT_MESSAGE_TYPES = new Set(['REDUCE_PAGE', 'CANCEL_REDUCTION', 'RESTORE_PAGE', 'GET_STATUS'])

type Reply = (response: MessageResponse) => void

function isContentMessageType(message: unknown): boolean {
  return !!message
    && typeof message === 'object'
    && 'type' in message
    && typeof message.type === 'string'
    && CONTENT_MESSAGE_TYPES.has(message.type)
}

/** Answer synchronously; InvalidStateError and friends become a failed response */
function respondNow<T>(sendResponse: Reply, task: () => T): false {
  try {
    sendResponse({ success: true, data: task() })
  } catch (err) {
    sendResponse({ success: false, error: getErrorMessage(err) })
  }
  return false
}

/**
 * Returns a chrome.runtime.onMessage listener. Messages of other types are
 * left for other listeners (undefined return, no answer).
 */
export function createContentMessageHandler(reducer: PageReducer) {
  return (message: unknown, _sender: chrome.runtime.MessageSender, sendResponse: Reply): boolean | undefined => {
    if (!isContentMessageType(message)) return undefined

    const parsed = ContentMessageSchema.safeParse(message)
    if (!parsed.success) {
      log.warn('Invalid message payload:', parsed.error.issues)
      sendResponse({ success: false, error: 'Invalid message payload' })
      return false
    }

    const msg = parsed.data
    switch (msg.type) {
      case 'REDUCE_PAGE':
        log.log(`Reduce requested at ${msg.payload.reductionLevel}%`)
        return respondAsync(sendResponse, () =>
          reducer.start(msg.payload.reductionLevel, msg.payload.customPrompt)
        )
      case 'CANCEL_REDUCTION':
        return respondNow(sendResponse, () => reducer.cancel())
      case 'RESTORE_PAGE':
        return respondNow(sendResponse, () => reducer.restore())
      case 'GET_STATUS':
        return respondNow(sendResponse, () => reducer.getStatus())
    }
  }
}
