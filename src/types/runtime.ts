/**
 * Chrome Runtime Message Type Definitions
 *
 * Strongly typed message passing between extension contexts.
 */

import type { ReductionProgress } from '../lib/reduction/types'

/**
 * Base runtime message
 */
export interface RuntimeMessage {
  type: string
  payload?: unknown
}

/**
 * Start reducing the page (popup → content)
 */
export interface ReducePageMessage extends RuntimeMessage {
  type: 'REDUCE_PAGE'
  payload: {
    reductionLevel: number
    customPrompt: string | null
  }
}

/**
 * Stop the running reduction at the next segment boundary (popup → content)
 */
export interface CancelReductionMessage extends RuntimeMessage {
  type: 'CANCEL_REDUCTION'
}

/**
 * Put the original text back (popup → content)
 */
export interface RestorePageMessage extends RuntimeMessage {
  type: 'RESTORE_PAGE'
}

/**
 * Query the page's reduction state (popup → content)
 */
export interface GetStatusMessage extends RuntimeMessage {
  type: 'GET_STATUS'
}

/**
 * Reduce one segment's text through the server (content → background)
 */
export interface ReduceTextMessage extends RuntimeMessage {
  type: 'REDUCE_TEXT'
  payload: {
    text: string
    reductionLevel: number
    customPrompt: string | null
  }
}

/**
 * Progress notification (content → extension pages, no answer expected)
 */
export interface ReduceProgressMessage extends RuntimeMessage {
  type: 'REDUCE_PROGRESS'
  payload: ReductionProgress
}
