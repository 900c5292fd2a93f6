/**
 * Popup → active tab commands. Each resolves with the content script's
 * validated answer or throws with its error message.
 */

import { sendTabMessage } from '../lib/core/messaging'
import { TIMEOUTS } from '../lib/config/constants'
import { ReductionOutcomeSchema, ReductionStatusSchema } from '../lib/reduction/schemas'
import type { ReductionOutcome, ReductionStatus } from '../lib/reduction/types'
import type {
  CancelReductionMessage,
  GetStatusMessage,
  ReducePageMessage,
  RestorePageMessage,
} from '../types'

export class NoActiveTabError extends Error {
  constructor() {
    super('No active tab found')
    this.name = 'NoActiveTabError'
  }
}

export async function getActiveTabId(): Promise<number> {
  const [tab] = await chrome.tabs.query({ active: true, currentWindow: true })
  if (tab?.id === undefined) throw new NoActiveTabError()
  return tab.id
}

export async function reducePage(reductionLevel: number, customPrompt: string | null): Promise<ReductionOutcome> {
  const message: ReducePageMessage = { type: 'REDUCE_PAGE', payload: { reductionLevel, customPrompt } }
  return sendTabMessage(await getActiveTabId(), message, ReductionOutcomeSchema, TIMEOUTS.PAGE_RUN_MS)
}

export async function cancelReduction(): Promise<ReductionStatus> {
  const message: CancelReductionMessage = { type: 'CANCEL_REDUCTION' }
  return sendTabMessage(await getActiveTabId(), message, ReductionStatusSchema, TIMEOUTS.MESSAGE_MS)
}

export async function restorePage(): Promise<ReductionStatus> {
  const message: RestorePageMessage = { type: 'RESTORE_PAGE' }
  return sendTabMessage(await getActiveTabId(), message, ReductionStatusSchema, TIMEOUTS.MESSAGE_MS)
}

export async function getPageStatus(): Promise<ReductionStatus> {
  const message: GetStatusMessage = { type: 'GET_STATUS' }
  return sendTabMessage(await getActiveTabId(), message, ReductionStatusSchema, TIMEOUTS.MESSAGE_MS)
}
