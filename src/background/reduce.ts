/**
 * Reduce Text Module
 *
 * Forwards one segment's text to the reduction server. The content script
 * cannot reach the server itself, so every request is made from here with the
 * server URL read from the persisted settings store.
 */

import { createLogger } from '../lib/core/debug'
import { safeJsonExtract } from '../lib/core/safeJson'
import { STORAGE_KEYS } from '../lib/config/constants'
import { createHttpReductionClient, normalizeServerUrl } from '../lib/reduction/client'
import type { ReductionClient } from '../lib/reduction/types'

const log = createLogger('Reduce')

export interface ReduceTextPayload {
  text: string
  reductionLevel: number
  customPrompt: string | null
}

/**
 * Server URL from the persisted settings (zustand persist wraps it in 'state').
 * Missing or corrupt settings fall back to the default server.
 */
export async function getServerUrl(): Promise<string> {
  const data = await chrome.storage.local.get(STORAGE_KEYS.SETTINGS)
  const stored = safeJsonExtract(data[STORAGE_KEYS.SETTINGS], 'state.serverUrl')
  return normalizeServerUrl(typeof stored === 'string' ? stored : null)
}

/**
 * @throws ServiceError when the server cannot produce a reduction
 */
export async function handleReduceText(
  payload: ReduceTextPayload,
  createClient: (serverUrl: string) => ReductionClient = (serverUrl) =>
    createHttpReductionClient({ serverUrl })
): Promise<{ reducedText: string }> {
  const serverUrl = await getServerUrl()
  log.log(`Reducing ${payload.text.length} chars at ${payload.reductionLevel}% via ${serverUrl}`)

  const reducedText = await createClient(serverUrl).reduce(
    payload.text,
    payload.reductionLevel,
    payload.customPrompt
  )
  return { reducedText }
}
