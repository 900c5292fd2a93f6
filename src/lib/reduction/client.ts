/**
 * Reduction Clients
 *
 * Two implementations of the same request/response contract:
 * - HTTP: background worker → reduction server (POST /reduce)
 * - Runtime: content script → background worker (REDUCE_TEXT message)
 * Both resolve with the server's raw HTML and throw ServiceError otherwise.
 */

import { fetchJsonResult } from '../core/api'
import { createLogger } from '../core/debug'
import {
  ServiceError,
  ServiceUnavailableError,
  fromException,
  makeFailure,
} from '../core/errors'
import { sendMessage } from '../core/messaging'
import { SERVER, TIMEOUTS } from '../config/constants'
import { buildDefaultPrompt } from './prompts'
import { HealthResponseSchema, ReduceResponseSchema, ReduceTextResultSchema } from './schemas'
import type { HealthStatus, ReductionClient } from './types'
import type { ReduceTextMessage } from '../../types'

const log = createLogger('ReductionClient')

/**
 * Strip trailing slashes; blank input falls back to the default server.
 */
export function normalizeServerUrl(url: string | null | undefined): string {
  const trimmed = (url ?? '').trim().replace(/\/+$/, '')
  return trimmed || SERVER.DEFAULT_URL
}

export interface HttpReductionClientOptions {
  serverUrl: string
  timeoutMs?: number
}

export function createHttpReductionClient(options: HttpReductionClientOptions): ReductionClient {
  const endpoint = `${normalizeServerUrl(options.serverUrl)}${SERVER.REDUCE_PATH}`
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.REDUCE_REQUEST_MS

  return {
    async reduce(text, level, customInstruction) {
      const prompt = customInstruction || buildDefaultPrompt(level)
      const body = JSON.stringify({
        text,
        reduction_level: level,
        prompt,
      })

      const requestDone = log.time('Reduce request')
      const result = await fetchJsonResult(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
        timeoutMs,
      })
      requestDone()

      if (!result.ok) {
        log.error(`Reduction request failed (${result.error.category}):`, result.error.message)
        throw new ServiceError(result.error)
      }

      const parsed = ReduceResponseSchema.safeParse(result.value)
      if (!parsed.success) {
        throw new ServiceError(makeFailure({
          category: 'parse',
          message: 'Server response has no reduced_text',
          cause: parsed.error,
        }))
      }

      const { reduced_text, reduction_percentage } = parsed.data
      if (reduction_percentage !== undefined) {
        log.log(`Server reports ${reduction_percentage}% reduction`)
      }
      return reduced_text
    },
  }
}

/**
 * Content-script side: forwards each request to the background worker,
 * which owns the server URL and host permissions.
 */
export function createRuntimeReductionClient(
  timeoutMs: number = TIMEOUTS.REDUCE_MESSAGE_MS
): ReductionClient {
  return {
    async reduce(text, level, customInstruction) {
      const message: ReduceTextMessage = {
        type: 'REDUCE_TEXT',
        payload: {
          text,
          reductionLevel: level,
          customPrompt: customInstruction ?? null,
        },
      }

      try {
        const { reducedText } = await sendMessage(message, ReduceTextResultSchema, timeoutMs)
        return reducedText
      } catch (err) {
        throw err instanceof ServiceError ? err : new ServiceError(fromException(err))
      }
    },
  }
}

/**
 * Liveness probe. Reachable means a 2xx answer whose optional JSON status
 * is not "unhealthy".
 */
export async function checkServerHealth(
  serverUrl: string,
  timeoutMs: number = TIMEOUTS.HEALTH_CHECK_MS
): Promise<HealthStatus> {
  const endpoint = `${normalizeServerUrl(serverUrl)}${SERVER.HEALTH_PATH}`
  const result = await fetchJsonResult(endpoint, { method: 'GET', timeoutMs })

  if (!result.ok) {
    // A 2xx with a non-JSON body still proves the server is up
    if (result.error.category === 'parse') {
      return { online: true }
    }
    return { online: false, error: result.error.message }
  }

  const parsed = HealthResponseSchema.safeParse(result.value)
  if (!parsed.success) {
    return { online: true }
  }

  if (parsed.data.status === 'unhealthy') {
    return { online: false, error: parsed.data.error ?? 'Server reports unhealthy' }
  }

  return parsed.data.model ? { online: true, model: parsed.data.model } : { online: true }
}

/**
 * Resolves with the healthy probe result.
 *
 * @throws ServiceUnavailableError when the probe fails
 */
export async function assertServerReachable(serverUrl: string): Promise<Extract<HealthStatus, { online: true }>> {
  const health = await checkServerHealth(serverUrl)
  if (!health.online) {
    throw new ServiceUnavailableError(`Reduction server unavailable: ${health.error}`)
  }
  return health
}
