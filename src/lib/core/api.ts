import { Result, ServiceFailure, classifyHttpError, fromException, makeFailure } from './errors'

// Minimal JSON fetch wrapper returning a Result with a typed ServiceFailure on failures
export async function fetchJsonResult(
  input: RequestInfo | URL,
  init: RequestInit & { timeoutMs?: number } = {}
): Promise<Result<unknown>> {
  const { timeoutMs, ...requestInit } = init
  const signal = timeoutMs !== undefined && !requestInit.signal
    ? AbortSignal.timeout(timeoutMs)
    : requestInit.signal

  try {
    const res = await fetch(input, { ...requestInit, signal })
    if (!res.ok) {
      const err: ServiceFailure = await classifyHttpError(res)
      return { ok: false, error: err }
    }
    try {
      const value: unknown = await res.json()
      return { ok: true, value }
    } catch (e) {
      return { ok: false, error: makeFailure({ category: 'parse', message: 'Response is not valid JSON', status: res.status, cause: e }) }
    }
  } catch (e) {
    return { ok: false, error: fromException(e) }
  }
}

export type { Result, ServiceFailure } from './errors'
