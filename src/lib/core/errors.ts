// Error taxonomy and Result wrapper for reduction service calls and page state transitions

export type ErrorCategory =
  | 'network'
  | 'timeout'
  | 'auth'
  | 'rate_limit'
  | 'server'
  | 'client'
  | 'abort'
  | 'parse'
  | 'unknown'

export interface ServiceFailure {
  category: ErrorCategory
  code?: string
  message: string
  status?: number
  retriable: boolean
  timestamp: number
  cause?: unknown
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: ServiceFailure }

export function makeFailure(
  partial: Partial<ServiceFailure> & Pick<ServiceFailure, 'category' | 'message'>
): ServiceFailure {
  return {
    code: undefined,
    status: undefined,
    retriable: false,
    timestamp: Date.now(),
    ...partial,
  }
}

function readErrorMessage(body: unknown): string {
  if (body && typeof body === 'object') {
    if ('detail' in body && typeof body.detail === 'string') return body.detail
    if ('error' in body && typeof body.error === 'string') return body.error
    if ('message' in body && typeof body.message === 'string') return body.message
    return JSON.stringify(body)
  }
  return typeof body === 'string' ? body : ''
}

// Classify a non-ok HTTP response into a ServiceFailure
export async function classifyHttpError(res: Response): Promise<ServiceFailure> {
  let message = ''
  try {
    const text = await res.clone().text()
    try {
      message = readErrorMessage(JSON.parse(text))
    } catch {
      message = text
    }
  } catch {
    // body unreadable, fall back to the status line
  }
  message = message || `HTTP ${res.status}`

  const status = res.status
  const code = `HTTP_${status}`

  if (status === 401 || status === 403) {
    return makeFailure({ category: 'auth', message, status, code })
  }
  if (status === 408) {
    return makeFailure({ category: 'timeout', message, status, code, retriable: true })
  }
  if (status === 429) {
    return makeFailure({ category: 'rate_limit', message, status, code, retriable: true })
  }
  if (status >= 500 && status <= 599) {
    return makeFailure({ category: 'server', message, status, code, retriable: true })
  }
  if (status >= 400 && status <= 499) {
    return makeFailure({ category: 'client', message, status, code })
  }
  return makeFailure({ category: 'unknown', message, status, code })
}

export function fromException(e: unknown): ServiceFailure {
  const name = e instanceof Error ? e.name : ''
  const message = getErrorMessage(e, String(e))

  // AbortSignal.timeout() rejects with a DOMException named TimeoutError
  if (name === 'TimeoutError') {
    return makeFailure({ category: 'timeout', message: 'Request timed out', retriable: true, cause: e })
  }

  if (name === 'AbortError' || message.toLowerCase().includes('abort')) {
    return makeFailure({ category: 'abort', message: 'Request aborted', cause: e })
  }

  const lower = message.toLowerCase()
  const networkIndicators = ['networkerror', 'failed to fetch', 'fetch failed', 'net::', 'dns', 'ssl', 'econnrefused']
  if (networkIndicators.some((k) => lower.includes(k))) {
    return makeFailure({ category: 'network', message, retriable: true, cause: e })
  }

  return makeFailure({ category: 'unknown', message, cause: e })
}

/** The external reduction service answered with a failure or could not be reached */
export class ServiceError extends Error {
  readonly failure: ServiceFailure

  constructor(failure: ServiceFailure) {
    super(failure.message)
    this.name = 'ServiceError'
    this.failure = failure
  }

  get category(): ErrorCategory {
    return this.failure.category
  }
}

/** One segment could not be reduced; the run continues with the next one */
export class SegmentReductionError extends Error {
  readonly segmentIndex: number

  constructor(segmentIndex: number, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SegmentReductionError'
    this.segmentIndex = segmentIndex
  }
}

/** The liveness probe failed, reduction must not be offered */
export class ServiceUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ServiceUnavailableError'
  }
}

/** An operation was requested in a state that does not accept it; nothing was changed */
export class InvalidStateError extends Error {
  readonly operation: string
  readonly state: string

  constructor(operation: string, state: string, message?: string) {
    super(message ?? `Cannot ${operation} while ${state}`)
    this.name = 'InvalidStateError'
    this.operation = operation
    this.state = state
  }
}

/**
 * Create an error message from an unknown error
 *
 * @example
 * ```typescript
 * catch (err) {
 *   sendResponse({
 *     success: false,
 *     error: getErrorMessage(err, 'Operation failed')
 *   })
 * }
 * ```
 */
export function getErrorMessage(err: unknown, fallback = 'Unknown error'): string {
  if (err instanceof Error) {
    return err.message
  }
  if (typeof err === 'string') {
    return err
  }
  if (err && typeof err === 'object' && 'message' in err) {
    return String(err.message)
  }
  return fallback
}
