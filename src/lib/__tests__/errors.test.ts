import { describe, it, expect, vi } from 'vitest'
import {
  InvalidStateError,
  SegmentReductionError,
  classifyHttpError,
  fromException,
  getErrorMessage,
} from '../core/errors'
import { fetchJsonResult } from '../core/api'

describe('classifyHttpError', () => {
  it.each([
    [401, 'auth', false],
    [403, 'auth', false],
    [408, 'timeout', true],
    [429, 'rate_limit', true],
    [502, 'server', true],
    [422, 'client', false],
  ] as const)('maps %i to %s', async (status, category, retriable) => {
    const failure = await classifyHttpError(new Response('', { status }))
    expect(failure.category).toBe(category)
    expect(failure.retriable).toBe(retriable)
    expect(failure.code).toBe(`HTTP_${status}`)
    expect(failure.message).toBe(`HTTP ${status}`)
  })

  it('reads detail, error or message from a JSON body', async () => {
    const detail = await classifyHttpError(new Response(JSON.stringify({ detail: 'bad level' }), { status: 400 }))
    expect(detail.message).toBe('bad level')
    const error = await classifyHttpError(new Response(JSON.stringify({ error: 'no model' }), { status: 500 }))
    expect(error.message).toBe('no model')
  })
})

describe('fromException', () => {
  it('recognises timeouts, aborts and network failures', () => {
    const timeout = Object.assign(new Error('signal timed out'), { name: 'TimeoutError' })
    const abort = Object.assign(new Error('The operation was aborted'), { name: 'AbortError' })
    expect(fromException(timeout).category).toBe('timeout')
    expect(fromException(abort).category).toBe('abort')
    expect(fromException(new TypeError('fetch failed')).category).toBe('network')
    expect(fromException(new Error('something else')).category).toBe('unknown')
  })
})

describe('fetchJsonResult', () => {
  it('returns the parsed body on success', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('{"a":1}', { status: 200 })))
    await expect(fetchJsonResult('http://test.local/x')).resolves.toEqual({ ok: true, value: { a: 1 } })
  })

  it('returns a parse failure for a non-JSON body', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>', { status: 200 })))
    const result = await fetchJsonResult('http://test.local/x')
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.category).toBe('parse')
    expect(result.error.status).toBe(200)
  })
})

describe('error classes', () => {
  it('InvalidStateError names the operation and state', () => {
    const err = new InvalidStateError('cancel', 'idle')
    expect(err.message).toBe('Cannot cancel while idle')
    expect(err.operation).toBe('cancel')
    expect(err.state).toBe('idle')
    expect(err.name).toBe('InvalidStateError')
  })

  it('SegmentReductionError keeps the segment index and cause', () => {
    const cause = new Error('boom')
    const err = new SegmentReductionError(3, 'failed', { cause })
    expect(err.segmentIndex).toBe(3)
    expect(err.cause).toBe(cause)
  })
})

describe('getErrorMessage', () => {
  it('handles errors, strings, message objects and unknowns', () => {
    expect(getErrorMessage(new Error('a'))).toBe('a')
    expect(getErrorMessage('b')).toBe('b')
    expect(getErrorMessage({ message: 'c' })).toBe('c')
    expect(getErrorMessage(42, 'fallback')).toBe('fallback')
  })
})
