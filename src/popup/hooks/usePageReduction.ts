/**
 * Page Reduction Hook
 *
 * Drives the active tab's reducer from the popup. Recovers the tab's state
 * when the popup opens, follows REDUCE_PROGRESS broadcasts, and keeps a
 * short-lived status line for the last action.
 */

import { useCallback, useEffect, useRef, useState } from 'react'
import { bus } from '../../lib/core/bus'
import { createLogger } from '../../lib/core/debug'
import { getErrorMessage } from '../../lib/core/errors'
import { TIMEOUTS } from '../../lib/config/constants'
import type { ReductionOutcome, ReductionProgress, ReductionStatus } from '../../lib/reduction/types'
import { cancelReduction, getPageStatus, reducePage, restorePage } from '../pageControl'

const log = createLogger('usePageReduction')

export type StatusKind = 'success' | 'error' | 'info'

export interface StatusMessage {
  kind: StatusKind
  text: string
}

export interface UsePageReductionReturn {
  /** null until the tab answered, or when it cannot be controlled */
  status: ReductionStatus | null
  progress: ReductionProgress | null
  message: StatusMessage | null
  reduce: (level: number, customPrompt: string | null) => Promise<void>
  cancel: () => Promise<void>
  restore: () => Promise<void>
}

export function describeOutcome(outcome: ReductionOutcome): string {
  if (outcome.status === 'cancelled') {
    return 'Reduction cancelled, page restored'
  }
  if (outcome.total === 0) {
    return 'No text blocks long enough to reduce'
  }
  const failed = outcome.failed > 0 ? `, ${outcome.failed} failed` : ''
  return `Reduced ${outcome.succeeded}/${outcome.total} blocks${failed} (${outcome.originalWords} → ${outcome.reducedWords} words)`
}

/**
 * Status line for a restore answer. Restore on an untouched page changes
 * nothing and says so.
 */
export function describeRestore(before: ReductionStatus['state'] | null, after: ReductionStatus): StatusMessage {
  if (before === 'idle') return { kind: 'info', text: 'Nothing to restore, the page is unchanged' }
  if (after.state === 'cancelling') return { kind: 'info', text: 'Cancelling after the current block...' }
  return { kind: 'success', text: 'Original content restored' }
}

export function usePageReduction(): UsePageReductionReturn {
  const [status, setStatus] = useState<ReductionStatus | null>(null)
  const [progress, setProgress] = useState<ReductionProgress | null>(null)
  const [message, setMessage] = useState<StatusMessage | null>(null)
  const hideTimer = useRef<ReturnType<typeof setTimeout> | null>(null)
  const stateRef = useRef<ReductionStatus['state'] | null>(null)

  const show = useCallback((kind: StatusKind, text: string, sticky = false) => {
    if (hideTimer.current) clearTimeout(hideTimer.current)
    setMessage({ kind, text })
    hideTimer.current = sticky ? null : setTimeout(() => setMessage(null), TIMEOUTS.STATUS_DISPLAY_MS)
  }, [])

  const applyStatus = useCallback((next: ReductionStatus) => {
    stateRef.current = next.state
    setStatus(next)
  }, [])

  const refresh = useCallback(async () => {
    try {
      applyStatus(await getPageStatus())
    } catch (err) {
      log.warn('Status unavailable:', getErrorMessage(err))
      stateRef.current = null
      setStatus(null)
      show('error', 'This page cannot be reduced (reload the tab and try again)', true)
    }
  }, [applyStatus, show])

  useEffect(() => {
    void refresh()
    return () => {
      if (hideTimer.current) clearTimeout(hideTimer.current)
    }
  }, [refresh])

  useEffect(() => {
    return bus.on('progress', (next) => {
      setProgress(next)
      // A run this popup did not start (reopened popup) ends without a reply
      if (stateRef.current === 'cancelling' || (next.total > 0 && next.current >= next.total)) {
        void refresh()
      }
    })
  }, [refresh])

  const reduce = useCallback(async (level: number, customPrompt: string | null) => {
    setProgress(null)
    setMessage(null)
    stateRef.current = 'running'
    setStatus((prev) => prev && { ...prev, state: 'running', isReduced: false })
    try {
      const outcome = await reducePage(level, customPrompt)
      show(outcome.status === 'reduced' ? 'success' : 'info', describeOutcome(outcome))
    } catch (err) {
      show('error', getErrorMessage(err, 'Reduction failed'))
    }
    await refresh()
  }, [refresh, show])

  const cancel = useCallback(async () => {
    try {
      applyStatus(await cancelReduction())
      show('info', 'Cancelling after the current block...')
    } catch (err) {
      show('error', getErrorMessage(err, 'Cancel failed'))
    }
  }, [applyStatus, show])

  const restore = useCallback(async () => {
    try {
      const before = stateRef.current
      const next = await restorePage()
      applyStatus(next)
      setProgress(null)
      const { kind, text } = describeRestore(before, next)
      show(kind, text)
    } catch (err) {
      show('error', getErrorMessage(err, 'Restore failed'))
    }
  }, [applyStatus, show])

  return { status, progress, message, reduce, cancel, restore }
}
