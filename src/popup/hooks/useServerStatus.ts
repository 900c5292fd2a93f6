/**
 * Server Status Hook
 *
 * Probes the reduction server whenever the configured URL changes. An
 * unreachable server is reported with the probe's message so the popup can
 * show it next to the disabled reduce action.
 */

import { useCallback, useEffect, useState } from 'react'
import { getErrorMessage } from '../../lib/core/errors'
import { assertServerReachable } from '../../lib/reduction/client'
import type { HealthStatus } from '../../lib/reduction/types'

export type ServerStatus = { checking: true } | ({ checking: false } & HealthStatus)

export async function probeServer(serverUrl: string): Promise<ServerStatus> {
  try {
    const health = await assertServerReachable(serverUrl)
    return { checking: false, ...health }
  } catch (err) {
    return { checking: false, online: false, error: getErrorMessage(err, 'Reduction server unavailable') }
  }
}

export function useServerStatus(serverUrl: string): { status: ServerStatus; recheck: () => void } {
  const [status, setStatus] = useState<ServerStatus>({ checking: true })
  const [attempt, setAttempt] = useState(0)

  useEffect(() => {
    let active = true
    setStatus({ checking: true })

    void probeServer(serverUrl).then((next) => {
      if (active) setStatus(next)
    })

    return () => {
      active = false
    }
  }, [serverUrl, attempt])

  const recheck = useCallback(() => setAttempt((n) => n + 1), [])

  return { status, recheck }
}
