// SPDX-License-Identifier: Apache-2.0
import { useEffect } from 'react'
import { refreshSnapshot } from '../state/actions'
import { useRefreshInterval } from '../state/settingsStore'
import { describeError, logError } from '../state/logStore'

function runRefresh() {
  refreshSnapshot().catch((err: unknown) => {
    logError('refresh', 'Snapshot refresh failed', describeError(err))
  })
}

/**
 * Reads the snapshot once on mount, then again every `refreshIntervalMs`.
 * The timer is rebuilt when the interval setting changes and cleared on unmount.
 */
export function useAutoRefresh(): void {
  const intervalMs = useRefreshInterval()

  useEffect(() => {
    runRefresh()
  }, [])

  useEffect(() => {
    const handle = setInterval(runRefresh, intervalMs)
    return () => clearInterval(handle)
  }, [intervalMs])
}

export default useAutoRefresh
