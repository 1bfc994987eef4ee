// SPDX-License-Identifier: Apache-2.0
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { act, renderHook, waitFor } from '@testing-library/react'
import { useAutoRefresh } from './useAutoRefresh'
import { refreshSnapshot } from '../state/actions'
import { useSettingsStore } from '../state/settingsStore'
import { useLogStore } from '../state/logStore'

vi.mock('../state/actions', () => ({ refreshSnapshot: vi.fn() }))

describe('useAutoRefresh', () => {
  beforeEach(() => {
    vi.mocked(refreshSnapshot).mockResolvedValue(undefined)
    useSettingsStore.getState().resetToDefaults()
    useLogStore.getState().clear()
  })

  afterEach(() => {
    vi.useRealTimers()
    vi.clearAllMocks()
  })

  it('refreshes on mount and on every interval until unmounted', () => {
    vi.useFakeTimers()
    const { unmount } = renderHook(() => useAutoRefresh())
    expect(refreshSnapshot).toHaveBeenCalledTimes(1)

    vi.advanceTimersByTime(300_000)
    expect(refreshSnapshot).toHaveBeenCalledTimes(2)

    unmount()
    vi.advanceTimersByTime(900_000)
    expect(refreshSnapshot).toHaveBeenCalledTimes(2)
  })

  it('restarts the timer when the interval setting changes', () => {
    vi.useFakeTimers()
    renderHook(() => useAutoRefresh())
    act(() => {
      useSettingsStore.getState().updateSetting('refreshIntervalMs', 20_000)
    })
    vi.advanceTimersByTime(20_000)
    expect(refreshSnapshot).toHaveBeenCalledTimes(2)
    vi.advanceTimersByTime(40_000)
    expect(refreshSnapshot).toHaveBeenCalledTimes(4)
  })

  it('logs refresh failures', async () => {
    vi.mocked(refreshSnapshot).mockRejectedValueOnce(new Error('offline'))
    renderHook(() => useAutoRefresh())
    await waitFor(() =>
      expect(useLogStore.getState().entries.at(-1)).toMatchObject({
        level: 'error',
        source: 'refresh',
        message: 'Snapshot refresh failed',
        detail: { message: 'offline', name: 'Error' },
      })
    )
  })
})
