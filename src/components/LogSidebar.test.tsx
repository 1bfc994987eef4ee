// SPDX-License-Identifier: Apache-2.0
import React from 'react'
import { beforeEach, describe, expect, it } from 'vitest'
import { act, fireEvent, render, screen } from '@testing-library/react'
import LogSidebar, { formatTimestamp, levelColor } from './LogSidebar'
import { logError, logInfo, useLogStore } from '../state/logStore'

describe('LogSidebar helpers', () => {
  it('colors levels', () => {
    expect(levelColor('error')).toBe('#ff6b6b')
    expect(levelColor('debug')).toBe('#a0aec0')
  })

  it('formats timestamps and passes through unparsable ones', () => {
    expect(formatTimestamp('2026-01-05T08:00:00.000Z')).toBe('2026-01-05 08:00:00.000')
    expect(formatTimestamp('yesterday')).toBe('yesterday')
  })
})

describe('LogSidebar', () => {
  beforeEach(() => {
    useLogStore.getState().clear()
    useLogStore.getState().setVisible(false)
  })

  it('opens from the toggle and lists entries', () => {
    logInfo('refresh', 'Snapshot loaded')
    render(<LogSidebar />)
    expect(screen.queryByRole('log')).not.toBeInTheDocument()
    fireEvent.click(screen.getByRole('button', { name: 'Toggle logs' }))
    expect(screen.getByRole('log')).toBeInTheDocument()
    expect(screen.getByText('Snapshot loaded')).toBeInTheDocument()
  })

  it('opens itself when an error is logged', () => {
    render(<LogSidebar />)
    act(() => {
      logError('refresh', 'Snapshot refresh failed')
    })
    expect(screen.getByRole('log')).toBeInTheDocument()
    expect(screen.getByText('Snapshot refresh failed')).toBeInTheDocument()
    expect(screen.queryByTestId('log-error-badge')).not.toBeInTheDocument()
  })

  it('clears entries', () => {
    logInfo('settings', 'Settings saved')
    render(<LogSidebar initiallyOpen />)
    fireEvent.click(screen.getByRole('button', { name: 'Clear' }))
    expect(screen.getByText('No log entries yet.')).toBeInTheDocument()
  })
})
