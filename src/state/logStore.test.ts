// SPDX-License-Identifier: Apache-2.0
import { beforeEach, describe, expect, it } from 'vitest'
import { MAX_LOG_ENTRIES, describeError, logError, logInfo, useLogStore } from './logStore'

describe('useLogStore', () => {
  beforeEach(() => {
    useLogStore.getState().clear()
    useLogStore.getState().setVisible(false)
  })

  it('appends entries with ids and timestamps', () => {
    logInfo('refresh', 'Loaded snapshot', { entities: 6 })
    const [entry] = useLogStore.getState().entries
    expect(entry).toMatchObject({ level: 'info', source: 'refresh', message: 'Loaded snapshot', detail: { entities: 6 } })
    expect(entry.id).toMatch(/^log-/)
    expect(Number.isNaN(Date.parse(entry.timestamp))).toBe(false)
  })

  it('keeps only the most recent entries', () => {
    for (let i = 0; i < MAX_LOG_ENTRIES + 5; i += 1) logInfo('test', `entry ${i}`)
    const entries = useLogStore.getState().entries
    expect(entries).toHaveLength(MAX_LOG_ENTRIES)
    expect(entries[0].message).toBe('entry 5')
  })

  it('counts unread errors only while hidden', () => {
    logError('test', 'first')
    logError('test', 'second')
    expect(useLogStore.getState().unreadErrorCount).toBe(2)
    useLogStore.getState().setVisible(true)
    expect(useLogStore.getState().unreadErrorCount).toBe(0)
    logError('test', 'third')
    expect(useLogStore.getState().unreadErrorCount).toBe(0)
  })

  it('clamps the panel width', () => {
    useLogStore.getState().setWidth(100)
    expect(useLogStore.getState().width).toBe(240)
    useLogStore.getState().setWidth(5000)
    expect(useLogStore.getState().width).toBe(640)
  })
})

describe('describeError', () => {
  it('keeps the name and message of errors', () => {
    expect(describeError(new TypeError('bad input'))).toEqual({ message: 'bad input', name: 'TypeError' })
    expect(describeError('plain')).toEqual({ message: 'plain' })
  })
})
