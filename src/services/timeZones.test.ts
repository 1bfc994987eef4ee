// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it } from 'vitest'
import { formatClock, isKenyaWindow, kenyaTime, minneapolisTime } from './timeZones'

describe('clocks', () => {
  it('formats fixed-offset 12-hour times', () => {
    const now = new Date('2026-01-05T14:05:00Z')
    expect(minneapolisTime(now)).toBe('08:05 AM')
    expect(kenyaTime(now)).toBe('05:05 PM')
  })

  it('shows midnight and noon as 12', () => {
    expect(formatClock(new Date('2026-01-05T00:30:00Z'), 0)).toBe('12:30 AM')
    expect(formatClock(new Date('2026-01-05T12:00:00Z'), 0)).toBe('12:00 PM')
  })

  it('wraps across the date line', () => {
    expect(minneapolisTime(new Date('2026-01-05T03:00:00Z'))).toBe('09:00 PM')
  })
})

describe('isKenyaWindow', () => {
  it('opens at 06:00 Minneapolis time and closes at 09:00', () => {
    expect(isKenyaWindow(new Date('2026-01-05T11:59:00Z'))).toBe(false)
    expect(isKenyaWindow(new Date('2026-01-05T12:00:00Z'))).toBe(true)
    expect(isKenyaWindow(new Date('2026-01-05T14:59:00Z'))).toBe(true)
    expect(isKenyaWindow(new Date('2026-01-05T15:00:00Z'))).toBe(false)
  })
})
