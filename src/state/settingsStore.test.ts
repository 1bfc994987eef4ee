// SPDX-License-Identifier: Apache-2.0
import { beforeEach, describe, expect, it } from 'vitest'
import {
  DEFAULT_REFRESH_INTERVAL_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  getDefaultSettings,
  getSettingsSnapshot,
  sanitizeBaseUrl,
  sanitizeNumberValue,
  sanitizeSettings,
  useSettingsStore,
} from './settingsStore'

describe('sanitizers', () => {
  it('trims base urls and drops trailing slashes', () => {
    expect(sanitizeBaseUrl('  http://automation.test/// ')).toBe('http://automation.test')
    expect(sanitizeBaseUrl('   ')).toBeNull()
    expect(sanitizeBaseUrl(42)).toBeNull()
  })

  it('reads numbers from numbers and numeric strings', () => {
    expect(sanitizeNumberValue(15)).toBe(15)
    expect(sanitizeNumberValue('2500')).toBe(2500)
    expect(sanitizeNumberValue('soon')).toBeUndefined()
    expect(sanitizeNumberValue(Number.NaN)).toBeUndefined()
  })

  it('clamps the refresh interval and request timeout', () => {
    const fallback = getDefaultSettings()
    const result = sanitizeSettings({ refreshIntervalMs: 500, requestTimeoutMs: 999_999 }, fallback)
    expect(result.refreshIntervalMs).toBe(10_000)
    expect(result.requestTimeoutMs).toBe(120_000)
  })

  it('falls back field by field', () => {
    const fallback = getDefaultSettings()
    const result = sanitizeSettings({ automationBaseUrl: '', requestTimeoutMs: -5, snapshotUrl: ' /snap.json ' }, fallback)
    expect(result).toEqual({ ...fallback, snapshotUrl: '/snap.json' })
  })
})

describe('useSettingsStore', () => {
  beforeEach(() => {
    useSettingsStore.getState().resetToDefaults()
  })

  it('starts from the defaults', () => {
    expect(getSettingsSnapshot()).toEqual({
      automationBaseUrl: 'http://localhost:5678',
      requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
      refreshIntervalMs: DEFAULT_REFRESH_INTERVAL_MS,
      snapshotUrl: '/data/live_data.json',
      commandSource: 'dashboard',
    })
  })

  it('applies a sanitized draft', () => {
    useSettingsStore.getState().applyDraft({
      automationBaseUrl: 'http://automation.test/',
      requestTimeoutMs: '3000',
      refreshIntervalMs: '60000',
      snapshotUrl: '/other.json',
      commandSource: 'kiosk',
    })
    expect(getSettingsSnapshot()).toEqual({
      automationBaseUrl: 'http://automation.test',
      requestTimeoutMs: 3000,
      refreshIntervalMs: 60_000,
      snapshotUrl: '/other.json',
      commandSource: 'kiosk',
    })
  })

  it('updates one setting and keeps the rest', () => {
    useSettingsStore.getState().updateSetting('refreshIntervalMs', 20_000)
    expect(getSettingsSnapshot()).toEqual({ ...getDefaultSettings(), refreshIntervalMs: 20_000 })
  })

  it('persists settings to local storage', () => {
    useSettingsStore.getState().updateSetting('commandSource', 'wallboard')
    const stored = window.localStorage.getItem('command-center-settings')
    expect(stored).not.toBeNull()
    expect(JSON.parse(stored ?? '{}')).toMatchObject({ state: { commandSource: 'wallboard' }, version: 1 })
  })
})
