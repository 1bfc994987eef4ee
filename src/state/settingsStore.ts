// SPDX-License-Identifier: Apache-2.0
import { create } from 'zustand'
import { persist, createJSONStorage } from 'zustand/middleware'
import { getEnvConfig } from '../config/env'

export type DashboardSettings = {
  automationBaseUrl: string
  requestTimeoutMs: number
  refreshIntervalMs: number
  snapshotUrl: string
  commandSource: string
}

type SettingsState = DashboardSettings & {
  updateSetting: <K extends keyof DashboardSettings>(key: K, value: DashboardSettings[K]) => void
  applyDraft: (draft: Partial<Record<keyof DashboardSettings, unknown>>) => void
  resetToDefaults: () => void
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000
export const DEFAULT_REFRESH_INTERVAL_MS = 300_000
const MIN_REFRESH_INTERVAL_MS = 10_000
const MAX_REQUEST_TIMEOUT_MS = 120_000

export function getDefaultSettings(): DashboardSettings {
  const env = getEnvConfig()
  return {
    automationBaseUrl: env.AUTOMATION_BASE_URL,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    refreshIntervalMs: DEFAULT_REFRESH_INTERVAL_MS,
    snapshotUrl: env.SNAPSHOT_URL,
    commandSource: 'dashboard',
  }
}

export function sanitizeBaseUrl(base: unknown): string | null {
  if (typeof base !== 'string') return null
  const trimmed = base.trim()
  if (!trimmed) return null
  return trimmed.replace(/\/+$/, '')
}

function sanitizeText(value: unknown): string | null {
  if (typeof value !== 'string') return null
  const trimmed = value.trim()
  return trimmed ? trimmed : null
}

export function sanitizeNumberValue(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value
  }
  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10)
    if (Number.isFinite(parsed)) {
      return parsed
    }
  }
  return undefined
}

function sanitizeTimeout(value: unknown): number | null {
  const parsed = sanitizeNumberValue(value)
  if (parsed === undefined || parsed <= 0) return null
  return Math.min(Math.round(parsed), MAX_REQUEST_TIMEOUT_MS)
}

function sanitizeInterval(value: unknown): number | null {
  const parsed = sanitizeNumberValue(value)
  if (parsed === undefined || parsed <= 0) return null
  return Math.max(Math.round(parsed), MIN_REFRESH_INTERVAL_MS)
}

export function sanitizeSettings(
  draft: Partial<Record<keyof DashboardSettings, unknown>>,
  fallback: DashboardSettings
): DashboardSettings {
  return {
    automationBaseUrl: sanitizeBaseUrl(draft.automationBaseUrl) ?? fallback.automationBaseUrl,
    requestTimeoutMs: sanitizeTimeout(draft.requestTimeoutMs) ?? fallback.requestTimeoutMs,
    refreshIntervalMs: sanitizeInterval(draft.refreshIntervalMs) ?? fallback.refreshIntervalMs,
    snapshotUrl: sanitizeText(draft.snapshotUrl) ?? fallback.snapshotUrl,
    commandSource: sanitizeText(draft.commandSource) ?? fallback.commandSource,
  }
}

const storage = typeof window !== 'undefined' ? createJSONStorage(() => window.localStorage) : undefined

export const useSettingsStore = create<SettingsState>()(
  persist(
    (set, get) => ({
      ...getDefaultSettings(),
      updateSetting: (key, value) => {
        const current = pickSettings(get())
        set(sanitizeSettings({ ...current, [key]: value }, getDefaultSettings()))
      },
      applyDraft: (draft) => set(sanitizeSettings(draft, getDefaultSettings())),
      resetToDefaults: () => set(getDefaultSettings()),
    }),
    {
      name: 'command-center-settings',
      storage,
      version: 1,
      partialize: (state) => pickSettings(state),
    }
  )
)

export function pickSettings(state: DashboardSettings): DashboardSettings {
  return {
    automationBaseUrl: state.automationBaseUrl,
    requestTimeoutMs: state.requestTimeoutMs,
    refreshIntervalMs: state.refreshIntervalMs,
    snapshotUrl: state.snapshotUrl,
    commandSource: state.commandSource,
  }
}

export const useRefreshInterval = (): number => useSettingsStore((s) => s.refreshIntervalMs)
export const useAutomationBaseUrl = (): string => useSettingsStore((s) => s.automationBaseUrl)

export const getSettingsSnapshot = (): DashboardSettings => pickSettings(useSettingsStore.getState())

export default useSettingsStore
