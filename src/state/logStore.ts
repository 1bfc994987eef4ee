// SPDX-License-Identifier: Apache-2.0
import { create } from 'zustand'
import { subscribeWithSelector } from 'zustand/middleware'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogEntry = {
  id: string
  timestamp: string
  level: LogLevel
  source: string
  message: string
  detail?: unknown
}

type LogStoreState = {
  entries: LogEntry[]
  isVisible: boolean
  dock: 'left' | 'right'
  width: number
  autoScroll: boolean
  unreadErrorCount: number
  append: (entry: Omit<LogEntry, 'id' | 'timestamp'> & { id?: string; timestamp?: string }) => void
  clear: () => void
  setVisible: (value: boolean) => void
  setDock: (value: 'left' | 'right') => void
  setWidth: (width: number) => void
  setAutoScroll: (value: boolean) => void
  consumeErrorBadge: () => void
}

export const MAX_LOG_ENTRIES = 500

export function generateId(prefix: string) {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`
}

// Mirrors entries to the dev server terminal (see vite.config.ts).
function forwardToDevServer(entry: LogEntry) {
  if (!import.meta.hot) return
  import.meta.hot.send('dashboard:log', entry)
}

export const useLogStore = create<LogStoreState>()(
  subscribeWithSelector((set) => ({
    entries: [],
    isVisible: false,
    dock: 'right',
    width: 360,
    autoScroll: true,
    unreadErrorCount: 0,
    append: (entry) => {
      const timestamp = entry.timestamp ?? new Date().toISOString()
      const id = entry.id ?? generateId('log')
      const normalized: LogEntry = {
        ...entry,
        id,
        timestamp,
      }
      set((state) => {
        const entries = [...state.entries, normalized]
        if (entries.length > MAX_LOG_ENTRIES) entries.splice(0, entries.length - MAX_LOG_ENTRIES)
        const unreadErrorCount =
          normalized.level === 'error' && !state.isVisible ? state.unreadErrorCount + 1 : state.unreadErrorCount
        return {
          entries,
          unreadErrorCount,
        }
      })
      forwardToDevServer(normalized)
    },
    clear: () => set({ entries: [], unreadErrorCount: 0 }),
    setVisible: (value) =>
      set((state) => ({
        isVisible: value,
        unreadErrorCount: value ? 0 : state.unreadErrorCount,
      })),
    setDock: (value) => set({ dock: value }),
    setWidth: (width) => {
      const clamped = Math.min(640, Math.max(240, Math.round(width)))
      set({ width: clamped })
    },
    setAutoScroll: (value) => set({ autoScroll: value }),
    consumeErrorBadge: () => set({ unreadErrorCount: 0 }),
  }))
)

export const useLogEntries = () => useLogStore((state) => state.entries)
export const useUnreadErrorCount = () => useLogStore((state) => state.unreadErrorCount)
export const useLogVisible = () => useLogStore((state) => state.isVisible)
export const useLogDock = () => useLogStore((state) => state.dock)
export const useLogWidth = () => useLogStore((state) => state.width)
export const useLogAutoScroll = () => useLogStore((state) => state.autoScroll)

export function describeError(error: unknown): { message: string; name?: string } {
  if (error instanceof Error) return { message: error.message, name: error.name }
  return { message: String(error) }
}

function appendLog(level: LogLevel, source: string, message: string, detail?: unknown) {
  useLogStore.getState().append({ level, source, message, detail })
}

export const logDebug = (source: string, message: string, detail?: unknown) =>
  appendLog('debug', source, message, detail)
export const logInfo = (source: string, message: string, detail?: unknown) =>
  appendLog('info', source, message, detail)
export const logWarn = (source: string, message: string, detail?: unknown) =>
  appendLog('warn', source, message, detail)
export const logError = (source: string, message: string, detail?: unknown) =>
  appendLog('error', source, message, detail)
