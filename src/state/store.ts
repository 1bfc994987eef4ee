// SPDX-License-Identifier: Apache-2.0
import { create } from 'zustand'
import type { DashboardTab, Layout, MetricsSnapshot } from '../types/dashboard'

export type SnapshotStatus = 'loading' | 'ready' | 'absent' | 'error'

export type CommandNotice = {
  id: string
  kind: 'success' | 'error' | 'info'
  title: string
  detail?: string
  timestamp: string
}

// Outcome of the most recent automation connection check.
export type AutomationCheck = {
  ok: boolean
  checkedAt: string
  detail: string
}

const MAX_NOTICES = 5

export interface AppState {
  // Latest snapshot read
  snapshot: MetricsSnapshot | null
  snapshotStatus: SnapshotStatus
  snapshotError: string | null
  lastLoadedAt: string | null
  refreshCount: number
  isFetching: boolean

  // Session context
  selectedEntity: string | null
  activeTab: DashboardTab
  darkMode: boolean

  // Visualization
  layout: Layout

  // Command feedback
  notices: CommandNotice[]
  // One entry per in-flight command; the same id may appear more than once.
  pendingCommands: string[]
  automationCheck: AutomationCheck | null

  // Mutators
  setSnapshotResult: (result: { snapshot: MetricsSnapshot | null; error: string | null }) => void
  setFetching: (b: boolean) => void
  setSelectedEntity: (code: string | null) => void
  setActiveTab: (tab: DashboardTab) => void
  setDarkMode: (b: boolean) => void
  setLayout: (layout: Layout) => void
  pushNotice: (notice: CommandNotice) => void
  removeNotice: (id: string) => void
  addPendingCommand: (id: string) => void
  removePendingCommand: (id: string) => void
  setAutomationCheck: (check: AutomationCheck) => void
}

export const useStore = create<AppState>()((set) => ({
  snapshot: null,
  snapshotStatus: 'loading',
  snapshotError: null,
  lastLoadedAt: null,
  refreshCount: 0,
  isFetching: false,

  selectedEntity: null,
  activeTab: 'universe',
  darkMode: true,

  layout: 'force',

  notices: [],
  pendingCommands: [],
  automationCheck: null,

  // A malformed snapshot keeps the error visible; absence is a quiet steady state.
  setSnapshotResult: ({ snapshot, error }) =>
    set((state) => ({
      snapshot,
      snapshotStatus: snapshot ? 'ready' : error ? 'error' : 'absent',
      snapshotError: snapshot ? null : error,
      lastLoadedAt: new Date().toISOString(),
      refreshCount: state.refreshCount + 1,
    })),
  setFetching: (b) => set({ isFetching: b }),
  setSelectedEntity: (code) => set({ selectedEntity: code }),
  setActiveTab: (tab) => set({ activeTab: tab }),
  setDarkMode: (b) => set({ darkMode: b }),
  setLayout: (layout) => set({ layout }),
  pushNotice: (notice) => set((state) => ({ notices: [notice, ...state.notices].slice(0, MAX_NOTICES) })),
  removeNotice: (id) => set((state) => ({ notices: state.notices.filter((n) => n.id !== id) })),
  addPendingCommand: (id) => set((state) => ({ pendingCommands: [...state.pendingCommands, id] })),
  removePendingCommand: (id) =>
    set((state) => {
      const index = state.pendingCommands.indexOf(id)
      if (index < 0) return {}
      return { pendingCommands: [...state.pendingCommands.slice(0, index), ...state.pendingCommands.slice(index + 1)] }
    }),
  setAutomationCheck: (check) => set({ automationCheck: check }),
}))

export const useSnapshot = () => useStore((s) => s.snapshot)
export const useSnapshotStatus = () => useStore((s) => s.snapshotStatus)
export const useSnapshotError = () => useStore((s) => s.snapshotError)
export const useLastLoadedAt = () => useStore((s) => s.lastLoadedAt)
export const useRefreshCount = () => useStore((s) => s.refreshCount)
export const useIsFetching = () => useStore((s) => s.isFetching)
export const useSelectedEntity = () => useStore((s) => s.selectedEntity)
export const useActiveTab = () => useStore((s) => s.activeTab)
export const useDarkMode = () => useStore((s) => s.darkMode)
export const useLayout = () => useStore((s) => s.layout)
export const useNotices = () => useStore((s) => s.notices)
export const usePendingCommands = () => useStore((s) => s.pendingCommands)
export const useAutomationCheck = () => useStore((s) => s.automationCheck)

export default useStore
