// SPDX-License-Identifier: Apache-2.0
import useStore, { type CommandNotice } from './store'
import { ENTITY_REGISTRY } from '../config/entities'
import { loadSnapshot } from '../services/snapshotLoader'
import {
  QUICK_ACTIONS,
  checkAutomationStatus,
  runQuickActionCommand,
  sendFreeTextCommand,
  type CommandResult,
  type CommandSuccess,
  type QuickActionId,
} from '../services/commandClient'
import { generateId, logInfo, logWarn } from './logStore'
import type { DashboardTab, Layout } from '../types/dashboard'

// Snapshot refresh. A tick that fires while a read is still in flight is dropped.
export const refreshSnapshot = async (): Promise<void> => {
  const s = useStore.getState()
  if (s.isFetching) {
    logWarn('refresh', 'Skipping refresh: previous read still in flight')
    return
  }
  s.setFetching(true)
  let error: string | null = null
  try {
    const snapshot = await loadSnapshot({
      onError: (message) => {
        error = message
      },
    })
    useStore.getState().setSnapshotResult({ snapshot, error })
  } finally {
    useStore.getState().setFetching(false)
  }
}

// Entity selection; unknown codes are ignored
export const selectEntity = (code: string | null) => {
  const s = useStore.getState()
  if (code === null) {
    s.setSelectedEntity(null)
    return
  }
  if (!ENTITY_REGISTRY.findEntity(code)) {
    logWarn('selection', 'Ignoring selection of unknown entity', { code })
    return
  }
  s.setSelectedEntity(code)
}

export const setActiveTab = (tab: DashboardTab) => useStore.getState().setActiveTab(tab)

export const toggleDarkMode = () => {
  const s = useStore.getState()
  s.setDarkMode(!s.darkMode)
}

export const setLayout = (layout: Layout) => useStore.getState().setLayout(layout)

function notify(kind: CommandNotice['kind'], title: string, detail?: string) {
  useStore.getState().pushNotice({ id: generateId('notice'), kind, title, detail, timestamp: new Date().toISOString() })
}

export const dismissNotice = (id: string) => useStore.getState().removeNotice(id)

async function trackCommand(
  id: string,
  run: () => Promise<CommandResult>,
  successTitle: string,
  failureTitle: string,
  successDetail?: (result: CommandSuccess) => string
) {
  useStore.getState().addPendingCommand(id)
  try {
    const result = await run()
    if (result.ok) notify('success', successTitle, successDetail?.(result))
    else notify('error', failureTitle, result.error)
    return result
  } finally {
    useStore.getState().removePendingCommand(id)
  }
}

export const runQuickAction = async (id: QuickActionId): Promise<CommandResult> => {
  const action = QUICK_ACTIONS.find((a) => a.id === id)
  const label = action?.label ?? id
  logInfo('command', 'Quick action triggered', { id })
  return trackCommand(id, () => runQuickActionCommand(id), `${label} requested`, `${label} failed`)
}

export const submitCommand = async (text: string): Promise<CommandResult> => {
  return trackCommand('commander', () => sendFreeTextCommand(text), 'Command sent!', 'Could not send command')
}

export const testAutomationConnection = async (): Promise<CommandResult> => {
  const result = await trackCommand(
    'status',
    () => checkAutomationStatus(),
    'Connected!',
    'Connection failed',
    (success) => `Response: ${JSON.stringify(success.data)}`
  )
  useStore.getState().setAutomationCheck({
    ok: result.ok,
    checkedAt: new Date().toISOString(),
    detail: result.ok ? `HTTP ${result.status} in ${result.durationMs} ms` : result.error,
  })
  return result
}
