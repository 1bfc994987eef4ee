// SPDX-License-Identifier: Apache-2.0
import type { AutomationCheck, SnapshotStatus } from '../state/store'

export type SystemCheckState = 'ok' | 'warn' | 'error' | 'unknown'

export type SystemCheck = {
  key: 'snapshot' | 'automation' | 'webhooks' | 'tasks'
  label: string
  state: SystemCheckState
  detail: string
}

export type SystemStatusInput = {
  snapshotStatus: SnapshotStatus
  snapshotError: string | null
  lastLoadedAt: string | null
  automationCheck: AutomationCheck | null
  webhookCount: number
  pendingTasks: number | null
}

export const SYSTEM_CHECK_ICONS: Record<SystemCheckState, string> = {
  ok: '✅',
  warn: '⚠️',
  error: '❌',
  unknown: '❔',
}

function snapshotCheck({ snapshotStatus, snapshotError, lastLoadedAt }: SystemStatusInput): SystemCheck {
  const label = 'Snapshot feed'
  switch (snapshotStatus) {
    case 'ready':
      return { key: 'snapshot', label, state: 'ok', detail: `Last read ${lastLoadedAt ?? 'just now'}` }
    case 'absent':
      return { key: 'snapshot', label, state: 'warn', detail: 'No snapshot published yet' }
    case 'error':
      return { key: 'snapshot', label, state: 'error', detail: snapshotError ?? 'Snapshot could not be read' }
    case 'loading':
      return { key: 'snapshot', label, state: 'unknown', detail: 'Waiting for the first read' }
  }
}

function automationCheck({ automationCheck: check }: SystemStatusInput): SystemCheck {
  const label = 'Automation host'
  if (!check) return { key: 'automation', label, state: 'unknown', detail: 'Not checked' }
  return { key: 'automation', label, state: check.ok ? 'ok' : 'error', detail: `${check.detail} (checked ${check.checkedAt})` }
}

/** Status rows for the admin tab, derived from what the dashboard has already observed. */
export function buildSystemStatus(input: SystemStatusInput): SystemCheck[] {
  const unreachable = input.automationCheck?.ok === false
  return [
    snapshotCheck(input),
    automationCheck(input),
    {
      key: 'webhooks',
      label: 'Webhooks',
      state: unreachable ? 'warn' : 'ok',
      detail: unreachable
        ? `${input.webhookCount} configured; host unreachable`
        : `${input.webhookCount} configured`,
    },
    input.pendingTasks === null
      ? { key: 'tasks', label: 'Pending tasks', state: 'unknown', detail: 'Not reported' }
      : { key: 'tasks', label: 'Pending tasks', state: 'ok', detail: `${input.pendingTasks} pending` },
  ]
}
