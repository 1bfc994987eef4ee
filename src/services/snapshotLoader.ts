// SPDX-License-Identifier: Apache-2.0
import type { AlertItem, EntityMetrics, MetricsSnapshot, PriorityEmail } from '../types/dashboard'
import { getSettingsSnapshot } from '../state/settingsStore'
import { describeError, logDebug, logError, logInfo } from '../state/logStore'
import { fetchTextWithTimeout } from './http'

export const DEFAULT_HEALTH_SCORE = 80
export const DEFAULT_STATUS = 'Active'
export const DEFAULT_RECENT_ACTIVITY = 'No recent activity'

export const DEFAULT_ENTITY_METRICS: Readonly<EntityMetrics> = Object.freeze({
  healthScore: DEFAULT_HEALTH_SCORE,
  pendingItems: 0,
  status: DEFAULT_STATUS,
  recentActivity: DEFAULT_RECENT_ACTIVITY,
  activityCount: null,
})

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function coerceNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value)
    if (Number.isFinite(parsed)) return parsed
  }
  return null
}

function coerceCount(value: unknown): number | null {
  const n = coerceNumber(value)
  return n === null ? null : Math.max(0, Math.round(n))
}

function coerceText(value: unknown): string | null {
  if (typeof value !== 'string') return null
  const trimmed = value.trim()
  return trimmed ? trimmed : null
}

function section(container: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = container[key]
  return isRecord(value) ? value : {}
}

function coerceEntityMetrics(input: unknown): EntityMetrics {
  const record = isRecord(input) ? input : {}
  const health = coerceNumber(record.health_score)
  return {
    healthScore: health === null ? DEFAULT_HEALTH_SCORE : Math.min(100, Math.max(0, Math.round(health))),
    pendingItems: coerceCount(record.pending_items) ?? 0,
    status: coerceText(record.status) ?? DEFAULT_STATUS,
    recentActivity: coerceText(record.recent_activity) ?? DEFAULT_RECENT_ACTIVITY,
    activityCount: coerceCount(record.activity_count),
  }
}

function coercePriorityEmail(input: unknown): PriorityEmail | null {
  if (!isRecord(input)) return null
  return {
    subject: coerceText(input.subject) ?? 'No subject',
    from: coerceText(input.from) ?? 'Unknown',
    entity: coerceText(input.entity),
    priority: input.priority === 'high' ? 'high' : 'normal',
  }
}

function coerceAlert(input: unknown): AlertItem | null {
  if (!isRecord(input)) return null
  const severity = typeof input.severity === 'string' ? input.severity.toLowerCase() : ''
  return {
    type: coerceText(input.type) ?? 'alert',
    severity: severity === 'high' || severity === 'low' ? severity : 'medium',
    message: coerceText(input.message) ?? 'Unknown alert',
  }
}

function compact<T>(items: Array<T | null>): T[] {
  return items.filter((item): item is T => item !== null)
}

export function parseSnapshot(raw: unknown): MetricsSnapshot {
  if (!isRecord(raw)) throw new Error('Snapshot JSON must be an object')
  const entitiesRaw = section(raw, 'entities')
  const entities: Record<string, EntityMetrics> = {}
  for (const [code, value] of Object.entries(entitiesRaw)) {
    entities[code] = coerceEntityMetrics(value)
  }

  const email = section(raw, 'email_summary')
  const calendar = section(raw, 'calendar_summary')
  const system = section(raw, 'system_health')
  const alerts = section(raw, 'alerts')
  const alertItems = Array.isArray(alerts.items) ? compact(alerts.items.map(coerceAlert)) : []

  return {
    entities: Object.freeze(entities),
    emailSummary: {
      unreadCount: coerceCount(email.unread_count),
      priorityEmails: Array.isArray(email.priority_emails) ? compact(email.priority_emails.map(coercePriorityEmail)) : [],
    },
    calendarSummary: { eventsToday: coerceCount(calendar.events_today) },
    systemHealth: { pendingTasks: coerceCount(system.pending_tasks) },
    alerts: { count: coerceCount(alerts.count) ?? 0, items: alertItems },
    lastUpdated: coerceText(raw.last_updated),
  }
}

export function resolveEntityMetrics(snapshot: MetricsSnapshot | null, code: string): EntityMetrics {
  return snapshot?.entities[code] ?? DEFAULT_ENTITY_METRICS
}

export function reportedEntityMetrics(snapshot: MetricsSnapshot | null, code: string): EntityMetrics | null {
  return snapshot?.entities[code] ?? null
}

export type SnapshotLoadOptions = {
  url?: string
  timeoutMs?: number
  fetchImpl?: typeof fetch
  onError?: (message: string) => void
}

// 404/410 mean the external process has not written a snapshot yet.
const ABSENT_STATUSES = new Set([404, 410])

export async function loadSnapshot(options: SnapshotLoadOptions = {}): Promise<MetricsSnapshot | null> {
  const settings = getSettingsSnapshot()
  const url = options.url ?? settings.snapshotUrl
  const timeoutMs = options.timeoutMs ?? settings.requestTimeoutMs
  const fetchImpl = options.fetchImpl ?? fetch
  const report = (message: string, detail?: unknown) => {
    logError('snapshot', message, detail)
    options.onError?.(message)
  }

  let text: string | null = null
  try {
    const response = await fetchTextWithTimeout(
      fetchImpl,
      url,
      { method: 'GET', headers: { Accept: 'application/json' }, cache: 'no-store' },
      timeoutMs
    )
    if (ABSENT_STATUSES.has(response.status)) {
      logDebug('snapshot', 'No snapshot published yet', { url, status: response.status })
      return null
    }
    if (!response.ok) {
      report(`Error loading live data: server returned ${response.status}`, { url })
      return null
    }
    text = response.text
  } catch (err) {
    const detail = describeError(err)
    report(`Error loading live data: ${detail.message}`, { url, ...detail })
    return null
  }
  if (text === null) return null

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    report(`Error loading live data: invalid JSON (${describeError(err).message})`, { url })
    return null
  }
  try {
    const snapshot = parseSnapshot(parsed)
    logInfo('snapshot', 'Snapshot loaded', {
      url,
      entityCount: Object.keys(snapshot.entities).length,
      lastUpdated: snapshot.lastUpdated,
    })
    return snapshot
  } catch (err) {
    report(`Error loading live data: ${describeError(err).message}`, { url })
    return null
  }
}
