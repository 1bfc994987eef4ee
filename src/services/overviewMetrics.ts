// SPDX-License-Identifier: Apache-2.0
import type { EntityRegistry } from '../config/entities'
import type { EntityDescriptor, MetricsSnapshot, PriorityEmail } from '../types/dashboard'
import { resolveEntityMetrics } from './snapshotLoader'

export const PLACEHOLDER = '--'

export type OverviewCard = {
  key: 'emails' | 'events' | 'tasks' | 'alerts' | 'automation'
  icon: string
  label: string
  value: string
  delta: string
  tone: 'neutral' | 'warning' | 'muted'
  help: string
}

function display(value: number | null | undefined): string {
  return typeof value === 'number' ? String(value) : PLACEHOLDER
}

export function buildOverviewCards(snapshot: MetricsSnapshot | null): OverviewCard[] {
  const loaded = snapshot !== null
  const alertCount = snapshot?.alerts.count ?? 0
  return [
    {
      key: 'emails',
      icon: '📧',
      label: 'Emails Today',
      value: display(snapshot?.emailSummary.unreadCount),
      delta: loaded ? 'unread' : 'Loading...',
      tone: 'neutral',
      help: 'Fetched from the mail summary',
    },
    {
      key: 'events',
      icon: '📅',
      label: 'Events Today',
      value: display(snapshot?.calendarSummary.eventsToday),
      delta: loaded ? 'scheduled' : 'Loading...',
      tone: 'neutral',
      help: 'From the calendar summary',
    },
    {
      key: 'tasks',
      icon: '✅',
      label: 'Tasks Due',
      value: loaded ? String(snapshot.systemHealth.pendingTasks ?? 0) : PLACEHOLDER,
      delta: loaded ? 'pending' : 'Loading...',
      tone: 'neutral',
      help: 'From the command center task sheet',
    },
    {
      key: 'alerts',
      icon: '⚠️',
      label: 'Alerts',
      value: alertCount > 0 ? String(alertCount) : PLACEHOLDER,
      delta: loaded && alertCount > 0 ? 'urgent' : 'none',
      tone: loaded && alertCount > 0 ? 'warning' : 'muted',
      help: 'Critical items',
    },
    {
      key: 'automation',
      icon: '🤖',
      label: 'Automation',
      value: 'Online',
      delta: 'All systems',
      tone: 'neutral',
      help: 'Webhook automation layer',
    },
  ]
}

export type MetricsBar = { category: 'Emails' | 'Events' | 'Tasks' | 'Alerts'; count: number; color: string }

export function buildTodayMetricsSeries(snapshot: MetricsSnapshot | null): MetricsBar[] {
  if (!snapshot) return []
  return [
    { category: 'Emails', count: snapshot.emailSummary.unreadCount ?? 0, color: '#3b82f6' },
    { category: 'Events', count: snapshot.calendarSummary.eventsToday ?? 0, color: '#22c55e' },
    { category: 'Tasks', count: snapshot.systemHealth.pendingTasks ?? 0, color: '#f59e0b' },
    { category: 'Alerts', count: snapshot.alerts.count, color: '#ef4444' },
  ]
}

export type ActivitySlice = { code: string; label: string; value: number; share: number; color: string }

export function buildActivityDistribution(registry: EntityRegistry, snapshot: MetricsSnapshot | null): ActivitySlice[] {
  if (!snapshot) return []
  const counted = registry
    .listEntities()
    .map((entity) => ({ entity, value: snapshot.entities[entity.code]?.activityCount ?? 0 }))
    .filter((item) => item.value > 0)
  const total = counted.reduce((sum, item) => sum + item.value, 0)
  return counted.map(({ entity, value }) => ({
    code: entity.code,
    label: `${entity.icon} ${entity.code}`,
    value,
    share: value / total,
    color: entity.color,
  }))
}

export function describeActivitySlice(slice: ActivitySlice): string {
  return `${slice.value} items (${Math.round(slice.share * 100)}%)`
}

export type EntityStatusCard = {
  entity: EntityDescriptor
  status: string
  healthScore: number
  pendingItems: number
  reported: boolean
}

export function buildEntityStatusCards(registry: EntityRegistry, snapshot: MetricsSnapshot | null): EntityStatusCard[] {
  return registry.listEntities().map((entity) => {
    const metrics = resolveEntityMetrics(snapshot, entity.code)
    return {
      entity,
      status: metrics.status,
      healthScore: metrics.healthScore,
      pendingItems: metrics.pendingItems,
      reported: Boolean(snapshot?.entities[entity.code]),
    }
  })
}

export function truncateSubject(subject: string, max = 50): string {
  return subject.length > max ? `${subject.slice(0, max)}...` : subject
}

export function recentPriorityEmails(snapshot: MetricsSnapshot | null, limit = 5): PriorityEmail[] {
  return snapshot ? snapshot.emailSummary.priorityEmails.slice(0, limit) : []
}
