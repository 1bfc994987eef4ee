// SPDX-License-Identifier: Apache-2.0
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { DEFAULT_ENTITY_METRICS, loadSnapshot, parseSnapshot, reportedEntityMetrics, resolveEntityMetrics } from './snapshotLoader'
import { useLogStore } from '../state/logStore'

function respondWith(body: string, status = 200) {
  return vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) => new Response(body, { status }))
}

const SAMPLE = {
  last_updated: '2026-01-05T08:15:00Z',
  entities: {
    AFK: { health_score: 86, pending_items: 3, status: 'Active', recent_activity: 'Harvest report received', activity_count: 12 },
    GAKC: { health_score: '55', pending_items: 7.4, status: 'Delayed' },
  },
  email_summary: {
    unread_count: 14,
    priority_emails: [{ subject: 'Harvest schedule', from: 'farm@example.com', entity: 'AFK', priority: 'high' }, 'junk'],
  },
  calendar_summary: { events_today: 4 },
  system_health: { pending_tasks: 6 },
  alerts: { count: 1, items: [{ type: 'security', severity: 'HIGH', message: 'New sign-in' }] },
}

describe('parseSnapshot', () => {
  it('maps the wire format onto the snapshot model', () => {
    const snapshot = parseSnapshot(SAMPLE)
    expect(snapshot.lastUpdated).toBe('2026-01-05T08:15:00Z')
    expect(snapshot.entities.AFK).toEqual({
      healthScore: 86,
      pendingItems: 3,
      status: 'Active',
      recentActivity: 'Harvest report received',
      activityCount: 12,
    })
    expect(snapshot.emailSummary.unreadCount).toBe(14)
    expect(snapshot.emailSummary.priorityEmails).toEqual([
      { subject: 'Harvest schedule', from: 'farm@example.com', entity: 'AFK', priority: 'high' },
    ])
    expect(snapshot.calendarSummary.eventsToday).toBe(4)
    expect(snapshot.systemHealth.pendingTasks).toBe(6)
    expect(snapshot.alerts).toEqual({ count: 1, items: [{ type: 'security', severity: 'high', message: 'New sign-in' }] })
  })

  it('coerces numeric strings and rounds counts', () => {
    const gakc = parseSnapshot(SAMPLE).entities.GAKC
    expect(gakc.healthScore).toBe(55)
    expect(gakc.pendingItems).toBe(7)
    expect(gakc.recentActivity).toBe('No recent activity')
    expect(gakc.activityCount).toBeNull()
  })

  it('clamps health into 0..100', () => {
    const snapshot = parseSnapshot({ entities: { A: { health_score: 140 }, B: { health_score: -5 } } })
    expect(snapshot.entities.A.healthScore).toBe(100)
    expect(snapshot.entities.B.healthScore).toBe(0)
  })

  it('fills absent sections with empty values', () => {
    const snapshot = parseSnapshot({})
    expect(snapshot).toEqual({
      entities: {},
      emailSummary: { unreadCount: null, priorityEmails: [] },
      calendarSummary: { eventsToday: null },
      systemHealth: { pendingTasks: null },
      alerts: { count: 0, items: [] },
      lastUpdated: null,
    })
  })

  it('rejects a non-object document', () => {
    expect(() => parseSnapshot([1, 2])).toThrow('Snapshot JSON must be an object')
    expect(() => parseSnapshot('text')).toThrow('Snapshot JSON must be an object')
  })
})

describe('resolveEntityMetrics', () => {
  it('falls back to defaults for unreported entities', () => {
    expect(resolveEntityMetrics(null, 'AFK')).toEqual(DEFAULT_ENTITY_METRICS)
    expect(resolveEntityMetrics(parseSnapshot(SAMPLE), 'PRSL')).toEqual({
      healthScore: 80,
      pendingItems: 0,
      status: 'Active',
      recentActivity: 'No recent activity',
      activityCount: null,
    })
  })
})

describe('reportedEntityMetrics', () => {
  it('is null unless the snapshot reported the entity', () => {
    const snapshot = parseSnapshot(SAMPLE)
    expect(reportedEntityMetrics(null, 'AFK')).toBeNull()
    expect(reportedEntityMetrics(snapshot, 'PRSL')).toBeNull()
    expect(reportedEntityMetrics(snapshot, 'AFK')?.healthScore).toBe(86)
  })
})

describe('loadSnapshot', () => {
  beforeEach(() => {
    useLogStore.getState().clear()
  })

  it('returns the parsed snapshot', async () => {
    const fetchImpl = respondWith(JSON.stringify(SAMPLE))
    const snapshot = await loadSnapshot({ url: '/data/live_data.json', fetchImpl, timeoutMs: 1000 })
    expect(snapshot?.entities.AFK.healthScore).toBe(86)
    expect(fetchImpl.mock.calls[0][0]).toBe('/data/live_data.json')
  })

  it('treats 404 as absent without reporting an error', async () => {
    const onError = vi.fn()
    const snapshot = await loadSnapshot({ url: '/x', fetchImpl: respondWith('', 404), timeoutMs: 1000, onError })
    expect(snapshot).toBeNull()
    expect(onError).not.toHaveBeenCalled()
    expect(useLogStore.getState().entries.some((e) => e.level === 'error')).toBe(false)
  })

  it('reports malformed JSON and returns null', async () => {
    const onError = vi.fn()
    const snapshot = await loadSnapshot({ url: '/x', fetchImpl: respondWith('{oops'), timeoutMs: 1000, onError })
    expect(snapshot).toBeNull()
    expect(onError).toHaveBeenCalledTimes(1)
    expect(onError.mock.calls[0][0]).toMatch(/^Error loading live data: invalid JSON/)
  })

  it('reports a non-object document', async () => {
    const onError = vi.fn()
    await loadSnapshot({ url: '/x', fetchImpl: respondWith('[]'), timeoutMs: 1000, onError })
    expect(onError).toHaveBeenCalledWith('Error loading live data: Snapshot JSON must be an object')
  })

  it('reports server errors', async () => {
    const onError = vi.fn()
    await loadSnapshot({ url: '/x', fetchImpl: respondWith('boom', 500), timeoutMs: 1000, onError })
    expect(onError).toHaveBeenCalledWith('Error loading live data: server returned 500')
  })

  it('reports a read that never finishes', async () => {
    const onError = vi.fn()
    const fetchImpl = vi.fn((_input: RequestInfo | URL, _init?: RequestInit) => new Promise<Response>(() => undefined))
    const snapshot = await loadSnapshot({ url: '/x', fetchImpl, timeoutMs: 20, onError })
    expect(snapshot).toBeNull()
    expect(onError).toHaveBeenCalledWith('Error loading live data: Request timed out after 20ms')
  })
})
