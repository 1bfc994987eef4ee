// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it } from 'vitest'
import {
  CORE_NODE_ID,
  STATUS_COLORS,
  buildOrbitGraph,
  buildUniverseGraph,
  categoryFor,
  healthColor,
  nodeSizeForHealth,
  pendingColor,
  statusColor,
} from './graphBuilder'
import { ENTITY_REGISTRY, createEntityRegistry } from '../config/entities'
import { parseSnapshot } from './snapshotLoader'
import type { EntityDescriptor, EntityLocation } from '../types/dashboard'

const entity = (code: string, location: EntityLocation, regulated = false): EntityDescriptor => ({
  code,
  displayName: code,
  icon: '•',
  color: '#abcdef',
  glowColor: '#abcdef55',
  location,
  regulated,
})

const snapshot = parseSnapshot({
  entities: {
    AFK: { health_score: 90, pending_items: 2, status: 'Active' },
    GAKP: { health_score: 59, pending_items: 0, status: 'Delayed' },
  },
})

describe('buildUniverseGraph', () => {
  it('builds the full node and edge sets from defaults when no snapshot exists', () => {
    const graph = buildUniverseGraph(ENTITY_REGISTRY, null)
    expect(graph.nodes.map((n) => n.id)).toEqual([CORE_NODE_ID, 'AFK', 'GAKP', 'GIFP', 'COMF', 'GAKC', 'PRSL'])
    graph.nodes.slice(1).forEach((n) => expect(n.size).toBeCloseTo(62, 10))
    expect(graph.edges.map((e) => e.id)).toEqual([
      'hub:AFK',
      'hub:GAKP',
      'hub:GIFP',
      'hub:COMF',
      'hub:GAKC',
      'hub:PRSL',
      'peer:AFK:GAKC',
      'peer:GAKP:GIFP',
      'peer:GAKP:PRSL',
      'peer:GIFP:PRSL',
    ])
  })

  it('pins the core node at its anchor', () => {
    const core = buildUniverseGraph(ENTITY_REGISTRY, null).nodes[0]
    expect(core).toMatchObject({ label: 'COMMAND\nCORE', size: 100, pinned: true, anchor: { x: 400, y: 300 }, category: 'Core' })
  })

  it('keeps regulated entities out of peer edges', () => {
    const graph = buildUniverseGraph(ENTITY_REGISTRY, snapshot)
    const peers = graph.edges.filter((e) => e.kind === 'peer')
    expect(peers.some((e) => e.source === 'COMF' || e.target === 'COMF')).toBe(false)
    expect(graph.edges.filter((e) => e.target === 'COMF').map((e) => e.kind)).toEqual(['hub'])
  })

  it('links only the Kenya pair when the USA side has a single unregulated member', () => {
    const registry = createEntityRegistry([
      entity('AFK', 'Kenya'),
      entity('GAKC', 'Kenya'),
      entity('GAKP', 'USA'),
      entity('COMF', 'USA', true),
    ])
    const peers = buildUniverseGraph(registry, null).edges.filter((e) => e.kind === 'peer')
    expect(peers.map((e) => [e.source, e.target])).toEqual([['AFK', 'GAKC']])
    expect(peers[0]).toMatchObject({ color: '#00FF9433', width: 1, curveness: 0.2 })
  })

  it('styles hub edges with the entity color', () => {
    const hub = buildUniverseGraph(ENTITY_REGISTRY, null).edges.find((e) => e.id === 'hub:GIFP')
    expect(hub).toMatchObject({ source: CORE_NODE_ID, target: 'GIFP', color: '#FFD700', width: 2, curveness: 0.1, opacity: 0.6 })
  })

  it('sizes nodes from health', () => {
    const graph = buildUniverseGraph(ENTITY_REGISTRY, snapshot)
    expect(graph.nodes.find((n) => n.id === 'AFK')?.size).toBeCloseTo(66, 10)
    expect(graph.nodes.find((n) => n.id === 'GAKP')?.size).toBeCloseTo(53.6, 10)
    expect(graph.nodes.find((n) => n.id === 'AFK')?.tooltip).toBe('Afro Farm Kenya\nHealth: 90%\nPending: 2')
  })

  it('categorizes regulated entities as Healthcare', () => {
    const graph = buildUniverseGraph(ENTITY_REGISTRY, null)
    expect(graph.nodes.find((n) => n.id === 'COMF')).toMatchObject({ category: 'Healthcare', categoryIndex: 3 })
    expect(graph.nodes.find((n) => n.id === 'GAKC')).toMatchObject({ category: 'Kenya', categoryIndex: 1 })
    expect(categoryFor(entity('X', 'Kenya', true))).toBe('Healthcare')
  })

  it('is idempotent for identical inputs', () => {
    expect(buildUniverseGraph(ENTITY_REGISTRY, snapshot)).toEqual(buildUniverseGraph(ENTITY_REGISTRY, snapshot))
  })

  it('returns a frozen value', () => {
    const graph = buildUniverseGraph(ENTITY_REGISTRY, null)
    expect(Object.isFrozen(graph)).toBe(true)
    expect(Object.isFrozen(graph.nodes)).toBe(true)
    expect(Object.isFrozen(graph.edges)).toBe(true)
  })
})

describe('nodeSizeForHealth', () => {
  it('stays within 30..70 and never shrinks as health rises', () => {
    let previous = -Infinity
    for (let health = 0; health <= 100; health += 1) {
      const size = nodeSizeForHealth(health)
      expect(size).toBeGreaterThanOrEqual(30)
      expect(size).toBeLessThanOrEqual(70)
      expect(size).toBeGreaterThanOrEqual(previous)
      previous = size
    }
  })
})

describe('status colors', () => {
  it('applies the health thresholds', () => {
    expect(healthColor(80)).toBe(STATUS_COLORS.green)
    expect(healthColor(79)).toBe(STATUS_COLORS.yellow)
    expect(healthColor(60)).toBe(STATUS_COLORS.yellow)
    expect(healthColor(59)).toBe(STATUS_COLORS.red)
  })

  it('colors pending work orange and idle green', () => {
    expect(pendingColor(1)).toBe(STATUS_COLORS.orange)
    expect(pendingColor(0)).toBe(STATUS_COLORS.green)
  })

  it('treats anything but Active as a problem status', () => {
    expect(statusColor('Active')).toBe(STATUS_COLORS.green)
    expect(statusColor('Delayed')).toBe(STATUS_COLORS.red)
  })
})

describe('buildOrbitGraph', () => {
  it('returns null for an unknown code', () => {
    expect(buildOrbitGraph(ENTITY_REGISTRY, null, 'ZZZZ')).toBeNull()
  })

  it('surrounds the entity with health, pending and status satellites', () => {
    const orbit = buildOrbitGraph(ENTITY_REGISTRY, snapshot, 'GAKP')
    expect(orbit?.title).toBe('🏢 GAK Properties Orbit')
    expect(orbit?.nodes.map((n) => [n.id, n.label, n.size, n.color])).toEqual([
      ['GAKP', '🏢 GAKP', 80, '#FF0055'],
      ['GAKP:health', 'Health\n59%', 40, STATUS_COLORS.red],
      ['GAKP:pending', 'Pending\n0', 35, STATUS_COLORS.green],
      ['GAKP:status', 'Status\nDelayed', 35, STATUS_COLORS.red],
    ])
    expect(orbit?.nodes[0]).toMatchObject({ pinned: true, anchor: { x: 300, y: 200 }, tooltip: 'GAK Properties\nStatus: Delayed' })
    expect(orbit?.nodes[1].tooltip).toBe('Health: 59%')
  })

  it('links every satellite to the center with the entity color', () => {
    const orbit = buildOrbitGraph(ENTITY_REGISTRY, null, 'AFK')
    expect(orbit?.edges.map((e) => [e.source, e.target, e.color, e.opacity, e.width])).toEqual([
      ['AFK', 'AFK:health', '#00FF94', 0.6, 2],
      ['AFK', 'AFK:pending', '#00FF94', 0.6, 2],
      ['AFK', 'AFK:status', '#00FF94', 0.6, 2],
    ])
  })

  it('says whether the snapshot reported the entity', () => {
    expect(buildOrbitGraph(ENTITY_REGISTRY, snapshot, 'GAKP')).toMatchObject({
      reported: true,
      metrics: { healthScore: 59, status: 'Delayed' },
    })
    expect(buildOrbitGraph(ENTITY_REGISTRY, null, 'AFK')).toMatchObject({
      reported: false,
      metrics: { healthScore: 80, pendingItems: 0, status: 'Active' },
    })
  })
})
