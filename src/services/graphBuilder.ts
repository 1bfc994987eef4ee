// SPDX-License-Identifier: Apache-2.0
// Registry + metrics snapshot -> node/edge descriptions for the universe and orbit views.
// Everything here is pure; layout physics lives in layoutEngine.
import type { EntityRegistry } from '../config/entities'
import type {
  EntityDescriptor,
  GraphEdge,
  MetricsSnapshot,
  OrbitGraph,
  OrbitNode,
  UniverseCategory,
  UniverseGraph,
  UniverseNode,
} from '../types/dashboard'
import { resolveEntityMetrics } from './snapshotLoader'

export const CORE_NODE_ID = 'core'
export const CORE_GLOW = '#00D4FF'

export const STATUS_COLORS = {
  green: '#00FF94',
  yellow: '#FFD700',
  red: '#FF0055',
  orange: '#FF6B35',
} as const

export const UNIVERSE_CATEGORIES: ReadonlyArray<{ name: UniverseCategory; color: string }> = Object.freeze([
  { name: 'Core', color: CORE_GLOW },
  { name: 'Kenya', color: '#00FF94' },
  { name: 'USA', color: '#FF0055' },
  { name: 'Healthcare', color: '#00B8FF' },
])

const PEER_EDGE_COLORS = {
  Kenya: '#00FF9433',
  USA: '#FF005533',
} as const

export function nodeSizeForHealth(healthScore: number): number {
  return 30 + (healthScore / 100) * 40
}

// Regulated status wins over location.
export function categoryFor(entity: EntityDescriptor): UniverseCategory {
  if (entity.regulated) return 'Healthcare'
  if (entity.location === 'Kenya') return 'Kenya'
  return 'USA'
}

export function categoryIndexOf(category: UniverseCategory): number {
  return UNIVERSE_CATEGORIES.findIndex((c) => c.name === category)
}

export function healthColor(healthScore: number): string {
  if (healthScore >= 80) return STATUS_COLORS.green
  if (healthScore >= 60) return STATUS_COLORS.yellow
  return STATUS_COLORS.red
}

export function pendingColor(pendingItems: number): string {
  return pendingItems > 0 ? STATUS_COLORS.orange : STATUS_COLORS.green
}

export function statusColor(status: string): string {
  return status === 'Active' ? STATUS_COLORS.green : STATUS_COLORS.red
}

export function entityLabel(entity: EntityDescriptor): string {
  return `${entity.icon} ${entity.code}`
}

function pairEdges(members: EntityDescriptor[], color: string): GraphEdge[] {
  const edges: GraphEdge[] = []
  members.forEach((a, i) => {
    members.slice(i + 1).forEach((b) => {
      edges.push({
        id: `peer:${a.code}:${b.code}`,
        source: a.code,
        target: b.code,
        kind: 'peer',
        color,
        width: 1,
        curveness: 0.2,
        opacity: 0.2,
      })
    })
  })
  return edges
}

export function buildUniverseGraph(registry: EntityRegistry, snapshot: MetricsSnapshot | null): UniverseGraph {
  const entities = registry.listEntities()

  const core: UniverseNode = {
    id: CORE_NODE_ID,
    label: 'COMMAND\nCORE',
    size: 100,
    color: CORE_GLOW,
    glowColor: CORE_GLOW,
    tooltip: 'Command Center',
    pinned: true,
    anchor: { x: 400, y: 300 },
    entityCode: null,
    category: 'Core',
    categoryIndex: 0,
  }

  const entityNodes = entities.map((entity): UniverseNode => {
    const { healthScore, pendingItems } = resolveEntityMetrics(snapshot, entity.code)
    const category = categoryFor(entity)
    return {
      id: entity.code,
      label: entityLabel(entity),
      size: nodeSizeForHealth(healthScore),
      color: entity.color,
      glowColor: entity.glowColor,
      tooltip: `${entity.displayName}\nHealth: ${healthScore}%\nPending: ${pendingItems}`,
      pinned: false,
      anchor: null,
      entityCode: entity.code,
      category,
      categoryIndex: categoryIndexOf(category),
    }
  })

  const hubEdges = entities.map(
    (entity): GraphEdge => ({
      id: `hub:${entity.code}`,
      source: CORE_NODE_ID,
      target: entity.code,
      kind: 'hub',
      color: entity.color,
      width: 2,
      curveness: 0.1,
      opacity: 0.6,
    })
  )

  const kenya = entities.filter((e) => e.location === 'Kenya')
  // Regulated entities stay out of USA peer links (compliance boundary).
  const usa = entities.filter((e) => e.location === 'USA' && !e.regulated)

  return Object.freeze({
    categories: UNIVERSE_CATEGORIES,
    nodes: Object.freeze([core, ...entityNodes]),
    edges: Object.freeze([...hubEdges, ...pairEdges(kenya, PEER_EDGE_COLORS.Kenya), ...pairEdges(usa, PEER_EDGE_COLORS.USA)]),
  })
}

export function buildOrbitGraph(
  registry: EntityRegistry,
  snapshot: MetricsSnapshot | null,
  code: string
): OrbitGraph | null {
  const entity = registry.findEntity(code)
  if (!entity) return null

  const metrics = resolveEntityMetrics(snapshot, entity.code)
  const { healthScore, pendingItems, status } = metrics

  const satellite = (role: OrbitNode['role'], label: string, size: number, color: string): OrbitNode => ({
    id: `${entity.code}:${role}`,
    label,
    size,
    color,
    glowColor: color,
    tooltip: label.replace('\n', ': '),
    pinned: false,
    anchor: null,
    entityCode: entity.code,
    role,
  })

  const center: OrbitNode = {
    id: entity.code,
    label: entityLabel(entity),
    size: 80,
    color: entity.color,
    glowColor: entity.glowColor,
    tooltip: `${entity.displayName}\nStatus: ${status}`,
    pinned: true,
    anchor: { x: 300, y: 200 },
    entityCode: entity.code,
    role: 'entity',
  }

  const satellites = [
    satellite('health', `Health\n${healthScore}%`, 40, healthColor(healthScore)),
    satellite('pending', `Pending\n${pendingItems}`, 35, pendingColor(pendingItems)),
    satellite('status', `Status\n${status}`, 35, statusColor(status)),
  ]

  const edges = satellites.map(
    (node): GraphEdge => ({
      id: `orbit:${node.id}`,
      source: center.id,
      target: node.id,
      kind: 'orbit',
      color: entity.color,
      width: 2,
      curveness: 0,
      opacity: 0.6,
    })
  )

  return Object.freeze({
    entity,
    metrics,
    reported: Boolean(snapshot?.entities[entity.code]),
    title: `${entity.icon} ${entity.displayName} Orbit`,
    nodes: Object.freeze([center, ...satellites]),
    edges: Object.freeze(edges),
  })
}
