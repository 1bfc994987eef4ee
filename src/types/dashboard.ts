// SPDX-License-Identifier: Apache-2.0
// Types for the entity registry, metrics snapshots, derived graphs, and build info

export type EntityLocation = 'Kenya' | 'USA'

export type EntityDescriptor = {
  code: string
  displayName: string
  icon: string
  color: string
  glowColor: string
  location: EntityLocation
  // Restricted/local-only data handling
  regulated: boolean
}

export type EntityMetrics = {
  healthScore: number
  pendingItems: number
  status: string
  recentActivity: string
  activityCount: number | null
}

export type PriorityEmail = {
  subject: string
  from: string
  entity: string | null
  priority: 'high' | 'normal'
}

export type AlertItem = {
  type: string
  severity: 'high' | 'medium' | 'low'
  message: string
}

export type MetricsSnapshot = {
  entities: Readonly<Record<string, EntityMetrics>>
  emailSummary: { unreadCount: number | null; priorityEmails: PriorityEmail[] }
  calendarSummary: { eventsToday: number | null }
  systemHealth: { pendingTasks: number | null }
  alerts: { count: number; items: AlertItem[] }
  lastUpdated: string | null
}

export type UniverseCategory = 'Core' | 'Kenya' | 'USA' | 'Healthcare'

export type GraphAnchor = { x: number; y: number }

export type GraphNodeBase = {
  id: string
  label: string
  size: number
  color: string
  glowColor: string
  tooltip: string
  pinned: boolean
  anchor: GraphAnchor | null
  entityCode: string | null
}

export type UniverseNode = GraphNodeBase & {
  category: UniverseCategory
  categoryIndex: number
}

export type OrbitRole = 'entity' | 'health' | 'pending' | 'status'

export type OrbitNode = GraphNodeBase & {
  role: OrbitRole
}

export type GraphEdge = {
  id: string
  source: string
  target: string
  kind: 'hub' | 'peer' | 'orbit'
  color: string
  width: number
  curveness: number
  opacity: number
}

export type UniverseGraph = {
  categories: ReadonlyArray<{ name: UniverseCategory; color: string }>
  nodes: ReadonlyArray<UniverseNode>
  edges: ReadonlyArray<GraphEdge>
}

export type OrbitGraph = {
  entity: EntityDescriptor
  metrics: EntityMetrics
  // False when the snapshot has no entry for the entity and metrics are defaults
  reported: boolean
  title: string
  nodes: ReadonlyArray<OrbitNode>
  edges: ReadonlyArray<GraphEdge>
}

export type BuildInfo = {
  buildNumber: string // canonical five-character identifier derived from epoch minutes
  epochMinutes: number
  semver: string
  gitSha: string
  builtAtIso: string
  versionBuild: string
}

export type Layout = 'force' | 'sphere' | 'grid'

// Tabs that group registry entities by line of business.
export type EntityTabKey = 'farm' | 'properties' | 'healthcare'

export type DashboardTab = 'universe' | 'overview' | EntityTabKey | 'admin'
