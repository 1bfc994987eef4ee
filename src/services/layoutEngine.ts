// SPDX-License-Identifier: Apache-2.0
import type { Layout } from '../types/dashboard'

export type Position = [number, number, number]

export type LayoutGraph = {
  nodes: ReadonlyArray<{ id: string; pinned: boolean }>
  edges: ReadonlyArray<{ source: string; target: string }>
}

export interface PositionState {
  graph: LayoutGraph
  layout: Layout
}

const CENTER: Position = [0.5, 0.5, 0.5]

function fibonacciSpherePoint(i: number, n: number, radius: number): Position {
  // Golden angle in radians
  const g = Math.PI * (3 - Math.sqrt(5))
  const y = n > 1 ? 1 - (i / (n - 1)) * 2 : 0 // y goes from 1 to -1
  const r = Math.sqrt(1 - y * y)
  const theta = g * i
  const x = Math.cos(theta) * r
  const z = Math.sin(theta) * r
  return [x * radius + 0.5, y * radius + 0.5, z * radius + 0.5]
}

function spherePositions(state: PositionState): Record<string, Position> {
  const positions: Record<string, Position> = {}
  const free = state.graph.nodes.filter((node) => !node.pinned)
  state.graph.nodes.forEach((node) => {
    if (node.pinned) positions[node.id] = [...CENTER]
  })
  const n = Math.max(free.length, 1)
  free.forEach((node, i) => {
    positions[node.id] = fibonacciSpherePoint(i, n, 0.4)
  })
  return positions
}

function gridPositions(state: PositionState): Record<string, Position> {
  const positions: Record<string, Position> = {}
  const nodes = state.graph.nodes
  const gridSize = Math.max(1, Math.ceil(Math.sqrt(nodes.length)))
  nodes.forEach((node, i) => {
    const gx = i % gridSize
    const gy = Math.floor(i / gridSize)
    const nx = gridSize > 1 ? gx / (gridSize - 1) : 0.5
    const ny = gridSize > 1 ? gy / (gridSize - 1) : 0.5
    positions[node.id] = [nx, ny, 0.5]
  })
  return positions
}

export const FORCE_ITERATIONS = 150
const REPULSION = 0.002
const SPRING = 0.08
const REST_LENGTH = 0.3

// Deterministic relaxation: seeded from the sphere layout, fixed iteration count,
// step size cooled linearly. Pinned nodes never move.
function forcePositions(state: PositionState): Record<string, Position> {
  const seed = spherePositions(state)
  const ids = state.graph.nodes.map((node) => node.id)
  const pinned = new Set(state.graph.nodes.filter((node) => node.pinned).map((node) => node.id))
  const pos = new Map<string, Position>(
    ids.map((id): [string, Position] => {
      const [x, y, z] = seed[id]
      return [id, [x, y, z]]
    })
  )
  const edges = state.graph.edges.filter((edge) => pos.has(edge.source) && pos.has(edge.target))

  for (let iter = 0; iter < FORCE_ITERATIONS; iter += 1) {
    const maxStep = 0.05 * (1 - iter / FORCE_ITERATIONS)
    const disp = new Map<string, Position>(ids.map((id): [string, Position] => [id, [0, 0, 0]]))

    for (let i = 0; i < ids.length; i += 1) {
      for (let j = i + 1; j < ids.length; j += 1) {
        const a = pos.get(ids[i])
        const b = pos.get(ids[j])
        const da = disp.get(ids[i])
        const db = disp.get(ids[j])
        if (!a || !b || !da || !db) continue
        const delta: Position = [a[0] - b[0], a[1] - b[1], a[2] - b[2]]
        const distSq = Math.max(delta[0] ** 2 + delta[1] ** 2 + delta[2] ** 2, 1e-4)
        const dist = Math.sqrt(distSq)
        const force = REPULSION / distSq
        for (let k = 0; k < 3; k += 1) {
          const f = (delta[k] / dist) * force
          da[k] += f
          db[k] -= f
        }
      }
    }

    edges.forEach((edge) => {
      const a = pos.get(edge.source)
      const b = pos.get(edge.target)
      const da = disp.get(edge.source)
      const db = disp.get(edge.target)
      if (!a || !b || !da || !db) return
      const delta: Position = [b[0] - a[0], b[1] - a[1], b[2] - a[2]]
      const dist = Math.max(Math.sqrt(delta[0] ** 2 + delta[1] ** 2 + delta[2] ** 2), 1e-3)
      const force = SPRING * (dist - REST_LENGTH)
      for (let k = 0; k < 3; k += 1) {
        const f = (delta[k] / dist) * force
        da[k] += f
        db[k] -= f
      }
    })

    ids.forEach((id) => {
      if (pinned.has(id)) return
      const p = pos.get(id)
      const d = disp.get(id)
      if (!p || !d) return
      const len = Math.sqrt(d[0] ** 2 + d[1] ** 2 + d[2] ** 2)
      const scale = len > maxStep ? maxStep / len : 1
      for (let k = 0; k < 3; k += 1) p[k] += d[k] * scale
    })
  }

  const positions: Record<string, Position> = {}
  pos.forEach((p, id) => {
    positions[id] = p
  })
  return positions
}

export function generatePositions(state: PositionState): Record<string, Position> {
  switch (state.layout) {
    case 'grid':
      return gridPositions(state)
    case 'sphere':
      return spherePositions(state)
    case 'force':
    default:
      return forcePositions(state)
  }
}
