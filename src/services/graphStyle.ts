// SPDX-License-Identifier: Apache-2.0
export type Vec3 = [number, number, number]

// Normalized layout space [0,1]^3 is stretched to this many world units.
export const WORLD_SPREAD = 400
// World units per node-size unit; the core (size 100) renders with radius 18.
export const RADIUS_PER_SIZE = 0.18

export function toWorld(position: Vec3): Vec3 {
  return [(position[0] - 0.5) * WORLD_SPREAD, (position[1] - 0.5) * WORLD_SPREAD, (position[2] - 0.5) * WORLD_SPREAD]
}

const HEX8 = /^#([0-9a-f]{6})([0-9a-f]{2})$/i

// three.js colors take no alpha channel, so #RRGGBBAA is split into color + opacity.
export function splitHexAlpha(color: string): { color: string; alpha: number } {
  const match = HEX8.exec(color.trim())
  if (!match) return { color, alpha: 1 }
  return { color: `#${match[1]}`, alpha: Number.parseInt(match[2], 16) / 255 }
}

export function edgeOpacity(color: string, opacity: number): number {
  const { alpha } = splitHexAlpha(color)
  return Math.min(1, Math.max(0.1, opacity * alpha))
}

// Control point offset perpendicular to the edge in the view plane, scaled by curveness.
export function curveMidpoint(start: Vec3, end: Vec3, curveness: number): Vec3 {
  const dx = end[0] - start[0]
  const dy = end[1] - start[1]
  return [
    (start[0] + end[0]) / 2 - dy * curveness,
    (start[1] + end[1]) / 2 + dx * curveness,
    (start[2] + end[2]) / 2,
  ]
}
