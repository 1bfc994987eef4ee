// SPDX-License-Identifier: Apache-2.0
import React from 'react'
import { QuadraticBezierLine } from '@react-three/drei'
import type { GraphEdge } from '../types/dashboard'
import { curveMidpoint, edgeOpacity, splitHexAlpha, type Vec3 } from '../services/graphStyle'

export default function GraphEdgeLine({
  edge,
  start,
  end,
  dim,
}: {
  edge: GraphEdge
  start: Vec3
  end: Vec3
  dim: boolean
}): JSX.Element {
  const { color } = splitHexAlpha(edge.color)
  const opacity = edgeOpacity(edge.color, edge.opacity) * (dim ? 0.4 : 1)
  return (
    <QuadraticBezierLine
      start={start}
      end={end}
      mid={curveMidpoint(start, end, edge.curveness)}
      color={color}
      lineWidth={edge.width}
      transparent
      opacity={opacity}
    />
  )
}
