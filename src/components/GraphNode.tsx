// SPDX-License-Identifier: Apache-2.0
import React, { useEffect, useRef, useState } from 'react'
import type { Group } from 'three'
import { Billboard, Html, Sphere, Text } from '@react-three/drei'
import { animate } from 'framer-motion'
import type { GraphNodeBase } from '../types/dashboard'
import { RADIUS_PER_SIZE, splitHexAlpha } from '../services/graphStyle'

export default function GraphNode({
  node,
  position,
  highlight,
  dim,
  onSelect,
}: {
  node: GraphNodeBase
  position: [number, number, number]
  highlight: boolean
  dim: boolean
  onSelect: (node: GraphNodeBase) => void
}): JSX.Element {
  const groupRef = useRef<Group>(null)
  const [hovered, setHovered] = useState(false)
  const radius = node.size * RADIUS_PER_SIZE
  const glow = splitHexAlpha(node.glowColor)
  const opacity = highlight ? 1 : dim ? 0.25 : 0.85
  const [x, y, z] = position

  // Glide to the new layout position instead of jumping
  useEffect(() => {
    const group = groupRef.current
    if (!group) return
    const options = { duration: 1, ease: 'circInOut' as const }
    const controls = [
      animate(group.position.x, x, { ...options, onUpdate: (v) => (group.position.x = v) }),
      animate(group.position.y, y, { ...options, onUpdate: (v) => (group.position.y = v) }),
      animate(group.position.z, z, { ...options, onUpdate: (v) => (group.position.z = v) }),
    ]
    return () => controls.forEach((c) => c.stop())
  }, [x, y, z])

  return (
    <group
      ref={groupRef}
      onClick={(e) => {
        e.stopPropagation()
        onSelect(node)
      }}
      onPointerOver={(e) => {
        e.stopPropagation()
        setHovered(true)
      }}
      onPointerOut={() => setHovered(false)}
      scale={hovered ? 1.15 : 1}
    >
      <Sphere args={[radius, 32, 32]}>
        <meshStandardMaterial
          color={node.color}
          transparent
          opacity={opacity}
          emissive={glow.color}
          emissiveIntensity={highlight || hovered ? 0.6 : 0.25}
        />
      </Sphere>
      <Sphere args={[radius * 1.25, 24, 24]}>
        <meshBasicMaterial color={glow.color} transparent opacity={glow.alpha * 0.35} depthWrite={false} />
      </Sphere>

      <Billboard>
        <Text
          fontSize={Math.max(radius * 0.32, 3)}
          color="white"
          anchorX="center"
          anchorY="middle"
          textAlign="center"
          position={[0, -radius - 6, 0]}
          maxWidth={radius * 6}
          fillOpacity={dim ? 0.5 : 1}
        >
          {node.label}
        </Text>
      </Billboard>

      {hovered && (
        <Html center position={[0, radius + 8, 0]} style={{ pointerEvents: 'none' }}>
          <div
            style={{
              background: 'rgba(0,0,0,0.85)',
              color: 'white',
              border: `1px solid ${glow.color}`,
              borderRadius: 6,
              padding: '4px 8px',
              fontSize: 12,
              fontFamily: 'Inter, sans-serif',
              whiteSpace: 'pre-line',
            }}
          >
            {node.tooltip}
          </div>
        </Html>
      )}
    </group>
  )
}
