// SPDX-License-Identifier: Apache-2.0
import React, { useCallback, useEffect, useRef, useState } from 'react'
import type { Group } from 'three'
import { useFrame, useThree } from '@react-three/fiber'
import { TrackballControls } from '@react-three/drei'
import { animate } from 'framer-motion'
import GraphNode from './GraphNode'
import GraphEdgeLine from './GraphEdgeLine'
import type { GraphEdge, GraphNodeBase, Layout } from '../types/dashboard'
import { toWorld, type Vec3 } from '../services/graphStyle'

type ControlsHandle = React.ElementRef<typeof TrackballControls>

export const CAMERA_HOME: Vec3 = [0, 0, 520]
const FOCUS_DISTANCE = 160
const IDLE_ROTATE_DELAY_MS = 15_000
const TARGET_SPEED = 0.05
const ACCELERATION = 0.5

export type GraphSceneProps = {
  nodes: ReadonlyArray<GraphNodeBase>
  edges: ReadonlyArray<GraphEdge>
  positions: Record<string, Vec3>
  layout: Layout
  focusedId: string | null
  onSelectNode: (node: GraphNodeBase) => void
}

export default function GraphScene({ nodes, edges, positions, layout, focusedId, onSelectNode }: GraphSceneProps): JSX.Element {
  const { camera } = useThree()
  const groupRef = useRef<Group>(null)
  const controlsRef = useRef<ControlsHandle>(null)
  const idleTimerRef = useRef<ReturnType<typeof setTimeout> | null>(null)
  const rotationVelocityRef = useRef(0)
  const [isAutoRotating, setIsAutoRotating] = useState(false)

  const stopIdleTimer = useCallback(() => {
    if (idleTimerRef.current !== null) clearTimeout(idleTimerRef.current)
    idleTimerRef.current = null
  }, [])

  const restartIdleTimer = useCallback(() => {
    stopIdleTimer()
    idleTimerRef.current = setTimeout(() => setIsAutoRotating(true), IDLE_ROTATE_DELAY_MS)
  }, [stopIdleTimer])

  const handleInteractionStart = () => {
    setIsAutoRotating(false)
    stopIdleTimer()
    rotationVelocityRef.current = 0
  }

  useEffect(() => stopIdleTimer, [stopIdleTimer])

  // Fly the camera to the focused node, or home when focus clears or the layout changes
  useEffect(() => {
    const controls = controlsRef.current
    const group = groupRef.current
    if (!controls || !group) return

    const local = focusedId ? positions[focusedId] : undefined
    let target: Vec3 = [0, 0, 0]
    let eye: Vec3 = CAMERA_HOME
    if (local) {
      setIsAutoRotating(false)
      stopIdleTimer()
      rotationVelocityRef.current = 0
      const [lx, ly, lz] = toWorld(local)
      const ry = group.rotation.y
      target = [lx * Math.cos(ry) + lz * Math.sin(ry), ly, -lx * Math.sin(ry) + lz * Math.cos(ry)]
      const offset = camera.position.clone().sub(controls.target)
      if (offset.lengthSq() === 0) offset.set(0, 0, 1)
      offset.normalize().multiplyScalar(FOCUS_DISTANCE)
      eye = [target[0] + offset.x, target[1] + offset.y, target[2] + offset.z]
    } else {
      restartIdleTimer()
    }

    const options = { duration: 0.8, ease: 'easeInOut' as const }
    const controlsTarget = controls.target
    const anims = [
      animate(controlsTarget.x, target[0], { ...options, onUpdate: (v) => (controlsTarget.x = v) }),
      animate(controlsTarget.y, target[1], { ...options, onUpdate: (v) => (controlsTarget.y = v) }),
      animate(controlsTarget.z, target[2], { ...options, onUpdate: (v) => (controlsTarget.z = v) }),
      animate(camera.position.x, eye[0], { ...options, onUpdate: (v) => (camera.position.x = v) }),
      animate(camera.position.y, eye[1], { ...options, onUpdate: (v) => (camera.position.y = v) }),
      animate(camera.position.z, eye[2], { ...options, onUpdate: (v) => (camera.position.z = v) }),
    ]
    return () => anims.forEach((a) => a.stop())
  }, [focusedId, positions, layout, camera, restartIdleTimer, stopIdleTimer])

  // Grid layouts face the camera squarely
  useEffect(() => {
    const group = groupRef.current
    if (!group || layout !== 'grid') return
    const anim = animate(group.rotation.y, 0, { duration: 0.8, ease: 'easeInOut', onUpdate: (v) => (group.rotation.y = v) })
    return () => anim.stop()
  }, [layout])

  useFrame((_, delta) => {
    const goal = isAutoRotating ? TARGET_SPEED : 0
    const velocity = rotationVelocityRef.current + (goal - rotationVelocityRef.current) * ACCELERATION * delta
    rotationVelocityRef.current = velocity
    const group = groupRef.current
    if (group && Math.abs(velocity) > 0.0001 && layout !== 'grid') group.rotation.y += velocity * delta
    controlsRef.current?.update()
  })

  const connected = new Set<string>()
  if (focusedId) {
    connected.add(focusedId)
    edges.forEach((edge) => {
      if (edge.source === focusedId) connected.add(edge.target)
      if (edge.target === focusedId) connected.add(edge.source)
    })
  }

  return (
    <>
      <ambientLight intensity={0.8} />
      <directionalLight position={[10, 10, 5]} intensity={1} />
      <pointLight position={[-10, -10, -5]} intensity={0.5} />

      <TrackballControls
        ref={controlsRef}
        onStart={handleInteractionStart}
        onEnd={restartIdleTimer}
        minDistance={40}
        maxDistance={1500}
        panSpeed={0.8}
        rotateSpeed={1.0}
        zoomSpeed={0.8}
      />

      <group ref={groupRef}>
        {edges.map((edge) => {
          const a = positions[edge.source]
          const b = positions[edge.target]
          if (!a || !b) return null
          const dim = focusedId !== null && !(connected.has(edge.source) && connected.has(edge.target))
          return <GraphEdgeLine key={edge.id} edge={edge} start={toWorld(a)} end={toWorld(b)} dim={dim} />
        })}
        {nodes.map((node) => {
          const pos = positions[node.id]
          if (!pos) return null
          return (
            <GraphNode
              key={node.id}
              node={node}
              position={toWorld(pos)}
              highlight={focusedId === node.id}
              dim={focusedId !== null && !connected.has(node.id)}
              onSelect={onSelectNode}
            />
          )
        })}
      </group>
    </>
  )
}
