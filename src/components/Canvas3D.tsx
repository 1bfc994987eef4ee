// SPDX-License-Identifier: Apache-2.0
import React, { useMemo } from 'react'
import { Canvas } from '@react-three/fiber'
import GraphScene, { CAMERA_HOME, type GraphSceneProps } from './GraphScene'
import { generatePositions } from '../services/layoutEngine'

type Canvas3DProps = Omit<GraphSceneProps, 'positions'> & {
  height?: number | string
  onClearFocus?: () => void
}

export default function Canvas3D({ nodes, edges, layout, focusedId, onSelectNode, onClearFocus, height = 520 }: Canvas3DProps): JSX.Element {
  const positions = useMemo(() => generatePositions({ graph: { nodes, edges }, layout }), [nodes, edges, layout])
  return (
    <div style={{ width: '100%', height, borderRadius: 12, overflow: 'hidden' }}>
      <Canvas
        camera={{ position: CAMERA_HOME, near: 0.1, far: 10000 }}
        onPointerMissed={() => onClearFocus?.()}
        style={{ background: 'linear-gradient(to bottom, #0a0a0a, #1a1a2e)' }}
      >
        <GraphScene
          nodes={nodes}
          edges={edges}
          positions={positions}
          layout={layout}
          focusedId={focusedId}
          onSelectNode={onSelectNode}
        />
      </Canvas>
    </div>
  )
}
