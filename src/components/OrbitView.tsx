// SPDX-License-Identifier: Apache-2.0
import React, { useMemo, useState } from 'react'
import Canvas3D from './Canvas3D'
import EntityDetailPanel from './EntityDetailPanel'
import { ENTITY_REGISTRY } from '../config/entities'
import { buildOrbitGraph } from '../services/graphBuilder'
import type { MetricsSnapshot } from '../types/dashboard'

type OrbitFocus = { code: string; nodeId: string }

export default function OrbitView({ code, snapshot }: { code: string; snapshot: MetricsSnapshot | null }): JSX.Element | null {
  const orbit = useMemo(() => buildOrbitGraph(ENTITY_REGISTRY, snapshot, code), [snapshot, code])
  // Focus belongs to the orbit it was made in; switching entities drops it.
  const [focus, setFocus] = useState<OrbitFocus | null>(null)
  if (!orbit) return null

  const focusedId = focus?.code === code ? focus.nodeId : null

  return (
    <div style={{ display: 'flex', flexDirection: 'column', gap: 12 }}>
      <h3 style={{ margin: 0 }}>{orbit.title}</h3>
      <Canvas3D
        nodes={orbit.nodes}
        edges={orbit.edges}
        layout="force"
        focusedId={focusedId}
        onSelectNode={(node) => setFocus({ code, nodeId: node.id })}
        onClearFocus={() => setFocus(null)}
        height={400}
      />
      <EntityDetailPanel entity={orbit.entity} metrics={orbit.reported ? orbit.metrics : null} />
    </div>
  )
}
