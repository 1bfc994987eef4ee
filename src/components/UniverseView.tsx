// SPDX-License-Identifier: Apache-2.0
import React, { useMemo } from 'react'
import Canvas3D from './Canvas3D'
import OrbitView from './OrbitView'
import { ENTITY_REGISTRY } from '../config/entities'
import { buildUniverseGraph } from '../services/graphBuilder'
import { selectEntity, setLayout } from '../state/actions'
import { useLayout, useSelectedEntity, useSnapshot } from '../state/store'
import type { Layout } from '../types/dashboard'

const LAYOUTS: ReadonlyArray<{ key: Layout; label: string }> = [
  { key: 'force', label: 'Force' },
  { key: 'sphere', label: 'Sphere' },
  { key: 'grid', label: 'Grid' },
]

function pillStyle(active: boolean, accent = '#00D4FF'): React.CSSProperties {
  return {
    padding: '6px 12px',
    borderRadius: 999,
    border: `1px solid ${active ? accent : 'rgba(255,255,255,0.15)'}`,
    background: active ? 'rgba(0,212,255,0.15)' : 'transparent',
    color: 'white',
    cursor: 'pointer',
    fontSize: 12,
  }
}

export default function UniverseView(): JSX.Element {
  const snapshot = useSnapshot()
  const layout = useLayout()
  const selectedEntity = useSelectedEntity()
  const universe = useMemo(() => buildUniverseGraph(ENTITY_REGISTRY, snapshot), [snapshot])

  return (
    <div style={{ display: 'flex', flexDirection: 'column', gap: 16 }}>
      <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center', flexWrap: 'wrap', gap: 12 }}>
        <h2 style={{ margin: 0 }}>🌌 Business Universe</h2>
        <div style={{ display: 'flex', gap: 6 }} role="group" aria-label="Layout">
          {LAYOUTS.map((option) => (
            <button key={option.key} onClick={() => setLayout(option.key)} style={pillStyle(layout === option.key)}>
              {option.label}
            </button>
          ))}
        </div>
      </div>

      <Canvas3D
        nodes={universe.nodes}
        edges={universe.edges}
        layout={layout}
        focusedId={selectedEntity}
        onSelectNode={(node) => selectEntity(node.entityCode)}
        onClearFocus={() => selectEntity(null)}
      />

      <div style={{ display: 'flex', gap: 16, fontSize: 12, color: 'rgba(255,255,255,0.75)' }}>
        {universe.categories.map((category) => (
          <span key={category.name}>
            <span style={{ color: category.color }}>●</span> {category.name}
          </span>
        ))}
      </div>

      <h3 style={{ margin: '8px 0 0' }}>🔭 Deep Dive: Entity Orbit View</h3>
      <div style={{ display: 'flex', gap: 8, flexWrap: 'wrap' }} role="group" aria-label="Entity orbit selector">
        {ENTITY_REGISTRY.listEntities().map((entity) => (
          <button
            key={entity.code}
            onClick={() => selectEntity(entity.code)}
            aria-pressed={selectedEntity === entity.code}
            style={pillStyle(selectedEntity === entity.code, entity.color)}
          >
            {entity.icon} {entity.code}
          </button>
        ))}
      </div>

      {selectedEntity && <OrbitView code={selectedEntity} snapshot={snapshot} />}
    </div>
  )
}
