// SPDX-License-Identifier: Apache-2.0
import React, { useMemo } from 'react'
import EntityDetailPanel from './EntityDetailPanel'
import { ENTITY_REGISTRY } from '../config/entities'
import { resolveEntityTab, type EntityTabConfig } from '../config/entityTabs'
import { reportedEntityMetrics } from '../services/snapshotLoader'
import { selectEntity, setActiveTab } from '../state/actions'
import type { MetricsSnapshot } from '../types/dashboard'

const cardStyle: React.CSSProperties = {
  background: 'rgba(255,255,255,0.04)',
  border: '1px solid rgba(255,255,255,0.08)',
  borderRadius: 12,
  padding: 16,
  display: 'flex',
  flexDirection: 'column',
  gap: 10,
}

export default function EntityTabPanel({ tab, snapshot }: { tab: EntityTabConfig; snapshot: MetricsSnapshot | null }): JSX.Element {
  const members = useMemo(() => resolveEntityTab(ENTITY_REGISTRY, tab), [tab])

  return (
    <div style={{ display: 'flex', flexDirection: 'column', gap: 16 }}>
      <h2 style={{ margin: 0 }}>{tab.title}</h2>
      {members.map(({ entity, caption }) => (
        <article key={entity.code} style={{ ...cardStyle, borderColor: `${entity.color}55` }}>
          <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'flex-start', gap: 12 }}>
            <div>
              <h3 style={{ margin: 0, color: entity.color }}>{`${entity.icon} ${entity.displayName} (${entity.code})`}</h3>
              <div style={{ fontSize: 12, color: 'rgba(255,255,255,0.6)', marginTop: 2 }}>{caption}</div>
            </div>
            <button
              aria-label={`Open ${entity.code} orbit`}
              onClick={() => {
                selectEntity(entity.code)
                setActiveTab('universe')
              }}
              style={{
                padding: '6px 12px',
                borderRadius: 8,
                border: `1px solid ${entity.color}`,
                background: 'transparent',
                color: 'white',
                cursor: 'pointer',
                fontSize: 12,
              }}
            >
              🌌 Open orbit
            </button>
          </div>
          <EntityDetailPanel entity={entity} metrics={reportedEntityMetrics(snapshot, entity.code)} />
        </article>
      ))}
    </div>
  )
}
