// SPDX-License-Identifier: Apache-2.0
import React from 'react'
import type { EntityDescriptor, EntityMetrics } from '../types/dashboard'
import { PLACEHOLDER } from '../services/overviewMetrics'

const statStyle: React.CSSProperties = {
  flex: 1,
  minWidth: 110,
  background: 'rgba(255,255,255,0.04)',
  border: '1px solid rgba(255,255,255,0.08)',
  borderRadius: 10,
  padding: '10px 12px',
}

function Stat({ label, value }: { label: string; value: string }) {
  return (
    <div style={statStyle}>
      <div style={{ fontSize: 11, color: 'rgba(255,255,255,0.6)' }}>{label}</div>
      <div style={{ fontSize: 20, fontWeight: 600, marginTop: 2 }} aria-label={label}>
        {value}
      </div>
    </div>
  )
}

/** Quick stats for one entity. `metrics` is null when the snapshot did not report it; values then show as "--". */
export default function EntityDetailPanel({
  entity,
  metrics: reported,
}: {
  entity: EntityDescriptor
  metrics: EntityMetrics | null
}): JSX.Element {
  return (
    <section aria-label={`${entity.displayName} details`} style={{ display: 'flex', flexDirection: 'column', gap: 10 }}>
      {entity.regulated && (
        <div
          role="note"
          style={{
            background: 'rgba(255,215,0,0.12)',
            border: '1px solid rgba(255,215,0,0.4)',
            color: '#FFD700',
            borderRadius: 8,
            padding: '8px 12px',
            fontSize: 13,
          }}
        >
          ⚠️ Regulated data: records for this entity are processed locally only and never leave this network.
        </div>
      )}
      <div style={{ display: 'flex', gap: 10, flexWrap: 'wrap' }}>
        <Stat label="Health Score" value={reported ? `${reported.healthScore}%` : `${PLACEHOLDER}%`} />
        <Stat label="Pending Items" value={reported ? String(reported.pendingItems) : PLACEHOLDER} />
        <Stat label="Status" value={reported ? reported.status : 'Unknown'} />
        <Stat label="Location" value={entity.location} />
      </div>
      <div style={{ fontSize: 12, color: 'rgba(255,255,255,0.6)' }}>
        Recent Activity: {reported ? reported.recentActivity : 'No recent activity'}
      </div>
    </section>
  )
}
