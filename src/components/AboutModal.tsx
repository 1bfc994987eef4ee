// SPDX-License-Identifier: Apache-2.0
import React from 'react'
import type { BuildInfo } from '../types/dashboard'
import { ENTITY_REGISTRY } from '../config/entities'
import { formatBuildLabel } from '../config/buildInfo'
import { getSettingsSnapshot } from '../state/settingsStore'

const rowStyle: React.CSSProperties = { display: 'flex', justifyContent: 'space-between', gap: 12, fontSize: 13, padding: '3px 0' }

function Row({ label, value }: { label: string; value: string }) {
  return (
    <div style={rowStyle}>
      <span style={{ color: 'rgba(255,255,255,0.6)' }}>{label}</span>
      <span style={{ fontFamily: 'monospace', textAlign: 'right', wordBreak: 'break-all' }}>{value}</span>
    </div>
  )
}

export default function AboutModal({ buildInfo, onClose }: { buildInfo: BuildInfo; onClose: () => void }): JSX.Element {
  const settings = getSettingsSnapshot()
  const entities = ENTITY_REGISTRY.listEntities()

  return (
    <div
      role="dialog"
      aria-modal="true"
      aria-label="About"
      onClick={onClose}
      style={{
        position: 'fixed',
        inset: 0,
        zIndex: 2000,
        display: 'grid',
        placeItems: 'center',
        background: 'rgba(5,5,16,0.7)',
      }}
    >
      <section
        onClick={(e) => e.stopPropagation()}
        style={{
          width: 460,
          padding: 22,
          borderRadius: 14,
          color: 'white',
          background: 'linear-gradient(180deg, #0b0b1e 0%, #1a0a2e 100%)',
          border: '1px solid rgba(0,212,255,0.3)',
          boxShadow: '0 0 40px rgba(0,212,255,0.15)',
        }}
      >
        <h2 style={{ margin: '0 0 4px' }}>🎯 Command Center</h2>
        <div style={{ fontSize: 12, color: 'rgba(255,255,255,0.6)', marginBottom: 14 }}>{formatBuildLabel(buildInfo)}</div>

        <Row label="Built" value={buildInfo.builtAtIso} />
        <Row label="Commit" value={buildInfo.gitSha} />
        <Row label="Snapshot source" value={settings.snapshotUrl} />
        <Row label="Automation host" value={settings.automationBaseUrl} />

        <div style={{ marginTop: 14, fontSize: 12, color: 'rgba(255,255,255,0.6)' }}>Tracking {ENTITY_REGISTRY.size} entities</div>
        <div style={{ display: 'flex', flexWrap: 'wrap', gap: 6, marginTop: 6 }}>
          {entities.map((entity) => (
            <span
              key={entity.code}
              title={entity.displayName}
              style={{ border: `1px solid ${entity.color}`, borderRadius: 999, padding: '2px 8px', fontSize: 12 }}
            >
              {entity.icon} {entity.code}
              {entity.regulated ? ' 🔒' : ''}
            </span>
          ))}
        </div>

        <button
          onClick={onClose}
          style={{
            display: 'block',
            marginLeft: 'auto',
            marginTop: 18,
            padding: '6px 14px',
            borderRadius: 8,
            cursor: 'pointer',
            color: 'white',
            background: 'rgba(0,212,255,0.2)',
            border: '1px solid rgba(0,212,255,0.4)',
          }}
        >
          Close
        </button>
      </section>
    </div>
  )
}
