// SPDX-License-Identifier: Apache-2.0
import React from 'react'
import type { BuildInfo } from '../types/dashboard'
import { formatVersionBuildForDisplay } from '../config/buildInfo'
import { ENTITY_REGISTRY } from '../config/entities'

// Shown over the shell while the first snapshot read is under way.
export default function SplashScreen({ buildInfo }: { buildInfo: BuildInfo }): JSX.Element {
  return (
    <div
      role="presentation"
      style={{
        position: 'fixed',
        inset: 0,
        zIndex: 1500,
        display: 'grid',
        placeItems: 'center',
        background: 'radial-gradient(circle at center, #1a0a2e 0%, #050510 70%)',
        color: 'white',
      }}
    >
      <div style={{ textAlign: 'center' }}>
        <div style={{ fontSize: 42 }}>🎯</div>
        <div style={{ fontSize: 22, fontWeight: 700, letterSpacing: 1, margin: '6px 0' }}>Command Center</div>
        <div style={{ display: 'flex', justifyContent: 'center', gap: 10, fontSize: 22, margin: '12px 0' }}>
          {ENTITY_REGISTRY.listEntities().map((entity) => (
            <span key={entity.code} title={entity.code} style={{ filter: `drop-shadow(0 0 6px ${entity.color})` }}>
              {entity.icon}
            </span>
          ))}
        </div>
        <div style={{ fontSize: 12, color: 'rgba(255,255,255,0.6)' }}>
          {formatVersionBuildForDisplay(buildInfo.versionBuild)} · build {buildInfo.buildNumber}
        </div>
      </div>
    </div>
  )
}
