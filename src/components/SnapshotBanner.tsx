// SPDX-License-Identifier: Apache-2.0
import React from 'react'
import type { SnapshotStatus } from '../state/store'

export default function SnapshotBanner({ status, error }: { status: SnapshotStatus; error: string | null }): JSX.Element | null {
  if (status === 'ready') return null
  if (status === 'error') {
    return (
      <div
        role="alert"
        style={{
          background: 'rgba(255,0,85,0.12)',
          border: '1px solid rgba(255,0,85,0.4)',
          borderRadius: 8,
          padding: '8px 12px',
          fontSize: 13,
        }}
      >
        {error ?? 'Error loading live data'}. Showing defaults until the next refresh.
      </div>
    )
  }
  return (
    <div
      role="status"
      style={{
        background: 'rgba(0,212,255,0.1)',
        border: '1px solid rgba(0,212,255,0.3)',
        borderRadius: 8,
        padding: '8px 12px',
        fontSize: 13,
      }}
    >
      {status === 'loading' ? 'Loading live data...' : 'Waiting for the first live data snapshot...'}
    </div>
  )
}
