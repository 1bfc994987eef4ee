// SPDX-License-Identifier: Apache-2.0
import React from 'react'
import { describe, expect, it } from 'vitest'
import { render, screen } from '@testing-library/react'
import EntityDetailPanel from './EntityDetailPanel'
import { ENTITY_REGISTRY } from '../config/entities'
import { parseSnapshot, reportedEntityMetrics } from '../services/snapshotLoader'
import type { EntityDescriptor } from '../types/dashboard'

function entity(code: string): EntityDescriptor {
  const found = ENTITY_REGISTRY.findEntity(code)
  if (!found) throw new Error(`missing entity ${code}`)
  return found
}

describe('EntityDetailPanel', () => {
  it('shows reported metrics', () => {
    const snapshot = parseSnapshot({
      entities: { AFK: { health_score: 88, pending_items: 2, status: 'Planting', recent_activity: 'Seed order placed' } },
    })
    render(<EntityDetailPanel entity={entity('AFK')} metrics={reportedEntityMetrics(snapshot, 'AFK')} />)
    expect(screen.getByLabelText('Health Score')).toHaveTextContent('88%')
    expect(screen.getByLabelText('Pending Items')).toHaveTextContent('2')
    expect(screen.getByLabelText('Status')).toHaveTextContent('Planting')
    expect(screen.getByLabelText('Location')).toHaveTextContent('Kenya')
    expect(screen.getByText('Recent Activity: Seed order placed')).toBeInTheDocument()
    expect(screen.queryByRole('note')).not.toBeInTheDocument()
  })

  it('falls back to placeholders when the entity is not reported', () => {
    render(<EntityDetailPanel entity={entity('GIFP')} metrics={null} />)
    expect(screen.getByLabelText('Health Score')).toHaveTextContent('--%')
    expect(screen.getByLabelText('Pending Items')).toHaveTextContent('--')
    expect(screen.getByLabelText('Status')).toHaveTextContent('Unknown')
    expect(screen.getByText('Recent Activity: No recent activity')).toBeInTheDocument()
  })

  it('flags regulated entities', () => {
    render(<EntityDetailPanel entity={entity('COMF')} metrics={null} />)
    expect(screen.getByRole('note')).toHaveTextContent('processed locally only')
    expect(screen.getByRole('region', { name: 'Comfort Services details' })).toBeInTheDocument()
  })
})
