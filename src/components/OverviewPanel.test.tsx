// SPDX-License-Identifier: Apache-2.0
import React from 'react'
import { describe, expect, it, vi } from 'vitest'
import { render, screen, within } from '@testing-library/react'
import OverviewPanel from './OverviewPanel'
import { parseSnapshot } from '../services/snapshotLoader'

// recharts needs real layout measurements
vi.mock('./MetricsCharts', () => ({
  TodayMetricsChart: () => null,
  ActivityPieChart: () => null,
}))

const snapshot = parseSnapshot({
  entities: { AFK: { health_score: 92, pending_items: 3, status: 'Harvest' } },
  email_summary: {
    unread_count: 12,
    priority_emails: [
      { subject: 'Board meeting moved to Friday', from: 'ops@example.test', entity: 'GAKP', priority: 'high' },
      { subject: 'Invoice received', from: 'billing@example.test' },
    ],
  },
  calendar_summary: { events_today: 4 },
  system_health: { pending_tasks: 6 },
  alerts: { count: 1, items: [{ type: 'security', severity: 'high', message: 'Door left open' }] },
})

describe('OverviewPanel', () => {
  it('shows placeholders before the first snapshot', () => {
    render(<OverviewPanel snapshot={null} />)
    const emails = screen.getByTestId('card-emails')
    expect(within(emails).getByText('--')).toBeInTheDocument()
    expect(within(emails).getByText('Loading...')).toBeInTheDocument()
    expect(within(screen.getByTestId('card-automation')).getByText('Online')).toBeInTheDocument()
    expect(screen.getByLabelText('AFK status')).toHaveTextContent('Health: --')
    expect(screen.getByText('No recent emails')).toBeInTheDocument()
    expect(screen.getByText('No urgent alerts')).toBeInTheDocument()
  })

  it('renders the snapshot counts, emails and alerts', () => {
    render(<OverviewPanel snapshot={snapshot} />)
    expect(within(screen.getByTestId('card-emails')).getByText('12')).toBeInTheDocument()
    expect(within(screen.getByTestId('card-alerts')).getByText('urgent')).toBeInTheDocument()
    expect(screen.getByLabelText('AFK status')).toHaveTextContent('Health: 92%')
    expect(screen.getByLabelText('AFK status')).toHaveTextContent('Status: Harvest')
    expect(screen.getByLabelText('PRSL status')).toHaveTextContent('Pending: --')

    expect(screen.getByText('🔴 Board meeting moved to Friday')).toBeInTheDocument()
    expect(screen.getByText('From: ops@example.test | Entity: GAKP')).toBeInTheDocument()
    expect(screen.getByText('📧 Invoice received')).toBeInTheDocument()
    expect(screen.getByText('From: billing@example.test | Entity: --')).toBeInTheDocument()

    expect(screen.getByRole('alert')).toHaveTextContent('SECURITY: Door left open')
  })
})
