// SPDX-License-Identifier: Apache-2.0
import React from 'react'
import { describe, expect, it } from 'vitest'
import { render, screen } from '@testing-library/react'
import SnapshotBanner from './SnapshotBanner'

describe('SnapshotBanner', () => {
  it('renders nothing once data is ready', () => {
    const { container } = render(<SnapshotBanner status="ready" error={null} />)
    expect(container).toBeEmptyDOMElement()
  })

  it('shows the load error', () => {
    render(<SnapshotBanner status="error" error="Error loading live data: Unexpected token" />)
    expect(screen.getByRole('alert')).toHaveTextContent(
      'Error loading live data: Unexpected token. Showing defaults until the next refresh.'
    )
  })

  it('distinguishes loading from a snapshot that was never written', () => {
    const { rerender } = render(<SnapshotBanner status="loading" error={null} />)
    expect(screen.getByRole('status')).toHaveTextContent('Loading live data...')
    rerender(<SnapshotBanner status="absent" error={null} />)
    expect(screen.getByRole('status')).toHaveTextContent('Waiting for the first live data snapshot...')
  })
})
