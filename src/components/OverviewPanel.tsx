// SPDX-License-Identifier: Apache-2.0
import React, { useMemo } from 'react'
import { ActivityPieChart, TodayMetricsChart } from './MetricsCharts'
import { ENTITY_REGISTRY } from '../config/entities'
import {
  PLACEHOLDER,
  buildActivityDistribution,
  buildEntityStatusCards,
  buildOverviewCards,
  buildTodayMetricsSeries,
  recentPriorityEmails,
  truncateSubject,
  type OverviewCard,
} from '../services/overviewMetrics'
import { healthColor } from '../services/graphBuilder'
import type { MetricsSnapshot } from '../types/dashboard'

const panelStyle: React.CSSProperties = {
  background: 'rgba(255,255,255,0.04)',
  border: '1px solid rgba(255,255,255,0.08)',
  borderRadius: 12,
  padding: 16,
}

const TONE_COLORS: Record<OverviewCard['tone'], string> = {
  neutral: 'rgba(255,255,255,0.65)',
  warning: '#FF6B35',
  muted: 'rgba(255,255,255,0.4)',
}

function MetricCard({ card }: { card: OverviewCard }) {
  return (
    <div style={{ ...panelStyle, flex: 1, minWidth: 150 }} title={card.help} data-testid={`card-${card.key}`}>
      <div style={{ fontSize: 12, color: 'rgba(255,255,255,0.7)' }}>
        {card.icon} {card.label}
      </div>
      <div style={{ fontSize: 26, fontWeight: 700, margin: '4px 0' }}>{card.value}</div>
      <div style={{ fontSize: 12, color: TONE_COLORS[card.tone] }}>{card.delta}</div>
    </div>
  )
}

export default function OverviewPanel({ snapshot }: { snapshot: MetricsSnapshot | null }): JSX.Element {
  const cards = useMemo(() => buildOverviewCards(snapshot), [snapshot])
  const series = useMemo(() => buildTodayMetricsSeries(snapshot), [snapshot])
  const slices = useMemo(() => buildActivityDistribution(ENTITY_REGISTRY, snapshot), [snapshot])
  const statusCards = useMemo(() => buildEntityStatusCards(ENTITY_REGISTRY, snapshot), [snapshot])
  const emails = recentPriorityEmails(snapshot)
  const alerts = snapshot?.alerts.items ?? []

  return (
    <div style={{ display: 'flex', flexDirection: 'column', gap: 16 }}>
      <h2 style={{ margin: 0 }}>🎯 Command Center Overview</h2>

      <div style={{ display: 'flex', gap: 12, flexWrap: 'wrap' }}>
        {cards.map((card) => (
          <MetricCard key={card.key} card={card} />
        ))}
      </div>

      <div style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fit, minmax(160px, 1fr))', gap: 12 }}>
        {statusCards.map(({ entity, status, healthScore, pendingItems, reported }) => (
          <div
            key={entity.code}
            style={{ ...panelStyle, borderColor: entity.glowColor }}
            aria-label={`${entity.code} status`}
          >
            <div style={{ fontWeight: 600, color: entity.color }}>
              {entity.icon} {entity.code}
            </div>
            <div style={{ fontSize: 11, color: 'rgba(255,255,255,0.6)' }}>{entity.displayName}</div>
            <div style={{ marginTop: 8, fontSize: 13 }}>
              Health:{' '}
              <span style={{ color: reported ? healthColor(healthScore) : undefined }}>
                {reported ? `${healthScore}%` : PLACEHOLDER}
              </span>
            </div>
            <div style={{ fontSize: 13 }}>Pending: {reported ? pendingItems : PLACEHOLDER}</div>
            <div style={{ fontSize: 13 }}>Status: {reported ? status : PLACEHOLDER}</div>
          </div>
        ))}
      </div>

      <div style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fit, minmax(320px, 1fr))', gap: 12 }}>
        <div style={panelStyle}>
          <h3 style={{ marginTop: 0 }}>📊 Today's Metrics</h3>
          <TodayMetricsChart series={series} />
        </div>
        <div style={panelStyle}>
          <h3 style={{ marginTop: 0 }}>🥧 Activity by Entity</h3>
          <ActivityPieChart slices={slices} />
        </div>
      </div>

      <div style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fit, minmax(320px, 1fr))', gap: 12 }}>
        <section style={panelStyle} aria-label="Recent emails">
          <h3 style={{ marginTop: 0 }}>🔔 Recent Emails</h3>
          {emails.length === 0 && <div style={{ color: 'rgba(255,255,255,0.6)' }}>No recent emails</div>}
          {emails.map((email, index) => (
            <div key={`${email.subject}-${index}`} style={{ marginBottom: 10 }}>
              <div style={{ fontWeight: 600 }}>
                {email.priority === 'high' ? '🔴' : '📧'} {truncateSubject(email.subject)}
              </div>
              <div style={{ fontSize: 11, color: 'rgba(255,255,255,0.6)' }}>
                From: {email.from} | Entity: {email.entity ?? PLACEHOLDER}
              </div>
            </div>
          ))}
        </section>

        <section style={panelStyle} aria-label="Action required">
          <h3 style={{ marginTop: 0 }}>⚠️ Action Required</h3>
          {alerts.length === 0 && <div style={{ color: '#00FF94' }}>No urgent alerts</div>}
          {alerts.map((alert, index) => (
            <div
              key={`${alert.type}-${index}`}
              role="alert"
              style={{
                background: 'rgba(255,0,85,0.12)',
                border: '1px solid rgba(255,0,85,0.4)',
                borderRadius: 8,
                padding: '8px 12px',
                marginBottom: 8,
                fontSize: 13,
              }}
            >
              {alert.severity === 'high' ? '🔴' : '🟡'} <strong>{alert.type.toUpperCase()}</strong>: {alert.message}
            </div>
          ))}
        </section>
      </div>
    </div>
  )
}
