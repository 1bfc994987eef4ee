// SPDX-License-Identifier: Apache-2.0
import React, { useMemo, useState } from 'react'
import { COMMANDER_ENDPOINT, QUICK_ACTIONS, STATUS_ENDPOINT, buildWebhookUrl, type CommandResult } from '../services/commandClient'
import { SYSTEM_CHECK_ICONS, buildSystemStatus } from '../services/systemStatus'
import { testAutomationConnection } from '../state/actions'
import { useAutomationCheck, useLastLoadedAt, useSnapshotError, useSnapshotStatus } from '../state/store'
import { useAutomationBaseUrl } from '../state/settingsStore'
import { describeError, logError } from '../state/logStore'
import type { MetricsSnapshot } from '../types/dashboard'

const panelStyle: React.CSSProperties = {
  background: 'rgba(255,255,255,0.04)',
  border: '1px solid rgba(255,255,255,0.08)',
  borderRadius: 12,
  padding: 16,
}

export function listWebhookEndpoints(baseUrl: string): Array<{ name: string; method: 'GET' | 'POST'; url: string }> {
  return [
    ...QUICK_ACTIONS.map((action) => ({ name: action.label, method: 'GET' as const, url: buildWebhookUrl(baseUrl, action.id) })),
    { name: 'Free-text command', method: 'POST', url: buildWebhookUrl(baseUrl, COMMANDER_ENDPOINT) },
    { name: 'Status check', method: 'GET', url: buildWebhookUrl(baseUrl, STATUS_ENDPOINT) },
  ]
}

export default function AdminPanel({ snapshot }: { snapshot: MetricsSnapshot | null }): JSX.Element {
  const baseUrl = useAutomationBaseUrl()
  const [testing, setTesting] = useState(false)
  const [lastResult, setLastResult] = useState<CommandResult | null>(null)
  const [showEndpoints, setShowEndpoints] = useState(false)
  const alerts = snapshot?.alerts.items ?? []
  const snapshotStatus = useSnapshotStatus()
  const snapshotError = useSnapshotError()
  const lastLoadedAt = useLastLoadedAt()
  const automationCheck = useAutomationCheck()
  const checks = useMemo(
    () =>
      buildSystemStatus({
        snapshotStatus,
        snapshotError,
        lastLoadedAt,
        automationCheck,
        webhookCount: listWebhookEndpoints(baseUrl).length,
        pendingTasks: snapshot?.systemHealth.pendingTasks ?? null,
      }),
    [snapshotStatus, snapshotError, lastLoadedAt, automationCheck, baseUrl, snapshot]
  )

  const runTest = () => {
    setTesting(true)
    testAutomationConnection()
      .then(setLastResult)
      .catch((err: unknown) => logError('admin', 'Connection test failed unexpectedly', describeError(err)))
      .finally(() => setTesting(false))
  }

  return (
    <div style={{ display: 'flex', flexDirection: 'column', gap: 16 }}>
      <h2 style={{ margin: 0 }}>⚙️ System Administration</h2>

      <section style={panelStyle} aria-label="System status">
        <h3 style={{ marginTop: 0 }}>🖥️ System Status</h3>
        <ul style={{ listStyle: 'none', margin: 0, padding: 0, display: 'flex', flexDirection: 'column', gap: 6 }}>
          {checks.map((check) => (
            <li key={check.key} aria-label={check.label} style={{ fontSize: 13 }}>
              {SYSTEM_CHECK_ICONS[check.state]} <strong>{check.label}:</strong> {check.detail}
            </li>
          ))}
        </ul>
      </section>

      <section style={panelStyle} aria-label="Automation connection">
        <h3 style={{ marginTop: 0 }}>🔗 Test Automation Connection</h3>
        <div style={{ fontSize: 12, color: 'rgba(255,255,255,0.6)', marginBottom: 8 }}>Base URL: {baseUrl}</div>
        <button
          onClick={runTest}
          disabled={testing}
          style={{
            padding: '8px 14px',
            borderRadius: 8,
            border: '1px solid rgba(255,255,255,0.2)',
            background: 'rgba(0,212,255,0.2)',
            color: 'white',
            cursor: 'pointer',
          }}
        >
          {testing ? 'Testing connection...' : 'Test Webhook'}
        </button>
        {lastResult && (
          <div
            role="status"
            style={{ marginTop: 10, fontSize: 13, color: lastResult.ok ? '#00FF94' : '#FF0055', wordBreak: 'break-word' }}
          >
            {lastResult.ok
              ? `Connected! Response: ${JSON.stringify(lastResult.data)}`
              : `Connection failed: ${lastResult.error}`}
          </div>
        )}
      </section>

      <section style={panelStyle} aria-label="Security alerts">
        <h3 style={{ marginTop: 0 }}>🔐 Security Alerts</h3>
        {alerts.length === 0 && <div style={{ color: '#00FF94' }}>No security alerts at this time</div>}
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
            <strong>
              {alert.type.toUpperCase()} ALERT ({alert.severity.toUpperCase()}):
            </strong>{' '}
            {alert.message}
          </div>
        ))}
      </section>

      <section style={panelStyle} aria-label="Webhook endpoints">
        <h3 style={{ marginTop: 0 }}>🪝 Webhooks</h3>
        <button
          onClick={() => setShowEndpoints((v) => !v)}
          style={{
            padding: '6px 12px',
            borderRadius: 8,
            border: '1px solid rgba(255,255,255,0.2)',
            background: 'rgba(255,255,255,0.06)',
            color: 'white',
            cursor: 'pointer',
          }}
        >
          {showEndpoints ? 'Hide Webhook Config' : 'View Webhook Config'}
        </button>
        {showEndpoints && (
          <table style={{ marginTop: 10, width: '100%', fontSize: 12, borderCollapse: 'collapse' }}>
            <tbody>
              {listWebhookEndpoints(baseUrl).map((endpoint) => (
                <tr key={endpoint.url}>
                  <td style={{ padding: '4px 8px' }}>{endpoint.name}</td>
                  <td style={{ padding: '4px 8px', color: '#00D4FF' }}>{endpoint.method}</td>
                  <td style={{ padding: '4px 8px', fontFamily: 'monospace' }}>{endpoint.url}</td>
                </tr>
              ))}
            </tbody>
          </table>
        )}
      </section>
    </div>
  )
}
