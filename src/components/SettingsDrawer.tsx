// SPDX-License-Identifier: Apache-2.0
import React, { useCallback, useEffect, useState } from 'react'
import useSettingsStore, {
  DEFAULT_REFRESH_INTERVAL_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  getSettingsSnapshot,
  type DashboardSettings,
} from '../state/settingsStore'
import { AUTOMATION_DEFAULT, SNAPSHOT_URL_DEFAULT } from '../config/env'
import { logInfo } from '../state/logStore'

type Props = {
  isOpen: boolean
  onClose: () => void
}

type DraftSettings = Record<keyof DashboardSettings, string>

const FIELDS: ReadonlyArray<{
  key: keyof DashboardSettings
  label: string
  type: 'text' | 'number'
  placeholder: string
  helper: string
}> = [
  {
    key: 'automationBaseUrl',
    label: 'Automation Base URL',
    type: 'text',
    placeholder: AUTOMATION_DEFAULT,
    helper: `Webhooks are called at <base>/webhook/<endpoint>. Clear to restore ${AUTOMATION_DEFAULT}.`,
  },
  {
    key: 'requestTimeoutMs',
    label: 'Request timeout (ms)',
    type: 'number',
    placeholder: String(DEFAULT_REQUEST_TIMEOUT_MS),
    helper: 'Webhook calls and snapshot reads give up after this long.',
  },
  {
    key: 'refreshIntervalMs',
    label: 'Refresh interval (ms)',
    type: 'number',
    placeholder: String(DEFAULT_REFRESH_INTERVAL_MS),
    helper: 'How often the snapshot is re-read. Minimum 10000.',
  },
  {
    key: 'snapshotUrl',
    label: 'Snapshot URL',
    type: 'text',
    placeholder: SNAPSHOT_URL_DEFAULT,
    helper: 'JSON document written by the collection workflows.',
  },
  {
    key: 'commandSource',
    label: 'Command source tag',
    type: 'text',
    placeholder: 'dashboard',
    helper: 'Sent as "source" with free-text commands.',
  },
]

function toDraft(settings: DashboardSettings): DraftSettings {
  return {
    automationBaseUrl: settings.automationBaseUrl,
    requestTimeoutMs: String(settings.requestTimeoutMs),
    refreshIntervalMs: String(settings.refreshIntervalMs),
    snapshotUrl: settings.snapshotUrl,
    commandSource: settings.commandSource,
  }
}

const inputStyle: React.CSSProperties = {
  width: '100%',
  padding: '10px 12px',
  borderRadius: 8,
  border: '1px solid rgba(255,255,255,0.2)',
  background: 'rgba(0,0,0,0.35)',
  color: 'white',
  fontSize: 13,
  boxSizing: 'border-box',
}

const footerButton: React.CSSProperties = {
  padding: '8px 14px',
  borderRadius: 8,
  border: '1px solid rgba(255,255,255,0.2)',
  background: 'rgba(255,255,255,0.06)',
  color: 'white',
  cursor: 'pointer',
  fontSize: 13,
}

const SettingsDrawer: React.FC<Props> = ({ isOpen, onClose }) => {
  const applyDraft = useSettingsStore((s) => s.applyDraft)
  const resetToDefaults = useSettingsStore((s) => s.resetToDefaults)
  const [draft, setDraft] = useState<DraftSettings>(() => toDraft(getSettingsSnapshot()))

  useEffect(() => {
    if (isOpen) setDraft(toDraft(getSettingsSnapshot()))
  }, [isOpen])

  const handleSave = useCallback(() => {
    applyDraft(draft)
    logInfo('settings', 'Settings saved', getSettingsSnapshot())
    onClose()
  }, [applyDraft, draft, onClose])

  const handleReset = useCallback(() => {
    resetToDefaults()
    setDraft(toDraft(getSettingsSnapshot()))
  }, [resetToDefaults])

  if (!isOpen) return null

  return (
    <div
      role="dialog"
      aria-label="Settings"
      style={{
        position: 'fixed',
        top: 0,
        right: 0,
        width: 420,
        height: '100vh',
        background: 'rgba(10, 12, 16, 0.96)',
        borderLeft: '1px solid rgba(255,255,255,0.12)',
        boxShadow: '-20px 0 40px rgba(0,0,0,0.4)',
        backdropFilter: 'blur(12px)',
        color: 'white',
        zIndex: 1200,
        display: 'flex',
        flexDirection: 'column',
      }}
    >
      <div
        style={{
          padding: '18px 20px',
          borderBottom: '1px solid rgba(255,255,255,0.1)',
          display: 'flex',
          alignItems: 'center',
          justifyContent: 'space-between',
        }}
      >
        <div>
          <div style={{ fontSize: 18, fontWeight: 600, display: 'flex', alignItems: 'center', gap: 8 }}>
            <span role="img" aria-label="settings">
              ⚙️
            </span>
            Settings
          </div>
          <div style={{ fontSize: 12, color: 'rgba(255,255,255,0.7)', marginTop: 4 }}>
            Stored in this browser only.
          </div>
        </div>
        <button
          onClick={onClose}
          style={{ background: 'transparent', color: 'rgba(255,255,255,0.7)', border: 'none', fontSize: 20, cursor: 'pointer' }}
          title="Close settings"
        >
          ×
        </button>
      </div>

      <div style={{ flex: 1, overflowY: 'auto', padding: 20, display: 'flex', flexDirection: 'column', gap: 16 }}>
        {FIELDS.map((field) => (
          <div key={field.key}>
            <label
              htmlFor={`setting-${field.key}`}
              style={{ display: 'block', fontSize: 12, color: 'rgba(255,255,255,0.75)', marginBottom: 4 }}
            >
              {field.label}
            </label>
            <input
              id={`setting-${field.key}`}
              type={field.type}
              value={draft[field.key]}
              placeholder={field.placeholder}
              onChange={(e) => {
                const value = e.target.value
                setDraft((prev) => ({ ...prev, [field.key]: value }))
              }}
              style={inputStyle}
            />
            <div style={{ fontSize: 10, color: 'rgba(255,255,255,0.5)', marginTop: 4 }}>{field.helper}</div>
          </div>
        ))}
      </div>

      <div
        style={{
          padding: '14px 20px',
          borderTop: '1px solid rgba(255,255,255,0.1)',
          display: 'flex',
          justifyContent: 'space-between',
          gap: 8,
        }}
      >
        <button onClick={handleReset} style={footerButton}>
          Reset to defaults
        </button>
        <div style={{ display: 'flex', gap: 8 }}>
          <button onClick={onClose} style={footerButton}>
            Cancel
          </button>
          <button onClick={handleSave} style={{ ...footerButton, background: 'rgba(0,212,255,0.25)' }}>
            Save
          </button>
        </div>
      </div>
    </div>
  )
}

export default SettingsDrawer
