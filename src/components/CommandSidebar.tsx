// SPDX-License-Identifier: Apache-2.0
import React, { useEffect, useState } from 'react'
import { QUICK_ACTIONS } from '../services/commandClient'
import { isKenyaWindow, kenyaTime, minneapolisTime } from '../services/timeZones'
import { dismissNotice, runQuickAction, submitCommand, toggleDarkMode } from '../state/actions'
import { useDarkMode, useIsFetching, useNotices, usePendingCommands, useRefreshCount } from '../state/store'
import { describeError, logError } from '../state/logStore'

const CLOCK_TICK_MS = 30_000

const sidebarButton: React.CSSProperties = {
  width: '100%',
  padding: '8px 12px',
  borderRadius: 8,
  border: '1px solid rgba(255,255,255,0.15)',
  background: 'rgba(255,255,255,0.05)',
  color: 'white',
  cursor: 'pointer',
  fontSize: 13,
  textAlign: 'left',
}

const NOTICE_COLORS = { success: '#00FF94', error: '#FF0055', info: '#00D4FF' } as const

function report(task: string) {
  return (err: unknown) => logError('command-sidebar', `${task} failed unexpectedly`, describeError(err))
}

function Clock({ city, time, zone }: { city: string; time: string; zone: string }) {
  return (
    <div style={{ flex: 1 }}>
      <div style={{ fontSize: 11, color: 'rgba(255,255,255,0.6)' }}>{city}</div>
      <div style={{ fontSize: 18, fontWeight: 600 }} data-testid={`clock-${zone}`}>
        {time}
      </div>
      <div style={{ fontSize: 11, color: '#00FF94' }}>{zone}</div>
    </div>
  )
}

export default function CommandSidebar({ now: fixedNow }: { now?: Date }): JSX.Element {
  const [tickNow, setTickNow] = useState(() => new Date())
  const [commandText, setCommandText] = useState('')
  const notices = useNotices()
  const pendingCommands = usePendingCommands()
  const refreshCount = useRefreshCount()
  const isFetching = useIsFetching()
  const darkMode = useDarkMode()
  const now = fixedNow ?? tickNow

  useEffect(() => {
    if (fixedNow) return
    const handle = setInterval(() => setTickNow(new Date()), CLOCK_TICK_MS)
    return () => clearInterval(handle)
  }, [fixedNow])

  const handleSend = () => {
    submitCommand(commandText)
      .then((result) => {
        if (result.ok) setCommandText('')
      })
      .catch(report('Command'))
  }

  return (
    <aside
      aria-label="Command sidebar"
      style={{
        width: 280,
        flexShrink: 0,
        padding: 16,
        borderRight: '1px solid rgba(255,255,255,0.08)',
        display: 'flex',
        flexDirection: 'column',
        gap: 16,
        overflowY: 'auto',
      }}
    >
      <div style={{ display: 'flex', gap: 8, alignItems: 'center' }}>
        <button onClick={toggleDarkMode} style={{ ...sidebarButton, width: 'auto', textAlign: 'center' }}>
          {darkMode ? '☀️ Light' : '🌙 Dark'}
        </button>
        <span style={{ fontSize: 11, color: 'rgba(255,255,255,0.6)' }}>
          Auto: {refreshCount}
          {isFetching ? ' (refreshing...)' : ''}
        </span>
      </div>

      <div style={{ display: 'flex', gap: 12 }}>
        <Clock city="Minneapolis" time={minneapolisTime(now)} zone="CST" />
        <Clock city="Kenya" time={kenyaTime(now)} zone="EAT" />
      </div>

      {isKenyaWindow(now) && (
        <div
          role="status"
          style={{
            background: 'rgba(0,255,148,0.12)',
            border: '1px solid rgba(0,255,148,0.4)',
            borderRadius: 8,
            padding: '8px 12px',
            fontSize: 13,
          }}
        >
          🌍 <strong>KENYA WINDOW ACTIVE</strong>
          <div>Best time to call the farm team!</div>
        </div>
      )}

      <section aria-label="Quick commands" style={{ display: 'flex', flexDirection: 'column', gap: 8 }}>
        <h3 style={{ margin: 0, fontSize: 15 }}>⚡ Quick Commands</h3>
        {QUICK_ACTIONS.map((action) => (
          <button
            key={action.id}
            onClick={() => {
              runQuickAction(action.id).catch(report(action.label))
            }}
            disabled={pendingCommands.includes(action.id)}
            style={sidebarButton}
          >
            {action.icon} {action.label}
          </button>
        ))}
      </section>

      <section aria-label="Free-text command" style={{ display: 'flex', flexDirection: 'column', gap: 8 }}>
        <h3 style={{ margin: 0, fontSize: 15 }}>🎤 Command</h3>
        <label htmlFor="command-text" style={{ fontSize: 12, color: 'rgba(255,255,255,0.7)' }}>
          Type a command:
        </label>
        <input
          id="command-text"
          type="text"
          value={commandText}
          placeholder="e.g. 'Message the farm manager about harvest'"
          onChange={(e) => setCommandText(e.target.value)}
          onKeyDown={(e) => {
            if (e.key === 'Enter' && commandText.trim()) handleSend()
          }}
          style={{
            padding: '8px 10px',
            borderRadius: 8,
            border: '1px solid rgba(255,255,255,0.2)',
            background: 'rgba(0,0,0,0.35)',
            color: 'white',
            fontSize: 13,
          }}
        />
        <button
          onClick={handleSend}
          disabled={!commandText.trim() || pendingCommands.includes('commander')}
          style={{ ...sidebarButton, textAlign: 'center', background: 'rgba(0,212,255,0.2)' }}
        >
          Send Command
        </button>
      </section>

      {notices.length > 0 && (
        <section aria-label="Command results" style={{ display: 'flex', flexDirection: 'column', gap: 6 }}>
          {notices.map((notice) => (
            <div
              key={notice.id}
              role="status"
              style={{
                border: `1px solid ${NOTICE_COLORS[notice.kind]}`,
                borderRadius: 8,
                padding: '6px 10px',
                fontSize: 12,
                display: 'flex',
                justifyContent: 'space-between',
                gap: 8,
              }}
            >
              <div>
                <div style={{ color: NOTICE_COLORS[notice.kind], fontWeight: 600 }}>{notice.title}</div>
                {notice.detail && <div style={{ color: 'rgba(255,255,255,0.7)', wordBreak: 'break-word' }}>{notice.detail}</div>}
              </div>
              <button
                onClick={() => dismissNotice(notice.id)}
                aria-label={`Dismiss ${notice.title}`}
                style={{ background: 'transparent', border: 'none', color: 'rgba(255,255,255,0.6)', cursor: 'pointer' }}
              >
                ×
              </button>
            </div>
          ))}
        </section>
      )}
    </aside>
  )
}
