// SPDX-License-Identifier: Apache-2.0
import React, { useEffect, useState } from 'react'
import CommandSidebar from './CommandSidebar'
import UniverseView from './UniverseView'
import OverviewPanel from './OverviewPanel'
import AdminPanel from './AdminPanel'
import EntityTabPanel from './EntityTabPanel'
import SnapshotBanner from './SnapshotBanner'
import SettingsDrawer from './SettingsDrawer'
import LogSidebar from './LogSidebar'
import AboutModal from './AboutModal'
import SplashScreen from './SplashScreen'
import { formatBuildLabel, getBuildInfo } from '../config/buildInfo'
import { ENTITY_TABS, findEntityTab } from '../config/entityTabs'
import { useAutoRefresh } from '../hooks/useAutoRefresh'
import { refreshSnapshot, setActiveTab } from '../state/actions'
import { useActiveTab, useDarkMode, useLastLoadedAt, useSnapshot, useSnapshotError, useSnapshotStatus } from '../state/store'
import { describeError, logError } from '../state/logStore'
import { kenyaTime, minneapolisTime } from '../services/timeZones'
import type { DashboardTab } from '../types/dashboard'

const TABS: ReadonlyArray<{ key: DashboardTab; label: string }> = [
  { key: 'universe', label: '🌌 Universe' },
  { key: 'overview', label: '📊 Overview' },
  ...ENTITY_TABS.map((tab) => ({ key: tab.key, label: tab.label })),
  { key: 'admin', label: '⚙️ Admin' },
]

const SPLASH_MS = 1200

const headerButton: React.CSSProperties = {
  background: 'rgba(0,0,0,0.7)',
  color: 'white',
  border: '1px solid rgba(255,255,255,0.2)',
  borderRadius: 8,
  padding: '6px 12px',
  cursor: 'pointer',
}

export default function AppShell(): JSX.Element {
  const [buildInfo] = useState(() => getBuildInfo())
  const [aboutOpen, setAboutOpen] = useState(false)
  const [showSplash, setShowSplash] = useState(true)
  const [settingsOpen, setSettingsOpen] = useState(false)
  const activeTab = useActiveTab()
  const darkMode = useDarkMode()
  const snapshot = useSnapshot()
  const snapshotStatus = useSnapshotStatus()
  const snapshotError = useSnapshotError()
  const lastLoadedAt = useLastLoadedAt()
  const entityTab = findEntityTab(activeTab)

  useAutoRefresh()

  useEffect(() => {
    const t = setTimeout(() => setShowSplash(false), SPLASH_MS)
    return () => clearTimeout(t)
  }, [])

  const now = new Date()
  const palette = darkMode
    ? { background: 'linear-gradient(180deg, #050510 0%, #1a0a2e 100%)', color: 'white' }
    : { background: 'linear-gradient(180deg, #2a3040 0%, #3a3f5a 100%)', color: '#f5f5f5' }

  return (
    <main style={{ width: '100%', minHeight: '100vh', display: 'flex', fontFamily: 'Inter, sans-serif', ...palette }}>
      <CommandSidebar />

      <div style={{ flex: 1, display: 'flex', flexDirection: 'column', minWidth: 0 }}>
        <header
          style={{
            display: 'flex',
            justifyContent: 'space-between',
            alignItems: 'center',
            padding: '12px 20px',
            borderBottom: '1px solid rgba(255,255,255,0.08)',
            gap: 12,
          }}
        >
          <nav role="tablist" aria-label="Dashboard sections" style={{ display: 'flex', gap: 6 }}>
            {TABS.map((tab) => (
              <button
                key={tab.key}
                role="tab"
                aria-selected={activeTab === tab.key}
                onClick={() => setActiveTab(tab.key)}
                style={{
                  padding: '8px 14px',
                  borderRadius: 999,
                  border: '1px solid rgba(255,255,255,0.15)',
                  background: activeTab === tab.key ? 'rgba(0,212,255,0.2)' : 'transparent',
                  color: 'white',
                  cursor: 'pointer',
                  fontSize: 13,
                }}
              >
                {tab.label}
              </button>
            ))}
          </nav>
          <div style={{ display: 'flex', gap: 8 }}>
            <button onClick={() => setSettingsOpen(true)} style={headerButton} title="Automation & refresh settings">
              ⚙️ Settings
            </button>
            <button onClick={() => setAboutOpen(true)} style={headerButton} title={formatBuildLabel(buildInfo)}>
              About
            </button>
            <LogSidebar />
          </div>
        </header>

        <div style={{ flex: 1, padding: 20, display: 'flex', flexDirection: 'column', gap: 16, overflowY: 'auto' }}>
          <SnapshotBanner status={snapshotStatus} error={snapshotError} />
          {activeTab === 'universe' && <UniverseView />}
          {activeTab === 'overview' && <OverviewPanel snapshot={snapshot} />}
          {entityTab && <EntityTabPanel tab={entityTab} snapshot={snapshot} />}
          {activeTab === 'admin' && <AdminPanel snapshot={snapshot} />}
        </div>

        <footer
          style={{
            display: 'flex',
            justifyContent: 'space-between',
            alignItems: 'center',
            padding: '10px 20px',
            borderTop: '1px solid rgba(255,255,255,0.08)',
            fontSize: 12,
            color: 'rgba(255,255,255,0.7)',
            gap: 12,
          }}
        >
          <div>
            {`🎯 Command Center ${buildInfo.versionBuild} | Minneapolis: ${minneapolisTime(now)} CST | Kenya: ${kenyaTime(now)} EAT | Data Updated: ${snapshot?.lastUpdated ?? 'Never'}`}
          </div>
          <button
            onClick={() => {
              refreshSnapshot().catch((err: unknown) => logError('app', 'Manual refresh failed', describeError(err)))
            }}
            style={headerButton}
            title={lastLoadedAt ? `Last read ${lastLoadedAt}` : 'Re-read the live data snapshot'}
          >
            🔄 Refresh Data
          </button>
        </footer>
      </div>

      <SettingsDrawer isOpen={settingsOpen} onClose={() => setSettingsOpen(false)} />
      {showSplash && <SplashScreen buildInfo={buildInfo} />}
      {aboutOpen && <AboutModal buildInfo={buildInfo} onClose={() => setAboutOpen(false)} />}
    </main>
  )
}
