// SPDX-License-Identifier: Apache-2.0
import { defineConfig, type Plugin } from 'vite'
import react from '@vitejs/plugin-react'
import snapshotFilePlugin from './plugins/snapshotFilePlugin'

function epochMinutes() {
  return Math.floor(Date.now() / 60000)
}

function buildNumberFromMinutes(minutes: number) {
  const base36 = Math.max(minutes, 0).toString(36).toUpperCase()
  const tail = base36.slice(-5)
  return tail.padStart(5, '0')
}

function parseMajorMinor(versionString: string): { major: number; minor: number } {
  const [majorRaw = '0', minorRaw = '0'] = versionString.split('.')
  const major = Number.parseInt(majorRaw, 10)
  const minor = Number.parseInt(minorRaw, 10)
  return {
    major: Number.isFinite(major) ? major : 0,
    minor: Number.isFinite(minor) ? minor : 0,
  }
}

function computeVersionBuild(semver: string, epochSeconds: number): string {
  const { major, minor } = parseMajorMinor(semver)
  const bucket = Math.floor(Math.max(epochSeconds, 0) / 100) % 10000
  return `v${major}.${String(minor).padStart(2, '0')}${String(bucket).padStart(4, '0')}`
}

const minutes = epochMinutes()
const buildNumber = buildNumberFromMinutes(minutes)
const packageVersion = process.env.npm_package_version || '0.0.0-dev'
const versionBuild = computeVersionBuild(packageVersion, Math.floor(Date.now() / 1000))

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

type IncomingLogEntry = {
  level: LogLevel
  source: string
  message: string
  detail?: unknown
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  error: '\x1b[31m',
  warn: '\x1b[33m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
}

function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
}

function toLogEntry(payload: unknown): IncomingLogEntry | null {
  if (typeof payload !== 'object' || payload === null) return null
  if (!('level' in payload) || !('source' in payload) || !('message' in payload)) return null
  const { level, source, message } = payload
  if (!isLogLevel(level) || typeof source !== 'string' || typeof message !== 'string') return null
  return { level, source, message, detail: 'detail' in payload ? payload.detail : undefined }
}

// Mirrors browser log entries (src/state/logStore.ts) into the dev server terminal.
function dashboardLogBridgePlugin(): Plugin {
  return {
    name: 'dashboard-log-bridge',
    apply: 'serve',
    configureServer(server) {
      const logger = server.config.logger
      server.ws.on('dashboard:log', (payload: unknown) => {
        const entry = toLogEntry(payload)
        if (!entry) return
        const color = LEVEL_COLORS[entry.level]
        const reset = '\x1b[0m'
        const line = `${color}[DASHBOARD ${entry.level.toUpperCase()}][${entry.source}]${reset} ${entry.message}`
        const method: 'info' | 'warn' | 'error' =
          entry.level === 'error' ? 'error' : entry.level === 'warn' ? 'warn' : 'info'
        logger[method](line)
        if (entry.detail !== undefined) {
          logger[method](`${color}  detail:${reset} ${JSON.stringify(entry.detail, null, 2)}`)
        }
      })
    },
  }
}

export default defineConfig({
  plugins: [
    react(),
    dashboardLogBridgePlugin(),
    snapshotFilePlugin({ filePath: process.env.DASHBOARD_SNAPSHOT_PATH || undefined }),
  ],
  define: {
    __BUILD_MINUTES__: JSON.stringify(minutes),
    __BUILD_NUMBER__: JSON.stringify(buildNumber),
    __BUILD_SEMVER__: JSON.stringify(packageVersion),
    __GIT_SHA__: JSON.stringify(process.env.GIT_COMMIT || process.env.GITHUB_SHA || 'unknown'),
    __VERSION_BUILD__: JSON.stringify(versionBuild),
  },
})
