// SPDX-License-Identifier: Apache-2.0
import type { BuildInfo } from '../types/dashboard'

// Injected by vite.config.ts `define`; the fallbacks below cover tests and unbundled runs.
declare const __BUILD_MINUTES__: number
declare const __BUILD_NUMBER__: string
declare const __BUILD_SEMVER__: string
declare const __GIT_SHA__: string
declare const __VERSION_BUILD__: string

export function computeEpochMinutes(): number {
  return Math.floor(Date.now() / 60000)
}

export function formatBuildNumber(epochMinutes: number): string {
  const base36 = Math.max(epochMinutes, 0).toString(36).toUpperCase()
  const tail = base36.slice(-5)
  return tail.padStart(5, '0')
}

export function computeVersionBuild(semver: string, epochSeconds: number): string {
  const { major, minor } = extractMajorMinor(semver)
  const bucket = Math.floor(Math.max(epochSeconds, 0) / 100) % 10000
  const minorPadded = String(minor).padStart(2, '0')
  const bucketPadded = String(bucket).padStart(4, '0')
  return `v${major}.${minorPadded}${bucketPadded}`
}

function extractMajorMinor(semver: string): { major: number; minor: number } {
  const [majorRaw = '0', minorRaw = '0'] = semver.split('.')
  const major = Number.parseInt(majorRaw, 10)
  const minor = Number.parseInt(minorRaw, 10)
  return {
    major: Number.isFinite(major) ? major : 0,
    minor: Number.isFinite(minor) ? minor : 0,
  }
}

export function getBuildInfo(): BuildInfo {
  const minutes = typeof __BUILD_MINUTES__ !== 'undefined' ? __BUILD_MINUTES__ : computeEpochMinutes()
  const buildNumber = typeof __BUILD_NUMBER__ !== 'undefined' ? __BUILD_NUMBER__ : formatBuildNumber(minutes)
  const semver = typeof __BUILD_SEMVER__ !== 'undefined' ? __BUILD_SEMVER__ : '0.0.0-dev'
  const gitSha = typeof __GIT_SHA__ !== 'undefined' ? __GIT_SHA__ : 'unknown'
  const versionBuild =
    typeof __VERSION_BUILD__ !== 'undefined' ? __VERSION_BUILD__ : computeVersionBuild(semver, minutes * 60)
  const builtAtIso = new Date(minutes * 60000).toISOString()
  return { buildNumber, epochMinutes: minutes, semver, gitSha, builtAtIso, versionBuild }
}

export function formatBuildLabel(info: BuildInfo): string {
  return `${info.versionBuild} • v${info.semver} • build ${info.buildNumber} • ${info.gitSha.substring(0, 7)}`
}

export function formatVersionBuildForDisplay(versionBuild: string): string {
  return versionBuild.startsWith('v') ? versionBuild : `v${versionBuild}`
}
