// SPDX-License-Identifier: Apache-2.0
import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  computeVersionBuild,
  formatBuildLabel,
  formatBuildNumber,
  formatVersionBuildForDisplay,
  getBuildInfo,
} from './buildInfo'

describe('formatBuildNumber', () => {
  it('renders five upper-case base36 characters', () => {
    expect(formatBuildNumber(0)).toBe('00000')
    expect(formatBuildNumber(35)).toBe('0000Z')
    expect(formatBuildNumber(36 ** 5)).toBe('00000')
  })
})

describe('computeVersionBuild', () => {
  it('combines major, padded minor and a time bucket', () => {
    expect(computeVersionBuild('2.0.0', 1_234_567)).toBe('v2.002345')
    expect(computeVersionBuild('1.12.3', 99)).toBe('v1.120000')
  })

  it('treats unparsable versions as zero', () => {
    expect(computeVersionBuild('junk', 50)).toBe('v0.000000')
  })
})

describe('getBuildInfo', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('derives everything from the clock when nothing was injected', () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2026-01-05T00:00:00Z'))
    const info = getBuildInfo()
    expect(info).toEqual({
      buildNumber: formatBuildNumber(29_459_520),
      epochMinutes: 29_459_520,
      semver: '0.0.0-dev',
      gitSha: 'unknown',
      builtAtIso: '2026-01-05T00:00:00.000Z',
      versionBuild: 'v0.005712',
    })
  })
})

describe('labels', () => {
  it('formats the about label', () => {
    expect(
      formatBuildLabel({
        buildNumber: 'ABCDE',
        epochMinutes: 1,
        semver: '2.0.0',
        gitSha: '0123456789abcdef',
        builtAtIso: '1970-01-01T00:01:00.000Z',
        versionBuild: 'v2.001234',
      })
    ).toBe('v2.001234 • v2.0.0 • build ABCDE • 0123456')
  })

  it('adds a v prefix only when missing', () => {
    expect(formatVersionBuildForDisplay('2.001234')).toBe('v2.001234')
    expect(formatVersionBuildForDisplay('v2.001234')).toBe('v2.001234')
  })
})
