// SPDX-License-Identifier: Apache-2.0
export type EnvConfig = {
  AUTOMATION_BASE_URL: string
  SNAPSHOT_URL: string
}

// Local automation runtime (n8n-style webhook host) on its default port.
export const AUTOMATION_DEFAULT = 'http://localhost:5678'
export const SNAPSHOT_URL_DEFAULT = '/data/live_data.json'

export function getEnvConfig(): EnvConfig {
  const automation = import.meta.env.VITE_AUTOMATION_BASE_URL || AUTOMATION_DEFAULT
  const snapshot = import.meta.env.VITE_SNAPSHOT_URL || SNAPSHOT_URL_DEFAULT
  return { AUTOMATION_BASE_URL: automation.replace(/\/$/, ''), SNAPSHOT_URL: snapshot }
}
