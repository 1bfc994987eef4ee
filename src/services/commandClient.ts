// SPDX-License-Identifier: Apache-2.0
import { getSettingsSnapshot, sanitizeBaseUrl } from '../state/settingsStore'
import { AUTOMATION_DEFAULT } from '../config/env'
import { describeError, logDebug, logInfo, logWarn } from '../state/logStore'
import { fetchTextWithTimeout, type TextResponse } from './http'

export type CommandSuccess = {
  ok: true
  endpoint: string
  status: number
  data: unknown
  durationMs: number
}

export type CommandFailure = {
  ok: false
  endpoint: string
  status: number | null
  error: string
  durationMs: number
}

export type CommandResult = CommandSuccess | CommandFailure

export type CommandOptions = {
  baseUrl?: string
  timeoutMs?: number
  fetchImpl?: typeof fetch
}

export type QuickActionId = 'morning-briefing' | 'farm-status' | 'urgent-emails' | 'calendar-today'

export type QuickAction = {
  id: QuickActionId
  label: string
  icon: string
}

export const QUICK_ACTIONS: ReadonlyArray<QuickAction> = [
  { id: 'morning-briefing', label: 'Morning Briefing', icon: '📋' },
  { id: 'farm-status', label: 'Farm Status', icon: '🌾' },
  { id: 'urgent-emails', label: 'Check Urgent Emails', icon: '📧' },
  { id: 'calendar-today', label: "Today's Calendar", icon: '📅' },
]

export const COMMANDER_ENDPOINT = 'commander'
export const STATUS_ENDPOINT = 'status'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function extractErrorDetail(payload: unknown): string | null {
  if (!isRecord(payload)) return null
  if (typeof payload.error === 'string') return payload.error
  if (isRecord(payload.error) && typeof payload.error.message === 'string') {
    return payload.error.message
  }
  return null
}

export function buildWebhookUrl(baseUrl: string, endpoint: string): string {
  const base = sanitizeBaseUrl(baseUrl) ?? AUTOMATION_DEFAULT
  const path = endpoint.trim().replace(/^\/+/, '')
  return `${base}/webhook/${encodeURI(path)}`
}

export async function sendCommand(
  endpoint: string,
  payload?: Record<string, unknown>,
  options: CommandOptions = {}
): Promise<CommandResult> {
  const settings = getSettingsSnapshot()
  const url = buildWebhookUrl(options.baseUrl ?? settings.automationBaseUrl, endpoint)
  const timeoutMs = options.timeoutMs ?? settings.requestTimeoutMs
  const fetchImpl = options.fetchImpl ?? fetch
  // An empty payload carries nothing to post.
  const body = payload && Object.keys(payload).length > 0 ? JSON.stringify(payload) : undefined
  const method = body === undefined ? 'GET' : 'POST'
  const startedAt = Date.now()
  const fail = (error: string, status: number | null): CommandFailure => {
    const durationMs = Date.now() - startedAt
    logWarn('automation', 'Automation call failed', { endpoint, url, status, error, durationMs })
    return { ok: false, endpoint, status, error, durationMs }
  }

  logDebug('automation', 'Dispatching automation call', { endpoint, url, method, timeoutMs })
  let response: TextResponse
  try {
    response = await fetchTextWithTimeout(
      fetchImpl,
      url,
      {
        method,
        headers: body === undefined
          ? { Accept: 'application/json' }
          : { 'Content-Type': 'application/json', Accept: 'application/json' },
        body,
      },
      timeoutMs
    )
  } catch (err) {
    return fail(describeError(err).message, null)
  }

  let data: unknown = null
  let parseError: string | null = null
  try {
    data = JSON.parse(response.text)
  } catch (err) {
    parseError = describeError(err).message
  }

  if (!response.ok) {
    const detail = extractErrorDetail(data)
    return fail(`Automation endpoint returned ${response.status}${detail ? `: ${detail}` : ''}`, response.status)
  }
  if (parseError !== null) {
    return fail(`Response was not valid JSON: ${parseError}`, response.status)
  }
  const reported = extractErrorDetail(data)
  if (reported) return fail(reported, response.status)

  const durationMs = Date.now() - startedAt
  logInfo('automation', 'Automation call succeeded', { endpoint, status: response.status, durationMs })
  return { ok: true, endpoint, status: response.status, data, durationMs }
}

export function runQuickActionCommand(id: QuickActionId, options?: CommandOptions): Promise<CommandResult> {
  return sendCommand(id, undefined, options)
}

export async function sendFreeTextCommand(
  text: string,
  options: CommandOptions & { source?: string } = {}
): Promise<CommandResult> {
  const command = text.trim()
  if (!command) {
    return { ok: false, endpoint: COMMANDER_ENDPOINT, status: null, error: 'Command text is empty', durationMs: 0 }
  }
  const source = options.source ?? getSettingsSnapshot().commandSource
  return sendCommand(COMMANDER_ENDPOINT, { command, source }, options)
}

export function checkAutomationStatus(options?: CommandOptions): Promise<CommandResult> {
  return sendCommand(STATUS_ENDPOINT, undefined, options)
}
