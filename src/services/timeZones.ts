// SPDX-License-Identifier: Apache-2.0
// Fixed offsets, no DST: the dashboard always shows Minneapolis as CST and Kenya as EAT.
export const MINNEAPOLIS_UTC_OFFSET = -6
export const KENYA_UTC_OFFSET = 3

const KENYA_WINDOW_START_HOUR = 6
const KENYA_WINDOW_END_HOUR = 9

function shifted(now: Date, offsetHours: number): Date {
  return new Date(now.getTime() + offsetHours * 3_600_000)
}

export function formatClock(now: Date, offsetHours: number): string {
  const local = shifted(now, offsetHours)
  const hours24 = local.getUTCHours()
  const hours12 = hours24 % 12 === 0 ? 12 : hours24 % 12
  const minutes = String(local.getUTCMinutes()).padStart(2, '0')
  const suffix = hours24 < 12 ? 'AM' : 'PM'
  return `${String(hours12).padStart(2, '0')}:${minutes} ${suffix}`
}

export const minneapolisTime = (now: Date) => formatClock(now, MINNEAPOLIS_UTC_OFFSET)
export const kenyaTime = (now: Date) => formatClock(now, KENYA_UTC_OFFSET)

// Best hours to reach the Kenya team: 06:00-09:00 CST (15:00-18:00 EAT).
export function isKenyaWindow(now: Date): boolean {
  const hour = shifted(now, MINNEAPOLIS_UTC_OFFSET).getUTCHours()
  return hour >= KENYA_WINDOW_START_HOUR && hour < KENYA_WINDOW_END_HOUR
}
