import { DateTime } from 'luxon'
import type { ClockTime, IsoDate } from '../types.js'

export const DATE_FORMAT = 'yyyy-MM-dd'
export const TIME_FORMAT = 'HH:mm'

/** Strict `yyyy-MM-dd` that names a real calendar day */
export function parseDate(raw: string): IsoDate | null {
  const trimmed = raw.trim()
  if (!/^\d{4}-\d{2}-\d{2}$/.test(trimmed)) return null
  const parsed = DateTime.fromFormat(trimmed, DATE_FORMAT)
  return parsed.isValid ? parsed.toFormat(DATE_FORMAT) : null
}

/** Strict 24-hour `HH:mm` */
export function parseTime(raw: string): ClockTime | null {
  const trimmed = raw.trim()
  if (!/^\d{2}:\d{2}$/.test(trimmed)) return null
  const parsed = DateTime.fromFormat(trimmed, TIME_FORMAT)
  return parsed.isValid ? parsed.toFormat(TIME_FORMAT) : null
}

/** `HH:mm` → `HH:mm:ss`, the form exports use */
export function withSeconds(time: ClockTime): string {
  return `${time}:00`
}

/** Local calendar day for statistics buckets */
export function todayIso(now: Date = new Date()): IsoDate {
  return DateTime.fromJSDate(now).toFormat(DATE_FORMAT)
}
