/**
 * Recurrence Rules
 *
 * Zone-aware "every day at HH:mm" strategy used by the maintenance task,
 * plus the time-of-day helpers the wake policy shares.
 */

import { DateTime } from 'luxon'
import type { RecurrenceRule } from './types.js'

export interface TimeOfDay {
  hour: number
  minute: number
}

const TIME_OF_DAY_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/

/**
 * Parse "HH:mm" (24h). Returns null for anything else.
 */
export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = TIME_OF_DAY_PATTERN.exec(value.trim())
  if (!match) return null
  return { hour: parseInt(match[1], 10), minute: parseInt(match[2], 10) }
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`
}

/**
 * The given day (in `zone`) at the given time of day.
 */
export function atTimeOfDay(day: DateTime, time: TimeOfDay): DateTime {
  return day.set({ hour: time.hour, minute: time.minute, second: 0, millisecond: 0 })
}

/**
 * First instant strictly after `after` that falls on `time` in `zone`.
 */
export function nextDailyOccurrence(after: Date, time: TimeOfDay, zone: string): Date {
  const reference = DateTime.fromJSDate(after, { zone })
  let candidate = atTimeOfDay(reference, time)
  if (candidate <= reference) {
    candidate = atTimeOfDay(reference.plus({ days: 1 }), time)
  }
  return candidate.toJSDate()
}

/**
 * Recurrence firing once a day at `time` in `zone`.
 */
export function dailyAt(time: TimeOfDay, zone: string): RecurrenceRule {
  return {
    description: `daily at ${formatTimeOfDay(time)} (${zone})`,
    next: (after: Date) => nextDailyOccurrence(after, time, zone),
  }
}
