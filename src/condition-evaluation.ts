/**
 * Condition Evaluation
 *
 * Pure functions for parsing and evaluating the time/day guards that can wrap
 * any step or playlist. Evaluation takes the instant as an argument and never
 * reads a clock, so previews and tests can replay any moment.
 */

import {
  type LocalDateTime, type Weekday,
  parseTime, parseWeekday, secondOfDay, dateOf, timeOf, dayOfWeek,
} from './time-date'
import type { Condition, TimeWindow } from './domain-types'
import { ConfigError } from './errors'
import { isRecord, keyPath, indexPath } from './internal/helpers'

export type { Condition, TimeWindow } from './domain-types'
export type { LocalDateTime, Weekday } from './time-date'

// ============================================================================
// Constructors
// ============================================================================

function toSeconds(value: string, path: string): number {
  const parsed = parseTime(value)
  if (!parsed.ok) throw new ConfigError(path, `time values must be HH:MM, got '${value}'`)
  return secondOfDay(parsed.value)
}

export function timeWindow(start: string, end: string): TimeWindow {
  return { start: toSeconds(start, 'start'), end: toSeconds(end, 'end') }
}

export function onDays(...days: Weekday[]): Condition {
  return { daysOfWeek: new Set(days) }
}

export function during(...windows: TimeWindow[]): Condition {
  return { timeOfDay: windows }
}

// ============================================================================
// Parsing
// ============================================================================

function parseDays(raw: unknown, path: string): ReadonlySet<Weekday> | undefined {
  const entries = typeof raw === 'string' ? [raw] : raw
  if (!Array.isArray(entries)) throw new ConfigError(path, 'days_of_week must be a list of weekday names')

  const days = new Set<Weekday>()
  entries.forEach((entry: unknown, i) => {
    const entryPath = indexPath(path, i)
    if (typeof entry !== 'string') throw new ConfigError(entryPath, 'days_of_week entries must be strings')
    if (!entry.trim()) return
    const day = parseWeekday(entry)
    if (day === null) throw new ConfigError(entryPath, `Unknown day-of-week '${entry}'`)
    days.add(day)
  })
  return days.size > 0 ? days : undefined
}

function parseWindows(raw: unknown, path: string): readonly TimeWindow[] | undefined {
  const entries = isRecord(raw) ? [raw] : raw
  if (!Array.isArray(entries)) throw new ConfigError(path, 'time_of_day must be a list of ranges')

  const windows: TimeWindow[] = entries.map((entry: unknown, i) => {
    const entryPath = indexPath(path, i)
    if (!isRecord(entry)) throw new ConfigError(entryPath, 'time_of_day entries must be objects')
    const { start, end } = entry
    if (typeof start !== 'string') throw new ConfigError(keyPath(entryPath, 'start'), 'range requires a start time')
    if (typeof end !== 'string') throw new ConfigError(keyPath(entryPath, 'end'), 'range requires an end time')
    return {
      start: toSeconds(start, keyPath(entryPath, 'start')),
      end: toSeconds(end, keyPath(entryPath, 'end')),
    }
  })
  return windows.length > 0 ? windows : undefined
}

/**
 * Parse a `conditions` object. Returns undefined when it imposes nothing,
 * so callers can skip evaluation entirely.
 */
export function parseCondition(raw: unknown, path: string): Condition | undefined {
  if (raw === undefined || raw === null) return undefined
  if (!isRecord(raw)) throw new ConfigError(path, 'conditions must be an object')

  const daysKey = raw.days_of_week !== undefined ? 'days_of_week' : 'day_of_week'
  const timeKey = raw.time_of_day !== undefined ? 'time_of_day' : 'time_ranges'
  const daysRaw = raw[daysKey]
  const timeRaw = raw[timeKey]

  const daysOfWeek = daysRaw === undefined || daysRaw === null ? undefined : parseDays(daysRaw, keyPath(path, daysKey))
  const timeOfDay = timeRaw === undefined || timeRaw === null ? undefined : parseWindows(timeRaw, keyPath(path, timeKey))

  if (!daysOfWeek && !timeOfDay) return undefined
  return {
    ...(daysOfWeek ? { daysOfWeek } : {}),
    ...(timeOfDay ? { timeOfDay } : {}),
  }
}

// ============================================================================
// Evaluation
// ============================================================================

export function windowContains(window: TimeWindow, seconds: number): boolean {
  const { start, end } = window
  if (start === end) return false
  if (start < end) return seconds >= start && seconds < end
  // Overnight range such as 22:00-02:00
  return seconds >= start || seconds < end
}

export function evaluateCondition(condition: Condition | undefined, now: LocalDateTime): boolean {
  if (!condition) return true
  if (condition.daysOfWeek && !condition.daysOfWeek.has(dayOfWeek(dateOf(now)))) return false
  if (!condition.timeOfDay) return true
  const seconds = secondOfDay(timeOf(now))
  return condition.timeOfDay.some((w) => windowContains(w, seconds))
}
