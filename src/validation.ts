/**
 * Calendar Rules & Strict Validation
 *
 * The conversion formulas accept any integers and never reject a date.
 * This module is the opt-in check for callers that want out-of-range
 * months and days refused instead of silently rolled over.
 */

import { getCalendar } from './calendars'
import type { CalendarDate, CalendarKind } from './core'
import { parseDateParts, type IntegerInput } from './input'

export { InvalidDateError } from './errors'
import { InvalidDateError } from './errors'

// ============================================================================
// Calendar Rules
// ============================================================================

const MONTH_DAYS: readonly number[] = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function isLeapYear(kind: CalendarKind, year: number): boolean {
  return getCalendar(kind).isLeapYear(year)
}

export function daysInYear(kind: CalendarKind, year: number): number {
  return isLeapYear(kind, year) ? 366 : 365
}

export function daysInMonth(kind: CalendarKind, year: number, month: number): number {
  const days = MONTH_DAYS[month - 1]
  if (days === undefined || !Number.isInteger(month)) {
    throw new InvalidDateError(`Invalid month: ${month}`)
  }
  if (month === 2 && isLeapYear(kind, year)) return 29
  return days
}

// ============================================================================
// Validation
// ============================================================================

export function isValidDate(kind: CalendarKind, year: number, month: number, day: number): boolean {
  getCalendar(kind)
  if (!Number.isSafeInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false
  if (month < 1 || month > 12) return false
  return day >= 1 && day <= daysInMonth(kind, year, month)
}

/**
 * Parse and range-check a date. Throws ParseError for non-numeric parts and
 * InvalidDateError for a month or day the calendar does not have.
 */
export function validateDate(
  kind: CalendarKind,
  year: IntegerInput,
  month: IntegerInput,
  day: IntegerInput,
): CalendarDate {
  const calendar = getCalendar(kind)
  const date = parseDateParts(year, month, day)

  if (date.month < 1 || date.month > 12) {
    throw new InvalidDateError(`Invalid month ${date.month} in ${calendar.name} date ${date.year}-${date.month}-${date.day}`)
  }
  const lastDay = daysInMonth(kind, date.year, date.month)
  if (date.day < 1 || date.day > lastDay) {
    throw new InvalidDateError(
      `Invalid day ${date.day} in ${calendar.name} date ${date.year}-${date.month}-${date.day} (month has ${lastDay} days)`,
    )
  }
  return date
}
