/**
 * ISO 8601 Date Strings
 *
 * Formatting and parsing of the extended date form [-]YYYY-MM-DD, plus
 * the field selection shared by the three inverse conversions.
 */

import type { CalendarDate, DateFieldOptions, IsoDateString } from './core'
import { Result, Ok, Err } from './result'

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a date as `YYYY-MM-DD`. Years are padded to four digits and keep
 * their sign, so astronomical year -1 becomes `-0001`.
 */
export function formatIsoDate(date: CalendarDate): IsoDateString {
  const sign = date.year < 0 ? '-' : ''
  return `${sign}${pad4(Math.abs(date.year))}-${pad2(date.month)}-${pad2(date.day)}` as IsoDateString
}

/**
 * Pick the output of an inverse conversion. Year takes priority over month,
 * month over day; with no flag set the whole date is formatted.
 */
export function selectDateField(
  date: CalendarDate,
  options: DateFieldOptions = {},
): IsoDateString | number {
  if (options.returnYear) return date.year
  if (options.returnMonth) return date.month
  if (options.returnDay) return date.day
  return formatIsoDate(date)
}

// ============================================================================
// Parsing
// ============================================================================

const ISO_DATE = /^([+-]?)(\d{4,})-(\d{2})-(\d{2})$/

/**
 * Parse `[±]YYYY-MM-DD` into its components. Only the shape is checked;
 * use validateDate for calendar-aware range checks.
 */
export function parseIsoDate(text: string): Result<CalendarDate, ParseError> {
  const match = ISO_DATE.exec(text)
  if (!match) return Err(new ParseError(`Invalid date format: '${text}'`))

  const [, sign, yearDigits, monthDigits, dayDigits] = match
  if (yearDigits === undefined || monthDigits === undefined || dayDigits === undefined) {
    return Err(new ParseError(`Invalid date format: '${text}'`))
  }

  const magnitude = parseInt(yearDigits, 10)
  if (!Number.isSafeInteger(magnitude)) {
    return Err(new ParseError(`Year out of range in date: '${text}'`))
  }

  return Ok({
    year: sign === '-' && magnitude !== 0 ? -magnitude : magnitude,
    month: parseInt(monthDigits, 10),
    day: parseInt(dayDigits, 10),
  })
}
