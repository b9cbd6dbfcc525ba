/**
 * Gregorian Calendar
 *
 * Proleptic Gregorian ↔ CJDN. Leap years every four years, except century
 * years not divisible by 400.
 */

import { floorDiv, floorMod } from './arithmetic'
import type { CalendarDate, CJDN, DateFieldOptions, IsoDateString, SingleFieldOptions } from './core'
import { selectDateField } from './format'
import { assertCJDN, parseDateParts, type IntegerInput } from './input'
import { CENTURY_DAYS_X100, daysBeforeMarchMonth, marchYearToDate } from './internal/march-year'

// ============================================================================
// Constants
// ============================================================================

/** CJDN of the day before Gregorian 0000-03-01 */
export const GREGORIAN_EPOCH = 1721119

/** Days in a 400-year Gregorian cycle */
export const GREGORIAN_CYCLE_DAYS = 146097

/** Centuries per Gregorian cycle */
const CENTURIES_PER_CYCLE = 4

// ============================================================================
// Leap Years
// ============================================================================

export function isGregorianLeapYear(year: number): boolean {
  return (floorMod(year, 4) === 0 && floorMod(year, 100) !== 0) || floorMod(year, 400) === 0
}

// ============================================================================
// Conversion
// ============================================================================

/** CJDN of an already parsed Gregorian date. No range checks. */
export function gregorianDateToCJDN(date: CalendarDate): CJDN {
  const c0 = floorDiv(date.month - 3, 12)
  const x4 = date.year + c0
  const x3 = floorDiv(x4, 100)
  const x2 = floorMod(x4, 100)
  const x1 = date.month - 12 * c0 - 3
  return (
    floorDiv(GREGORIAN_CYCLE_DAYS * x3, CENTURIES_PER_CYCLE) +
    floorDiv(CENTURY_DAYS_X100 * x2, 100) +
    daysBeforeMarchMonth(x1) +
    date.day +
    GREGORIAN_EPOCH
  )
}

export function cjdnToGregorianDate(cjdn: CJDN): CalendarDate {
  const k3 = CENTURIES_PER_CYCLE * (assertCJDN(cjdn) - GREGORIAN_EPOCH - 1) + 3
  const x3 = floorDiv(k3, GREGORIAN_CYCLE_DAYS)
  const k2 = 100 * floorDiv(floorMod(k3, GREGORIAN_CYCLE_DAYS), CENTURIES_PER_CYCLE) + 99
  return marchYearToDate(100 * x3, k2)
}

// ============================================================================
// Public Functions
// ============================================================================

export function gregorianToCJDN(year: IntegerInput, month: IntegerInput, day: IntegerInput): CJDN {
  return gregorianDateToCJDN(parseDateParts(year, month, day))
}

export function cjdnToGregorian(cjdn: CJDN): IsoDateString
export function cjdnToGregorian(cjdn: CJDN, options: SingleFieldOptions): number
export function cjdnToGregorian(cjdn: CJDN, options?: DateFieldOptions): IsoDateString | number
export function cjdnToGregorian(cjdn: CJDN, options?: DateFieldOptions): IsoDateString | number {
  return selectDateField(cjdnToGregorianDate(cjdn), options)
}
