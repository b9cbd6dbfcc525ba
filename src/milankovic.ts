/**
 * Milanković (Revised Julian) Calendar
 *
 * Leap years every four years, except century years, which are leap only
 * when the century number leaves 2 or 6 after division by 9. That gives 218
 * leap years in every 900 and agreement with the Gregorian calendar from
 * 1 March 1600 to 28 February 2800.
 */

import { floorDiv, floorMod } from './arithmetic'
import type { CalendarDate, CJDN, DateFieldOptions, IsoDateString, SingleFieldOptions } from './core'
import { selectDateField } from './format'
import { GREGORIAN_EPOCH } from './gregorian'
import { assertCJDN, parseDateParts, type IntegerInput } from './input'
import { CENTURY_DAYS_X100, daysBeforeMarchMonth, marchYearToDate } from './internal/march-year'

// ============================================================================
// Constants
// ============================================================================

/** Days in a 900-year Milanković cycle */
export const MILANKOVIC_CYCLE_DAYS = 328718

/** Centuries per Milanković cycle */
const CENTURIES_PER_CYCLE = 9

/** Aligns the century count so the cycle's leap centuries land on mod 9 ∈ {2, 6} */
const CENTURY_PHASE = 6

/** Century numbers (mod 9) whose century year is a leap year */
const LEAP_CENTURY_RESIDUES: readonly number[] = [2, 6]

// ============================================================================
// Leap Years
// ============================================================================

export function isMilankovicLeapYear(year: number): boolean {
  if (floorMod(year, 4) !== 0) return false
  if (floorMod(year, 100) !== 0) return true
  return LEAP_CENTURY_RESIDUES.includes(floorMod(floorDiv(year, 100), CENTURIES_PER_CYCLE))
}

// ============================================================================
// Conversion
// ============================================================================

export function milankovicDateToCJDN(date: CalendarDate): CJDN {
  const c0 = floorDiv(date.month - 3, 12)
  const x4 = date.year + c0
  const x3 = floorDiv(x4, 100)
  const x2 = floorMod(x4, 100)
  const x1 = date.month - 12 * c0 - 3
  return (
    floorDiv(MILANKOVIC_CYCLE_DAYS * x3 + CENTURY_PHASE, CENTURIES_PER_CYCLE) +
    floorDiv(CENTURY_DAYS_X100 * x2, 100) +
    daysBeforeMarchMonth(x1) +
    date.day +
    GREGORIAN_EPOCH
  )
}

export function cjdnToMilankovicDate(cjdn: CJDN): CalendarDate {
  const k3 = CENTURIES_PER_CYCLE * (assertCJDN(cjdn) - GREGORIAN_EPOCH - 1) + 2
  const x3 = floorDiv(k3, MILANKOVIC_CYCLE_DAYS)
  const k2 = 100 * floorDiv(floorMod(k3, MILANKOVIC_CYCLE_DAYS), CENTURIES_PER_CYCLE) + 99
  return marchYearToDate(100 * x3, k2)
}

// ============================================================================
// Public Functions
// ============================================================================

export function milankovicToCJDN(year: IntegerInput, month: IntegerInput, day: IntegerInput): CJDN {
  return milankovicDateToCJDN(parseDateParts(year, month, day))
}

export function cjdnToMilankovic(cjdn: CJDN): IsoDateString
export function cjdnToMilankovic(cjdn: CJDN, options: SingleFieldOptions): number
export function cjdnToMilankovic(cjdn: CJDN, options?: DateFieldOptions): IsoDateString | number
export function cjdnToMilankovic(cjdn: CJDN, options?: DateFieldOptions): IsoDateString | number {
  return selectDateField(cjdnToMilankovicDate(cjdn), options)
}
