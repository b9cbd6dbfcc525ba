/**
 * Julian Calendar
 *
 * Proleptic Julian ↔ CJDN. Every fourth year is a leap year, with no
 * century exception. CJDN 0 is Julian -4712-01-01.
 */

import { floorDiv, floorMod } from './arithmetic'
import type { CalendarDate, CJDN, DateFieldOptions, IsoDateString, SingleFieldOptions } from './core'
import { selectDateField } from './format'
import { assertCJDN, parseDateParts, type IntegerInput } from './input'

// ============================================================================
// Constants
// ============================================================================

/** CJDN of the day before Julian 0000-03-01 */
export const JULIAN_EPOCH = 1721117

/** Days in a four-year Julian cycle */
export const JULIAN_CYCLE_DAYS = 1461

const FIVE_MONTH_DAYS = 153

// ============================================================================
// Leap Years
// ============================================================================

export function isJulianLeapYear(year: number): boolean {
  return floorMod(year, 4) === 0
}

// ============================================================================
// Conversion
// ============================================================================

export function julianDateToCJDN(date: CalendarDate): CJDN {
  const c0 = floorDiv(date.month - 3, 12)
  const j1 = floorDiv((c0 + date.year) * JULIAN_CYCLE_DAYS, 4)
  const j2 = floorDiv(FIVE_MONTH_DAYS * date.month - 1836 * c0 - 457, 5)
  return j1 + j2 + date.day + JULIAN_EPOCH
}

export function cjdnToJulianDate(cjdn: CJDN): CalendarDate {
  const k2 = 4 * (assertCJDN(cjdn) - JULIAN_EPOCH - 1) + 3
  const k1 = 5 * floorDiv(floorMod(k2, JULIAN_CYCLE_DAYS), 4) + 2
  const x1 = floorDiv(k1, FIVE_MONTH_DAYS)
  const c0 = floorDiv(x1 + 2, 12)
  return {
    year: floorDiv(k2, JULIAN_CYCLE_DAYS) + c0,
    month: x1 - 12 * c0 + 3,
    day: floorDiv(floorMod(k1, FIVE_MONTH_DAYS), 5) + 1,
  }
}

// ============================================================================
// Public Functions
// ============================================================================

export function julianToCJDN(year: IntegerInput, month: IntegerInput, day: IntegerInput): CJDN {
  return julianDateToCJDN(parseDateParts(year, month, day))
}

export function cjdnToJulian(cjdn: CJDN): IsoDateString
export function cjdnToJulian(cjdn: CJDN, options: SingleFieldOptions): number
export function cjdnToJulian(cjdn: CJDN, options?: DateFieldOptions): IsoDateString | number
export function cjdnToJulian(cjdn: CJDN, options?: DateFieldOptions): IsoDateString | number {
  return selectDateField(cjdnToJulianDate(cjdn), options)
}
