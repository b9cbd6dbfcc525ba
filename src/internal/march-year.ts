/**
 * March-based year helpers shared by the Gregorian and Milanković formulas.
 *
 * Both count years from 1 March so the leap day falls at the end of the year,
 * and both split a date into century, year of century and month offset.
 */

import { floorDiv, floorMod } from '../arithmetic'
import type { CalendarDate } from '../core'

/** Days in a century of 100 Julian-length years, times 100 */
export const CENTURY_DAYS_X100 = 36525

/** Days in the five-month March–July run; months alternate 31/30 within it */
const FIVE_MONTH_DAYS = 153

/**
 * Days from 1 March to the first of the month `monthOffset` months later,
 * for offsets 0 (March) … 11 (February).
 */
export function daysBeforeMarchMonth(monthOffset: number): number {
  return floorDiv(FIVE_MONTH_DAYS * monthOffset + 2, 5)
}

/**
 * Finish an inverse conversion once the century is known. `k2` is the day
 * within the century, scaled by 100 and offset by 99.
 */
export function marchYearToDate(centuryYears: number, k2: number): CalendarDate {
  const x2 = floorDiv(k2, CENTURY_DAYS_X100)
  const k1 = 5 * floorDiv(floorMod(k2, CENTURY_DAYS_X100), 100) + 2
  const x1 = floorDiv(k1, FIVE_MONTH_DAYS)
  const c0 = floorDiv(x1 + 2, 12)
  return {
    year: centuryYears + x2 + c0,
    month: x1 - 12 * c0 + 3,
    day: floorDiv(floorMod(k1, FIVE_MONTH_DAYS), 5) + 1,
  }
}
