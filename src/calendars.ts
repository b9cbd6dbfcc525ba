/**
 * Calendar Registry
 *
 * Dispatch by CalendarKind to the Julian, Milanković and Gregorian modules,
 * and conversion of a date from one calendar to another through its CJDN.
 */

import type { CalendarDate, CJDN } from './core'
import { CalendarKind, isCalendarKind } from './core'
import { cjdnToGregorianDate, gregorianDateToCJDN, isGregorianLeapYear } from './gregorian'
import { parseDateParts, type IntegerInput } from './input'
import { cjdnToJulianDate, isJulianLeapYear, julianDateToCJDN } from './julian'
import { cjdnToMilankovicDate, isMilankovicLeapYear, milankovicDateToCJDN } from './milankovic'

export { InvalidCalendarError } from './errors'
import { InvalidCalendarError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type CalendarName = 'julian' | 'milankovic' | 'gregorian'

export type CalendarSystem = {
  readonly kind: CalendarKind
  readonly name: CalendarName
  toCJDN(date: CalendarDate): CJDN
  fromCJDN(cjdn: CJDN): CalendarDate
  isLeapYear(year: number): boolean
}

// ============================================================================
// Registry
// ============================================================================

const CALENDARS: Readonly<Record<CalendarKind, CalendarSystem>> = {
  [CalendarKind.Julian]: {
    kind: CalendarKind.Julian,
    name: 'julian',
    toCJDN: julianDateToCJDN,
    fromCJDN: cjdnToJulianDate,
    isLeapYear: isJulianLeapYear,
  },
  [CalendarKind.Milankovic]: {
    kind: CalendarKind.Milankovic,
    name: 'milankovic',
    toCJDN: milankovicDateToCJDN,
    fromCJDN: cjdnToMilankovicDate,
    isLeapYear: isMilankovicLeapYear,
  },
  [CalendarKind.Gregorian]: {
    kind: CalendarKind.Gregorian,
    name: 'gregorian',
    toCJDN: gregorianDateToCJDN,
    fromCJDN: cjdnToGregorianDate,
    isLeapYear: isGregorianLeapYear,
  },
}

/** Look up a calendar; throws InvalidCalendarError for anything but 1, 2 or 3. */
export function getCalendar(kind: CalendarKind): CalendarSystem {
  if (!isCalendarKind(kind)) {
    throw new InvalidCalendarError(`Unknown calendar: ${String(kind)} (expected 1, 2 or 3)`)
  }
  return CALENDARS[kind]
}

// ============================================================================
// Dispatching Conversions
// ============================================================================

export function dateToCJDN(
  kind: CalendarKind,
  year: IntegerInput,
  month: IntegerInput,
  day: IntegerInput,
): CJDN {
  const calendar = getCalendar(kind)
  return calendar.toCJDN(parseDateParts(year, month, day))
}

export function cjdnToDate(kind: CalendarKind, cjdn: CJDN): CalendarDate {
  return getCalendar(kind).fromCJDN(cjdn)
}

/** Re-express a date from one calendar in another. */
export function convertDate(date: CalendarDate, from: CalendarKind, to: CalendarKind): CalendarDate {
  const source = getCalendar(from)
  const target = getCalendar(to)
  return target.fromCJDN(source.toCJDN(parseDateParts(date.year, date.month, date.day)))
}
