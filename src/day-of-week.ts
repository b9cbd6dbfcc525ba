/**
 * Day of Week
 *
 * ISO 8601 weekday of a CJDN. Weekdays do not depend on the calendar a day
 * is written in; the selector is validated and otherwise ignored.
 */

import { floorMod } from './arithmetic'
import { getCalendar } from './calendars'
import { CalendarKind, type CJDN, type Weekday } from './core'
import { assertCJDN } from './input'

/** CJDN 0 (Julian -4712-01-01) was a Monday */
const ISO_WEEKDAY_OFFSET = 0

const DAYS_PER_WEEK = 7

const ISO_WEEKDAYS: readonly Weekday[] = [1, 2, 3, 4, 5, 6, 7]

export type WeekdayName = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

const WEEKDAY_NAMES: Readonly<Record<Weekday, WeekdayName>> = {
  1: 'mon',
  2: 'tue',
  3: 'wed',
  4: 'thu',
  5: 'fri',
  6: 'sat',
  7: 'sun',
}

export function dayOfWeek(cjdn: CJDN, calendar: CalendarKind = CalendarKind.Gregorian): Weekday {
  const day = assertCJDN(cjdn)
  getCalendar(calendar)
  const weekday = ISO_WEEKDAYS[floorMod(day + ISO_WEEKDAY_OFFSET, DAYS_PER_WEEK)]
  if (weekday === undefined) throw new RangeError(`No weekday for CJDN ${day}`)
  return weekday
}

export function weekdayName(weekday: Weekday): WeekdayName {
  return WEEKDAY_NAMES[weekday]
}
