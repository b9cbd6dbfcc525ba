/**
 * cjdn-calendars
 *
 * Public API exports
 */

// Error system (canonical source — base class, codes, all error classes)
export {
  CalendarError, CalendarErrorCode,
  ParseError, InvalidCjdnError,
  InvalidCalendarError, InvalidDateError,
  InvalidConfigError, InvalidEventError,
} from './errors'
export type { CalendarErrorCode as CalendarErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Core types
export type {
  CalendarDate, CJDN, IsoDateString, Weekday,
  DateFieldOptions, SingleFieldOptions,
} from './core'
export { CalendarKind, isCalendarKind } from './core'

// Arithmetic primitives
export { floorDiv, floorMod } from './arithmetic'

// Input parsing
export type { IntegerInput } from './input'
export { parseInteger, parseDatePart, parseDateParts, assertCJDN, MAX_DATE_PART, MAX_CJDN } from './input'

// ISO 8601 strings
export { formatIsoDate, parseIsoDate, selectDateField } from './format'

// Gregorian
export {
  gregorianToCJDN, cjdnToGregorian,
  gregorianDateToCJDN, cjdnToGregorianDate,
  isGregorianLeapYear,
} from './gregorian'

// Milanković
export {
  milankovicToCJDN, cjdnToMilankovic,
  milankovicDateToCJDN, cjdnToMilankovicDate,
  isMilankovicLeapYear,
} from './milankovic'

// Julian
export {
  julianToCJDN, cjdnToJulian,
  julianDateToCJDN, cjdnToJulianDate,
  isJulianLeapYear,
} from './julian'

// Calendar registry
export type { CalendarName, CalendarSystem } from './calendars'
export { getCalendar, dateToCJDN, cjdnToDate, convertDate } from './calendars'

// Calendar rules & strict validation
export {
  isLeapYear, daysInYear, daysInMonth,
  isValidDate, validateDate,
} from './validation'

// Day of week
export type { WeekdayName } from './day-of-week'
export { dayOfWeek, weekdayName } from './day-of-week'

// Easter
export { westernEaster, orthodoxEaster } from './easter'

// Converter facade
export type {
  CalendarConverter, CalendarConverterConfig, ResolvedConverterConfig,
  InvalidDateEvent, InvalidDateHandler,
} from './converter'
export { createCalendarConverter } from './converter'
