/**
 * Calendar Converter
 *
 * Consumer-facing facade that binds the conversion functions to a
 * configuration: a default calendar, and whether out-of-range dates are
 * rejected (strict) or converted anyway and reported through the
 * `invalidDate` event (lenient, the default).
 */

import { getCalendar } from './calendars'
import type { CalendarDate, CJDN, IsoDateString, Weekday } from './core'
import { CalendarKind, isCalendarKind } from './core'
import { dayOfWeek } from './day-of-week'
import { orthodoxEaster, westernEaster } from './easter'
import { formatIsoDate, parseIsoDate } from './format'
import { parseDateParts, type IntegerInput } from './input'
import { unwrap } from './result'
import { isValidDate, validateDate } from './validation'

export { InvalidConfigError, InvalidEventError } from './errors'
import { InvalidConfigError, InvalidEventError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type CalendarConverterConfig = {
  defaultCalendar?: CalendarKind
  strict?: boolean
}

export type ResolvedConverterConfig = {
  readonly defaultCalendar: CalendarKind
  readonly strict: boolean
}

export type InvalidDateEvent = {
  readonly calendar: CalendarKind
  readonly date: CalendarDate
  readonly cjdn: CJDN
}

export type InvalidDateHandler = (event: InvalidDateEvent) => void

export type CalendarConverter = {
  readonly config: ResolvedConverterConfig
  toCJDN(year: IntegerInput, month: IntegerInput, day: IntegerInput, calendar?: CalendarKind): CJDN
  fromCJDN(cjdn: CJDN, calendar?: CalendarKind): CalendarDate
  format(cjdn: CJDN, calendar?: CalendarKind): IsoDateString
  parse(text: string, calendar?: CalendarKind): CJDN
  convert(date: CalendarDate, from: CalendarKind, to: CalendarKind): CalendarDate
  dayOfWeek(cjdn: CJDN): Weekday
  easter(year: IntegerInput, calendar?: CalendarKind): CJDN
  on(event: 'invalidDate', handler: InvalidDateHandler): void
}

// ============================================================================
// Config
// ============================================================================

function resolveConfig(config: CalendarConverterConfig): ResolvedConverterConfig {
  const defaultCalendar = config.defaultCalendar ?? CalendarKind.Gregorian
  if (!isCalendarKind(defaultCalendar)) {
    throw new InvalidConfigError(`defaultCalendar must be 1, 2 or 3, got ${String(defaultCalendar)}`)
  }
  const strict = config.strict ?? false
  if (typeof strict !== 'boolean') {
    throw new InvalidConfigError(`strict must be a boolean, got ${typeof strict}`)
  }
  return Object.freeze({ defaultCalendar, strict })
}

// ============================================================================
// Factory
// ============================================================================

export function createCalendarConverter(config: CalendarConverterConfig = {}): CalendarConverter {
  const resolved = resolveConfig(config)
  const invalidDateHandlers: InvalidDateHandler[] = []

  function emitInvalidDate(event: InvalidDateEvent): void {
    for (const handler of invalidDateHandlers) {
      try { handler(event) } catch (e) { console.error(`Event handler error on 'invalidDate':`, e) }
    }
  }

  function on(event: 'invalidDate', handler: InvalidDateHandler): void {
    if (event !== 'invalidDate') throw new InvalidEventError(`Unknown event: '${String(event)}'`)
    invalidDateHandlers.push(handler)
  }

  // Strict mode refuses the date; lenient mode converts it and reports it.
  function checkedToCJDN(date: CalendarDate, kind: CalendarKind): CJDN {
    const calendar = getCalendar(kind)
    if (resolved.strict) {
      return calendar.toCJDN(validateDate(kind, date.year, date.month, date.day))
    }
    const cjdn = calendar.toCJDN(date)
    if (!isValidDate(kind, date.year, date.month, date.day)) {
      emitInvalidDate(Object.freeze({ calendar: kind, date: Object.freeze({ ...date }), cjdn }))
    }
    return cjdn
  }

  function toCJDN(
    year: IntegerInput,
    month: IntegerInput,
    day: IntegerInput,
    calendar: CalendarKind = resolved.defaultCalendar,
  ): CJDN {
    return checkedToCJDN(parseDateParts(year, month, day), calendar)
  }

  function fromCJDN(cjdn: CJDN, calendar: CalendarKind = resolved.defaultCalendar): CalendarDate {
    return getCalendar(calendar).fromCJDN(cjdn)
  }

  function format(cjdn: CJDN, calendar: CalendarKind = resolved.defaultCalendar): IsoDateString {
    return formatIsoDate(fromCJDN(cjdn, calendar))
  }

  function parse(text: string, calendar: CalendarKind = resolved.defaultCalendar): CJDN {
    return checkedToCJDN(unwrap(parseIsoDate(text)), calendar)
  }

  function convert(date: CalendarDate, from: CalendarKind, to: CalendarKind): CalendarDate {
    const cjdn = checkedToCJDN(parseDateParts(date.year, date.month, date.day), from)
    return fromCJDN(cjdn, to)
  }

  function easter(year: IntegerInput, calendar: CalendarKind = resolved.defaultCalendar): CJDN {
    getCalendar(calendar)
    return calendar === CalendarKind.Gregorian ? westernEaster(year) : orthodoxEaster(year)
  }

  return {
    config: resolved,
    toCJDN,
    fromCJDN,
    format,
    parse,
    convert,
    dayOfWeek: (cjdn: CJDN) => dayOfWeek(cjdn, resolved.defaultCalendar),
    easter,
    on,
  }
}
