/**
 * Core Types
 *
 * Value types shared by every calendar module. All of them are plain
 * immutable data; nothing outlives the call that produced it.
 */

// ============================================================================
// Calendar Selection
// ============================================================================

export const CalendarKind = {
  Julian: 1,
  Milankovic: 2,
  Gregorian: 3,
} as const

export type CalendarKind = (typeof CalendarKind)[keyof typeof CalendarKind]

const CALENDAR_KINDS: readonly CalendarKind[] = [
  CalendarKind.Julian,
  CalendarKind.Milankovic,
  CalendarKind.Gregorian,
]

export function isCalendarKind(value: unknown): value is CalendarKind {
  return CALENDAR_KINDS.some((kind) => kind === value)
}

// ============================================================================
// Dates
// ============================================================================

/**
 * A day on one calendar. `year` is astronomical: year 0 is 1 BC, year -1 is 2 BC.
 */
export type CalendarDate = {
  readonly year: number
  readonly month: number
  readonly day: number
}

declare const __isoDate: unique symbol

/** ISO 8601 extended date: [-]YYYY-MM-DD, at least four year digits */
export type IsoDateString = string & { readonly [__isoDate]: true }

/** Chronological Julian Day Number: whole days since 1 January 4713 BC (Julian) */
export type CJDN = number

/** ISO 8601 weekday, Monday = 1 … Sunday = 7 */
export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7

// ============================================================================
// Inverse Conversion Options
// ============================================================================

/**
 * Selects a single field of an inverse conversion. When several flags are set,
 * year wins over month and month wins over day.
 */
export type DateFieldOptions = {
  returnYear?: boolean
  returnMonth?: boolean
  returnDay?: boolean
}

/** Options that select one numeric field; used to type the inverse overloads. */
export type SingleFieldOptions = DateFieldOptions &
  ({ returnYear: true } | { returnMonth: true } | { returnDay: true })
