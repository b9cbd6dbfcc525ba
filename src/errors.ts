/**
 * Consolidated error system for cjdn-calendars.
 *
 * All error classes extend CalendarError, which carries a typed error code.
 * Modules re-export the classes they throw so existing import paths continue to work.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CalendarErrorCode = {
  // Input parsing
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_CJDN: 'INVALID_CJDN',

  // Calendar selection
  INVALID_CALENDAR: 'INVALID_CALENDAR',

  // Strict validation
  INVALID_DATE: 'INVALID_DATE',

  // Converter facade
  INVALID_CONFIG: 'INVALID_CONFIG',
  INVALID_EVENT: 'INVALID_EVENT',
} as const

export type CalendarErrorCode = (typeof CalendarErrorCode)[keyof typeof CalendarErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CalendarError extends Error {
  readonly code: CalendarErrorCode

  constructor(code: CalendarErrorCode, message: string) {
    super(message)
    this.name = 'CalendarError'
    this.code = code
  }
}

// ============================================================================
// Input Errors
// ============================================================================

export class ParseError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

export class InvalidCjdnError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_CJDN, message)
    this.name = 'InvalidCjdnError'
  }
}

// ============================================================================
// Calendar Errors
// ============================================================================

export class InvalidCalendarError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_CALENDAR, message)
    this.name = 'InvalidCalendarError'
  }
}

export class InvalidDateError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_DATE, message)
    this.name = 'InvalidDateError'
  }
}

// ============================================================================
// Converter Errors
// ============================================================================

export class InvalidConfigError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_CONFIG, message)
    this.name = 'InvalidConfigError'
  }
}

export class InvalidEventError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_EVENT, message)
    this.name = 'InvalidEventError'
  }
}
