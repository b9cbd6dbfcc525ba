/**
 * Input Parsing
 *
 * The single boundary where loosely typed year/month/day/CJDN arguments
 * become strict integers. Everything past this module works on numbers only.
 */

import type { CalendarDate, CJDN } from './core'

export { ParseError, InvalidCjdnError } from './errors'
import { ParseError, InvalidCjdnError } from './errors'

/** A date component as callers may pass it: an integer or a numeric string */
export type IntegerInput = number | string

const INTEGER_TEXT = /^[+-]?\d+$/

/**
 * Largest magnitude accepted for a year, month or day. The Milanković
 * formula multiplies the century by 328718; past this bound the products
 * leave the range where doubles divide exactly.
 */
export const MAX_DATE_PART = 1_000_000_000_000

/**
 * Largest CJDN magnitude accepted by the inverse formulas, which scale it
 * by up to 9. Every CJDN in range maps to a year inside MAX_DATE_PART.
 */
export const MAX_CJDN = 365_000_000_000_000

/**
 * Convert an integer or numeric string to a safe integer.
 * Accepts an optional sign and surrounding whitespace; rejects fractions,
 * exponents, hex and empty text.
 */
export function parseInteger(value: IntegerInput, field = 'value'): number {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new ParseError(`Invalid ${field}: ${value} is not a safe integer`)
    }
    return value
  }

  const text = value.trim()
  if (!INTEGER_TEXT.test(text)) {
    throw new ParseError(`Invalid ${field}: '${value}' is not an integer`)
  }

  const parsed = parseInt(text, 10)
  if (!Number.isSafeInteger(parsed)) {
    throw new ParseError(`Invalid ${field}: '${value}' is out of range`)
  }
  // parseInt('-0') is -0
  return parsed === 0 ? 0 : parsed
}

/** parseInteger, limited to ±MAX_DATE_PART */
export function parseDatePart(value: IntegerInput, field: string): number {
  const parsed = parseInteger(value, field)
  if (Math.abs(parsed) > MAX_DATE_PART) {
    throw new ParseError(`Invalid ${field}: ${parsed} is outside ±${MAX_DATE_PART}`)
  }
  return parsed
}

export function parseDateParts(
  year: IntegerInput,
  month: IntegerInput,
  day: IntegerInput,
): CalendarDate {
  return {
    year: parseDatePart(year, 'year'),
    month: parseDatePart(month, 'month'),
    day: parseDatePart(day, 'day'),
  }
}

export function assertCJDN(cjdn: unknown): CJDN {
  if (typeof cjdn !== 'number' || !Number.isSafeInteger(cjdn)) {
    throw new InvalidCjdnError(`Invalid CJDN: ${String(cjdn)} is not a safe integer`)
  }
  if (Math.abs(cjdn) > MAX_CJDN) {
    throw new InvalidCjdnError(`Invalid CJDN: ${cjdn} is outside ±${MAX_CJDN}`)
  }
  return cjdn
}
