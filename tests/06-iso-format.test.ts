/**
 * Segment 06: ISO 8601 Date String Tests
 *
 * Formatting with signed, zero-padded years, shape-only parsing, and the
 * field selection shared by the inverse conversions.
 */

import { describe, it, expect } from 'vitest'
import { formatIsoDate, parseIsoDate, selectDateField } from '../src/format'
import { ParseError } from '../src/errors'
import { unwrap } from '../src/result'

// ============================================================================
// 1. FORMATTING
// ============================================================================

describe('formatIsoDate', () => {
  it('pads month and day to two digits', () => {
    expect(formatIsoDate({ year: 2024, month: 3, day: 5 })).toBe('2024-03-05')
  })

  it('pads years to four digits', () => {
    expect(formatIsoDate({ year: 7, month: 1, day: 1 })).toBe('0007-01-01')
    expect(formatIsoDate({ year: 0, month: 12, day: 31 })).toBe('0000-12-31')
  })

  it('prefixes negative years with a minus sign', () => {
    expect(formatIsoDate({ year: -1, month: 6, day: 15 })).toBe('-0001-06-15')
    expect(formatIsoDate({ year: -4712, month: 1, day: 1 })).toBe('-4712-01-01')
  })

  it('keeps every digit of long years', () => {
    expect(formatIsoDate({ year: 12345, month: 1, day: 1 })).toBe('12345-01-01')
    expect(formatIsoDate({ year: -12345, month: 1, day: 1 })).toBe('-12345-01-01')
  })
})

// ============================================================================
// 2. FIELD SELECTION
// ============================================================================

describe('selectDateField', () => {
  const date = { year: -44, month: 3, day: 15 }

  it('formats with no options', () => {
    expect(selectDateField(date)).toBe('-0044-03-15')
    expect(selectDateField(date, {})).toBe('-0044-03-15')
  })

  it('applies year > month > day precedence', () => {
    expect(selectDateField(date, { returnYear: true, returnMonth: true })).toBe(-44)
    expect(selectDateField(date, { returnMonth: true, returnDay: true })).toBe(3)
    expect(selectDateField(date, { returnDay: true })).toBe(15)
  })
})

// ============================================================================
// 3. PARSING
// ============================================================================

describe('parseIsoDate', () => {
  it('parses a plain date', () => {
    const result = parseIsoDate('2024-03-15')
    expect(result).toEqual({ ok: true, value: { year: 2024, month: 3, day: 15 } })
  })

  it('parses signed years', () => {
    expect(unwrap(parseIsoDate('-0001-06-15'))).toEqual({ year: -1, month: 6, day: 15 })
    expect(unwrap(parseIsoDate('+2024-01-01'))).toEqual({ year: 2024, month: 1, day: 1 })
  })

  it('reads -0000 as year 0', () => {
    const parsed = unwrap(parseIsoDate('-0000-01-01'))
    expect(Object.is(parsed.year, 0)).toBe(true)
  })

  it('parses five-digit years', () => {
    expect(unwrap(parseIsoDate('10000-01-01'))).toEqual({ year: 10000, month: 1, day: 1 })
  })

  it('does not range-check month or day', () => {
    expect(unwrap(parseIsoDate('2023-02-30'))).toEqual({ year: 2023, month: 2, day: 30 })
  })

  it('rejects short years and unpadded fields', () => {
    expect(parseIsoDate('24-03-15').ok).toBe(false)
    expect(parseIsoDate('2024-3-15').ok).toBe(false)
    expect(parseIsoDate('2024-03-5').ok).toBe(false)
  })

  it('rejects other separators and trailing text', () => {
    expect(parseIsoDate('2024/03/15').ok).toBe(false)
    expect(parseIsoDate('2024-03-15T00:00').ok).toBe(false)
    expect(parseIsoDate('').ok).toBe(false)
  })

  it('returns a ParseError naming the input', () => {
    const result = parseIsoDate('not-a-date')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ParseError)
      expect(result.error.message).toBe("Invalid date format: 'not-a-date'")
    }
  })

  it('formatIsoDate output parses back to the same date', () => {
    for (const date of [{ year: -4712, month: 1, day: 1 }, { year: 0, month: 2, day: 29 }, { year: 2000, month: 12, day: 31 }]) {
      expect(unwrap(parseIsoDate(formatIsoDate(date)))).toEqual(date)
    }
  })
})
