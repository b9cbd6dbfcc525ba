/**
 * Segment 12: Error System Tests
 *
 * Tests the consolidated error system in errors.ts:
 * CalendarError base class, error code enum, and all error subclasses.
 */

import { describe, it, expect } from 'vitest'
import {
  CalendarError,
  CalendarErrorCode,
  ParseError,
  InvalidCjdnError,
  InvalidCalendarError,
  InvalidDateError,
  InvalidConfigError,
  InvalidEventError,
} from '../src/errors'
import { Ok, Err, unwrap } from '../src/result'

describe('Segment 12: Error System', () => {
  // ========================================================================
  // CalendarError Base Class
  // ========================================================================

  describe('CalendarError base class', () => {
    it('constructor sets code and message', () => {
      const err = new CalendarError(CalendarErrorCode.PARSE_ERROR, 'test message')
      expect(err.code).toBe('PARSE_ERROR')
      expect(err.message).toBe('test message')
    })

    it('is instanceof Error', () => {
      const err = new CalendarError(CalendarErrorCode.INVALID_DATE, 'x')
      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(CalendarError)
    })

    it('name property is CalendarError', () => {
      expect(new CalendarError(CalendarErrorCode.INVALID_DATE, 'x').name).toBe('CalendarError')
    })
  })

  // ========================================================================
  // Error Codes
  // ========================================================================

  describe('CalendarErrorCode', () => {
    it('lists every code once, valued by its own name', () => {
      expect(Object.entries(CalendarErrorCode)).toEqual([
        ['PARSE_ERROR', 'PARSE_ERROR'],
        ['INVALID_CJDN', 'INVALID_CJDN'],
        ['INVALID_CALENDAR', 'INVALID_CALENDAR'],
        ['INVALID_DATE', 'INVALID_DATE'],
        ['INVALID_CONFIG', 'INVALID_CONFIG'],
        ['INVALID_EVENT', 'INVALID_EVENT'],
      ])
    })
  })

  // ========================================================================
  // Subclasses
  // ========================================================================

  describe('subclasses', () => {
    const cases = [
      { ErrorClass: ParseError, name: 'ParseError', code: 'PARSE_ERROR' },
      { ErrorClass: InvalidCjdnError, name: 'InvalidCjdnError', code: 'INVALID_CJDN' },
      { ErrorClass: InvalidCalendarError, name: 'InvalidCalendarError', code: 'INVALID_CALENDAR' },
      { ErrorClass: InvalidDateError, name: 'InvalidDateError', code: 'INVALID_DATE' },
      { ErrorClass: InvalidConfigError, name: 'InvalidConfigError', code: 'INVALID_CONFIG' },
      { ErrorClass: InvalidEventError, name: 'InvalidEventError', code: 'INVALID_EVENT' },
    ] as const

    for (const { ErrorClass, name, code } of cases) {
      it(`${name} carries code ${code}`, () => {
        const err = new ErrorClass('boom')
        expect(err).toBeInstanceOf(CalendarError)
        expect(err).toBeInstanceOf(Error)
        expect(err.name).toBe(name)
        expect(err.code).toBe(code)
        expect(err.message).toBe('boom')
      })
    }
  })

  // ========================================================================
  // Result
  // ========================================================================

  describe('Result', () => {
    it('Ok wraps a value', () => {
      expect(Ok(3)).toEqual({ ok: true, value: 3 })
    })

    it('Err wraps an error', () => {
      const error = new ParseError('bad')
      expect(Err(error)).toEqual({ ok: false, error })
    })

    it('unwrap returns Ok values and throws Err errors', () => {
      expect(unwrap(Ok('2024-01-01'))).toBe('2024-01-01')
      const error = new ParseError('bad input')
      expect(() => unwrap(Err(error))).toThrow(error)
    })
  })
})
