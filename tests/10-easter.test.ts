/**
 * Segment 10: Easter Tests
 *
 * Western (Gregorian computus) and Orthodox (Julian computus) Easter
 * Sunday as CJDNs.
 */

import { describe, it, expect } from 'vitest'
import { westernEaster, orthodoxEaster } from '../src/easter'
import { cjdnToGregorian } from '../src/gregorian'
import { cjdnToJulian } from '../src/julian'
import { dayOfWeek } from '../src/day-of-week'
import { ParseError } from '../src/errors'

describe('westernEaster', () => {
  it('2024 is March 31', () => {
    expect(westernEaster(2024)).toBe(2460401)
    expect(cjdnToGregorian(westernEaster(2024))).toBe('2024-03-31')
  })

  it('2000 is April 23', () => {
    expect(cjdnToGregorian(westernEaster(2000))).toBe('2000-04-23')
  })

  it('1961 is April 2', () => {
    expect(cjdnToGregorian(westernEaster(1961))).toBe('1961-04-02')
  })

  it('accepts a numeric string year', () => {
    expect(westernEaster('2019')).toBe(2458595)
  })

  it('throws ParseError on a non-numeric year', () => {
    expect(() => westernEaster('this year')).toThrow(ParseError)
  })
})

describe('orthodoxEaster', () => {
  it('2024 is Julian April 22, Gregorian May 5', () => {
    expect(orthodoxEaster(2024)).toBe(2460436)
    expect(cjdnToJulian(orthodoxEaster(2024))).toBe('2024-04-22')
    expect(cjdnToGregorian(orthodoxEaster(2024))).toBe('2024-05-05')
  })

  it('2019 is Gregorian April 28', () => {
    expect(cjdnToGregorian(orthodoxEaster(2019))).toBe('2019-04-28')
  })

  it('coincides with Western Easter in 2025', () => {
    expect(orthodoxEaster(2025)).toBe(2460786)
    expect(westernEaster(2025)).toBe(2460786)
  })
})

describe('Easter is always a Sunday', () => {
  it('for every year 1583..2600 on both computus rules', () => {
    for (let year = 1583; year <= 2600; year++) {
      expect(dayOfWeek(westernEaster(year))).toBe(7)
      expect(dayOfWeek(orthodoxEaster(year))).toBe(7)
    }
  })
})
