/**
 * Easter
 *
 * The date of Easter Sunday by the two computus rules in use today.
 * Results are CJDNs, so either can be written in any of the three calendars.
 */

import { floorDiv, floorMod } from './arithmetic'
import type { CJDN } from './core'
import { gregorianDateToCJDN } from './gregorian'
import { parseDatePart, type IntegerInput } from './input'
import { julianDateToCJDN } from './julian'

/** Years in the Metonic cycle of lunar phases */
const METONIC_CYCLE = 19

/**
 * Easter Sunday by the Gregorian computus (the anonymous Gregorian
 * algorithm), as observed by the Western churches.
 */
export function westernEaster(year: IntegerInput): CJDN {
  const y = parseDatePart(year, 'year')
  const a = floorMod(y, METONIC_CYCLE)
  const b = floorDiv(y, 100)
  const c = floorMod(y, 100)
  const d = floorDiv(b, 4)
  const e = floorMod(b, 4)
  const f = floorDiv(b + 8, 25)
  const g = floorDiv(b - f + 1, 3)
  const h = floorMod(19 * a + b - d - g + 15, 30)
  const i = floorDiv(c, 4)
  const k = floorMod(c, 4)
  const l = floorMod(32 + 2 * e + 2 * i - h - k, 7)
  const m = floorDiv(a + 11 * h + 22 * l, 451)
  const n = h + l - 7 * m + 114
  return gregorianDateToCJDN({ year: y, month: floorDiv(n, 31), day: floorMod(n, 31) + 1 })
}

/**
 * Easter Sunday by the Julian computus, as observed by the Orthodox
 * churches (including those on the Milanković calendar for fixed feasts).
 */
export function orthodoxEaster(year: IntegerInput): CJDN {
  const y = parseDatePart(year, 'year')
  const a = floorMod(y, 4)
  const b = floorMod(y, 7)
  const c = floorMod(y, METONIC_CYCLE)
  const d = floorMod(19 * c + 15, 30)
  const e = floorMod(2 * a + 4 * b - d + 34, 7)
  const n = d + e + 114
  return julianDateToCJDN({ year: y, month: floorDiv(n, 31), day: floorMod(n, 31) + 1 })
}
