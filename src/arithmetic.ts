/**
 * Integer Arithmetic
 *
 * Floor division and floor modulo. The remainder takes the sign of the
 * divisor, so -1 mod 100 is 99 and floorDiv(-1, 100) is -1. JavaScript's `%`
 * truncates toward zero instead, which misplaces every BC year and every
 * CJDN before the epoch.
 */

export function floorDiv(a: number, b: number): number {
  return Math.floor(a / b)
}

export function floorMod(a: number, b: number): number {
  return a - b * floorDiv(a, b)
}
