/**
 * Monetary arithmetic helpers.
 * Amounts are yen; every derived amount passes through roundToNearest1000.
 */

import { ROUNDING_UNIT } from "./constants";

/**
 * Rounds a number to the nearest thousand (1000), halves rounding up.
 * Used for rounding financial amounts to the nearest ¥1000.
 * 
 * @example
 * ```ts
 * roundToNearest1000(12400) // returns 12000
 * roundToNearest1000(12600) // returns 13000
 * ```
 */
export function roundToNearest1000(value: number): number {
  return Math.round(value / ROUNDING_UNIT) * ROUNDING_UNIT;
}

/**
 * Rounds a non-negative amount down to a multiple of 1000.
 *
 * @example
 * ```ts
 * floorToNearest1000(1500) // returns 1000
 * ```
 */
export function floorToNearest1000(value: number): number {
  return Math.floor(value / ROUNDING_UNIT) * ROUNDING_UNIT;
}

/**
 * Integer division rounded up, for positive integer amounts.
 * 
 * @example
 * ```ts
 * ceilDiv(10000, 3000) // returns 4
 * ceilDiv(9000, 3000) // returns 3
 * ```
 */
export function ceilDiv(numerator: number, denominator: number): number {
  const whole = Math.floor(numerator / denominator);
  return numerator % denominator > 0 ? whole + 1 : whole;
}

/**
 * Share of `part` in `total` as a percentage, rounded to one decimal.
 * Returns 0 when the total is 0.
 */
export function sharePct(part: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  return Math.round((part / total) * 1000) / 10;
}

/**
 * Compares two fractions with a tolerance that absorbs binary floating point error
 * (0.15 + 0.10 + 0.05 is not exactly 0.30).
 */
export function fractionsEqual(a: number, b: number, tolerance: number = 1e-9): boolean {
  return Math.abs(a - b) <= tolerance;
}
