/**
 * Truncated Maclaurin series for sine and cosine
 * Valid for |x| ≤ π; callers reduce the angle with normalizeRadians first.
 *
 * Each term is derived from the previous one instead of recomputing powers
 * and factorials. The exact recurrence and term count are part of the
 * observable numeric behavior.
 */

import { SERIES_TERMS } from "./constants.ts";

/** sin(x) = Σ (−1)ⁿ x^(2n+1) / (2n+1)!, n = 0..14 */
export function sin(x: number): number {
  let term = x;
  let sum = x;
  for (let n = 1; n < SERIES_TERMS; n++) {
    term *= (-x * x) / (2 * n * (2 * n + 1));
    sum += term;
  }
  return sum;
}

/** cos(x) = Σ (−1)ⁿ x^(2n) / (2n)!, n = 0..14 */
export function cos(x: number): number {
  let term = 1;
  let sum = 1;
  for (let n = 1; n < SERIES_TERMS; n++) {
    term *= (-x * x) / ((2 * n - 1) * (2 * n));
    sum += term;
  }
  return sum;
}
