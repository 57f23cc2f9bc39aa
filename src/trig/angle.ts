/**
 * Angle conversion and range reduction
 */

import { PI, TWO_PI } from "./constants.ts";

/** Degrees → radians using the embedded π */
export function toRadians(degrees: number): number {
  return (degrees * PI) / 180;
}

/**
 * Reduce an angle in radians into [−π, π].
 * Must run before series evaluation; the truncated series lose accuracy far from zero.
 */
export function normalizeRadians(radians: number): number {
  let r = radians % TWO_PI;
  if (r > PI) r -= TWO_PI;
  if (r < -PI) r += TWO_PI;
  return r;
}
