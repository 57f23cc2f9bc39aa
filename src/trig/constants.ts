/**
 * Fixed constants of the tangent pipeline
 * Embedded literals so results do not depend on the platform's Math library
 */

/** π to 50 decimal places (rounds to the nearest double) */
export const PI = 3.14159265358979323846264338327950288419716939937510;

export const TWO_PI = 2 * PI;

/** |cos(x)| below this means tan(x) is undefined */
export const EPSILON = 1e-12;

/** Maclaurin terms summed for sin and cos. Not configurable. */
export const SERIES_TERMS = 15;
