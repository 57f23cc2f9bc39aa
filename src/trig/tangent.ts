/**
 * Tangent policy and the full degrees → tan pipeline
 */

import { normalizeRadians, toRadians } from "./angle.ts";
import { EPSILON } from "./constants.ts";
import { parseInput } from "./parse.ts";
import { cos, sin } from "./series.ts";
import { fail, ok, type TrigResult } from "./types.ts";

/**
 * tan(x) = sin(x) / cos(x) for an already reduced angle.
 * Undefined when the series cosine is within EPSILON of zero.
 */
export function tan(x: number): TrigResult<number> {
  const c = cos(x);
  if (Math.abs(c) < EPSILON) {
    return fail("UndefinedTangent", "cos≈0");
  }
  const s = sin(x);
  return ok(s / c);
}

export interface TangentEvaluation {
  /** Parsed input */
  degrees: number;
  /** Angle after reduction into [−π, π] */
  radians: number;
  tangent: number;
}

/**
 * Validate → convert → reduce → evaluate, keeping the intermediate angles.
 * Stops at the first failure.
 */
export function evaluateTangent(input: string): TrigResult<TangentEvaluation> {
  const degrees = parseInput(input);
  if (!degrees.success) return degrees;

  // |degrees| above ~5.7e307 overflows during conversion
  const radians = toRadians(degrees.value);
  if (!Number.isFinite(radians)) {
    return fail("InvalidInput", "Angle too large to convert to radians");
  }

  const reduced = normalizeRadians(radians);
  const tangent = tan(reduced);
  if (!tangent.success) return tangent;

  return ok({ degrees: degrees.value, radians: reduced, tangent: tangent.value });
}

export function calculateTangent(input: string): TrigResult<number> {
  const result = evaluateTangent(input);
  return result.success ? ok(result.value.tangent) : result;
}
