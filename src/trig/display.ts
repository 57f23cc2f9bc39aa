/**
 * User-facing text for pipeline outcomes
 * Result line, status line and the live input check shown while typing.
 */

import { parseInput, trimInput } from "./parse.ts";
import type { TrigResult } from "./types.ts";

/** Result line for a tangent outcome, six decimals on success */
export function formatTangent(result: TrigResult<number>): string {
  if (result.success) {
    return `Result: ${result.value.toFixed(6)}`;
  }
  return result.error === "UndefinedTangent" ? "Result: UNDEFINED" : "Result: INVALID INPUT";
}

export function formatError(message: string): string {
  return `Result: ${message}`;
}

/** Shown when something other than a domain failure stopped the calculation */
export function formatUnexpectedError(): string {
  return formatError("ERROR");
}

export function statusFor(result: TrigResult<unknown>): string {
  if (result.success) return "Calculation completed successfully";
  switch (result.error) {
    case "UndefinedTangent":
      return "Undefined tangent - angle at asymptote";
    case "InvalidInput":
      return "Invalid input - please check your entry";
  }
}

// =============================================================================
// LIVE INPUT CHECK
// =============================================================================

export type InputState = "empty" | "valid" | "invalid";

export interface InputCheck {
  state: InputState;
  message: string;
}

/** Classify partially typed input. Uses parseInput, never a second parser. */
export function checkInput(input: string): InputCheck {
  if (trimInput(input) === "") {
    return { state: "empty", message: "Ready" };
  }
  if (parseInput(input).success) {
    return { state: "valid", message: "Valid input - Press Enter or click Compute" };
  }
  return { state: "invalid", message: "Please enter a valid number" };
}
