/**
 * Input validation: text → finite number of degrees
 */

import { fail, ok, type TrigResult } from "./types.ts";

// Decimal floating-point literal with an optional f/F/d/D type suffix.
// NaN and Infinity are accepted here and rejected after parsing.
const DECIMAL_LITERAL = /^[+-]?(?:NaN|Infinity|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?[fFdD]?)$/;

// Hexadecimal floating-point literal: 0x<digits>[.<digits>]p<binary exponent>.
// The exponent is mandatory, so "0x10" is not a number.
const HEX_LITERAL = /^([+-]?)0[xX]([0-9a-fA-F]*)(?:\.([0-9a-fA-F]*))?[pP]([+-]?\d+)[fFdD]?$/;

// Control characters and space, trimmed from both ends
const EDGE_WHITESPACE = /^[\u0000- ]+|[\u0000- ]+$/g;

/** Strip leading and trailing code units ≤ U+0020 */
export function trimInput(input: string): string {
  return input.replace(EDGE_WHITESPACE, "");
}

/**
 * Parse a degree value typed by the user.
 * Accepts decimal and hexadecimal floating-point literals.
 * Rejects blank text, anything else that is not a number, NaN and ±Infinity
 * (including literals that overflow, such as "1e400").
 */
export function parseInput(input: string): TrigResult<number> {
  const text = trimInput(input);
  if (text === "") {
    return fail("InvalidInput", "Empty input");
  }

  const value = DECIMAL_LITERAL.test(text) ? Number(text.replace(/[fFdD]$/, "")) : parseHex(text);
  if (value === null) {
    return fail("InvalidInput", "Non-numeric input");
  }
  if (!Number.isFinite(value)) {
    return fail("InvalidInput", "NaN or Infinite value");
  }

  return ok(value);
}

/** Value of a hexadecimal floating-point literal, or null when text is not one */
function parseHex(text: string): number | null {
  const match = HEX_LITERAL.exec(text);
  if (!match) return null;

  const [, sign = "", whole = "", fraction = "", exponent = "0"] = match;
  if (whole === "" && fraction === "") return null;

  const mantissa = Number(BigInt(`0x${whole}${fraction}`));
  const value = mantissa === 0 ? 0 : scaleByPowerOfTwo(mantissa, Number.parseInt(exponent, 10) - 4 * fraction.length);
  return sign === "-" ? -value : value;
}

/** x × 2^k, in steps so that 2^k itself cannot overflow or underflow first */
function scaleByPowerOfTwo(x: number, k: number): number {
  let result = x;
  let remaining = k;
  while (remaining > 1000 && Number.isFinite(result) && result !== 0) {
    result *= 2 ** 1000;
    remaining -= 1000;
  }
  while (remaining < -1000 && result !== 0) {
    result *= 2 ** -1000;
    remaining += 1000;
  }
  return result * 2 ** remaining;
}
