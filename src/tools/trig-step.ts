import { z } from "zod";
import {
  cos,
  fail,
  normalizeRadians,
  parseInput,
  sin,
  tan,
  toRadians,
  type TrigResult,
} from "../trig/index.ts";
import type { ToolContext } from "./context.ts";
import { formatNumber } from "./tangent.ts";

const OPERATIONS = ["parse", "to_radians", "normalize", "sin", "cos", "tan"] as const;

export type TrigOperation = (typeof OPERATIONS)[number];

/** Numeric steps; `parse` is handled separately since it takes the raw text */
const STEPS: Record<Exclude<TrigOperation, "parse">, (x: number) => TrigResult<number>> = {
  to_radians: (x) => ({ success: true, value: toRadians(x) }),
  normalize: (x) => ({ success: true, value: normalizeRadians(x) }),
  sin: (x) => ({ success: true, value: sin(x) }),
  cos: (x) => ({ success: true, value: cos(x) }),
  tan: (x) => tan(x),
};

/** Run a single pipeline step */
export function runStep(operation: TrigOperation, value: string): TrigResult<number> {
  const parsed = parseInput(value);
  if (operation === "parse" || !parsed.success) return parsed;

  const result = STEPS[operation](parsed.value);
  if (result.success && !Number.isFinite(result.value)) {
    return fail("InvalidInput", "Result is not a finite number");
  }
  return result;
}

/**
 * Diagnostic access to each stage of the tangent pipeline
 * Single flat schema with an operation enum (no union at the root)
 */
export const trigStepTool = {
  name: "trig_step",
  description: `Run one stage of the tangent pipeline on a value.

Operations:
- parse: validate text as a degree value
- to_radians: degrees → radians
- normalize: reduce radians into [-π, π]
- sin / cos: 15-term Maclaurin series (radians, expects |x| ≤ π)
- tan: sin/cos with the undefined-tangent check (radians, already reduced)`,

  parameters: z.object({
    operation: z.enum(OPERATIONS).describe("Pipeline stage to run"),
    value: z.string().describe("Input value: degrees for parse/to_radians, radians otherwise"),
  }),

  execute: async (
    args: { operation: TrigOperation; value: string },
    context: ToolContext,
  ): Promise<string> => {
    const result = runStep(args.operation, args.value);
    context.log.debug("trig_step", { operation: args.operation, value: args.value, success: result.success });

    if (result.success) {
      return `${args.operation}(${args.value}) = ${formatNumber(result.value)}`;
    }
    return `${args.operation}(${args.value}): ${result.error} (${result.message})`;
  },
};
