import { z } from "zod";
import {
  evaluateTangent,
  formatTangent,
  formatUnexpectedError,
  ok,
  statusFor,
  type TangentEvaluation,
  type TrigResult,
} from "../trig/index.ts";
import type { ToolContext } from "./context.ts";

/**
 * Tangent of an angle typed in degrees
 * The MCP counterpart of the calculator's Compute button
 */
export const calculateTangentTool = {
  name: "calculate_tangent",
  description: `Calculate tan(x) for an angle given in degrees.

The angle is reduced into [-π, π] and evaluated with 15-term Maclaurin series
for sine and cosine. Angles at odd multiples of 90° report UNDEFINED; text that
is not a number reports INVALID INPUT.`,

  parameters: z.object({
    angle: z.string().describe("Angle in degrees, as typed (e.g. \"45\", \"-361\", \"1.5e2\")"),
  }),

  execute: async (args: { angle: string }, context: ToolContext): Promise<string> => {
    context.log.debug("calculate_tangent request", { angle: args.angle });

    let result: TrigResult<TangentEvaluation>;
    try {
      result = evaluateTangent(args.angle);
    } catch (err) {
      context.log.error("calculate_tangent failed unexpectedly", {
        angle: args.angle,
        error: err instanceof Error ? err.message : String(err),
      });
      return formatUnexpectedError();
    }

    if (result.success) {
      context.log.info("tangent computed", { angle: args.angle, value: result.value.tangent });
    } else {
      context.log.warn("tangent not computed", { angle: args.angle, error: result.error });
    }

    return formatTangentResult(result);
  },
};

function formatTangentResult(result: TrigResult<TangentEvaluation>): string {
  const tangent = result.success ? ok(result.value.tangent) : result;
  const lines = [`**${formatTangent(tangent)}**`, `- Status: ${statusFor(result)}`];

  if (result.success) {
    const { degrees, radians } = result.value;
    lines.push(`- Angle: ${degrees}° → ${formatNumber(radians)} rad (reduced)`);
  } else {
    lines.push(`- Reason: ${result.message}`);
  }

  return lines.join("\n");
}

/** Up to 15 significant digits, without trailing zeros */
export function formatNumber(n: number): string {
  return String(Number(n.toPrecision(15)));
}
