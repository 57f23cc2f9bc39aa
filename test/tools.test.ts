/**
 * Tool handler tests
 * Handlers run in process with a stub logger; no server is started.
 */

import { describe, expect, test, vi } from "vitest";
import { constantsResource } from "../src/resources/constants.ts";
import {
  calculateTangentTool,
  checkAngleTool,
  formatNumber,
  runStep,
  type ToolContext,
  trigStepTool,
} from "../src/tools/index.ts";

function stubContext() {
  const log = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  const context: ToolContext = { log };
  return { context, log };
}

describe("calculate_tangent", () => {
  test("reports the result, status and reduced angle", async () => {
    const { context } = stubContext();
    const text = await calculateTangentTool.execute({ angle: "45" }, context);
    expect(text).toBe(
      [
        "**Result: 1.000000**",
        "- Status: Calculation completed successfully",
        "- Angle: 45° → 0.785398163397448 rad (reduced)",
      ].join("\n"),
    );
  });

  test("reports the undefined tangent", async () => {
    const { context } = stubContext();
    const text = await calculateTangentTool.execute({ angle: "90" }, context);
    expect(text).toBe(
      ["**Result: UNDEFINED**", "- Status: Undefined tangent - angle at asymptote", "- Reason: cos≈0"].join("\n"),
    );
  });

  test("reports invalid input", async () => {
    const { context } = stubContext();
    const text = await calculateTangentTool.execute({ angle: "abc" }, context);
    expect(text).toBe(
      [
        "**Result: INVALID INPUT**",
        "- Status: Invalid input - please check your entry",
        "- Reason: Non-numeric input",
      ].join("\n"),
    );
  });

  test("reports an angle too large to convert as invalid input", async () => {
    const { context, log } = stubContext();
    const text = await calculateTangentTool.execute({ angle: "1e308" }, context);
    expect(text).toBe(
      [
        "**Result: INVALID INPUT**",
        "- Status: Invalid input - please check your entry",
        "- Reason: Angle too large to convert to radians",
      ].join("\n"),
    );
    expect(text.includes("NaN")).toBe(false);
    expect(log.info).not.toHaveBeenCalled();
  });

  test("accepts hexadecimal angles", async () => {
    const { context } = stubContext();
    const text = await calculateTangentTool.execute({ angle: "0x2Dp0" }, context);
    expect(text.split("\n")[0]).toBe("**Result: 1.000000**");
    expect(text.split("\n")[2]).toBe("- Angle: 45° → 0.785398163397448 rad (reduced)");
  });

  test("logs successes at info and failures at warn", async () => {
    const { context, log } = stubContext();
    await calculateTangentTool.execute({ angle: "0" }, context);
    expect(log.info).toHaveBeenCalledWith("tangent computed", { angle: "0", value: 0 });

    await calculateTangentTool.execute({ angle: "270" }, context);
    expect(log.warn).toHaveBeenCalledWith("tangent not computed", {
      angle: "270",
      error: "UndefinedTangent",
    });
    expect(log.debug).toHaveBeenCalledTimes(2);
    expect(log.error).not.toHaveBeenCalled();
  });
});

describe("check_angle", () => {
  test("classifies text", async () => {
    expect(await checkAngleTool.execute({ angle: "" })).toBe("empty: Ready");
    expect(await checkAngleTool.execute({ angle: "12" })).toBe(
      "valid: Valid input - Press Enter or click Compute",
    );
    expect(await checkAngleTool.execute({ angle: "12a" })).toBe("invalid: Please enter a valid number");
  });
});

describe("trig_step", () => {
  test("runStep parses before every operation", () => {
    expect(runStep("parse", " 45 ")).toEqual({ success: true, value: 45 });
    expect(runStep("cos", "0")).toEqual({ success: true, value: 1 });
    expect(runStep("tan", "abc")).toEqual({
      success: false,
      error: "InvalidInput",
      message: "Non-numeric input",
    });
  });

  test("formats each stage", async () => {
    const { context } = stubContext();
    expect(await trigStepTool.execute({ operation: "parse", value: "1.5e2" }, context)).toBe("parse(1.5e2) = 150");
    expect(await trigStepTool.execute({ operation: "to_radians", value: "0" }, context)).toBe("to_radians(0) = 0");
    expect(await trigStepTool.execute({ operation: "to_radians", value: "180" }, context)).toBe(
      "to_radians(180) = 3.14159265358979",
    );
    expect(await trigStepTool.execute({ operation: "normalize", value: "1" }, context)).toBe("normalize(1) = 1");
    expect(await trigStepTool.execute({ operation: "sin", value: "0" }, context)).toBe("sin(0) = 0");
    expect(await trigStepTool.execute({ operation: "cos", value: "0" }, context)).toBe("cos(0) = 1");
  });

  test("reports failures with kind and reason", async () => {
    const { context } = stubContext();
    expect(await trigStepTool.execute({ operation: "to_radians", value: "1e308" }, context)).toBe(
      "to_radians(1e308): InvalidInput (Result is not a finite number)",
    );
    expect(await trigStepTool.execute({ operation: "tan", value: "1.5707963267948966" }, context)).toBe(
      "tan(1.5707963267948966): UndefinedTangent (cos≈0)",
    );
    expect(await trigStepTool.execute({ operation: "sin", value: "" }, context)).toBe(
      "sin(): InvalidInput (Empty input)",
    );
  });
});

describe("formatNumber", () => {
  test("drops trailing zeros and noise past 15 digits", () => {
    expect(formatNumber(1)).toBe("1");
    expect(formatNumber(0.1 + 0.2)).toBe("0.3");
    expect(formatNumber(-2.5)).toBe("-2.5");
  });
});

describe("trig://constants", () => {
  test("exposes the engine parameters", async () => {
    const { text } = await constantsResource.load();
    expect(JSON.parse(text)).toEqual({
      pi: Math.PI,
      epsilon: 1e-12,
      series_terms: 15,
      version: "1.0.0",
    });
  });
});
