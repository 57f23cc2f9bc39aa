export { checkAngleTool } from "./check.ts";
export type { ToolContext, ToolLogger } from "./context.ts";
export { calculateTangentTool, formatNumber } from "./tangent.ts";
export { runStep, type TrigOperation, trigStepTool } from "./trig-step.ts";
