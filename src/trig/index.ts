/**
 * Tangent engine - public API
 */

export { normalizeRadians, toRadians } from "./angle.ts";
export { EPSILON, PI, SERIES_TERMS, TWO_PI } from "./constants.ts";
export {
  checkInput,
  formatError,
  formatTangent,
  formatUnexpectedError,
  type InputCheck,
  type InputState,
  statusFor,
} from "./display.ts";
export { parseInput, trimInput } from "./parse.ts";
export { cos, sin } from "./series.ts";
export { calculateTangent, evaluateTangent, type TangentEvaluation, tan } from "./tangent.ts";
export {
  fail,
  isOk,
  ok,
  type TrigErrorKind,
  type TrigFailure,
  type TrigResult,
  type TrigSuccess,
} from "./types.ts";
