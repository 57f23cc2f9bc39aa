/**
 * Type definitions for the trig module
 */

/** The two expected failure conditions of the pipeline */
export type TrigErrorKind = "InvalidInput" | "UndefinedTangent";

export interface TrigSuccess<T> {
  success: true;
  value: T;
}

export interface TrigFailure {
  success: false;
  error: TrigErrorKind;
  message: string;
}

/** Outcome of a pipeline step. Domain failures are values, never exceptions. */
export type TrigResult<T> = TrigSuccess<T> | TrigFailure;

export function ok<T>(value: T): TrigSuccess<T> {
  return { success: true, value };
}

export function fail(error: TrigErrorKind, message: string): TrigFailure {
  return { success: false, error, message };
}

export function isOk<T>(result: TrigResult<T>): result is TrigSuccess<T> {
  return result.success;
}
