/**
 * Operation Results
 *
 * Expected failures are returned, not thrown. `not_found` is kept apart from
 * the other kinds so callers decide deliberately between creating a default
 * and propagating the failure.
 */

import { OperationFailedError } from "./errors.js";

export type FailureKind =
  | "not_found"
  | "duplicate"
  | "validation"
  | "persistence"
  | "unsupported";

export interface StoreFailure {
  kind: FailureKind;
  message: string;
}

/** Result type for operations that can fail */
export type Result<T> = { success: true; data: T } | { success: false; error: StoreFailure };

export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

export function fail<T = never>(kind: FailureKind, message: string): Result<T> {
  return { success: false, error: { kind, message } };
}

export function notFound<T = never>(message: string): Result<T> {
  return fail("not_found", message);
}

/**
 * Wrap a store call, converting thrown errors into `persistence` failures.
 */
export function attempt<T>(action: string, fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return fail("persistence", `${action}: ${message}`);
  }
}

/**
 * The value of a successful result. A failure is thrown as OperationFailedError,
 * which lets a store transaction roll back on the first failed step.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.success) {
    throw new OperationFailedError(result.error);
  }
  return result.data;
}
