/**
 * Study Context Middleware
 *
 * Makes the process-wide StudyContext available to route handlers and
 * provides the JSON error helpers the routes share.
 */

import type { Context, MiddlewareHandler } from "hono";
import { z } from "zod";
import { formatValidationError, type ErrorCode } from "@study-loop/shared";
import { errorCodeForFailure } from "../errors.js";
import type { Result, StoreFailure } from "../result.js";
import { fail, ok } from "../result.js";
import type { StudyContext } from "../study-context.js";

/**
 * Error response format for REST endpoints.
 */
export interface RestErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
  };
}

/**
 * Hono environment for routes that read the study context.
 */
export interface StudyEnv {
  Variables: {
    study: StudyContext;
  };
}

export type ErrorStatus = 400 | 404 | 409 | 500;

/**
 * Maps error codes to HTTP status codes.
 *
 * - VALIDATION_ERROR, UNSUPPORTED_OPERATION, DECK_READ_FAILED: 400
 * - CARD_NOT_FOUND: 404
 * - DUPLICATE_CARD: 409
 * - everything else: 500
 */
export function statusForCode(code: ErrorCode): ErrorStatus {
  switch (code) {
    case "VALIDATION_ERROR":
    case "UNSUPPORTED_OPERATION":
    case "DECK_READ_FAILED":
      return 400;
    case "CARD_NOT_FOUND":
      return 404;
    case "DUPLICATE_CARD":
      return 409;
    case "PERSISTENCE_ERROR":
    case "STORE_INIT_FAILED":
    case "INTERNAL_ERROR":
      return 500;
  }
}

/**
 * Creates a JSON error response with the proper format.
 */
export function jsonError(c: Context, status: ErrorStatus, code: ErrorCode, message: string) {
  const body: RestErrorResponse = {
    error: {
      code,
      message,
    },
  };
  return c.json(body, status);
}

/**
 * JSON error response for a failed service result.
 */
export function failureResponse(c: Context, failure: StoreFailure) {
  const code = errorCodeForFailure(failure.kind);
  return jsonError(c, statusForCode(code), code, failure.message);
}

/**
 * Parse and validate a JSON request body.
 * A body that is not JSON or does not match the schema is a validation failure.
 */
export async function readJsonBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S
): Promise<Result<z.output<S>>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return fail("validation", "Invalid JSON in request body");
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return fail("validation", formatValidationError(parsed.error));
  }
  return ok(parsed.data);
}

/**
 * Middleware that exposes the study context as `c.get("study")`.
 */
export function studyContext(study: StudyContext): MiddlewareHandler<StudyEnv> {
  return async (c, next) => {
    c.set("study", study);
    await next();
  };
}
