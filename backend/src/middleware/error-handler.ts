/**
 * Error Handling Middleware
 *
 * Hono error handler that maps domain exceptions to HTTP status codes
 * with `{ error: { code, message } }` bodies. Unknown errors become a 500
 * with a generic message; details only go to the log.
 */

import type { Context, ErrorHandler } from "hono";
import { StudyLoopError } from "../errors.js";
import { createLogger } from "../logger.js";
import { jsonError, statusForCode, type RestErrorResponse } from "./study-context.js";

const log = createLogger("ErrorHandler");

/**
 * Logs error details server-side with the request method and path.
 * Stack traces are logged but never exposed in responses.
 */
function logError(c: Context, error: Error): void {
  const method = c.req.method;
  const path = c.req.path;

  if (error instanceof StudyLoopError) {
    log.warn(`${method} ${path} - ${error.code}: ${error.message}`);
  } else {
    log.error(`${method} ${path} - Unexpected error: ${error.message}`, {
      stack: error.stack,
    });
  }
}

/**
 * Hono error handler for REST API routes.
 *
 * Usage:
 * ```typescript
 * app.onError(restErrorHandler);
 * ```
 */
export const restErrorHandler: ErrorHandler = (err, c) => {
  logError(c, err);

  if (err instanceof StudyLoopError) {
    return jsonError(c, statusForCode(err.code), err.code, err.message);
  }

  return jsonError(
    c,
    500,
    "INTERNAL_ERROR",
    "An unexpected error occurred. Please try again later."
  );
};

export type { RestErrorResponse };
