/**
 * Domain Errors
 *
 * Thrown errors carry an ErrorCode so the REST layer can map them to
 * statuses. Expected per-operation failures use Result instead (see result.ts).
 */

import type { ErrorCode } from "@study-loop/shared";
import type { FailureKind, StoreFailure } from "./result.js";

/**
 * Base error for Study Loop operations.
 */
export class StudyLoopError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = "StudyLoopError";
    this.code = code;
  }
}

/**
 * Thrown when a store cannot be opened at startup. Fatal to the process.
 */
export class StoreInitError extends StudyLoopError {
  constructor(message: string) {
    super(message, "STORE_INIT_FAILED");
    this.name = "StoreInitError";
  }
}

/**
 * Thrown when a deck file cannot be opened or read.
 */
export class DeckReadError extends StudyLoopError {
  constructor(message: string) {
    super(message, "DECK_READ_FAILED");
    this.name = "DeckReadError";
  }
}

/**
 * Thrown when a returned failure must cross a boundary that only speaks exceptions.
 */
export class OperationFailedError extends StudyLoopError {
  readonly kind: FailureKind;

  constructor(failure: StoreFailure) {
    super(failure.message, errorCodeForFailure(failure.kind));
    this.name = "OperationFailedError";
    this.kind = failure.kind;
  }
}

export function errorCodeForFailure(kind: FailureKind): ErrorCode {
  switch (kind) {
    case "not_found":
      return "CARD_NOT_FOUND";
    case "duplicate":
      return "DUPLICATE_CARD";
    case "validation":
      return "VALIDATION_ERROR";
    case "unsupported":
      return "UNSUPPORTED_OPERATION";
    case "persistence":
      return "PERSISTENCE_ERROR";
  }
}
