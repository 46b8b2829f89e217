/**
 * Protocol Schema Tests
 *
 * REST request bodies and response shapes.
 */

import { describe, test, expect } from "vitest";
import {
  CreateCardRequestSchema,
  ErrorCodeSchema,
  ErrorResponseSchema,
  ExportStatsRequestSchema,
  LoadDeckRequestSchema,
  RateCardRequestSchema,
  UpdateCardRequestSchema,
} from "../protocol.js";
import type { ErrorCode } from "../types.js";

// =============================================================================
// Request Schemas
// =============================================================================

describe("CreateCardRequestSchema", () => {
  test("fills defaults and trims text", () => {
    const result = CreateCardRequestSchema.parse({ question: "  Q  ", answer: "A " });

    expect(result).toEqual({ question: "Q", answer: "A", promptKind: "factual", tags: [] });
  });

  test("accepts every optional field", () => {
    const result = CreateCardRequestSchema.parse({
      question: "Q",
      answer: "A",
      sourceContext: "Chemistry",
      promptKind: "comparison",
      tags: ["acids", "bases"],
    });

    expect(result.promptKind).toBe("comparison");
    expect(result.tags).toEqual(["acids", "bases"]);
  });

  test("rejects blank question or answer", () => {
    expect(CreateCardRequestSchema.safeParse({ question: "   ", answer: "A" }).success).toBe(false);
    expect(CreateCardRequestSchema.safeParse({ question: "Q", answer: "" }).success).toBe(false);
  });

  test("rejects an unknown prompt kind", () => {
    const result = CreateCardRequestSchema.safeParse({ question: "Q", answer: "A", promptKind: "trivia" });
    expect(result.success).toBe(false);
  });
});

describe("UpdateCardRequestSchema", () => {
  test("requires both fields", () => {
    expect(UpdateCardRequestSchema.safeParse({ question: "Q" }).success).toBe(false);
    expect(UpdateCardRequestSchema.parse({ question: "Q", answer: "A" })).toEqual({
      question: "Q",
      answer: "A",
    });
  });
});

describe("RateCardRequestSchema", () => {
  test("accepts the four ratings", () => {
    for (const rating of ["again", "hard", "good", "easy"]) {
      expect(RateCardRequestSchema.safeParse({ cardKey: "deck.txt:1", rating }).success).toBe(true);
    }
  });

  test("rejects other ratings and a missing key", () => {
    expect(RateCardRequestSchema.safeParse({ cardKey: "deck.txt:1", rating: "perfect" }).success).toBe(false);
    expect(RateCardRequestSchema.safeParse({ cardKey: "", rating: "good" }).success).toBe(false);
  });
});

describe("path requests", () => {
  test("require a non-empty path", () => {
    expect(LoadDeckRequestSchema.safeParse({ path: "" }).success).toBe(false);
    expect(LoadDeckRequestSchema.safeParse({ path: "/decks/a.txt" }).success).toBe(true);
    expect(ExportStatsRequestSchema.safeParse({}).success).toBe(false);
  });
});

// =============================================================================
// Error Schemas
// =============================================================================

describe("ErrorCodeSchema", () => {
  test("accepts all defined error codes", () => {
    const codes: ErrorCode[] = [
      "VALIDATION_ERROR",
      "CARD_NOT_FOUND",
      "DUPLICATE_CARD",
      "UNSUPPORTED_OPERATION",
      "PERSISTENCE_ERROR",
      "STORE_INIT_FAILED",
      "DECK_READ_FAILED",
      "INTERNAL_ERROR",
    ];
    for (const code of codes) {
      expect(ErrorCodeSchema.parse(code)).toBe(code);
    }
  });

  test("rejects unknown codes", () => {
    expect(ErrorCodeSchema.safeParse("CARD_MISSING").success).toBe(false);
  });
});

describe("ErrorResponseSchema", () => {
  test("accepts the REST error body", () => {
    const body = { error: { code: "DUPLICATE_CARD", message: "Card exists" } };
    expect(ErrorResponseSchema.parse(body)).toEqual(body);
  });
});
