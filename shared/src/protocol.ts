/**
 * Study Loop REST Protocol
 *
 * Zod schemas for request bodies accepted by the REST API, and the JSON
 * shapes it returns.
 */

import { z } from "zod";
import { NewCardInputSchema, CardEditSchema, PromptKindSchema, RatingSchema } from "./models.js";

// =============================================================================
// Error Code Schema
// =============================================================================

/**
 * Schema for ErrorCode enum values
 */
export const ErrorCodeSchema = z.enum([
  "VALIDATION_ERROR",
  "CARD_NOT_FOUND",
  "DUPLICATE_CARD",
  "UNSUPPORTED_OPERATION",
  "PERSISTENCE_ERROR",
  "STORE_INIT_FAILED",
  "DECK_READ_FAILED",
  "INTERNAL_ERROR",
]);

// =============================================================================
// Request Schemas
// =============================================================================

export const CreateCardRequestSchema = NewCardInputSchema;

export const UpdateCardRequestSchema = CardEditSchema;

export const LoadDeckRequestSchema = z.object({
  path: z.string().min(1, "Deck path is required"),
});

/**
 * Rating submission. The card is addressed by its key (`<sourceFile>:<line>`)
 * so cards without store identity can be rated too.
 */
export const RateCardRequestSchema = z.object({
  cardKey: z.string().min(1, "cardKey is required"),
  rating: RatingSchema,
});

export const ExportStatsRequestSchema = z.object({
  path: z.string().min(1, "Export path is required"),
});

// =============================================================================
// Response Schemas
// =============================================================================

/**
 * Card as serialized in responses.
 */
export const CardResponseSchema = z.object({
  id: z.number().int().nullable(),
  key: z.string(),
  question: z.string(),
  answer: z.string(),
  sourceFile: z.string(),
  sourceLine: z.number().int(),
  sourceContext: z.string().nullable(),
  promptKind: PromptKindSchema,
  tags: z.array(z.string()),
  createdAt: z.string(),
});

export const ErrorResponseSchema = z.object({
  error: z.object({
    code: ErrorCodeSchema,
    message: z.string(),
  }),
});

// =============================================================================
// Types
// =============================================================================

export type CreateCardRequest = z.input<typeof CreateCardRequestSchema>;
export type UpdateCardRequest = z.infer<typeof UpdateCardRequestSchema>;
export type LoadDeckRequest = z.infer<typeof LoadDeckRequestSchema>;
export type RateCardRequest = z.infer<typeof RateCardRequestSchema>;
export type ExportStatsRequest = z.infer<typeof ExportStatsRequestSchema>;
export type CardResponse = z.infer<typeof CardResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
