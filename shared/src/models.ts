/**
 * Study Loop Model Schemas
 *
 * Zod schemas for ratings, prompt kinds and the JSON documents written by the
 * file-backed store. Types that cross the persistence boundary are inferred
 * from these schemas.
 */

import { z } from "zod";
import type { Card } from "./types.js";

// =============================================================================
// Date Patterns
// =============================================================================

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const isoDateTime = () => z.string().datetime({ offset: true });

// =============================================================================
// Enumerations
// =============================================================================

/**
 * The four review grades, from forgotten to effortless.
 */
export const RatingSchema = z.enum(["again", "hard", "good", "easy"]);

/**
 * Categorical prompt kinds a card can be tagged with.
 */
export const PromptKindSchema = z.enum(["factual", "conceptual", "application", "comparison"]);

export type Rating = z.infer<typeof RatingSchema>;
export type PromptKind = z.infer<typeof PromptKindSchema>;

// =============================================================================
// Statistics Schemas
// =============================================================================

export const DailyStatsSchema = z.object({
  date: z.string().regex(DATE_PATTERN, "Date must be YYYY-MM-DD format"),
  cardsReviewed: z.number().int().min(0).default(0),
  sessionMinutes: z.number().int().min(0).default(0),
  sessionCount: z.number().int().min(0).default(0),
  newCards: z.number().int().min(0).default(0),
  reviewedCards: z.number().int().min(0).default(0),
});

export const LearningStreakSchema = z.object({
  currentStreak: z.number().int().min(0).default(0),
  longestStreak: z.number().int().min(0).default(0),
  /** YYYY-MM-DD, or "" before the first session */
  lastStudyDate: z.string().default(""),
});

/**
 * Document stored in `study-stats.json` by the file backend.
 */
export const StatsFileSchema = z.object({
  dailyStats: z.record(z.string(), DailyStatsSchema).default({}),
  /** Absent until the first session has ended */
  learningStreak: LearningStreakSchema.optional(),
});

export type StatsFile = z.infer<typeof StatsFileSchema>;

// =============================================================================
// Review State Schemas
// =============================================================================

/**
 * One review state as written to `review-state.json`.
 */
export const ReviewStateRecordSchema = z.object({
  schedulerState: z.string().min(1),
  lastReview: isoDateTime().nullable(),
  reviewCount: z.number().int().min(0),
  due: isoDateTime(),
});

/**
 * Document stored in `review-state.json`, keyed by card key.
 */
export const ReviewStateFileSchema = z.record(z.string(), ReviewStateRecordSchema);

export type ReviewStateRecord = z.infer<typeof ReviewStateRecordSchema>;
export type ReviewStateFile = z.infer<typeof ReviewStateFileSchema>;

// =============================================================================
// Card Input Schemas
// =============================================================================

/**
 * Input accepted when a card is added by hand.
 */
export const NewCardInputSchema = z.object({
  question: z.string().trim().min(1, "Question is required"),
  answer: z.string().trim().min(1, "Answer is required"),
  sourceContext: z.string().trim().optional(),
  promptKind: PromptKindSchema.default("factual"),
  tags: z.array(z.string().trim().min(1)).default([]),
});

/**
 * Input accepted when a card's text is edited.
 */
export const CardEditSchema = z.object({
  question: z.string().trim().min(1, "Question is required"),
  answer: z.string().trim().min(1, "Answer is required"),
});

export type NewCardInput = z.input<typeof NewCardInputSchema>;
export type CardEdit = z.infer<typeof CardEditSchema>;

/**
 * Format a Zod validation error into a human-readable message.
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

// =============================================================================
// Card Keys
// =============================================================================

/**
 * Key identifying a card by provenance: `<sourceFile>:<sourceLine>`.
 * Used for review state of cards that carry no store identity, and for
 * matching legacy state during migration.
 */
export function cardKey(card: Pick<Card, "sourceFile" | "sourceLine">): string {
  return `${card.sourceFile}:${card.sourceLine}`;
}

/**
 * Split a card key back into its locator and line number.
 * Returns null if the key does not end in `:<line>`.
 */
export function parseCardKey(key: string): { sourceFile: string; sourceLine: number } | null {
  const match = key.match(/^(.*):(\d+)$/);
  if (!match) {
    return null;
  }
  return { sourceFile: match[1], sourceLine: Number(match[2]) };
}
