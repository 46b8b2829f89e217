/**
 * Study Loop Shared Types and Protocols
 *
 * This package contains:
 * - TypeScript types for Card, ReviewState, Session and statistics models
 * - Zod schemas for persisted documents and REST request bodies
 * - Calendar date utilities
 */

export const VERSION = "0.1.0";

// Core types
export type {
  Card,
  ReviewState,
  Session,
  DailyStats,
  LearningStreak,
  ErrorCode,
} from "./types.js";

// Model schemas
export {
  RatingSchema,
  PromptKindSchema,
  DailyStatsSchema,
  LearningStreakSchema,
  StatsFileSchema,
  ReviewStateRecordSchema,
  ReviewStateFileSchema,
  NewCardInputSchema,
  CardEditSchema,
  formatValidationError,
  cardKey,
  parseCardKey,
} from "./models.js";

export type {
  Rating,
  PromptKind,
  StatsFile,
  ReviewStateRecord,
  ReviewStateFile,
  NewCardInput,
  CardEdit,
} from "./models.js";

// Date utilities
export {
  formatDate,
  parseDate,
  getToday,
  addDays,
  dayDifference,
  lastNDays,
} from "./dates.js";

// Protocol schemas
export {
  ErrorCodeSchema,
  CreateCardRequestSchema,
  UpdateCardRequestSchema,
  LoadDeckRequestSchema,
  RateCardRequestSchema,
  ExportStatsRequestSchema,
  CardResponseSchema,
  ErrorResponseSchema,
} from "./protocol.js";

export type {
  CreateCardRequest,
  UpdateCardRequest,
  LoadDeckRequest,
  RateCardRequest,
  ExportStatsRequest,
  CardResponse,
  ErrorResponse,
} from "./protocol.js";
