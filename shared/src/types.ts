/**
 * Study Loop Shared Types
 *
 * Core domain models for cards, review state and study statistics.
 * These types are used by the storage backends, the services and the REST layer.
 */

import type { PromptKind } from "./models.js";

/**
 * A flashcard.
 *
 * @property id - Store identity (SQLite row id), null for cards that only live in memory
 * @property sourceFile - Locator of the deck the card was read from
 * @property sourceLine - 1-based line number within the deck
 * @property sourceContext - Optional label such as a book or project name
 */
export interface Card {
  id: number | null;
  question: string;
  answer: string;
  sourceFile: string;
  sourceLine: number;
  sourceContext: string | null;
  promptKind: PromptKind;
  tags: string[];
  createdAt: Date;
}

/**
 * Scheduling state of one card.
 *
 * `schedulerState` is the scheduler's serialized state. It is passed through
 * untouched by everything except the scheduler adapter.
 */
export interface ReviewState {
  cardKey: string;
  cardId: number | null;
  schedulerState: string;
  lastReview: Date | null;
  reviewCount: number;
  due: Date;
}

/**
 * A study session. `endTime` is null while the session is active.
 */
export interface Session {
  id: number | null;
  startTime: Date;
  endTime: Date | null;
  cardsReviewed: number;
  newCards: number;
  reviewedCards: number;
}

/**
 * Aggregated activity for one local calendar date (YYYY-MM-DD).
 */
export interface DailyStats {
  date: string;
  cardsReviewed: number;
  sessionMinutes: number;
  sessionCount: number;
  newCards: number;
  reviewedCards: number;
}

/**
 * Consecutive-day study streak. `lastStudyDate` is "" before the first session.
 */
export interface LearningStreak {
  currentStreak: number;
  longestStreak: number;
  lastStudyDate: string;
}

/**
 * Error codes shared by the services and the REST API.
 */
export type ErrorCode =
  | "VALIDATION_ERROR"
  | "CARD_NOT_FOUND"
  | "DUPLICATE_CARD"
  | "UNSUPPORTED_OPERATION"
  | "PERSISTENCE_ERROR"
  | "STORE_INIT_FAILED"
  | "DECK_READ_FAILED"
  | "INTERNAL_ERROR";
