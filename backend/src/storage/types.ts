/**
 * Storage Contracts
 *
 * Repository interfaces implemented by both backends: the file-backed JSON
 * store and the SQLite store. A backend is chosen once at startup and
 * injected into the services.
 *
 * Every repository call is synchronous and returns a Result. Lookups report
 * absence as a `not_found` failure; write failures are `persistence` failures.
 */

import type {
  Card,
  CardEdit,
  DailyStats,
  LearningStreak,
  ReviewState,
  Session,
} from "@study-loop/shared";
import type { StorageKind } from "../config.js";
import type { Result } from "../result.js";

/**
 * Fields needed to store a new card. Identity and timestamps are assigned by the store.
 */
export type NewCardRecord = Omit<Card, "id" | "createdAt">;

export interface CardRepository {
  /** Whether stored cards receive a store identity (`Card.id`). */
  readonly hasIdentity: boolean;
  create(card: NewCardRecord): Result<Card>;
  getById(id: number): Result<Card>;
  /** Look up a card by its exact (question, answer) pair. */
  findByContent(question: string, answer: string): Result<Card>;
  /** Look up a card by provenance. */
  findBySource(sourceFile: string, sourceLine: number): Result<Card>;
  /** All cards in insertion order. */
  list(): Result<Card[]>;
  update(id: number, edit: CardEdit): Result<Card>;
  delete(id: number): Result<void>;
}

export interface ReviewStateRepository {
  get(card: Card): Result<ReviewState>;
  /** Create or replace the state of a card. */
  save(card: Card, state: ReviewState): Result<ReviewState>;
  deleteByCardId(cardId: number): Result<void>;
}

export type NewSessionRecord = Omit<Session, "id">;

export interface SessionRepository {
  create(session: NewSessionRecord): Result<Session>;
  update(session: Session): Result<Session>;
  /** Sessions without an end time, oldest first. */
  listUnfinished(): Result<Session[]>;
  delete(session: Session): Result<void>;
  clear(): Result<void>;
}

export interface DailyStatsRepository {
  getByDate(date: string): Result<DailyStats>;
  create(stats: DailyStats): Result<DailyStats>;
  update(stats: DailyStats): Result<DailyStats>;
  /** Rows between two dates inclusive, ascending. */
  range(startDate: string, endDate: string): Result<DailyStats[]>;
  /** All rows, ascending by date. */
  list(): Result<DailyStats[]>;
  clear(): Result<void>;
}

export interface StreakRepository {
  /** `not_found` until a streak has been saved. */
  get(): Result<LearningStreak>;
  save(streak: LearningStreak): Result<LearningStreak>;
  clear(): Result<void>;
}

export interface StorageBackend {
  readonly kind: StorageKind;
  readonly cards: CardRepository;
  readonly reviewStates: ReviewStateRepository;
  readonly sessions: SessionRepository;
  readonly dailyStats: DailyStatsRepository;
  readonly streak: StreakRepository;
  /**
   * Run `fn` so that its writes are persisted together or not at all.
   * Anything `fn` throws rolls the writes back and is rethrown.
   */
  transaction<T>(fn: () => T): T;
  close(): void;
}
