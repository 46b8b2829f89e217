/**
 * SQLite Repositories
 *
 * Row mapping and queries for the SQLite backend. Dates are stored as ISO
 * 8601 text, tags as a JSON array.
 */

import type Database from "better-sqlite3";
import {
  PromptKindSchema,
  cardKey,
  type Card,
  type CardEdit,
  type DailyStats,
  type LearningStreak,
  type ReviewState,
  type Session,
} from "@study-loop/shared";
import { z } from "zod";
import { hasErrorCode } from "../fs-utils.js";
import type { Result } from "../result.js";
import { attempt, fail, notFound, ok } from "../result.js";
import type { ReviewStateCache } from "./review-state-cache.js";
import type {
  CardRepository,
  DailyStatsRepository,
  NewCardRecord,
  NewSessionRecord,
  ReviewStateRepository,
  SessionRepository,
  StreakRepository,
} from "./types.js";

// =============================================================================
// Row Types
// =============================================================================

interface CardRow {
  id: number;
  question: string;
  answer: string;
  source_file: string;
  source_line: number;
  source_context: string | null;
  prompt_kind: string;
  tags: string;
  created_at: string;
}

interface ReviewStateRow {
  card_id: number;
  scheduler_state: string;
  last_review: string | null;
  review_count: number;
  due: string;
}

interface SessionRow {
  id: number;
  start_time: string;
  end_time: string | null;
  cards_reviewed: number;
  new_cards: number;
  reviewed_cards: number;
}

interface DailyStatsRow {
  date: string;
  cards_reviewed: number;
  session_minutes: number;
  session_count: number;
  new_cards: number;
  reviewed_cards: number;
}

interface StreakRow {
  current_streak: number;
  longest_streak: number;
  last_study_date: string;
}

// =============================================================================
// Row Mapping
// =============================================================================

const TagListSchema = z.array(z.string());

/**
 * Tags column to a list. Rows written before tags were stored as JSON hold
 * a comma-separated list; an empty column has no tags.
 */
function parseTags(raw: string): string[] {
  if (raw === "") {
    return [];
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return raw.split(",");
  }
  const tags = TagListSchema.safeParse(value);
  return tags.success ? tags.data : raw.split(",");
}

function toCard(row: CardRow): Card {
  const kind = PromptKindSchema.safeParse(row.prompt_kind);
  return {
    id: row.id,
    question: row.question,
    answer: row.answer,
    sourceFile: row.source_file,
    sourceLine: row.source_line,
    sourceContext: row.source_context,
    promptKind: kind.success ? kind.data : "factual",
    tags: parseTags(row.tags),
    createdAt: new Date(row.created_at),
  };
}

function toSession(row: SessionRow): Session {
  return {
    id: row.id,
    startTime: new Date(row.start_time),
    endTime: row.end_time === null ? null : new Date(row.end_time),
    cardsReviewed: row.cards_reviewed,
    newCards: row.new_cards,
    reviewedCards: row.reviewed_cards,
  };
}

function toDailyStats(row: DailyStatsRow): DailyStats {
  return {
    date: row.date,
    cardsReviewed: row.cards_reviewed,
    sessionMinutes: row.session_minutes,
    sessionCount: row.session_count,
    newCards: row.new_cards,
    reviewedCards: row.reviewed_cards,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    hasErrorCode(error, "SQLITE_CONSTRAINT_UNIQUE") ||
    hasErrorCode(error, "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}

const CARD_COLUMNS =
  "id, question, answer, source_file, source_line, source_context, prompt_kind, tags, created_at";

// =============================================================================
// Cards
// =============================================================================

export class SqliteCardRepository implements CardRepository {
  readonly hasIdentity = true;

  constructor(
    private readonly db: Database.Database,
    private readonly cache: ReviewStateCache,
    private readonly getNow: () => Date
  ) {}

  create(record: NewCardRecord): Result<Card> {
    const createdAt = this.getNow();
    try {
      const info = this.db
        .prepare(
          `INSERT INTO cards (question, answer, source_file, source_line, source_context, prompt_kind, tags, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          record.question,
          record.answer,
          record.sourceFile,
          record.sourceLine,
          record.sourceContext,
          record.promptKind,
          JSON.stringify(record.tags),
          createdAt.toISOString()
        );
      return ok({ ...record, tags: [...record.tags], id: Number(info.lastInsertRowid), createdAt });
    } catch (e) {
      if (isUniqueViolation(e)) {
        return fail("duplicate", `Card already exists: ${record.question}`);
      }
      const message = e instanceof Error ? e.message : String(e);
      return fail("persistence", `Create card: ${message}`);
    }
  }

  getById(id: number): Result<Card> {
    const row = attempt("Get card", () =>
      this.db.prepare<[number], CardRow>(`SELECT ${CARD_COLUMNS} FROM cards WHERE id = ?`).get(id)
    );
    if (!row.success) return row;
    return row.data ? ok(toCard(row.data)) : notFound(`Card ${id} not found`);
  }

  findByContent(question: string, answer: string): Result<Card> {
    const row = attempt("Find card", () =>
      this.db
        .prepare<[string, string], CardRow>(
          `SELECT ${CARD_COLUMNS} FROM cards WHERE question = ? AND answer = ?`
        )
        .get(question, answer)
    );
    if (!row.success) return row;
    return row.data ? ok(toCard(row.data)) : notFound(`No card with question: ${question}`);
  }

  findBySource(sourceFile: string, sourceLine: number): Result<Card> {
    const row = attempt("Find card", () =>
      this.db
        .prepare<[string, number], CardRow>(
          `SELECT ${CARD_COLUMNS} FROM cards WHERE source_file = ? AND source_line = ? ORDER BY id LIMIT 1`
        )
        .get(sourceFile, sourceLine)
    );
    if (!row.success) return row;
    return row.data ? ok(toCard(row.data)) : notFound(`No card at ${sourceFile}:${sourceLine}`);
  }

  list(): Result<Card[]> {
    return attempt("List cards", () =>
      this.db
        .prepare<[], CardRow>(`SELECT ${CARD_COLUMNS} FROM cards ORDER BY id`)
        .all()
        .map(toCard)
    );
  }

  update(id: number, edit: CardEdit): Result<Card> {
    try {
      const info = this.db
        .prepare("UPDATE cards SET question = ?, answer = ? WHERE id = ?")
        .run(edit.question, edit.answer, id);
      if (info.changes === 0) {
        return notFound(`Card ${id} not found`);
      }
    } catch (e) {
      if (isUniqueViolation(e)) {
        return fail("duplicate", `Card already exists: ${edit.question}`);
      }
      const message = e instanceof Error ? e.message : String(e);
      return fail("persistence", `Update card: ${message}`);
    }
    return this.getById(id);
  }

  delete(id: number): Result<void> {
    const deleted = attempt("Delete card", () =>
      this.db.prepare("DELETE FROM cards WHERE id = ?").run(id)
    );
    if (!deleted.success) return deleted;
    if (deleted.data.changes === 0) {
      return notFound(`Card ${id} not found`);
    }
    // review_states rows go with the card (ON DELETE CASCADE)
    this.cache.deleteByCardId(id);
    return ok(undefined);
  }
}

// =============================================================================
// Review States
// =============================================================================

export class SqliteReviewStateRepository implements ReviewStateRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly cache: ReviewStateCache
  ) {}

  get(card: Card): Result<ReviewState> {
    const key = cardKey(card);
    if (card.id === null) {
      const cached = this.cache.get(key);
      return cached ? ok({ ...cached }) : notFound(`No review state for ${key}`);
    }

    const cardId = card.id;
    const row = attempt("Get review state", () =>
      this.db
        .prepare<[number], ReviewStateRow>(
          "SELECT card_id, scheduler_state, last_review, review_count, due FROM review_states WHERE card_id = ?"
        )
        .get(cardId)
    );
    if (!row.success) return row;
    if (!row.data) {
      return notFound(`No review state for card ${cardId}`);
    }

    return ok({
      cardKey: key,
      cardId: row.data.card_id,
      schedulerState: row.data.scheduler_state,
      lastReview: row.data.last_review === null ? null : new Date(row.data.last_review),
      reviewCount: row.data.review_count,
      due: new Date(row.data.due),
    });
  }

  save(card: Card, state: ReviewState): Result<ReviewState> {
    const stored: ReviewState = { ...state, cardKey: cardKey(card), cardId: card.id };
    if (card.id === null) {
      this.cache.set(stored);
      return ok({ ...stored });
    }

    const cardId = card.id;
    const written = attempt("Save review state", () =>
      this.db
        .prepare(
          `INSERT INTO review_states (card_id, scheduler_state, last_review, review_count, due)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(card_id) DO UPDATE SET
             scheduler_state = excluded.scheduler_state,
             last_review = excluded.last_review,
             review_count = excluded.review_count,
             due = excluded.due`
        )
        .run(
          cardId,
          stored.schedulerState,
          stored.lastReview ? stored.lastReview.toISOString() : null,
          stored.reviewCount,
          stored.due.toISOString()
        )
    );
    if (!written.success) return written;

    this.cache.set(stored);
    return ok({ ...stored });
  }

  deleteByCardId(cardId: number): Result<void> {
    const deleted = attempt("Delete review state", () =>
      this.db.prepare("DELETE FROM review_states WHERE card_id = ?").run(cardId)
    );
    if (!deleted.success) return deleted;
    this.cache.deleteByCardId(cardId);
    return ok(undefined);
  }
}

// =============================================================================
// Sessions
// =============================================================================

export class SqliteSessionRepository implements SessionRepository {
  constructor(private readonly db: Database.Database) {}

  create(record: NewSessionRecord): Result<Session> {
    return attempt("Create session", () => {
      const info = this.db
        .prepare(
          `INSERT INTO sessions (start_time, end_time, cards_reviewed, new_cards, reviewed_cards)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(
          record.startTime.toISOString(),
          record.endTime ? record.endTime.toISOString() : null,
          record.cardsReviewed,
          record.newCards,
          record.reviewedCards
        );
      return { ...record, id: Number(info.lastInsertRowid) };
    });
  }

  update(session: Session): Result<Session> {
    const id = session.id;
    if (id === null) {
      return fail("validation", "Cannot update a session that was never stored");
    }
    const updated = attempt("Update session", () =>
      this.db
        .prepare(
          `UPDATE sessions SET start_time = ?, end_time = ?, cards_reviewed = ?, new_cards = ?, reviewed_cards = ?
           WHERE id = ?`
        )
        .run(
          session.startTime.toISOString(),
          session.endTime ? session.endTime.toISOString() : null,
          session.cardsReviewed,
          session.newCards,
          session.reviewedCards,
          id
        )
    );
    if (!updated.success) return updated;
    if (updated.data.changes === 0) {
      return notFound(`Session ${id} not found`);
    }
    return ok({ ...session });
  }

  listUnfinished(): Result<Session[]> {
    return attempt("List unfinished sessions", () =>
      this.db
        .prepare<[], SessionRow>(
          `SELECT id, start_time, end_time, cards_reviewed, new_cards, reviewed_cards
           FROM sessions WHERE end_time IS NULL ORDER BY start_time, id`
        )
        .all()
        .map(toSession)
    );
  }

  delete(session: Session): Result<void> {
    const id = session.id;
    if (id === null) {
      return fail("validation", "Cannot delete a session that was never stored");
    }
    const deleted = attempt("Delete session", () =>
      this.db.prepare("DELETE FROM sessions WHERE id = ?").run(id)
    );
    if (!deleted.success) return deleted;
    return deleted.data.changes === 0 ? notFound(`Session ${id} not found`) : ok(undefined);
  }

  clear(): Result<void> {
    return attempt("Clear sessions", () => {
      this.db.prepare("DELETE FROM sessions").run();
    });
  }
}

// =============================================================================
// Daily Statistics
// =============================================================================

const DAILY_COLUMNS =
  "date, cards_reviewed, session_minutes, session_count, new_cards, reviewed_cards";

export class SqliteDailyStatsRepository implements DailyStatsRepository {
  constructor(private readonly db: Database.Database) {}

  getByDate(date: string): Result<DailyStats> {
    const row = attempt("Get daily stats", () =>
      this.db
        .prepare<[string], DailyStatsRow>(`SELECT ${DAILY_COLUMNS} FROM daily_stats WHERE date = ?`)
        .get(date)
    );
    if (!row.success) return row;
    return row.data ? ok(toDailyStats(row.data)) : notFound(`No statistics for ${date}`);
  }

  create(stats: DailyStats): Result<DailyStats> {
    try {
      this.db
        .prepare(`INSERT INTO daily_stats (${DAILY_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?)`)
        .run(
          stats.date,
          stats.cardsReviewed,
          stats.sessionMinutes,
          stats.sessionCount,
          stats.newCards,
          stats.reviewedCards
        );
      return ok({ ...stats });
    } catch (e) {
      if (isUniqueViolation(e)) {
        return fail("duplicate", `Statistics for ${stats.date} already exist`);
      }
      const message = e instanceof Error ? e.message : String(e);
      return fail("persistence", `Create daily stats: ${message}`);
    }
  }

  update(stats: DailyStats): Result<DailyStats> {
    const updated = attempt("Update daily stats", () =>
      this.db
        .prepare(
          `UPDATE daily_stats SET cards_reviewed = ?, session_minutes = ?, session_count = ?,
             new_cards = ?, reviewed_cards = ?
           WHERE date = ?`
        )
        .run(
          stats.cardsReviewed,
          stats.sessionMinutes,
          stats.sessionCount,
          stats.newCards,
          stats.reviewedCards,
          stats.date
        )
    );
    if (!updated.success) return updated;
    return updated.data.changes === 0
      ? notFound(`No statistics for ${stats.date}`)
      : ok({ ...stats });
  }

  range(startDate: string, endDate: string): Result<DailyStats[]> {
    return attempt("Query daily stats", () =>
      this.db
        .prepare<[string, string], DailyStatsRow>(
          `SELECT ${DAILY_COLUMNS} FROM daily_stats WHERE date >= ? AND date <= ? ORDER BY date`
        )
        .all(startDate, endDate)
        .map(toDailyStats)
    );
  }

  list(): Result<DailyStats[]> {
    return attempt("List daily stats", () =>
      this.db
        .prepare<[], DailyStatsRow>(`SELECT ${DAILY_COLUMNS} FROM daily_stats ORDER BY date`)
        .all()
        .map(toDailyStats)
    );
  }

  clear(): Result<void> {
    return attempt("Clear daily stats", () => {
      this.db.prepare("DELETE FROM daily_stats").run();
    });
  }
}

// =============================================================================
// Learning Streak
// =============================================================================

export class SqliteStreakRepository implements StreakRepository {
  constructor(private readonly db: Database.Database) {}

  get(): Result<LearningStreak> {
    const row = attempt("Get learning streak", () =>
      this.db
        .prepare<[], StreakRow>(
          "SELECT current_streak, longest_streak, last_study_date FROM learning_streak WHERE id = 1"
        )
        .get()
    );
    if (!row.success) return row;
    if (!row.data) {
      return notFound("No learning streak recorded");
    }
    return ok({
      currentStreak: row.data.current_streak,
      longestStreak: row.data.longest_streak,
      lastStudyDate: row.data.last_study_date,
    });
  }

  save(streak: LearningStreak): Result<LearningStreak> {
    return attempt("Save learning streak", () => {
      this.db
        .prepare(
          `INSERT INTO learning_streak (id, current_streak, longest_streak, last_study_date)
           VALUES (1, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             current_streak = excluded.current_streak,
             longest_streak = excluded.longest_streak,
             last_study_date = excluded.last_study_date`
        )
        .run(streak.currentStreak, streak.longestStreak, streak.lastStudyDate);
      return { ...streak };
    });
  }

  clear(): Result<void> {
    return attempt("Clear learning streak", () => {
      this.db.prepare("DELETE FROM learning_streak").run();
    });
  }
}
