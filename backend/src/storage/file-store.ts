/**
 * File Store
 *
 * Storage backend that keeps review state and statistics in two JSON
 * documents in the data directory:
 * - review-state.json: review states keyed by `sourceFile:sourceLine`
 * - study-stats.json: daily rows keyed by date, plus the learning streak
 *
 * Cards and sessions live only in memory; cards are reloaded from their
 * decks on every launch and carry no store identity. Every successful
 * mutation rewrites the affected document in full (temp file + rename).
 * Inside transaction() rewrites are deferred to commit, and a failed
 * commit restores the in-memory documents. A card's initial, never-rated
 * state is held in memory and written with the next rewrite or on close.
 */

import { rename } from "node:fs/promises";
import {
  StatsFileSchema,
  cardKey,
  formatValidationError,
  type Card,
  type CardEdit,
  type DailyStats,
  type LearningStreak,
  type ReviewState,
  type Session,
  type StatsFile,
} from "@study-loop/shared";
import { readJsonDocument, writeFileAtomicSync } from "../fs-utils.js";
import { storeLog as log } from "../logger.js";
import type { Result } from "../result.js";
import { fail, notFound, ok } from "../result.js";
import { ReviewStateCache, reviewStatesFromDocument } from "./review-state-cache.js";
import type {
  CardRepository,
  DailyStatsRepository,
  NewCardRecord,
  NewSessionRecord,
  ReviewStateRepository,
  SessionRepository,
  StorageBackend,
  StreakRepository,
} from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface FileStoreOptions {
  reviewStatePath: string;
  statsPath: string;
  /** Clock used for card creation timestamps */
  getNow?: () => Date;
}

type Document = "reviewState" | "stats";

interface Snapshot {
  cards: Card[];
  sessions: Session[];
  reviewStates: Map<string, ReviewState>;
  stats: StatsFile;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Move an unreadable document aside so the next write does not destroy it.
 */
async function quarantine(path: string, reason: string): Promise<void> {
  const target = `${path}.corrupt-${Date.now()}`;
  log.warn(`Invalid document ${path} (${reason}), moving to ${target} and starting empty`);
  await rename(path, target);
}

async function loadReviewStates(path: string): Promise<ReviewState[]> {
  const doc = await readJsonDocument(path);
  if (doc === null) {
    return [];
  }
  if ("error" in doc) {
    await quarantine(path, doc.error);
    return [];
  }

  const states = reviewStatesFromDocument(doc.raw);
  if (!states.success) {
    await quarantine(path, states.error.message);
    return [];
  }
  return states.data;
}

async function loadStats(path: string): Promise<StatsFile> {
  const doc = await readJsonDocument(path);
  if (doc === null) {
    return { dailyStats: {} };
  }
  if ("error" in doc) {
    await quarantine(path, doc.error);
    return { dailyStats: {} };
  }

  const parsed = StatsFileSchema.safeParse(doc.raw);
  if (!parsed.success) {
    await quarantine(path, formatValidationError(parsed.error));
    return { dailyStats: {} };
  }
  return parsed.data;
}

// =============================================================================
// Document State
// =============================================================================

/**
 * The in-memory documents plus their write discipline.
 */
class FileDocuments {
  readonly reviewStates = new ReviewStateCache();
  cards: Card[] = [];
  sessions: Session[] = [];
  stats: StatsFile = { dailyStats: {} };

  private inTransaction = false;
  private dirty: Set<Document> = new Set();
  /** Documents changed in memory but not yet written */
  private pending: Set<Document> = new Set();

  constructor(private readonly options: FileStoreOptions) {}

  now(): Date {
    return this.options.getNow ? this.options.getNow() : new Date();
  }

  /**
   * Apply an in-memory change and persist the documents it touches.
   * Outside a transaction a failed write undoes the change.
   */
  mutate<T>(action: string, documents: Document[], apply: () => T): Result<T> {
    if (this.inTransaction) {
      const value = apply();
      for (const doc of documents) {
        this.dirty.add(doc);
      }
      return ok(value);
    }

    // Nothing to write, so nothing to roll back
    if (documents.length === 0 && this.pending.size === 0) {
      return ok(apply());
    }

    const snapshot = this.snapshot();
    try {
      const value = apply();
      this.flush(documents);
      return ok(value);
    } catch (e) {
      this.restore(snapshot);
      const message = e instanceof Error ? e.message : String(e);
      log.error(`${action} failed: ${message}`);
      return fail("persistence", `${action}: ${message}`);
    }
  }

  /**
   * Apply an in-memory change whose write waits for the next flush.
   */
  stage<T>(documents: Document[], apply: () => T): T {
    const value = apply();
    for (const doc of documents) {
      this.pending.add(doc);
    }
    return value;
  }

  /**
   * Write every document with staged changes.
   */
  flushPending(): void {
    this.flush([]);
  }

  transaction<T>(fn: () => T): T {
    // Nested calls join the outer transaction
    if (this.inTransaction) {
      return fn();
    }

    const snapshot = this.snapshot();
    this.inTransaction = true;
    this.dirty.clear();
    try {
      const value = fn();
      this.flush([...this.dirty]);
      return value;
    } catch (e) {
      this.restore(snapshot);
      throw e;
    } finally {
      this.inTransaction = false;
      this.dirty.clear();
    }
  }

  private flush(documents: Document[]): void {
    for (const doc of new Set([...documents, ...this.pending])) {
      if (doc === "reviewState") {
        writeFileAtomicSync(
          this.options.reviewStatePath,
          JSON.stringify(this.reviewStates.toDocument(), null, 2)
        );
      } else {
        writeFileAtomicSync(this.options.statsPath, JSON.stringify(this.stats, null, 2));
      }
      this.pending.delete(doc);
    }
  }

  private snapshot(): Snapshot {
    return {
      cards: this.cards.map((card) => ({ ...card, tags: [...card.tags] })),
      sessions: this.sessions.map((session) => ({ ...session })),
      reviewStates: this.reviewStates.snapshot(),
      stats: structuredClone(this.stats),
    };
  }

  private restore(snapshot: Snapshot): void {
    this.cards = snapshot.cards;
    this.sessions = snapshot.sessions;
    this.reviewStates.restore(snapshot.reviewStates);
    this.stats = snapshot.stats;
  }
}

// =============================================================================
// Repositories
// =============================================================================

class FileCardRepository implements CardRepository {
  readonly hasIdentity = false;

  constructor(private readonly docs: FileDocuments) {}

  create(record: NewCardRecord): Result<Card> {
    if (this.docs.cards.some((c) => c.question === record.question && c.answer === record.answer)) {
      return fail("duplicate", `Card already exists: ${record.question}`);
    }
    const card: Card = { ...record, tags: [...record.tags], id: null, createdAt: this.docs.now() };
    return this.docs.mutate("Create card", [], () => {
      this.docs.cards.push(card);
      return { ...card };
    });
  }

  getById(id: number): Result<Card> {
    return fail("unsupported", `Cards have no identity in the file store (requested ${id})`);
  }

  findByContent(question: string, answer: string): Result<Card> {
    const card = this.docs.cards.find((c) => c.question === question && c.answer === answer);
    return card ? ok({ ...card }) : notFound(`No card with question: ${question}`);
  }

  findBySource(sourceFile: string, sourceLine: number): Result<Card> {
    const card = this.docs.cards.find(
      (c) => c.sourceFile === sourceFile && c.sourceLine === sourceLine
    );
    return card ? ok({ ...card }) : notFound(`No card at ${sourceFile}:${sourceLine}`);
  }

  list(): Result<Card[]> {
    return ok(this.docs.cards.map((card) => ({ ...card })));
  }

  update(id: number, _edit: CardEdit): Result<Card> {
    return fail("unsupported", `Cannot edit card ${id}: the file store has no card identity`);
  }

  delete(id: number): Result<void> {
    return fail("unsupported", `Cannot delete card ${id}: the file store has no card identity`);
  }
}

function isInitialState(state: ReviewState): boolean {
  return state.reviewCount === 0 && state.lastReview === null;
}

class FileReviewStateRepository implements ReviewStateRepository {
  constructor(private readonly docs: FileDocuments) {}

  get(card: Card): Result<ReviewState> {
    const state = this.docs.reviewStates.get(cardKey(card));
    return state ? ok({ ...state }) : notFound(`No review state for ${cardKey(card)}`);
  }

  save(card: Card, state: ReviewState): Result<ReviewState> {
    const stored: ReviewState = { ...state, cardKey: cardKey(card), cardId: card.id };
    if (isInitialState(stored) && !this.docs.reviewStates.get(stored.cardKey)) {
      return ok(
        this.docs.stage(["reviewState"], () => {
          this.docs.reviewStates.set(stored);
          return { ...stored };
        })
      );
    }
    return this.docs.mutate("Save review state", ["reviewState"], () => {
      this.docs.reviewStates.set(stored);
      return { ...stored };
    });
  }

  deleteByCardId(cardId: number): Result<void> {
    return this.docs.mutate("Delete review state", ["reviewState"], () => {
      this.docs.reviewStates.deleteByCardId(cardId);
    });
  }
}

/**
 * Sessions are not persisted by the file store. Without a store identity a
 * session is matched by its start time.
 */
class FileSessionRepository implements SessionRepository {
  constructor(private readonly docs: FileDocuments) {}

  private indexOf(session: Session): number {
    return this.docs.sessions.findIndex(
      (s) => s.startTime.getTime() === session.startTime.getTime()
    );
  }

  create(record: NewSessionRecord): Result<Session> {
    const session: Session = { ...record, id: null };
    return this.docs.mutate("Create session", [], () => {
      this.docs.sessions.push(session);
      return { ...session };
    });
  }

  update(session: Session): Result<Session> {
    const index = this.indexOf(session);
    if (index === -1) {
      return notFound(`Session started ${session.startTime.toISOString()} not found`);
    }
    return this.docs.mutate("Update session", [], () => {
      this.docs.sessions[index] = { ...session };
      return { ...session };
    });
  }

  listUnfinished(): Result<Session[]> {
    return ok(
      this.docs.sessions
        .filter((s) => s.endTime === null)
        .sort((a, b) => a.startTime.getTime() - b.startTime.getTime())
        .map((s) => ({ ...s }))
    );
  }

  delete(session: Session): Result<void> {
    const index = this.indexOf(session);
    if (index === -1) {
      return notFound(`Session started ${session.startTime.toISOString()} not found`);
    }
    return this.docs.mutate("Delete session", [], () => {
      this.docs.sessions.splice(index, 1);
    });
  }

  clear(): Result<void> {
    return this.docs.mutate("Clear sessions", [], () => {
      this.docs.sessions = [];
    });
  }
}

class FileDailyStatsRepository implements DailyStatsRepository {
  constructor(private readonly docs: FileDocuments) {}

  getByDate(date: string): Result<DailyStats> {
    const row = this.docs.stats.dailyStats[date];
    return row ? ok({ ...row }) : notFound(`No statistics for ${date}`);
  }

  create(stats: DailyStats): Result<DailyStats> {
    if (this.docs.stats.dailyStats[stats.date]) {
      return fail("duplicate", `Statistics for ${stats.date} already exist`);
    }
    return this.docs.mutate("Create daily stats", ["stats"], () => {
      this.docs.stats.dailyStats[stats.date] = { ...stats };
      return { ...stats };
    });
  }

  update(stats: DailyStats): Result<DailyStats> {
    if (!this.docs.stats.dailyStats[stats.date]) {
      return notFound(`No statistics for ${stats.date}`);
    }
    return this.docs.mutate("Update daily stats", ["stats"], () => {
      this.docs.stats.dailyStats[stats.date] = { ...stats };
      return { ...stats };
    });
  }

  range(startDate: string, endDate: string): Result<DailyStats[]> {
    const rows = this.sorted().filter((row) => row.date >= startDate && row.date <= endDate);
    return ok(rows);
  }

  list(): Result<DailyStats[]> {
    return ok(this.sorted());
  }

  clear(): Result<void> {
    return this.docs.mutate("Clear daily stats", ["stats"], () => {
      this.docs.stats.dailyStats = {};
    });
  }

  private sorted(): DailyStats[] {
    return Object.values(this.docs.stats.dailyStats)
      .map((row) => ({ ...row }))
      .sort((a, b) => a.date.localeCompare(b.date));
  }
}

class FileStreakRepository implements StreakRepository {
  constructor(private readonly docs: FileDocuments) {}

  get(): Result<LearningStreak> {
    const streak = this.docs.stats.learningStreak;
    return streak ? ok({ ...streak }) : notFound("No learning streak recorded");
  }

  save(streak: LearningStreak): Result<LearningStreak> {
    return this.docs.mutate("Save learning streak", ["stats"], () => {
      this.docs.stats.learningStreak = { ...streak };
      return { ...streak };
    });
  }

  clear(): Result<void> {
    return this.docs.mutate("Clear learning streak", ["stats"], () => {
      delete this.docs.stats.learningStreak;
    });
  }
}

// =============================================================================
// Backend
// =============================================================================

class FileStore implements StorageBackend {
  readonly kind = "file" as const;
  readonly cards: CardRepository;
  readonly reviewStates: ReviewStateRepository;
  readonly sessions: SessionRepository;
  readonly dailyStats: DailyStatsRepository;
  readonly streak: StreakRepository;

  constructor(private readonly docs: FileDocuments) {
    this.cards = new FileCardRepository(docs);
    this.reviewStates = new FileReviewStateRepository(docs);
    this.sessions = new FileSessionRepository(docs);
    this.dailyStats = new FileDailyStatsRepository(docs);
    this.streak = new FileStreakRepository(docs);
  }

  transaction<T>(fn: () => T): T {
    return this.docs.transaction(fn);
  }

  close(): void {
    try {
      this.docs.flushPending();
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      log.error(`Failed to write staged review states on close: ${message}`);
    }
  }
}

/**
 * Open the file store, loading both documents. Missing documents start
 * empty; invalid ones are moved aside with a warning and start empty.
 */
export async function openFileStore(options: FileStoreOptions): Promise<StorageBackend> {
  const docs = new FileDocuments(options);

  for (const state of await loadReviewStates(options.reviewStatePath)) {
    docs.reviewStates.set(state);
  }
  docs.stats = await loadStats(options.statsPath);

  log.info(
    `Opened file store (${docs.reviewStates.size} review states, ${Object.keys(docs.stats.dailyStats).length} days)`
  );
  return new FileStore(docs);
}
