/**
 * Study Context
 *
 * Owns the store and the services built on it for the lifetime of the
 * process. Startup imports legacy documents (SQLite only), closes sessions a
 * previous run left open and loads the sample deck; shutdown ends the active
 * session and closes the store.
 */

import { parseCardKey, type Card, type Rating, type ReviewState } from "@study-loop/shared";
import type { ResolvedConfig } from "./config.js";
import { DeckReadError } from "./errors.js";
import { fileExists } from "./fs-utils.js";
import { CardIngestion, type ParseResult } from "./ingestion/card-ingestion.js";
import { createLogger } from "./logger.js";
import {
  hasPendingReviewStates,
  migrateLegacyToStore,
  migrateReviewStates,
  type MigrationReport,
} from "./migration/legacy-migration.js";
import type { Result } from "./result.js";
import { fail, ok } from "./result.js";
import { FsrsScheduler } from "./scheduling/fsrs-scheduler.js";
import { ReviewCoordinator } from "./scheduling/review-coordinator.js";
import { ReviewQueue } from "./scheduling/review-queue.js";
import type { ReviewScheduler } from "./scheduling/scheduler.js";
import { StatisticsEngine } from "./statistics/statistics-engine.js";
import { openStorage, SqliteStore, type StorageBackend } from "./storage/index.js";

const log = createLogger("Context");

export interface StudyContextOptions {
  /** Defaults to FSRS */
  scheduler?: ReviewScheduler;
  getNow?: () => Date;
}

export interface RatingOutcome {
  state: ReviewState;
  /** Whether this was the card's first rating */
  wasNew: boolean;
  /** Cards still due after this rating */
  remaining: number;
}

export class StudyContext {
  readonly coordinator: ReviewCoordinator;
  readonly engine: StatisticsEngine;
  readonly ingestion: CardIngestion;
  readonly queue: ReviewQueue;

  private pendingMigration = false;
  private stopped = false;

  constructor(
    readonly config: ResolvedConfig,
    readonly store: StorageBackend,
    private readonly scheduler: ReviewScheduler,
    private readonly getNow: () => Date
  ) {
    this.coordinator = new ReviewCoordinator(store.reviewStates, scheduler, { getNow });
    this.engine = new StatisticsEngine(store, {
      getNow,
      orphanSecondsPerCard: config.orphanSecondsPerCard,
    });
    this.ingestion = new CardIngestion(store.cards, this.coordinator, {
      maxFieldLength: config.maxFieldLength,
    });
    this.queue = new ReviewQueue(() => this.dueCards());
  }

  /**
   * Run the startup steps. Only a store failure is fatal; a missing or
   * unreadable sample deck is logged and skipped.
   */
  async start(): Promise<void> {
    if (this.store instanceof SqliteStore) {
      const report = await migrateLegacyToStore(this.store, this.scheduler, {
        reviewStatePath: this.config.reviewStatePath,
        statsPath: this.config.statsPath,
        getNow: this.getNow,
      });
      this.pendingMigration = hasPendingReviewStates(report);
      logMigration(report);
    }

    const recovered = this.engine.recoverOrphanSessions();
    if (!recovered.success) {
      log.error(`Orphan session recovery failed: ${recovered.error.message}`);
    }

    const deck = this.config.sampleDeck;
    if (deck === null) return;

    if (!(await fileExists(deck))) {
      log.warn(`Sample deck ${deck} not found, starting without it`);
      return;
    }
    try {
      await this.loadDeck(deck);
    } catch (e) {
      if (!(e instanceof DeckReadError)) throw e;
      log.warn(e.message);
    }
  }

  // ---------------------------------------------------------------------------
  // Decks and cards
  // ---------------------------------------------------------------------------

  /**
   * Load a deck, then retry legacy review states that were waiting for cards.
   */
  async loadDeck(path: string): Promise<ParseResult> {
    const result = await this.ingestion.load(path);

    if (this.pendingMigration && this.store instanceof SqliteStore) {
      const retry = await migrateReviewStates(
        this.store,
        this.scheduler,
        this.config.reviewStatePath,
        this.getNow()
      );
      this.pendingMigration = retry.status === "partial" && retry.unmatched > 0;
    }

    this.queue.reset();
    return result;
  }

  /**
   * Look a card up by its key (`<sourceFile>:<sourceLine>`).
   */
  findCard(key: string): Result<Card> {
    const source = parseCardKey(key);
    if (!source) {
      return fail("validation", `Invalid card key: ${key}`);
    }
    return this.store.cards.findBySource(source.sourceFile, source.sourceLine);
  }

  // ---------------------------------------------------------------------------
  // Review
  // ---------------------------------------------------------------------------

  dueCards(): Result<Card[]> {
    const cards = this.store.cards.list();
    if (!cards.success) return cards;
    return this.coordinator.dueCards(cards.data);
  }

  /**
   * The next due card in round-robin order, or null when nothing is due.
   */
  nextCard(): Result<Card | null> {
    const refreshed = this.queue.refresh();
    if (!refreshed.success) return refreshed;
    return ok(this.queue.next());
  }

  /**
   * Rate a card and count the review against the active session,
   * starting one if none is running.
   */
  rateCard(key: string, rating: Rating): Result<RatingOutcome> {
    const card = this.findCard(key);
    if (!card.success) return card;

    const isNew = this.coordinator.isNewCard(card.data);
    if (!isNew.success) return isNew;

    const state = this.coordinator.applyRating(card.data, rating);
    if (!state.success) return state;

    const counted = this.engine.recordReview(isNew.data);
    if (!counted.success) return counted;

    const remaining = this.queue.refresh();
    if (!remaining.success) return remaining;

    return ok({ state: state.data, wasNew: isNew.data, remaining: remaining.data });
  }

  // ---------------------------------------------------------------------------
  // Shutdown
  // ---------------------------------------------------------------------------

  /**
   * End the active session and close the store. Safe to call more than once.
   */
  shutdown(): Result<void> {
    if (this.stopped) return ok(undefined);
    this.stopped = true;

    const ended = this.engine.endSession();
    this.store.close();
    if (!ended.success) {
      log.error(`Could not end the active session: ${ended.error.message}`);
      return ended;
    }
    log.info("Study context shut down");
    return ok(undefined);
  }
}

function logMigration(report: MigrationReport): void {
  for (const file of [report.reviewStates, report.statistics]) {
    if (file.status === "migrated" || file.status === "partial") {
      log.info(`Legacy ${file.path}: ${file.status} (${file.migrated} records)`);
    }
  }
}

/**
 * Open the configured store and start the services.
 * Throws StoreInitError when the store cannot be opened.
 */
export async function createStudyContext(
  config: ResolvedConfig,
  options: StudyContextOptions = {}
): Promise<StudyContext> {
  const getNow = options.getNow ?? (() => new Date());
  const store = await openStorage(config, getNow);
  const context = new StudyContext(config, store, options.scheduler ?? new FsrsScheduler(), getNow);

  try {
    await context.start();
  } catch (e) {
    store.close();
    throw e;
  }
  return context;
}
