/**
 * Statistics Engine
 *
 * Session lifecycle and the aggregates built from it. Owns sessions, daily
 * statistics and the learning streak.
 *
 *   Idle --startSession--> Active --recordReview*--> Active --endSession--> Idle
 *
 * recordReview while Idle starts a session. Ending a session folds it into
 * the day's row and the streak in one store transaction; if that fails the
 * session stays active.
 */

import {
  getToday,
  lastNDays,
  type DailyStats,
  type LearningStreak,
  type Session,
} from "@study-loop/shared";
import { DEFAULT_SECONDS_PER_CARD } from "../config.js";
import { OperationFailedError } from "../errors.js";
import { statsLog as log } from "../logger.js";
import type { Result } from "../result.js";
import { fail, ok, unwrap } from "../result.js";
import type { StorageBackend } from "../storage/types.js";
import { writeDelimitedStats } from "./stats-export.js";
import { EMPTY_STREAK, advanceStreak } from "./streak.js";

// =============================================================================
// Types
// =============================================================================

export interface StatisticsEngineOptions {
  getNow?: () => Date;
  /** Seconds per reviewed card assumed when closing an orphan session */
  orphanSecondsPerCard?: number;
}

export interface AllTimeStats {
  totalCardsReviewed: number;
  totalSessionMinutes: number;
  totalSessions: number;
  totalNewCards: number;
  totalReviewedCards: number;
  /** Dates with at least one row */
  studyDays: number;
}

export interface OrphanRecovery {
  /** Sessions closed with an estimated end time */
  recovered: number;
  /** Sessions deleted because nothing was reviewed */
  discarded: number;
}

const MS_PER_MINUTE = 60 * 1000;

function emptyDay(date: string): DailyStats {
  return {
    date,
    cardsReviewed: 0,
    sessionMinutes: 0,
    sessionCount: 0,
    newCards: 0,
    reviewedCards: 0,
  };
}

function wholeMinutes(from: Date, to: Date): number {
  return Math.max(0, Math.trunc((to.getTime() - from.getTime()) / MS_PER_MINUTE));
}

// =============================================================================
// StatisticsEngine Class
// =============================================================================

export class StatisticsEngine {
  private active: Session | null = null;
  private readonly getNow: () => Date;
  private readonly orphanSecondsPerCard: number;

  constructor(
    private readonly store: StorageBackend,
    options: StatisticsEngineOptions = {}
  ) {
    this.getNow = options.getNow ?? (() => new Date());
    this.orphanSecondsPerCard = options.orphanSecondsPerCard ?? DEFAULT_SECONDS_PER_CARD;
  }

  // ---------------------------------------------------------------------------
  // Session lifecycle
  // ---------------------------------------------------------------------------

  hasActiveSession(): boolean {
    return this.active !== null;
  }

  /**
   * Start a session. Returns the active session if one is already running.
   */
  startSession(): Result<Session> {
    if (this.active) {
      return ok({ ...this.active });
    }

    const created = this.store.sessions.create({
      startTime: this.getNow(),
      endTime: null,
      cardsReviewed: 0,
      newCards: 0,
      reviewedCards: 0,
    });
    if (!created.success) return created;

    this.active = created.data;
    log.info(`Session started at ${created.data.startTime.toISOString()}`);
    return ok({ ...created.data });
  }

  /**
   * Count one review against the active session, starting one if needed.
   */
  recordReview(isNew: boolean): Result<Session> {
    const started = this.startSession();
    if (!started.success) return started;

    const next: Session = {
      ...started.data,
      cardsReviewed: started.data.cardsReviewed + 1,
      newCards: started.data.newCards + (isNew ? 1 : 0),
      reviewedCards: started.data.reviewedCards + (isNew ? 0 : 1),
    };

    const updated = this.store.sessions.update(next);
    if (!updated.success) return updated;

    this.active = updated.data;
    return ok({ ...updated.data });
  }

  /**
   * End the active session and fold it into today's statistics.
   * Returns null when no session was active.
   */
  endSession(): Result<Session | null> {
    const active = this.active;
    if (!active) {
      return ok(null);
    }

    const now = this.getNow();
    const ended: Session = { ...active, endTime: now };
    const today = getToday(now);
    const minutes = wholeMinutes(active.startTime, now);

    const result = this.runInTransaction("End session", () => {
      unwrap(this.store.sessions.update(ended));
      this.foldIntoDay(today, ended, minutes);
      this.saveStreak(advanceStreak(this.readStreak(), today));
      return ended;
    });

    if (!result.success) {
      log.error(`Failed to end session: ${result.error.message}`);
      return result;
    }

    this.active = null;
    log.info(`Session ended: ${ended.cardsReviewed} cards in ${minutes} min`);
    return ok({ ...ended });
  }

  getCurrentSession(): Session | null {
    return this.active ? { ...this.active } : null;
  }

  getCurrentSessionMinutes(): number {
    return this.active ? wholeMinutes(this.active.startTime, this.getNow()) : 0;
  }

  // ---------------------------------------------------------------------------
  // Orphan recovery
  // ---------------------------------------------------------------------------

  /**
   * Close sessions a previous run left without an end time. Sessions with no
   * reviews are deleted; the rest get an end time estimated from their review
   * count and are folded into the date they started on.
   */
  recoverOrphanSessions(): Result<OrphanRecovery> {
    const unfinished = this.store.sessions.listUnfinished();
    if (!unfinished.success) return unfinished;

    const activeStart = this.active?.startTime.getTime();
    const outcome: OrphanRecovery = { recovered: 0, discarded: 0 };

    for (const session of unfinished.data) {
      if (session.startTime.getTime() === activeStart) {
        continue;
      }

      if (session.cardsReviewed === 0) {
        const deleted = this.store.sessions.delete(session);
        if (!deleted.success) return deleted;
        outcome.discarded++;
        continue;
      }

      const durationMs = session.cardsReviewed * this.orphanSecondsPerCard * 1000;
      const ended: Session = {
        ...session,
        endTime: new Date(session.startTime.getTime() + durationMs),
      };
      const date = getToday(session.startTime);

      const recovered = this.runInTransaction("Recover session", () => {
        unwrap(this.store.sessions.update(ended));
        this.foldIntoDay(date, ended, Math.trunc(durationMs / MS_PER_MINUTE));
        const streak = this.readStreak();
        // A session older than the last study day cannot extend the streak
        if (streak.lastStudyDate === "" || date >= streak.lastStudyDate) {
          this.saveStreak(advanceStreak(streak, date));
        }
        return ended;
      });
      if (!recovered.success) return recovered;
      outcome.recovered++;
    }

    if (outcome.recovered > 0 || outcome.discarded > 0) {
      log.info(
        `Orphan sessions: ${outcome.recovered} recovered, ${outcome.discarded} discarded`
      );
    }
    return ok(outcome);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getDailyStats(date: string): Result<DailyStats> {
    const row = this.store.dailyStats.getByDate(date);
    if (!row.success && row.error.kind === "not_found") {
      return ok(emptyDay(date));
    }
    return row;
  }

  getTodayStats(): Result<DailyStats> {
    return this.getDailyStats(getToday(this.getNow()));
  }

  /** The last 7 days ending today, oldest first, zero-filled. */
  getWeeklyStats(): Result<DailyStats[]> {
    return this.lastDays(7);
  }

  /** The last 30 days ending today, oldest first, zero-filled. */
  getMonthlyStats(): Result<DailyStats[]> {
    return this.lastDays(30);
  }

  getAllTimeStats(): Result<AllTimeStats> {
    const rows = this.store.dailyStats.list();
    if (!rows.success) return rows;

    const totals: AllTimeStats = {
      totalCardsReviewed: 0,
      totalSessionMinutes: 0,
      totalSessions: 0,
      totalNewCards: 0,
      totalReviewedCards: 0,
      studyDays: rows.data.length,
    };
    for (const row of rows.data) {
      totals.totalCardsReviewed += row.cardsReviewed;
      totals.totalSessionMinutes += row.sessionMinutes;
      totals.totalSessions += row.sessionCount;
      totals.totalNewCards += row.newCards;
      totals.totalReviewedCards += row.reviewedCards;
    }
    return ok(totals);
  }

  getLearningStreak(): Result<LearningStreak> {
    const streak = this.store.streak.get();
    if (!streak.success && streak.error.kind === "not_found") {
      return ok({ ...EMPTY_STREAK });
    }
    return streak;
  }

  /**
   * Delete all sessions, daily rows and the streak. An active session is dropped.
   */
  resetStatistics(): Result<void> {
    const result = this.runInTransaction("Reset statistics", () => {
      unwrap(this.store.sessions.clear());
      unwrap(this.store.dailyStats.clear());
      unwrap(this.store.streak.clear());
    });
    if (result.success) {
      this.active = null;
      log.info("Statistics reset");
    }
    return result;
  }

  /**
   * Write every daily row to `path` as delimited text. Returns the row count.
   */
  async exportToDelimitedText(path: string): Promise<Result<number>> {
    const rows = this.store.dailyStats.list();
    if (!rows.success) return rows;

    try {
      await writeDelimitedStats(rows.data, path);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      log.error(`Export to ${path} failed: ${message}`);
      return fail("persistence", `Export statistics: ${message}`);
    }
    log.info(`Exported ${rows.data.length} days to ${path}`);
    return ok(rows.data.length);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private lastDays(count: number): Result<DailyStats[]> {
    const dates = lastNDays(getToday(this.getNow()), count);
    const rows = this.store.dailyStats.range(dates[0], dates[dates.length - 1]);
    if (!rows.success) return rows;

    const byDate = new Map(rows.data.map((row) => [row.date, row]));
    return ok(dates.map((date) => byDate.get(date) ?? emptyDay(date)));
  }

  /** Add a completed session to its day's row, creating the row if absent. */
  private foldIntoDay(date: string, session: Session, minutes: number): void {
    const existing = this.store.dailyStats.getByDate(date);
    if (!existing.success && existing.error.kind !== "not_found") {
      throw new OperationFailedError(existing.error);
    }

    const base = existing.success ? existing.data : emptyDay(date);
    const next: DailyStats = {
      date,
      cardsReviewed: base.cardsReviewed + session.cardsReviewed,
      sessionMinutes: base.sessionMinutes + minutes,
      sessionCount: base.sessionCount + 1,
      newCards: base.newCards + session.newCards,
      reviewedCards: base.reviewedCards + session.reviewedCards,
    };

    unwrap(existing.success ? this.store.dailyStats.update(next) : this.store.dailyStats.create(next));
  }

  private readStreak(): LearningStreak {
    return unwrap(this.getLearningStreak());
  }

  private saveStreak(streak: LearningStreak): void {
    unwrap(this.store.streak.save(streak));
  }

  /**
   * Run `fn` in a store transaction. A step that throws OperationFailedError
   * rolls everything back and comes out as that failure.
   */
  private runInTransaction<T>(action: string, fn: () => T): Result<T> {
    try {
      return ok(this.store.transaction(fn));
    } catch (e) {
      if (e instanceof OperationFailedError) {
        return fail(e.kind, `${action}: ${e.message}`);
      }
      const message = e instanceof Error ? e.message : String(e);
      return fail("persistence", `${action}: ${message}`);
    }
  }
}
