/**
 * Legacy Migration
 *
 * One-way import of the file backend's documents (review-state.json and
 * study-stats.json) into the SQLite store. Each document is copied to a
 * timestamped backup before it is first read; if the backup fails that
 * document is left alone. Retries reuse the first backup.
 *
 * Review states are matched to stored cards by provenance, so they can only
 * be imported once the decks they came from have been loaded. A document
 * that imported cleanly is recorded in the store and never touched again;
 * one with unmatched records is retried after the next deck import.
 */

import { copyFile } from "node:fs/promises";
import {
  StatsFileSchema,
  cardKey,
  formatValidationError,
  parseCardKey,
  type ReviewState,
} from "@study-loop/shared";
import { fileExists, readJsonDocument } from "../fs-utils.js";
import { createLogger } from "../logger.js";
import type { ReviewScheduler } from "../scheduling/scheduler.js";
import { reviewStatesFromDocument } from "../storage/review-state-cache.js";
import type { SqliteStore } from "../storage/sqlite-store.js";

const log = createLogger("Migration");

// =============================================================================
// Constants
// =============================================================================

export const REVIEW_STATE_MIGRATION = "legacy-review-state";
export const STATS_MIGRATION = "legacy-study-stats";

/** Appended to a migration name to mark that its document was backed up */
const BACKUP_MARKER_SUFFIX = ":backup";

// =============================================================================
// Types
// =============================================================================

export type MigrationStatus =
  | "missing"
  | "already_migrated"
  | "backup_failed"
  | "invalid"
  | "migrated"
  | "partial";

export interface FileMigrationReport {
  path: string;
  status: MigrationStatus;
  /** Backup taken on the first attempt */
  backupPath: string | null;
  /** Records written to the store */
  migrated: number;
  /** Records the store already had */
  skipped: number;
  /** Review states with no matching card */
  unmatched: number;
  /** Records that could not be read or written */
  failed: number;
}

export interface MigrationReport {
  reviewStates: FileMigrationReport;
  statistics: FileMigrationReport;
}

export interface LegacyMigrationOptions {
  reviewStatePath: string;
  statsPath: string;
  getNow?: () => Date;
}

// =============================================================================
// Helpers
// =============================================================================

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local timestamp as YYYYMMDD_HHMMSS.
 */
export function backupTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

function backupPathFor(path: string, at: Date): string {
  return `${path}.backup_${backupTimestamp(at)}`;
}

/**
 * Copy the document aside the first time it is migrated. Later attempts
 * reuse that backup. Returns null when the copy fails.
 */
async function backUpOnce(
  store: SqliteStore,
  name: string,
  path: string,
  now: Date
): Promise<string | null> {
  const marker = `${name}${BACKUP_MARKER_SUFFIX}`;
  const previous = store.migrationTime(marker);
  if (!previous.success) {
    log.warn(`Cannot read backup marker ${marker}, backing up again: ${previous.error.message}`);
  } else if (previous.data) {
    return backupPathFor(path, previous.data);
  }

  const backupPath = backupPathFor(path, now);
  try {
    await copyFile(path, backupPath);
    log.info(`Backed up ${path} to ${backupPath}`);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.error(`Backup of ${path} failed, not migrating it: ${message}`);
    return null;
  }

  const recorded = store.recordMigration(marker, now);
  if (!recorded.success) {
    log.warn(`Cannot record backup of ${path}: ${recorded.error.message}`);
  }
  return backupPath;
}

function emptyReport(path: string, status: MigrationStatus): FileMigrationReport {
  return { path, status, backupPath: null, migrated: 0, skipped: 0, unmatched: 0, failed: 0 };
}

type Prepared =
  | { ready: true; raw: unknown; backupPath: string }
  | { ready: false; report: FileMigrationReport };

/**
 * Check the marker, back the file up (once) and read it.
 */
async function prepare(
  store: SqliteStore,
  name: string,
  path: string,
  now: Date
): Promise<Prepared> {
  const marker = store.hasMigration(name);
  if (!marker.success) {
    log.error(`Cannot read migration marker ${name}: ${marker.error.message}`);
    return { ready: false, report: { ...emptyReport(path, "invalid"), failed: 1 } };
  }
  if (marker.data) {
    return { ready: false, report: emptyReport(path, "already_migrated") };
  }
  if (!(await fileExists(path))) {
    log.debug(`No legacy document at ${path}`);
    return { ready: false, report: emptyReport(path, "missing") };
  }

  const backupPath = await backUpOnce(store, name, path, now);
  if (backupPath === null) {
    return { ready: false, report: emptyReport(path, "backup_failed") };
  }

  const doc = await readJsonDocument(path);
  if (doc === null || "error" in doc) {
    log.warn(`Legacy document ${path} is not readable JSON, not migrating it`);
    return { ready: false, report: { ...emptyReport(path, "invalid"), backupPath } };
  }
  return { ready: true, raw: doc.raw, backupPath };
}

function finish(
  store: SqliteStore,
  name: string,
  report: FileMigrationReport,
  now: Date
): FileMigrationReport {
  if (report.unmatched > 0 || report.failed > 0) {
    return { ...report, status: "partial" };
  }

  const recorded = store.recordMigration(name, now);
  if (!recorded.success) {
    log.error(`Cannot record migration ${name}: ${recorded.error.message}`);
    return { ...report, status: "partial" };
  }
  return { ...report, status: "migrated" };
}

// =============================================================================
// Review States
// =============================================================================

function importReviewState(
  store: SqliteStore,
  scheduler: ReviewScheduler,
  legacy: ReviewState,
  report: FileMigrationReport
): void {
  const source = parseCardKey(legacy.cardKey);
  const found = source
    ? store.cards.findBySource(source.sourceFile, source.sourceLine)
    : null;

  if (found === null || (!found.success && found.error.kind === "not_found")) {
    log.warn(`No card found for legacy review state ${legacy.cardKey}, skipping`);
    report.unmatched++;
    return;
  }
  if (!found.success) {
    log.warn(`Cannot look up card ${legacy.cardKey}: ${found.error.message}`);
    report.failed++;
    return;
  }

  const card = found.data;
  const existing = store.reviewStates.get(card);
  if (existing.success) {
    report.skipped++;
    return;
  }
  if (existing.error.kind !== "not_found") {
    log.warn(`Cannot read review state of ${legacy.cardKey}: ${existing.error.message}`);
    report.failed++;
    return;
  }

  const decoded = scheduler.deserialize(legacy.schedulerState);
  if (!decoded.success) {
    log.warn(`Unreadable scheduler state for ${legacy.cardKey}: ${decoded.error.message}`);
    report.failed++;
    return;
  }

  const saved = store.reviewStates.save(card, {
    ...legacy,
    cardKey: cardKey(card),
    cardId: card.id,
    schedulerState: scheduler.serialize(decoded.data),
  });
  if (!saved.success) {
    log.warn(`Cannot store review state of ${legacy.cardKey}: ${saved.error.message}`);
    report.failed++;
    return;
  }
  report.migrated++;
}

/**
 * Import legacy review states for cards already in the store.
 */
export async function migrateReviewStates(
  store: SqliteStore,
  scheduler: ReviewScheduler,
  path: string,
  now: Date
): Promise<FileMigrationReport> {
  const prepared = await prepare(store, REVIEW_STATE_MIGRATION, path, now);
  if (!prepared.ready) {
    return prepared.report;
  }

  const states = reviewStatesFromDocument(prepared.raw);
  if (!states.success) {
    log.warn(`Legacy review states at ${path} are invalid: ${states.error.message}`);
    return { ...emptyReport(path, "invalid"), backupPath: prepared.backupPath };
  }

  const report: FileMigrationReport = {
    ...emptyReport(path, "migrated"),
    backupPath: prepared.backupPath,
  };
  store.transaction(() => {
    for (const legacy of states.data) {
      importReviewState(store, scheduler, legacy, report);
    }
  });

  log.info(
    `Review states from ${path}: ${report.migrated} migrated, ${report.skipped} already present, ` +
      `${report.unmatched} unmatched, ${report.failed} failed`
  );
  return finish(store, REVIEW_STATE_MIGRATION, report, now);
}

// =============================================================================
// Statistics
// =============================================================================

/**
 * Import legacy daily rows and, if the store has none, the streak.
 */
export async function migrateStatistics(
  store: SqliteStore,
  path: string,
  now: Date
): Promise<FileMigrationReport> {
  const prepared = await prepare(store, STATS_MIGRATION, path, now);
  if (!prepared.ready) {
    return prepared.report;
  }

  const parsed = StatsFileSchema.safeParse(prepared.raw);
  if (!parsed.success) {
    log.warn(`Legacy statistics at ${path} are invalid: ${formatValidationError(parsed.error)}`);
    return { ...emptyReport(path, "invalid"), backupPath: prepared.backupPath };
  }

  const report: FileMigrationReport = {
    ...emptyReport(path, "migrated"),
    backupPath: prepared.backupPath,
  };
  const { dailyStats, learningStreak } = parsed.data;

  store.transaction(() => {
    for (const date of Object.keys(dailyStats).sort()) {
      const existing = store.dailyStats.getByDate(date);
      if (existing.success) {
        report.skipped++;
        continue;
      }
      const created =
        existing.error.kind === "not_found"
          ? store.dailyStats.create({ ...dailyStats[date], date })
          : existing;
      if (created.success) {
        report.migrated++;
      } else {
        log.warn(`Cannot migrate statistics for ${date}: ${created.error.message}`);
        report.failed++;
      }
    }

    if (learningStreak) {
      const current = store.streak.get();
      if (!current.success && current.error.kind === "not_found") {
        const saved = store.streak.save(learningStreak);
        if (!saved.success) {
          log.warn(`Cannot migrate learning streak: ${saved.error.message}`);
          report.failed++;
        }
      }
    }
  });

  log.info(
    `Statistics from ${path}: ${report.migrated} days migrated, ${report.skipped} already present, ` +
      `${report.failed} failed`
  );
  return finish(store, STATS_MIGRATION, report, now);
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Import both legacy documents into the SQLite store.
 */
export async function migrateLegacyToStore(
  store: SqliteStore,
  scheduler: ReviewScheduler,
  options: LegacyMigrationOptions
): Promise<MigrationReport> {
  const now = (options.getNow ?? (() => new Date()))();
  const reviewStates = await migrateReviewStates(store, scheduler, options.reviewStatePath, now);
  const statistics = await migrateStatistics(store, options.statsPath, now);
  return { reviewStates, statistics };
}

/**
 * Whether the review state document still has records waiting for their cards.
 */
export function hasPendingReviewStates(report: MigrationReport): boolean {
  return report.reviewStates.status === "partial" && report.reviewStates.unmatched > 0;
}
