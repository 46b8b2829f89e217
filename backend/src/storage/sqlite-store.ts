/**
 * SQLite Store
 *
 * Storage backend on a single SQLite file (better-sqlite3, synchronous).
 * WAL journaling with NORMAL sync; an integrity check runs on open and a
 * failed check is fatal. Schema is created idempotently and older tables
 * gain missing columns on open.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { StoreInitError } from "../errors.js";
import { storeLog as log } from "../logger.js";
import type { Result } from "../result.js";
import { attempt } from "../result.js";
import { ReviewStateCache } from "./review-state-cache.js";
import {
  SqliteCardRepository,
  SqliteDailyStatsRepository,
  SqliteReviewStateRepository,
  SqliteSessionRepository,
  SqliteStreakRepository,
} from "./sqlite-repositories.js";
import type { StorageBackend } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS cards (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    question TEXT NOT NULL,
    answer TEXT NOT NULL,
    source_file TEXT NOT NULL,
    source_line INTEGER NOT NULL,
    source_context TEXT,
    prompt_kind TEXT NOT NULL DEFAULT 'factual',
    tags TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_cards_content ON cards(question, answer);
  CREATE INDEX IF NOT EXISTS idx_cards_source ON cards(source_file, source_line);

  CREATE TABLE IF NOT EXISTS review_states (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    card_id INTEGER NOT NULL UNIQUE REFERENCES cards(id) ON DELETE CASCADE,
    scheduler_state TEXT NOT NULL,
    last_review TEXT,
    review_count INTEGER NOT NULL DEFAULT 0,
    due TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_review_states_due ON review_states(due);

  CREATE TABLE IF NOT EXISTS sessions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    start_time TEXT NOT NULL,
    end_time TEXT,
    cards_reviewed INTEGER NOT NULL DEFAULT 0,
    new_cards INTEGER NOT NULL DEFAULT 0,
    reviewed_cards INTEGER NOT NULL DEFAULT 0
  );

  CREATE INDEX IF NOT EXISTS idx_sessions_end_time ON sessions(end_time);

  CREATE TABLE IF NOT EXISTS daily_stats (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL UNIQUE,
    cards_reviewed INTEGER NOT NULL DEFAULT 0,
    session_minutes INTEGER NOT NULL DEFAULT 0,
    session_count INTEGER NOT NULL DEFAULT 0,
    new_cards INTEGER NOT NULL DEFAULT 0,
    reviewed_cards INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS learning_streak (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    current_streak INTEGER NOT NULL DEFAULT 0,
    longest_streak INTEGER NOT NULL DEFAULT 0,
    last_study_date TEXT NOT NULL DEFAULT ''
  );

  CREATE TABLE IF NOT EXISTS migrations (
    name TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`;

/**
 * Columns added after the first schema version. Databases written by an
 * older build gain them on open.
 */
const ADDED_COLUMNS: ReadonlyArray<{ table: string; column: string; definition: string }> = [
  { table: "cards", column: "source_context", definition: "TEXT" },
  { table: "cards", column: "prompt_kind", definition: "TEXT NOT NULL DEFAULT 'factual'" },
  { table: "cards", column: "tags", definition: "TEXT NOT NULL DEFAULT ''" },
  { table: "sessions", column: "new_cards", definition: "INTEGER NOT NULL DEFAULT 0" },
  { table: "sessions", column: "reviewed_cards", definition: "INTEGER NOT NULL DEFAULT 0" },
  { table: "daily_stats", column: "new_cards", definition: "INTEGER NOT NULL DEFAULT 0" },
  { table: "daily_stats", column: "reviewed_cards", definition: "INTEGER NOT NULL DEFAULT 0" },
];

// =============================================================================
// SqliteStore Class
// =============================================================================

export interface SqliteStoreOptions {
  databasePath: string;
  /** Clock used for card creation timestamps */
  getNow?: () => Date;
}

export class SqliteStore implements StorageBackend {
  readonly kind = "sqlite" as const;
  readonly cards: SqliteCardRepository;
  readonly reviewStates: SqliteReviewStateRepository;
  readonly sessions: SqliteSessionRepository;
  readonly dailyStats: SqliteDailyStatsRepository;
  readonly streak: SqliteStreakRepository;

  private readonly cache = new ReviewStateCache();
  private closed = false;

  constructor(
    private readonly db: Database.Database,
    readonly databasePath: string,
    getNow: () => Date
  ) {
    this.cards = new SqliteCardRepository(db, this.cache, getNow);
    this.reviewStates = new SqliteReviewStateRepository(db, this.cache);
    this.sessions = new SqliteSessionRepository(db);
    this.dailyStats = new SqliteDailyStatsRepository(db);
    this.streak = new SqliteStreakRepository(db);
  }

  transaction<T>(fn: () => T): T {
    // Nested calls become savepoints inside the outer transaction
    const snapshot = this.cache.snapshot();
    try {
      return this.db.transaction(fn)();
    } catch (e) {
      this.cache.restore(snapshot);
      throw e;
    }
  }

  /**
   * Whether a named one-time migration has been recorded.
   */
  hasMigration(name: string): Result<boolean> {
    return attempt("Check migration", () => {
      const row = this.db
        .prepare<[string], { name: string }>("SELECT name FROM migrations WHERE name = ?")
        .get(name);
      return row !== undefined;
    });
  }

  /**
   * When a migration marker was recorded, or null if it never was.
   */
  migrationTime(name: string): Result<Date | null> {
    return attempt("Read migration", () => {
      const row = this.db
        .prepare<[string], { applied_at: string }>("SELECT applied_at FROM migrations WHERE name = ?")
        .get(name);
      return row ? new Date(row.applied_at) : null;
    });
  }

  recordMigration(name: string, appliedAt: Date): Result<void> {
    return attempt("Record migration", () => {
      this.db
        .prepare("INSERT OR REPLACE INTO migrations (name, applied_at) VALUES (?, ?)")
        .run(name, appliedAt.toISOString());
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
    log.info(`Closed SQLite store at ${this.databasePath}`);
  }
}

// =============================================================================
// Opening
// =============================================================================

function configurePragmas(db: Database.Database): void {
  db.pragma("journal_mode = WAL");
  // NORMAL sync is sufficient with WAL
  db.pragma("synchronous = NORMAL");
  db.pragma("busy_timeout = 5000");
  db.pragma("foreign_keys = ON");
}

function checkIntegrity(db: Database.Database): boolean {
  return db.pragma("integrity_check", { simple: true }) === "ok";
}

function ensureColumns(db: Database.Database): void {
  for (const { table, column, definition } of ADDED_COLUMNS) {
    const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
    if (!columns.some((c) => c.name === column)) {
      log.info(`Adding column ${table}.${column}`);
      db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
    }
  }
}

/**
 * Open (creating if needed) the SQLite store.
 * Throws StoreInitError when the database cannot be opened or is corrupt.
 */
export function openSqliteStore(options: SqliteStoreOptions): SqliteStore {
  const { databasePath } = options;
  let db: Database.Database | null = null;

  try {
    mkdirSync(dirname(databasePath), { recursive: true });
    db = new Database(databasePath);
    configurePragmas(db);

    if (!checkIntegrity(db)) {
      throw new Error("integrity check failed");
    }

    db.exec(SCHEMA);
    ensureColumns(db);

    log.info(`Opened SQLite store at ${databasePath}`);
    return new SqliteStore(db, databasePath, options.getNow ?? (() => new Date()));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    if (db) {
      db.close();
    }
    log.error(`Failed to open SQLite store at ${databasePath}: ${message}`);
    throw new StoreInitError(`Cannot open database ${databasePath}: ${message}`);
  }
}
