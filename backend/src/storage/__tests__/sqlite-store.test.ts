/**
 * SQLite Store Tests
 *
 * Open/close lifecycle, schema upgrades, cascade deletes, the keyed cache
 * for cards without identity and migration markers.
 */

import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import Database from "better-sqlite3";
import type { Card, ReviewState } from "@study-loop/shared";
import { StoreInitError } from "../../errors.js";
import { openSqliteStore, type SqliteStore } from "../sqlite-store.js";
import type { NewCardRecord } from "../types.js";

// =============================================================================
// Test Helpers
// =============================================================================

const NOW = new Date("2026-03-10T09:00:00.000Z");

function makeRecord(overrides: Partial<NewCardRecord> = {}): NewCardRecord {
  return {
    question: "Largest planet?",
    answer: "Jupiter",
    sourceFile: "space.txt",
    sourceLine: 1,
    sourceContext: "Astronomy",
    promptKind: "factual",
    tags: ["planets", "solar-system"],
    ...overrides,
  };
}

function makeState(card: Card): ReviewState {
  return {
    cardKey: `${card.sourceFile}:${card.sourceLine}`,
    cardId: card.id,
    schedulerState: "opaque",
    lastReview: null,
    reviewCount: 0,
    due: NOW,
  };
}

function mustCreate(store: SqliteStore, record: NewCardRecord): Card {
  const result = store.cards.create(record);
  if (!result.success) {
    throw new Error(result.error.message);
  }
  return result.data;
}

// =============================================================================
// SQLite Store Tests
// =============================================================================

describe("openSqliteStore", () => {
  let testDir: string;
  let databasePath: string;
  let store: SqliteStore | null;

  beforeEach(async () => {
    testDir = join(tmpdir(), `sqlite-store-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    databasePath = join(testDir, "nested", "study-loop.db");
    store = null;
  });

  afterEach(async () => {
    store?.close();
    await rm(testDir, { recursive: true, force: true });
  });

  function open(): SqliteStore {
    store = openSqliteStore({ databasePath, getNow: () => NOW });
    return store;
  }

  test("assigns card identities and keeps every field across reopen", () => {
    const first = open();
    const card = mustCreate(first, makeRecord());
    expect(card.id).toBe(1);
    first.close();

    const second = open();
    const loaded = second.cards.getById(1);
    expect(loaded.success && loaded.data).toEqual({ ...makeRecord(), id: 1, createdAt: NOW });
  });

  test("keeps tags that contain commas intact", () => {
    const db = open();
    const card = mustCreate(db, makeRecord({ tags: ["rome, italy", "capitals"] }));

    const loaded = db.cards.getById(card.id ?? 0);
    expect(loaded.success && loaded.data.tags).toEqual(["rome, italy", "capitals"]);
  });

  test("reads comma-separated tags written by an older build", () => {
    const db = open();
    db.close();
    const raw = new Database(databasePath);
    raw
      .prepare(
        `INSERT INTO cards (question, answer, source_file, source_line, tags, created_at)
         VALUES ('Q', 'A', 'old.txt', 1, 'alpha,beta', '2025-01-01T00:00:00.000Z')`
      )
      .run();
    raw.close();

    const reopened = open();
    const loaded = reopened.cards.getById(1);
    expect(loaded.success && loaded.data.tags).toEqual(["alpha", "beta"]);
  });

  test("keeps unfinished sessions across reopen", () => {
    const first = open();
    first.sessions.create({ startTime: NOW, endTime: null, cardsReviewed: 3, newCards: 1, reviewedCards: 2 });
    first.close();

    const second = open();
    const unfinished = second.sessions.listUnfinished();
    expect(unfinished.success && unfinished.data).toEqual([
      { id: 1, startTime: NOW, endTime: null, cardsReviewed: 3, newCards: 1, reviewedCards: 2 },
    ]);
  });

  test("edits a card and rejects an edit that duplicates another card", () => {
    const db = open();
    const card = mustCreate(db, makeRecord());
    mustCreate(db, makeRecord({ question: "Smallest planet?", answer: "Mercury", sourceLine: 2 }));

    const edited = db.cards.update(card.id ?? 0, { question: "Biggest planet?", answer: "Jupiter" });
    expect(edited.success && edited.data.question).toBe("Biggest planet?");

    const clash = db.cards.update(card.id ?? 0, { question: "Smallest planet?", answer: "Mercury" });
    expect(!clash.success && clash.error.kind).toBe("duplicate");
  });

  test("reports not_found when editing or deleting a missing card", () => {
    const db = open();

    const edited = db.cards.update(99, { question: "Q", answer: "A" });
    const deleted = db.cards.delete(99);

    expect(!edited.success && edited.error.kind).toBe("not_found");
    expect(!deleted.success && deleted.error.kind).toBe("not_found");
  });

  test("deleting a card removes its review state", () => {
    const db = open();
    const card = mustCreate(db, makeRecord());
    db.reviewStates.save(card, makeState(card));

    expect(db.cards.delete(card.id ?? 0).success).toBe(true);

    const state = db.reviewStates.get(card);
    expect(!state.success && state.error.kind).toBe("not_found");
  });

  test("keeps state of cards without identity in memory only", () => {
    const first = open();
    const transient: Card = { ...makeRecord(), id: null, createdAt: NOW };

    expect(first.reviewStates.save(transient, makeState(transient)).success).toBe(true);
    const cached = first.reviewStates.get(transient);
    expect(cached.success && cached.data.cardKey).toBe("space.txt:1");
    first.close();

    const second = open();
    expect(second.reviewStates.get(transient).success).toBe(false);
  });

  test("records migration markers", () => {
    const db = open();

    const before = db.hasMigration("review-state.json");
    expect(before.success && before.data).toBe(false);

    db.recordMigration("review-state.json", NOW);
    const after = db.hasMigration("review-state.json");
    expect(after.success && after.data).toBe(true);
  });

  test("adds columns missing from an older database", async () => {
    await mkdir(join(testDir, "nested"), { recursive: true });
    const legacy = new Database(databasePath);
    legacy.exec(`
      CREATE TABLE cards (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        question TEXT NOT NULL,
        answer TEXT NOT NULL,
        source_file TEXT NOT NULL,
        source_line INTEGER NOT NULL,
        created_at TEXT NOT NULL
      );
      INSERT INTO cards (question, answer, source_file, source_line, created_at)
      VALUES ('Old question', 'Old answer', 'old.txt', 4, '2025-01-01T00:00:00.000Z');
    `);
    legacy.close();

    const db = open();
    const cards = db.cards.list();
    expect(cards.success && cards.data).toEqual([
      {
        id: 1,
        question: "Old question",
        answer: "Old answer",
        sourceFile: "old.txt",
        sourceLine: 4,
        sourceContext: null,
        promptKind: "factual",
        tags: [],
        createdAt: new Date("2025-01-01T00:00:00.000Z"),
      },
    ]);
  });

  test("throws StoreInitError for a file that is not a database", async () => {
    await mkdir(join(testDir, "nested"), { recursive: true });
    await writeFile(databasePath, "this is plainly not an SQLite database file ".repeat(20), "utf-8");

    expect(() => open()).toThrow(StoreInitError);
  });

  test("close is idempotent", () => {
    const db = open();
    db.close();
    expect(() => db.close()).not.toThrow();
  });
});
