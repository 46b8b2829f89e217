/**
 * Storage Contract Tests
 *
 * Behavior both backends must share. Each case runs against the file store
 * and the SQLite store in a fresh temp directory.
 */

import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Card, ReviewState } from "@study-loop/shared";
import { openFileStore } from "../file-store.js";
import { openSqliteStore } from "../sqlite-store.js";
import type { NewCardRecord, StorageBackend } from "../types.js";

// =============================================================================
// Test Helpers
// =============================================================================

const NOW = new Date("2026-03-10T09:00:00.000Z");

type Opener = (dir: string) => Promise<StorageBackend>;

const backends: Array<[string, Opener]> = [
  [
    "file",
    (dir) =>
      openFileStore({
        reviewStatePath: join(dir, "review-state.json"),
        statsPath: join(dir, "study-stats.json"),
        getNow: () => NOW,
      }),
  ],
  [
    "sqlite",
    (dir) => Promise.resolve(openSqliteStore({ databasePath: join(dir, "study-loop.db"), getNow: () => NOW })),
  ],
];

function makeRecord(overrides: Partial<NewCardRecord> = {}): NewCardRecord {
  return {
    question: "What is 2+2?",
    answer: "4",
    sourceFile: "deck.txt",
    sourceLine: 1,
    sourceContext: null,
    promptKind: "factual",
    tags: [],
    ...overrides,
  };
}

function makeState(card: Card, overrides: Partial<ReviewState> = {}): ReviewState {
  return {
    cardKey: `${card.sourceFile}:${card.sourceLine}`,
    cardId: card.id,
    schedulerState: '{"stability":1}',
    lastReview: null,
    reviewCount: 0,
    due: NOW,
    ...overrides,
  };
}

function mustCreate(store: StorageBackend, record: NewCardRecord): Card {
  const result = store.cards.create(record);
  if (!result.success) {
    throw new Error(result.error.message);
  }
  return result.data;
}

// =============================================================================
// Contract
// =============================================================================

describe.each(backends)("%s backend", (_name, open) => {
  let testDir: string;
  let store: StorageBackend;

  beforeEach(async () => {
    testDir = join(
      tmpdir(),
      `storage-contract-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
    );
    await mkdir(testDir, { recursive: true });
    store = await open(testDir);
  });

  afterEach(async () => {
    store.close();
    await rm(testDir, { recursive: true, force: true });
  });

  describe("cards", () => {
    test("creates a card and finds it by content and by source", () => {
      const card = mustCreate(store, makeRecord({ tags: ["math"] }));
      expect(card.question).toBe("What is 2+2?");
      expect(card.createdAt).toEqual(NOW);

      const byContent = store.cards.findByContent("What is 2+2?", "4");
      expect(byContent.success && byContent.data.sourceLine).toBe(1);

      const bySource = store.cards.findBySource("deck.txt", 1);
      expect(bySource.success && bySource.data.tags).toEqual(["math"]);
    });

    test("rejects a second card with the same question and answer", () => {
      mustCreate(store, makeRecord());
      const result = store.cards.create(makeRecord({ sourceLine: 7 }));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("duplicate");
      }
      const list = store.cards.list();
      expect(list.success && list.data.length).toBe(1);
    });

    test("reports not_found for unknown content", () => {
      const result = store.cards.findByContent("missing", "card");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("not_found");
      }
    });

    test("lists cards in insertion order", () => {
      mustCreate(store, makeRecord({ question: "B", answer: "b", sourceLine: 2 }));
      mustCreate(store, makeRecord({ question: "A", answer: "a", sourceLine: 1 }));

      const list = store.cards.list();
      expect(list.success && list.data.map((c) => c.question)).toEqual(["B", "A"]);
    });
  });

  describe("review states", () => {
    test("reports not_found before the first save", () => {
      const card = mustCreate(store, makeRecord());
      const result = store.reviewStates.get(card);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("not_found");
      }
    });

    test("saves and replaces a state", () => {
      const card = mustCreate(store, makeRecord());
      const reviewedAt = new Date("2026-03-10T09:05:00.000Z");
      const due = new Date("2026-03-13T09:05:00.000Z");

      expect(store.reviewStates.save(card, makeState(card)).success).toBe(true);
      expect(
        store.reviewStates.save(
          card,
          makeState(card, { reviewCount: 1, lastReview: reviewedAt, due })
        ).success
      ).toBe(true);

      const result = store.reviewStates.get(card);
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.cardKey).toBe("deck.txt:1");
        expect(result.data.reviewCount).toBe(1);
        expect(result.data.lastReview).toEqual(reviewedAt);
        expect(result.data.due).toEqual(due);
        expect(result.data.schedulerState).toBe('{"stability":1}');
      }
    });
  });

  describe("sessions", () => {
    test("lists only unfinished sessions", () => {
      const first = store.sessions.create({
        startTime: new Date("2026-03-10T08:00:00.000Z"),
        endTime: null,
        cardsReviewed: 0,
        newCards: 0,
        reviewedCards: 0,
      });
      const second = store.sessions.create({
        startTime: new Date("2026-03-10T08:30:00.000Z"),
        endTime: null,
        cardsReviewed: 2,
        newCards: 1,
        reviewedCards: 1,
      });
      expect(first.success && second.success).toBe(true);
      if (!first.success || !second.success) return;

      const ended = store.sessions.update({
        ...first.data,
        endTime: new Date("2026-03-10T08:10:00.000Z"),
      });
      expect(ended.success).toBe(true);

      const unfinished = store.sessions.listUnfinished();
      expect(unfinished.success && unfinished.data.map((s) => s.cardsReviewed)).toEqual([2]);
    });

    test("deletes a session", () => {
      const created = store.sessions.create({
        startTime: NOW,
        endTime: null,
        cardsReviewed: 0,
        newCards: 0,
        reviewedCards: 0,
      });
      if (!created.success) throw new Error(created.error.message);

      expect(store.sessions.delete(created.data).success).toBe(true);
      const unfinished = store.sessions.listUnfinished();
      expect(unfinished.success && unfinished.data).toEqual([]);
    });
  });

  describe("daily stats", () => {
    const row = {
      date: "2026-03-10",
      cardsReviewed: 5,
      sessionMinutes: 12,
      sessionCount: 1,
      newCards: 2,
      reviewedCards: 3,
    };

    test("creates, reads and updates a row", () => {
      expect(store.dailyStats.create(row).success).toBe(true);
      expect(store.dailyStats.update({ ...row, cardsReviewed: 8 }).success).toBe(true);

      const result = store.dailyStats.getByDate("2026-03-10");
      expect(result.success && result.data).toEqual({ ...row, cardsReviewed: 8 });
    });

    test("rejects a second row for the same date", () => {
      store.dailyStats.create(row);
      const result = store.dailyStats.create(row);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("duplicate");
      }
    });

    test("reports not_found when updating a missing date", () => {
      const result = store.dailyStats.update(row);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("not_found");
      }
    });

    test("returns a date range ascending", () => {
      store.dailyStats.create({ ...row, date: "2026-03-12" });
      store.dailyStats.create({ ...row, date: "2026-03-09" });
      store.dailyStats.create({ ...row, date: "2026-03-10" });
      store.dailyStats.create({ ...row, date: "2026-03-20" });

      const result = store.dailyStats.range("2026-03-09", "2026-03-12");
      expect(result.success && result.data.map((r) => r.date)).toEqual([
        "2026-03-09",
        "2026-03-10",
        "2026-03-12",
      ]);
    });
  });

  describe("learning streak", () => {
    test("is not_found until saved, then round-trips and clears", () => {
      expect(store.streak.get().success).toBe(false);

      const streak = { currentStreak: 3, longestStreak: 5, lastStudyDate: "2026-03-10" };
      expect(store.streak.save(streak).success).toBe(true);
      const saved = store.streak.get();
      expect(saved.success && saved.data).toEqual(streak);

      expect(store.streak.clear().success).toBe(true);
      expect(store.streak.get().success).toBe(false);
    });
  });

  describe("transactions", () => {
    test("rolls back every write when the function throws", () => {
      const card = mustCreate(store, makeRecord());

      expect(() =>
        store.transaction(() => {
          store.reviewStates.save(card, makeState(card));
          store.dailyStats.create({
            date: "2026-03-10",
            cardsReviewed: 1,
            sessionMinutes: 0,
            sessionCount: 1,
            newCards: 1,
            reviewedCards: 0,
          });
          throw new Error("abort");
        })
      ).toThrow("abort");

      expect(store.reviewStates.get(card).success).toBe(false);
      expect(store.dailyStats.getByDate("2026-03-10").success).toBe(false);
    });

    test("returns the function's value on commit", () => {
      const value = store.transaction(() => {
        store.streak.save({ currentStreak: 1, longestStreak: 1, lastStudyDate: "2026-03-10" });
        return 42;
      });

      expect(value).toBe(42);
      expect(store.streak.get().success).toBe(true);
    });
  });
});
