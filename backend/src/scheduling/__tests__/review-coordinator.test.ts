/**
 * Review Coordinator Tests
 *
 * Lazy state creation, due selection, rating and deletion, on both backends.
 */

import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { rm } from "node:fs/promises";
import { join } from "node:path";
import type { Card, Rating } from "@study-loop/shared";
import { openFileStore } from "../../storage/file-store.js";
import { openSqliteStore } from "../../storage/sqlite-store.js";
import type { StorageBackend } from "../../storage/types.js";
import { ReviewCoordinator } from "../review-coordinator.js";
import type { Scheduled } from "../scheduler.js";
import {
  StepScheduler,
  TestClock,
  createTestDir,
  makeCardRecord,
  type StepState,
} from "../../__tests__/test-helpers.js";

const START = "2026-03-10T09:00:00.000Z";

/**
 * Schedules every rating an hour in the past.
 */
class PastDueScheduler extends StepScheduler {
  next(state: StepState, rating: Rating, now: Date): Scheduled<StepState> {
    return {
      state: super.next(state, rating, now).state,
      due: new Date(now.getTime() - 60 * 60 * 1000),
    };
  }
}

type Opener = (dir: string) => Promise<StorageBackend>;

const backends: Array<[string, Opener]> = [
  [
    "file",
    (dir) =>
      openFileStore({
        reviewStatePath: join(dir, "review-state.json"),
        statsPath: join(dir, "study-stats.json"),
      }),
  ],
  ["sqlite", (dir) => Promise.resolve(openSqliteStore({ databasePath: join(dir, "study.db") }))],
];

describe.each(backends)("ReviewCoordinator (%s backend)", (_name, open) => {
  let testDir: string;
  let store: StorageBackend;
  let clock: TestClock;
  let coordinator: ReviewCoordinator;

  function addCard(question: string, line: number): Card {
    const result = store.cards.create(
      makeCardRecord({ question, answer: `${question} answer`, sourceLine: line })
    );
    if (!result.success) throw new Error(result.error.message);
    return result.data;
  }

  beforeEach(async () => {
    testDir = await createTestDir("review-coordinator-test");
    store = await open(testDir);
    clock = new TestClock(START);
    coordinator = new ReviewCoordinator(store.reviewStates, new StepScheduler(), {
      getNow: clock.now,
    });
  });

  afterEach(async () => {
    store.close();
    await rm(testDir, { recursive: true, force: true });
  });

  test("creates a due state on first access", () => {
    const card = addCard("Q1", 1);

    const state = coordinator.getCardState(card);

    expect(state.success).toBe(true);
    if (state.success) {
      expect(state.data.reviewCount).toBe(0);
      expect(state.data.lastReview).toBeNull();
      expect(state.data.due).toEqual(new Date(START));
      expect(state.data.schedulerState).toBe('{"step":0}');
    }
    expect(store.reviewStates.get(card).success).toBe(true);
  });

  test("every unseen card is due, in input order", () => {
    const cards = [addCard("Q1", 1), addCard("Q2", 2), addCard("Q3", 3)];

    const due = coordinator.dueCards(cards);

    expect(due.success && due.data.map((c) => c.question)).toEqual(["Q1", "Q2", "Q3"]);
  });

  test("first good rating counts the review and schedules a day out", () => {
    const card = addCard("What is 2+2?", 1);

    const rated = coordinator.applyRating(card, "good");

    expect(rated.success).toBe(true);
    if (rated.success) {
      expect(rated.data.reviewCount).toBe(1);
      expect(rated.data.lastReview).toEqual(new Date(START));
      expect(rated.data.due).toEqual(new Date("2026-03-11T09:00:00.000Z"));
    }
    const isNew = coordinator.isNewCard(card);
    expect(isNew.success && isNew.data).toBe(false);
  });

  test("rated cards leave the due set until their due time", () => {
    const first = addCard("Q1", 1);
    const second = addCard("Q2", 2);
    coordinator.applyRating(first, "good");

    const dueNow = coordinator.dueCards([first, second]);
    expect(dueNow.success && dueNow.data.map((c) => c.question)).toEqual(["Q2"]);

    clock.advanceDays(1);
    const dueTomorrow = coordinator.dueCards([first, second]);
    expect(dueTomorrow.success && dueTomorrow.data.map((c) => c.question)).toEqual(["Q1", "Q2"]);
  });

  test("again keeps the card due within minutes", () => {
    const card = addCard("Q1", 1);

    const rated = coordinator.applyRating(card, "again");

    expect(rated.success && rated.data.due).toEqual(new Date("2026-03-10T09:01:00.000Z"));
    clock.advanceMinutes(1);
    const due = coordinator.dueCards([card]);
    expect(due.success && due.data).toHaveLength(1);
  });

  test("consecutive ratings build on the stored scheduler state", () => {
    const card = addCard("Q1", 1);
    coordinator.applyRating(card, "good");
    clock.advanceDays(1);

    const second = coordinator.applyRating(card, "good");

    expect(second.success).toBe(true);
    if (second.success) {
      expect(second.data.reviewCount).toBe(2);
      expect(second.data.schedulerState).toBe('{"step":2}');
      expect(second.data.due).toEqual(new Date("2026-03-13T09:00:00.000Z"));
    }
  });

  test("an unreadable scheduler state starts over", () => {
    const card = addCard("Q1", 1);
    store.reviewStates.save(card, {
      cardKey: "deck.txt:1",
      cardId: card.id,
      schedulerState: "garbage",
      lastReview: null,
      reviewCount: 3,
      due: new Date(START),
    });

    const rated = coordinator.applyRating(card, "good");

    expect(rated.success && rated.data.schedulerState).toBe('{"step":1}');
    expect(rated.success && rated.data.reviewCount).toBe(4);
  });

  test("summarizes total, due and reviewed counts", () => {
    const cards = [addCard("Q1", 1), addCard("Q2", 2), addCard("Q3", 3)];
    coordinator.applyRating(cards[0], "easy");
    coordinator.applyRating(cards[1], "again");

    const summary = coordinator.summarize(cards);

    // Q2 is reviewed but due again in a minute
    expect(summary.success && summary.data).toEqual({ total: 3, due: 1, reviewed: 2 });
  });

  test("a due time in the past is raised to now", () => {
    const card = addCard("Q1", 1);
    const pastDue = new ReviewCoordinator(store.reviewStates, new PastDueScheduler(), {
      getNow: clock.now,
    });

    const rated = pastDue.applyRating(card, "good");

    expect(rated.success && rated.data.due).toEqual(new Date(START));
    expect(rated.success && rated.data.reviewCount).toBe(1);
    const due = pastDue.dueCards([card]);
    expect(due.success && due.data.map((c) => c.question)).toEqual(["Q1"]);
  });

  test("deleting a state that does not exist is not an error", () => {
    expect(coordinator.deleteState(404).success).toBe(true);
  });
});
