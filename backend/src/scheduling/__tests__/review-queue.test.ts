/**
 * Review Queue Tests
 */

import { describe, expect, test } from "vitest";
import type { Card } from "@study-loop/shared";
import { ok } from "../../result.js";
import { ReviewQueue } from "../review-queue.js";

function card(line: number): Card {
  return {
    id: line,
    question: `Q${line}`,
    answer: `A${line}`,
    sourceFile: "deck.txt",
    sourceLine: line,
    sourceContext: null,
    promptKind: "factual",
    tags: [],
    createdAt: new Date("2026-03-10T09:00:00.000Z"),
  };
}

describe("ReviewQueue", () => {
  test("cycles through due cards and wraps around", () => {
    const queue = new ReviewQueue(() => ok([card(1), card(2), card(3)]));
    queue.refresh();

    const seen = [queue.next(), queue.next(), queue.next(), queue.next()].map((c) => c?.question);

    expect(seen).toEqual(["Q1", "Q2", "Q3", "Q1"]);
  });

  test("returns null when nothing is due", () => {
    const queue = new ReviewQueue(() => ok([]));
    queue.refresh();

    expect(queue.next()).toBeNull();
    expect(queue.size).toBe(0);
  });

  test("continues with the following card after the reviewed one drops out", () => {
    let due = [card(1), card(2), card(3)];
    const queue = new ReviewQueue(() => ok(due));
    queue.refresh();

    expect(queue.next()?.question).toBe("Q1");
    due = [card(2), card(3)];
    queue.refresh();

    expect(queue.next()?.question).toBe("Q2");
  });

  test("moves past a reviewed card that is still due", () => {
    const due = [card(1), card(2), card(3)];
    const queue = new ReviewQueue(() => ok(due));
    queue.refresh();

    queue.next();
    queue.next();
    queue.refresh();

    expect(queue.next()?.question).toBe("Q3");
  });

  test("wraps to the first card when the last card drops out", () => {
    let due = [card(1), card(2), card(3)];
    const queue = new ReviewQueue(() => ok(due));
    queue.refresh();

    queue.next();
    queue.next();
    expect(queue.next()?.question).toBe("Q3");
    due = [card(1), card(2)];
    queue.refresh();

    expect(queue.next()?.question).toBe("Q1");
  });
});
