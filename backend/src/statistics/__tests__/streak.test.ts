import { describe, expect, test } from "vitest";
import { EMPTY_STREAK, advanceStreak } from "../streak.js";

describe("advanceStreak", () => {
  test("first study day starts the streak", () => {
    expect(advanceStreak(EMPTY_STREAK, "2026-03-10")).toEqual({
      currentStreak: 1,
      longestStreak: 1,
      lastStudyDate: "2026-03-10",
    });
  });

  test("same day changes nothing", () => {
    const streak = { currentStreak: 3, longestStreak: 5, lastStudyDate: "2026-03-10" };
    expect(advanceStreak(streak, "2026-03-10")).toEqual(streak);
  });

  test("next day extends and raises the longest", () => {
    const streak = { currentStreak: 5, longestStreak: 5, lastStudyDate: "2026-03-10" };
    expect(advanceStreak(streak, "2026-03-11")).toEqual({
      currentStreak: 6,
      longestStreak: 6,
      lastStudyDate: "2026-03-11",
    });
  });

  test("next day across a month boundary extends", () => {
    const streak = { currentStreak: 1, longestStreak: 1, lastStudyDate: "2026-02-28" };
    expect(advanceStreak(streak, "2026-03-01").currentStreak).toBe(2);
  });

  test("a gap restarts at one and keeps the longest", () => {
    const streak = { currentStreak: 4, longestStreak: 9, lastStudyDate: "2026-03-10" };
    expect(advanceStreak(streak, "2026-03-13")).toEqual({
      currentStreak: 1,
      longestStreak: 9,
      lastStudyDate: "2026-03-13",
    });
  });

  test("a date before the last study day restarts", () => {
    const streak = { currentStreak: 4, longestStreak: 4, lastStudyDate: "2026-03-10" };
    expect(advanceStreak(streak, "2026-03-09")).toEqual({
      currentStreak: 1,
      longestStreak: 4,
      lastStudyDate: "2026-03-09",
    });
  });

  test("an unreadable last date restarts", () => {
    const streak = { currentStreak: 2, longestStreak: 2, lastStudyDate: "yesterday" };
    expect(advanceStreak(streak, "2026-03-10").currentStreak).toBe(1);
  });
});
