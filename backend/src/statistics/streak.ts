/**
 * Learning Streak Rule
 */

import { dayDifference, type LearningStreak } from "@study-loop/shared";

export const EMPTY_STREAK: LearningStreak = {
  currentStreak: 0,
  longestStreak: 0,
  lastStudyDate: "",
};

/**
 * Streak after studying on `today`.
 *
 * Same day: unchanged. Next day: extended. Anything else (a gap, a date in
 * the past, an unreadable last date): restarted at 1. The longest streak
 * never decreases.
 */
export function advanceStreak(streak: LearningStreak, today: string): LearningStreak {
  if (streak.lastStudyDate === "") {
    return {
      currentStreak: 1,
      longestStreak: Math.max(1, streak.longestStreak),
      lastStudyDate: today,
    };
  }

  const gap = dayDifference(streak.lastStudyDate, today);
  if (gap === 0) {
    return { ...streak };
  }

  const currentStreak = gap === 1 ? streak.currentStreak + 1 : 1;
  return {
    currentStreak,
    longestStreak: Math.max(streak.longestStreak, currentStreak),
    lastStudyDate: today,
  };
}
