/**
 * Review State Cache
 *
 * In-process map of review states keyed by card key (`sourceFile:sourceLine`).
 * The file backend persists it as review-state.json; the SQLite backend uses
 * it for cards that have no store identity and mirrors database writes into it.
 */

import {
  ReviewStateFileSchema,
  formatValidationError,
  type ReviewState,
  type ReviewStateFile,
} from "@study-loop/shared";
import type { Result } from "../result.js";
import { fail, ok } from "../result.js";

export class ReviewStateCache {
  private entries: Map<string, ReviewState> = new Map();

  get size(): number {
    return this.entries.size;
  }

  get(key: string): ReviewState | undefined {
    return this.entries.get(key);
  }

  set(state: ReviewState): void {
    this.entries.set(state.cardKey, { ...state });
  }

  /**
   * Remove every entry belonging to a stored card.
   */
  deleteByCardId(cardId: number): number {
    let removed = 0;
    for (const [key, state] of this.entries) {
      if (state.cardId === cardId) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Snapshot for rollback.
   */
  snapshot(): Map<string, ReviewState> {
    return new Map([...this.entries].map(([key, state]) => [key, { ...state }]));
  }

  restore(snapshot: Map<string, ReviewState>): void {
    this.entries = snapshot;
  }

  toDocument(): ReviewStateFile {
    const doc: ReviewStateFile = {};
    for (const [key, state] of this.entries) {
      doc[key] = {
        schedulerState: state.schedulerState,
        lastReview: state.lastReview ? state.lastReview.toISOString() : null,
        reviewCount: state.reviewCount,
        due: state.due.toISOString(),
      };
    }
    return doc;
  }
}

/**
 * Validate a parsed review-state document and convert it to review states.
 * Legacy records carry no card identity, so `cardId` is null.
 */
export function reviewStatesFromDocument(raw: unknown): Result<ReviewState[]> {
  const parsed = ReviewStateFileSchema.safeParse(raw);
  if (!parsed.success) {
    return fail("validation", formatValidationError(parsed.error));
  }

  return ok(
    Object.entries(parsed.data).map(([key, record]) => ({
      cardKey: key,
      cardId: null,
      schedulerState: record.schedulerState,
      lastReview: record.lastReview ? new Date(record.lastReview) : null,
      reviewCount: record.reviewCount,
      due: new Date(record.due),
    }))
  );
}
