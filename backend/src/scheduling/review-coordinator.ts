/**
 * Review Coordinator
 *
 * Owns per-card review state. A card with no stored state is unseen and
 * due; the first access creates its state from the scheduler. Once stored,
 * a card is due when it has never been rated or its due time has passed.
 *
 * Only applyRating mutates a state, and nothing changes unless the write
 * succeeds.
 */

import { cardKey, type Card, type Rating, type ReviewState } from "@study-loop/shared";
import { createLogger } from "../logger.js";
import type { Result } from "../result.js";
import { ok } from "../result.js";
import type { ReviewStateRepository } from "../storage/types.js";
import type { ReviewScheduler } from "./scheduler.js";

const log = createLogger("Review");

// =============================================================================
// Types
// =============================================================================

export interface ReviewSummary {
  total: number;
  due: number;
  /** Cards rated at least once */
  reviewed: number;
}

export interface ReviewCoordinatorOptions {
  getNow?: () => Date;
}

// =============================================================================
// ReviewCoordinator Class
// =============================================================================

export class ReviewCoordinator {
  private readonly getNow: () => Date;

  constructor(
    private readonly states: ReviewStateRepository,
    private readonly scheduler: ReviewScheduler,
    options: ReviewCoordinatorOptions = {}
  ) {
    this.getNow = options.getNow ?? (() => new Date());
  }

  /**
   * A card's state, created and stored if the card has none yet.
   */
  getCardState(card: Card): Result<ReviewState> {
    const existing = this.states.get(card);
    if (existing.success || existing.error.kind !== "not_found") {
      return existing;
    }

    const now = this.getNow();
    const initial = this.scheduler.initialState(now);
    return this.states.save(card, {
      cardKey: cardKey(card),
      cardId: card.id,
      schedulerState: this.scheduler.serialize(initial.state),
      lastReview: null,
      reviewCount: 0,
      due: initial.due,
    });
  }

  isDue(state: ReviewState, now: Date = this.getNow()): boolean {
    return state.reviewCount === 0 || now.getTime() >= state.due.getTime();
  }

  /**
   * Cards that are due now, in the order given.
   */
  dueCards(cards: Card[]): Result<Card[]> {
    const now = this.getNow();
    const due: Card[] = [];

    for (const card of cards) {
      const state = this.getCardState(card);
      if (!state.success) return state;
      if (this.isDue(state.data, now)) {
        due.push(card);
      }
    }

    return ok(due);
  }

  /**
   * True if the card has never been rated.
   */
  isNewCard(card: Card): Result<boolean> {
    const state = this.getCardState(card);
    if (!state.success) return state;
    return ok(state.data.reviewCount === 0);
  }

  /**
   * Advance a card's state by one rating and store it.
   */
  applyRating(card: Card, rating: Rating): Result<ReviewState> {
    const current = this.getCardState(card);
    if (!current.success) return current;

    const now = this.getNow();
    const next = this.scheduler.next(this.readSchedulerState(current.data, now), rating, now);

    const updated: ReviewState = {
      ...current.data,
      schedulerState: this.scheduler.serialize(next.state),
      reviewCount: current.data.reviewCount + 1,
      lastReview: now,
      due: next.due.getTime() > now.getTime() ? next.due : now,
    };

    const saved = this.states.save(card, updated);
    if (saved.success) {
      log.debug(`Rated ${updated.cardKey} ${rating}, due ${updated.due.toISOString()}`);
    }
    return saved;
  }

  /**
   * Remove a card's state. A card without state is not an error.
   */
  deleteState(cardId: number): Result<void> {
    const deleted = this.states.deleteByCardId(cardId);
    if (!deleted.success && deleted.error.kind === "not_found") {
      return ok(undefined);
    }
    return deleted;
  }

  summarize(cards: Card[]): Result<ReviewSummary> {
    const now = this.getNow();
    const summary: ReviewSummary = { total: cards.length, due: 0, reviewed: 0 };

    for (const card of cards) {
      const state = this.getCardState(card);
      if (!state.success) return state;
      if (this.isDue(state.data, now)) summary.due++;
      if (state.data.reviewCount > 0) summary.reviewed++;
    }

    return ok(summary);
  }

  /**
   * Stored scheduler state, or a fresh one when the stored blob is unreadable.
   */
  private readSchedulerState(state: ReviewState, now: Date): unknown {
    const parsed = this.scheduler.deserialize(state.schedulerState);
    if (parsed.success) {
      return parsed.data;
    }
    log.warn(`Unreadable scheduler state for ${state.cardKey}, starting over: ${parsed.error.message}`);
    return this.scheduler.initialState(now).state;
  }
}
