/**
 * Review Queue
 *
 * Round-robin cursor over the due cards. Rated cards that are no longer due
 * drop out on refresh; the cursor stays on the card that followed them.
 */

import { cardKey, type Card } from "@study-loop/shared";
import type { Result } from "../result.js";
import { ok } from "../result.js";

export class ReviewQueue {
  private cards: Card[] = [];
  private position = 0;
  private last: { key: string; index: number } | null = null;

  /**
   * @param loadDue - Produces the current due list, in review order
   */
  constructor(private readonly loadDue: () => Result<Card[]>) {}

  get size(): number {
    return this.cards.length;
  }

  /**
   * Reload the due list.
   */
  refresh(): Result<number> {
    const due = this.loadDue();
    if (!due.success) return due;

    this.cards = due.data;
    if (this.cards.length === 0) {
      this.position = 0;
      return ok(0);
    }

    if (this.last) {
      const lastKey = this.last.key;
      const index = this.cards.findIndex((c) => cardKey(c) === lastKey);
      // A card that left the list is replaced by the one after it
      this.position =
        index === -1 ? this.last.index % this.cards.length : (index + 1) % this.cards.length;
    } else {
      this.position = 0;
    }
    return ok(this.cards.length);
  }

  /**
   * The next card to review, wrapping from the last card to the first.
   * Null when nothing is due.
   */
  next(): Card | null {
    if (this.cards.length === 0) {
      return null;
    }

    const index = this.position % this.cards.length;
    const card = this.cards[index];
    this.last = { key: cardKey(card), index };
    this.position = (index + 1) % this.cards.length;
    return card;
  }

  reset(): void {
    this.cards = [];
    this.position = 0;
    this.last = null;
  }
}
