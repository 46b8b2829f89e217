/**
 * Review Scheduler Contract
 *
 * The numeric scheduling model lives behind this interface. The rest of the
 * system only ever handles its state as an opaque serialized string.
 */

import type { Rating } from "@study-loop/shared";
import type { Result } from "../result.js";

/**
 * A scheduler state together with the time its card is next due.
 */
export interface Scheduled<S> {
  state: S;
  due: Date;
}

export interface ReviewScheduler<S = unknown> {
  /** State for a card that has never been reviewed. `due` equals `now`. */
  initialState(now: Date): Scheduled<S>;
  /** State after rating a card at `now`. */
  next(state: S, rating: Rating, now: Date): Scheduled<S>;
  serialize(state: S): string;
  /** Parse a serialized state, failing with `validation` when it is unreadable. */
  deserialize(blob: string): Result<S>;
}
