/**
 * FSRS Scheduler
 *
 * ReviewScheduler backed by ts-fsrs. The serialized state is the ts-fsrs
 * card as JSON, dates in ISO 8601.
 */

import {
  Rating as FsrsRating,
  State,
  createEmptyCard,
  fsrs,
  type Card as FsrsCard,
  type FSRS,
  type FSRSParameters,
  type Grade,
} from "ts-fsrs";
import { z } from "zod";
import { formatValidationError, type Rating } from "@study-loop/shared";
import type { Result } from "../result.js";
import { fail, ok } from "../result.js";
import type { ReviewScheduler, Scheduled } from "./scheduler.js";

const GRADES: Record<Rating, Grade> = {
  again: FsrsRating.Again,
  hard: FsrsRating.Hard,
  good: FsrsRating.Good,
  easy: FsrsRating.Easy,
};

const FsrsCardSchema = z.object({
  due: z.coerce.date(),
  stability: z.number().min(0),
  difficulty: z.number().min(0),
  elapsed_days: z.number().min(0),
  scheduled_days: z.number().min(0),
  reps: z.number().int().min(0),
  lapses: z.number().int().min(0),
  state: z.nativeEnum(State),
  last_review: z.coerce.date().optional(),
});

export class FsrsScheduler implements ReviewScheduler<FsrsCard> {
  private readonly engine: FSRS;

  constructor(params: Partial<FSRSParameters> = {}) {
    // Fuzz off so intervals are reproducible
    this.engine = fsrs({ enable_fuzz: false, ...params });
  }

  initialState(now: Date): Scheduled<FsrsCard> {
    return { state: createEmptyCard(now), due: now };
  }

  next(state: FsrsCard, rating: Rating, now: Date): Scheduled<FsrsCard> {
    const { card } = this.engine.next(state, now, GRADES[rating]);
    return { state: card, due: card.due };
  }

  serialize(state: FsrsCard): string {
    return JSON.stringify(state);
  }

  deserialize(blob: string): Result<FsrsCard> {
    let raw: unknown;
    try {
      raw = JSON.parse(blob);
    } catch (e) {
      return fail("validation", `Scheduler state is not JSON: ${e instanceof Error ? e.message : String(e)}`);
    }

    const parsed = FsrsCardSchema.safeParse(raw);
    if (!parsed.success) {
      return fail("validation", `Invalid scheduler state: ${formatValidationError(parsed.error)}`);
    }
    return ok(parsed.data);
  }
}
