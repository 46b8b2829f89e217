/**
 * Review Routes
 *
 * - GET /review/due - Cards due now
 * - POST /review/next - Next due card in round-robin order
 * - POST /review/rate - Rate a card: { cardKey, rating }
 *
 * Rating a card starts a session if none is active.
 */

import { Hono } from "hono";
import { RateCardRequestSchema, type CardResponse } from "@study-loop/shared";
import { failureResponse, readJsonBody, type StudyEnv } from "../middleware/study-context.js";
import { createLogger } from "../logger.js";
import { toCardResponse, toReviewStateResponse, type ReviewStateResponse } from "./serializers.js";

const log = createLogger("ReviewRoutes");

export interface DueCardsResponse {
  cards: CardResponse[];
  count: number;
}

export interface NextCardResponse {
  card: CardResponse | null;
  /** Cards in the review queue */
  remaining: number;
}

export interface RateCardResponse {
  state: ReviewStateResponse;
  wasNew: boolean;
  remaining: number;
}

const reviewRoutes = new Hono<StudyEnv>();

reviewRoutes.get("/due", (c) => {
  const due = c.get("study").dueCards();
  if (!due.success) return failureResponse(c, due.error);

  const response: DueCardsResponse = {
    cards: due.data.map(toCardResponse),
    count: due.data.length,
  };
  return c.json(response);
});

reviewRoutes.post("/next", (c) => {
  const study = c.get("study");
  const next = study.nextCard();
  if (!next.success) return failureResponse(c, next.error);

  const response: NextCardResponse = {
    card: next.data ? toCardResponse(next.data) : null,
    remaining: study.queue.size,
  };
  return c.json(response);
});

reviewRoutes.post("/rate", async (c) => {
  const body = await readJsonBody(c, RateCardRequestSchema);
  if (!body.success) return failureResponse(c, body.error);

  const { cardKey, rating } = body.data;
  const rated = c.get("study").rateCard(cardKey, rating);
  if (!rated.success) return failureResponse(c, rated.error);

  log.debug(`Rated ${cardKey} ${rating}`);
  const response: RateCardResponse = {
    state: toReviewStateResponse(rated.data.state),
    wasNew: rated.data.wasNew,
    remaining: rated.data.remaining,
  };
  return c.json(response);
});

export { reviewRoutes };
