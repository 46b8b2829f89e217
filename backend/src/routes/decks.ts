/**
 * Deck Routes
 *
 * - POST /decks/load - Parse a deck file and store its new cards
 *
 * A deck that cannot be read answers 400 (DECK_READ_FAILED) through the
 * error handler; bad lines are part of the successful response.
 */

import { Hono } from "hono";
import { LoadDeckRequestSchema, type CardResponse } from "@study-loop/shared";
import { formatParseReport } from "../ingestion/card-ingestion.js";
import type { ParseIssue } from "../ingestion/deck-parser.js";
import { failureResponse, readJsonBody, type StudyEnv } from "../middleware/study-context.js";
import { toCardResponse } from "./serializers.js";

export interface LoadDeckResponse {
  sourceFile: string;
  totalLines: number;
  validCards: number;
  skippedLines: number;
  importedCards: number;
  duplicateCards: number;
  cards: CardResponse[];
  issues: ParseIssue[];
  /** Human-readable summary */
  report: string;
}

const decksRoutes = new Hono<StudyEnv>();

decksRoutes.post("/load", async (c) => {
  const body = await readJsonBody(c, LoadDeckRequestSchema);
  if (!body.success) return failureResponse(c, body.error);

  const result = await c.get("study").loadDeck(body.data.path);

  const response: LoadDeckResponse = {
    ...result,
    cards: result.cards.map(toCardResponse),
    report: formatParseReport(result),
  };
  return c.json(response);
});

export { decksRoutes };
