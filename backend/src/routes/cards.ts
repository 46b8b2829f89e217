/**
 * Card Routes
 *
 * - GET /cards - All stored cards
 * - POST /cards - Add a card by hand
 * - GET /cards/:id - One card
 * - PUT /cards/:id - Edit question and answer
 * - DELETE /cards/:id - Delete a card and its review state
 *
 * Editing and deleting need store identity, so they answer 400 on the
 * file backend.
 */

import { Hono, type Context } from "hono";
import {
  CreateCardRequestSchema,
  UpdateCardRequestSchema,
  type CardResponse,
} from "@study-loop/shared";
import {
  failureResponse,
  jsonError,
  readJsonBody,
  type StudyEnv,
} from "../middleware/study-context.js";
import { createLogger } from "../logger.js";
import { toCardResponse } from "./serializers.js";

const log = createLogger("CardRoutes");

// =============================================================================
// Response Types
// =============================================================================

export interface CardListResponse {
  cards: CardResponse[];
  count: number;
}

export interface CardDetailResponse {
  card: CardResponse;
}

// =============================================================================
// Helpers
// =============================================================================

function parseCardId(c: Context<StudyEnv>): number | null {
  const raw = c.req.param("id") ?? "";
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

// =============================================================================
// Routes
// =============================================================================

const cardsRoutes = new Hono<StudyEnv>();

cardsRoutes.get("/", (c) => {
  const cards = c.get("study").ingestion.listCards();
  if (!cards.success) return failureResponse(c, cards.error);

  const response: CardListResponse = {
    cards: cards.data.map(toCardResponse),
    count: cards.data.length,
  };
  return c.json(response);
});

cardsRoutes.post("/", async (c) => {
  const body = await readJsonBody(c, CreateCardRequestSchema);
  if (!body.success) return failureResponse(c, body.error);

  const added = c.get("study").ingestion.addCard(body.data);
  if (!added.success) return failureResponse(c, added.error);

  log.info(`Added card ${added.data.sourceFile}:${added.data.sourceLine}`);
  const response: CardDetailResponse = { card: toCardResponse(added.data) };
  return c.json(response, 201);
});

cardsRoutes.get("/:id", (c) => {
  const id = parseCardId(c);
  if (id === null) {
    return jsonError(c, 400, "VALIDATION_ERROR", "Card id must be a positive integer");
  }

  const card = c.get("study").ingestion.getCard(id);
  if (!card.success) return failureResponse(c, card.error);

  const response: CardDetailResponse = { card: toCardResponse(card.data) };
  return c.json(response);
});

cardsRoutes.put("/:id", async (c) => {
  const id = parseCardId(c);
  if (id === null) {
    return jsonError(c, 400, "VALIDATION_ERROR", "Card id must be a positive integer");
  }

  const body = await readJsonBody(c, UpdateCardRequestSchema);
  if (!body.success) return failureResponse(c, body.error);

  const updated = c.get("study").ingestion.updateCard(id, body.data);
  if (!updated.success) return failureResponse(c, updated.error);

  const response: CardDetailResponse = { card: toCardResponse(updated.data) };
  return c.json(response);
});

cardsRoutes.delete("/:id", (c) => {
  const id = parseCardId(c);
  if (id === null) {
    return jsonError(c, 400, "VALIDATION_ERROR", "Card id must be a positive integer");
  }

  const deleted = c.get("study").ingestion.deleteCard(id);
  if (!deleted.success) return failureResponse(c, deleted.error);

  return c.json({ success: true });
});

export { cardsRoutes };
