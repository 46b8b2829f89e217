/**
 * Route Index
 *
 * Registers all REST routes under `/api/*`. The study context middleware
 * runs first so every handler can read `c.get("study")`.
 */

import { Hono } from "hono";
import type { StudyContext } from "../study-context.js";
import { studyContext, type StudyEnv } from "../middleware/study-context.js";

import { cardsRoutes } from "./cards.js";
import { decksRoutes } from "./decks.js";
import { reviewRoutes } from "./review.js";
import { sessionsRoutes } from "./sessions.js";
import { statsRoutes } from "./stats.js";

/**
 * Hono router for the study API.
 *
 * Usage in server.ts:
 * ```typescript
 * app.route("/api", createApiRoutes(study));
 * ```
 */
export function createApiRoutes(study: StudyContext): Hono<StudyEnv> {
  const api = new Hono<StudyEnv>();

  api.use("/*", studyContext(study));

  api.route("/cards", cardsRoutes);
  api.route("/decks", decksRoutes);
  api.route("/review", reviewRoutes);
  api.route("/sessions", sessionsRoutes);
  api.route("/stats", statsRoutes);

  return api;
}
