/**
 * Hono server configuration for Study Loop
 *
 * Provides:
 * - Health check endpoint at /api/health
 * - The study REST API under /api (cards, decks, review, sessions, stats)
 * - CORS headers for local development
 * - JSON error responses for anything a route throws
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { VERSION } from "@study-loop/shared";
import { restErrorHandler } from "./middleware/error-handler.js";
import { createApiRoutes } from "./routes/index.js";
import type { StudyContext } from "./study-context.js";

export interface HealthResponse {
  status: "ok";
  version: string;
  storage: StudyContext["store"]["kind"];
  activeSession: boolean;
}

/**
 * Create and configure the Hono application
 */
export const createApp = (study: StudyContext) => {
  const app = new Hono();

  app.use(
    "/api/*",
    cors({
      origin: ["http://localhost:5173", "http://localhost:3000"],
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type"],
    })
  );

  // Health check endpoint
  app.get("/api/health", (c) => {
    const response: HealthResponse = {
      status: "ok",
      version: VERSION,
      storage: study.store.kind,
      activeSession: study.engine.hasActiveSession(),
    };
    return c.json(response);
  });

  app.route("/api", createApiRoutes(study));

  app.onError(restErrorHandler);

  return app;
};
