/**
 * Session Routes
 *
 * - POST /sessions/start - Start a session (returns the active one if running)
 * - POST /sessions/end - End the active session and fold it into today
 * - GET /sessions/current - Active session and its elapsed minutes
 */

import { Hono } from "hono";
import { failureResponse, type StudyEnv } from "../middleware/study-context.js";
import { serverLog as log } from "../logger.js";
import { toSessionResponse, type SessionResponse } from "./serializers.js";

export interface SessionStateResponse {
  session: SessionResponse | null;
}

export interface CurrentSessionResponse extends SessionStateResponse {
  minutes: number;
}

const sessionsRoutes = new Hono<StudyEnv>();

sessionsRoutes.post("/start", (c) => {
  const started = c.get("study").engine.startSession();
  if (!started.success) return failureResponse(c, started.error);

  const response: SessionStateResponse = { session: toSessionResponse(started.data) };
  return c.json(response);
});

sessionsRoutes.post("/end", (c) => {
  const ended = c.get("study").engine.endSession();
  if (!ended.success) {
    log.error(`REST: Failed to end session: ${ended.error.message}`);
    return failureResponse(c, ended.error);
  }

  const response: SessionStateResponse = {
    session: ended.data ? toSessionResponse(ended.data) : null,
  };
  return c.json(response);
});

sessionsRoutes.get("/current", (c) => {
  const engine = c.get("study").engine;
  const session = engine.getCurrentSession();

  const response: CurrentSessionResponse = {
    session: session ? toSessionResponse(session) : null,
    minutes: engine.getCurrentSessionMinutes(),
  };
  return c.json(response);
});

export { sessionsRoutes };
