/**
 * Statistics Routes
 *
 * - GET /stats/today | week | month | all-time | streak | summary
 * - POST /stats/export - Write the daily rows to a delimited file: { path }
 * - POST /stats/reset - Clear sessions, daily rows and the streak
 */

import { Hono } from "hono";
import { ExportStatsRequestSchema, type DailyStats, type LearningStreak } from "@study-loop/shared";
import { failureResponse, readJsonBody, type StudyEnv } from "../middleware/study-context.js";
import type { ReviewSummary } from "../scheduling/review-coordinator.js";

export interface StatsSummaryResponse {
  cards: ReviewSummary;
  today: DailyStats;
  streak: LearningStreak;
  sessionMinutes: number;
}

const statsRoutes = new Hono<StudyEnv>();

statsRoutes.get("/today", (c) => {
  const today = c.get("study").engine.getTodayStats();
  if (!today.success) return failureResponse(c, today.error);
  return c.json({ stats: today.data });
});

statsRoutes.get("/week", (c) => {
  const days = c.get("study").engine.getWeeklyStats();
  if (!days.success) return failureResponse(c, days.error);
  return c.json({ days: days.data });
});

statsRoutes.get("/month", (c) => {
  const days = c.get("study").engine.getMonthlyStats();
  if (!days.success) return failureResponse(c, days.error);
  return c.json({ days: days.data });
});

statsRoutes.get("/all-time", (c) => {
  const totals = c.get("study").engine.getAllTimeStats();
  if (!totals.success) return failureResponse(c, totals.error);
  return c.json(totals.data);
});

statsRoutes.get("/streak", (c) => {
  const streak = c.get("study").engine.getLearningStreak();
  if (!streak.success) return failureResponse(c, streak.error);
  return c.json(streak.data);
});

statsRoutes.get("/summary", (c) => {
  const study = c.get("study");

  const cards = study.store.cards.list();
  if (!cards.success) return failureResponse(c, cards.error);
  const summary = study.coordinator.summarize(cards.data);
  if (!summary.success) return failureResponse(c, summary.error);
  const today = study.engine.getTodayStats();
  if (!today.success) return failureResponse(c, today.error);
  const streak = study.engine.getLearningStreak();
  if (!streak.success) return failureResponse(c, streak.error);

  const response: StatsSummaryResponse = {
    cards: summary.data,
    today: today.data,
    streak: streak.data,
    sessionMinutes: study.engine.getCurrentSessionMinutes(),
  };
  return c.json(response);
});

statsRoutes.post("/export", async (c) => {
  const body = await readJsonBody(c, ExportStatsRequestSchema);
  if (!body.success) return failureResponse(c, body.error);

  const exported = await c.get("study").engine.exportToDelimitedText(body.data.path);
  if (!exported.success) return failureResponse(c, exported.error);

  return c.json({ path: body.data.path, rows: exported.data });
});

statsRoutes.post("/reset", (c) => {
  const reset = c.get("study").engine.resetStatistics();
  if (!reset.success) return failureResponse(c, reset.error);
  return c.json({ success: true });
});

export { statsRoutes };
