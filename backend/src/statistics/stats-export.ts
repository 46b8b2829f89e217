/**
 * Statistics Export
 *
 * Daily statistics as comma-delimited text, one row per date ascending.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { DailyStats } from "@study-loop/shared";

export const EXPORT_HEADER =
  "Date,Cards Reviewed,Session Time (min),Session Count,New Cards,Reviewed Cards";

export function formatDelimitedStats(rows: DailyStats[]): string {
  const sorted = [...rows].sort((a, b) => a.date.localeCompare(b.date));
  const lines = sorted.map((row) =>
    [
      row.date,
      row.cardsReviewed,
      row.sessionMinutes,
      row.sessionCount,
      row.newCards,
      row.reviewedCards,
    ].join(",")
  );
  return [EXPORT_HEADER, ...lines].join("\n") + "\n";
}

/**
 * Write the export to `path`, creating its directory if needed.
 */
export async function writeDelimitedStats(rows: DailyStats[], path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, formatDelimitedStats(rows), "utf-8");
}
