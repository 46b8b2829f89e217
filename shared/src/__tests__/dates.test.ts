/**
 * Calendar Date Utility Tests
 */

import { describe, test, expect } from "vitest";
import { addDays, dayDifference, formatDate, lastNDays, parseDate } from "../dates.js";

describe("parseDate", () => {
  test("parses a real date", () => {
    const date = parseDate("2026-03-10");
    expect(date && formatDate(date)).toBe("2026-03-10");
  });

  test("rejects malformed and impossible dates", () => {
    expect(parseDate("2026-3-10")).toBeNull();
    expect(parseDate("2026-02-30")).toBeNull();
    expect(parseDate("")).toBeNull();
  });
});

describe("addDays", () => {
  test("crosses month and year boundaries", () => {
    expect(addDays("2026-02-28", 1)).toBe("2026-03-01");
    expect(addDays("2026-01-01", -1)).toBe("2025-12-31");
  });

  test("throws on an invalid date", () => {
    expect(() => addDays("not-a-date", 1)).toThrow("Invalid date: not-a-date");
  });
});

describe("dayDifference", () => {
  test("counts whole days in either direction", () => {
    expect(dayDifference("2026-03-10", "2026-03-11")).toBe(1);
    expect(dayDifference("2026-03-10", "2026-03-10")).toBe(0);
    expect(dayDifference("2026-03-10", "2026-03-07")).toBe(-3);
    expect(dayDifference("2024-02-28", "2024-03-01")).toBe(2);
  });

  test("returns null for an unparseable date", () => {
    expect(dayDifference("", "2026-03-10")).toBeNull();
  });
});

describe("lastNDays", () => {
  test("lists the window oldest first", () => {
    expect(lastNDays("2026-03-02", 3)).toEqual(["2026-02-28", "2026-03-01", "2026-03-02"]);
  });
});
