/**
 * Player Statistics Tests
 *
 * Tests for day bucketing, daily streaks and the get-stats report.
 */

import { describe, test, expect } from "vitest";
import type { HistoryEvent } from "@decouvertes/shared";
import {
  computePlayerStats,
  dayNumber,
  formatStatsReport,
  longestDailyStreak,
  toDayKey,
} from "../stats.js";
import { createMockEntry, createMockPlayer } from "../../__tests__/test-helpers.js";

function eventsAt(...timestamps: string[]): HistoryEvent[] {
  return timestamps.map((timestamp) => ({ card_id: "c1", timestamp, correct: true }));
}

describe("stats", () => {
  // ===========================================================================
  // Calendar Days
  // ===========================================================================

  describe("toDayKey", () => {
    test("formats the calendar day in the given zone", () => {
      const instant = new Date("2026-03-10T23:30:00.000Z");
      expect(toDayKey(instant, "UTC")).toBe("2026-03-10");
      expect(toDayKey(instant, "Asia/Tokyo")).toBe("2026-03-11");
      expect(toDayKey(instant, "America/New_York")).toBe("2026-03-10");
    });
  });

  describe("dayNumber", () => {
    test("counts days since the epoch", () => {
      expect(dayNumber("1970-01-01")).toBe(0);
      expect(dayNumber("1970-01-02")).toBe(1);
    });

    test("consecutive days differ by one across month and DST changes", () => {
      expect(dayNumber("2026-02-01") - dayNumber("2026-01-31")).toBe(1);
      expect(dayNumber("2026-03-09") - dayNumber("2026-03-08")).toBe(1);
    });

    test("throws on a malformed key", () => {
      expect(() => dayNumber("2026/01/01")).toThrow("Invalid day key: 2026/01/01");
    });
  });

  describe("longestDailyStreak", () => {
    test("finds the longest run of consecutive days", () => {
      expect(longestDailyStreak(["2026-01-01", "2026-01-02", "2026-01-03", "2026-01-06"])).toBe(3);
    });

    test("ignores duplicates and order", () => {
      expect(
        longestDailyStreak(["2026-01-06", "2026-01-02", "2026-01-02", "2026-01-01", "2026-01-07"])
      ).toBe(2);
    });

    test("a single day is a streak of one", () => {
      expect(longestDailyStreak(["2026-01-01", "2026-01-01"])).toBe(1);
    });

    test("no days is a streak of zero", () => {
      expect(longestDailyStreak([])).toBe(0);
    });
  });

  // ===========================================================================
  // Player Summary
  // ===========================================================================

  describe("computePlayerStats", () => {
    test("totals come from the per-card counters", () => {
      const player = createMockPlayer({
        cards: {
          c1: createMockEntry({ passed: 3, failed: 1 }),
          c2: createMockEntry({ passed: 0, failed: 2 }),
        },
      });

      const stats = computePlayerStats(player, new Date("2026-01-06T18:00:00.000Z"), "UTC");

      expect(stats).toEqual({
        playerId: "player-1",
        playerName: "Ada",
        totalAnswered: 6,
        correct: 3,
        incorrect: 3,
        activity: null,
      });
    });

    test("counts today's answers and the longest daily streak", () => {
      const player = createMockPlayer({
        history: eventsAt(
          "2026-01-01T10:00:00.000Z",
          "2026-01-02T09:00:00.000Z",
          "2026-01-03T12:00:00.000Z",
          "2026-01-06T08:00:00.000Z",
          "2026-01-06T09:00:00.000Z"
        ),
      });

      const stats = computePlayerStats(player, new Date("2026-01-06T18:00:00.000Z"), "UTC");

      expect(stats.activity).toEqual({ answeredToday: 2, longestDailyStreak: 3 });
    });

    test("buckets days in the configured time zone", () => {
      const player = createMockPlayer({ history: eventsAt("2026-01-06T23:30:00.000Z") });
      const now = new Date("2026-01-07T01:00:00.000Z");

      expect(computePlayerStats(player, now, "Asia/Tokyo").activity?.answeredToday).toBe(1);
      expect(computePlayerStats(player, now, "UTC").activity?.answeredToday).toBe(0);
    });
  });

  // ===========================================================================
  // Report
  // ===========================================================================

  describe("formatStatsReport", () => {
    test("reports activity when there is history", () => {
      const report = formatStatsReport({
        playerId: "player-1",
        playerName: "Ada",
        totalAnswered: 6,
        correct: 4,
        incorrect: 2,
        activity: { answeredToday: 2, longestDailyStreak: 3 },
      });

      expect(report).toBe(
        [
          "Stats for Player: Ada",
          "------------------------------",
          "Total Cards Answered: 6",
          "Correct Answers: 4",
          "Incorrect Answers: 2",
          "Cards Answered Today: 2",
          "Longest Daily Streak: 3 day(s)",
        ].join("\n")
      );
    });

    test("says so when there is no history", () => {
      const report = formatStatsReport({
        playerId: "player-1",
        playerName: "Ada",
        totalAnswered: 0,
        correct: 0,
        incorrect: 0,
        activity: null,
      });

      expect(report.split("\n")).toEqual([
        "Stats for Player: Ada",
        "------------------------------",
        "Total Cards Answered: 0",
        "Correct Answers: 0",
        "Incorrect Answers: 0",
        "No review history yet, so no time-based stats are available.",
      ]);
    });
  });
});
