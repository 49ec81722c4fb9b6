/**
 * Player Statistics
 *
 * Summaries for get-stats. Answer totals come from the per-card counters so
 * they stay right even without history; everything time-based comes from
 * the history log, bucketed into calendar days in a fixed time zone.
 */

import type { PlayerRecord } from "@decouvertes/shared";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const DAY_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

// =============================================================================
// Types
// =============================================================================

export interface DailyActivity {
  answeredToday: number;
  longestDailyStreak: number;
}

export interface PlayerStats {
  playerId: string;
  playerName: string;
  totalAnswered: number;
  correct: number;
  incorrect: number;
  /** null when the player has no history yet */
  activity: DailyActivity | null;
}

// =============================================================================
// Calendar Days
// =============================================================================

/**
 * Calendar day of an instant in a time zone, as YYYY-MM-DD.
 */
export function toDayKey(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((candidate) => candidate.type === type)?.value ?? "";
  return `${part("year")}-${part("month")}-${part("day")}`;
}

/**
 * Days since the epoch for a YYYY-MM-DD key, so that consecutive calendar
 * days always differ by exactly one whatever the DST shifts in between.
 */
export function dayNumber(dayKey: string): number {
  const match = DAY_KEY_PATTERN.exec(dayKey);
  if (!match) {
    throw new Error(`Invalid day key: ${dayKey}`);
  }
  const [, year, month, day] = match;
  return Date.UTC(Number(year), Number(month) - 1, Number(day)) / MS_PER_DAY;
}

/**
 * Longest run of consecutive calendar days. Input may be unsorted and
 * contain duplicates; an empty input has no streak.
 */
export function longestDailyStreak(dayKeys: readonly string[]): number {
  const days = [...new Set(dayKeys.map(dayNumber))].sort((a, b) => a - b);
  if (days.length === 0) {
    return 0;
  }

  let longest = 1;
  let current = 1;
  for (let i = 1; i < days.length; i++) {
    current = days[i] - days[i - 1] === 1 ? current + 1 : 1;
    longest = Math.max(longest, current);
  }
  return longest;
}

// =============================================================================
// Player Summary
// =============================================================================

export function computePlayerStats(player: PlayerRecord, now: Date, timeZone: string): PlayerStats {
  let correct = 0;
  let incorrect = 0;
  for (const entry of Object.values(player.cards)) {
    correct += entry.passed;
    incorrect += entry.failed;
  }

  const stats: PlayerStats = {
    playerId: player.id,
    playerName: player.name,
    totalAnswered: correct + incorrect,
    correct,
    incorrect,
    activity: null,
  };

  if (player.history.length === 0) {
    return stats;
  }

  const today = toDayKey(now, timeZone);
  const dayKeys = player.history.map((event) => toDayKey(new Date(event.timestamp), timeZone));

  return {
    ...stats,
    activity: {
      // Day keys are zero-padded, so string order is date order
      answeredToday: dayKeys.filter((day) => day >= today).length,
      longestDailyStreak: longestDailyStreak(dayKeys),
    },
  };
}

/**
 * The get-stats report. The editor plugin scrapes these labels, so they
 * must not change.
 */
export function formatStatsReport(stats: PlayerStats): string {
  const lines = [
    `Stats for Player: ${stats.playerName}`,
    "------------------------------",
    `Total Cards Answered: ${stats.totalAnswered}`,
    `Correct Answers: ${stats.correct}`,
    `Incorrect Answers: ${stats.incorrect}`,
  ];

  if (stats.activity === null) {
    lines.push("No review history yet, so no time-based stats are available.");
  } else {
    lines.push(`Cards Answered Today: ${stats.activity.answeredToday}`);
    lines.push(`Longest Daily Streak: ${stats.activity.longestDailyStreak} day(s)`);
  }

  return lines.join("\n");
}
