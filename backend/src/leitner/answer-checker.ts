/**
 * Answer Checker
 *
 * Judges a submitted answer against a card's solution and applies the
 * Leitner transition: a correct answer moves the card up one box (with no
 * ceiling, so a card can leave the review pool), a wrong answer sends it
 * back to box 1.
 */

import type { CheckResult, HistoryEvent, PlayerRecord, ProgressEntry } from "@decouvertes/shared";
import { createLogger } from "../logger.js";
import { INITIAL_BOX } from "./box-weights.js";
import { createProgressEntry, findProgressEntry } from "./progress-store.js";

const log = createLogger("answer-checker");

// =============================================================================
// Normalization
// =============================================================================

/**
 * Canonical form used for comparison: lowercase, no whitespace at all, and
 * no trailing semicolons.
 *
 * "FOO = [];" and "foo=[]" both become "foo=[]". Any other difference
 * (quotes, names, punctuation) still counts.
 */
export function normalizeAnswer(text: string): string {
  return text.toLowerCase().replace(/\s+/g, "").replace(/;+$/, "");
}

export function isCorrectAnswer(answer: string, solution: string): boolean {
  return normalizeAnswer(answer) === normalizeAnswer(solution);
}

// =============================================================================
// Box Transitions
// =============================================================================

/**
 * Apply one answer to an entry. Does not mutate the input.
 */
export function applyAnswer(entry: ProgressEntry, correct: boolean, now: Date): ProgressEntry {
  if (correct) {
    return {
      ...entry,
      box: entry.box + 1,
      streak: entry.streak + 1,
      passed: entry.passed + 1,
      last_reviewed: now.toISOString(),
    };
  }

  return {
    ...entry,
    box: INITIAL_BOX,
    streak: 0,
    failed: entry.failed + 1,
    last_reviewed: now.toISOString(),
  };
}

export interface RecordedAnswer {
  player: PlayerRecord;
  /** The card's entry after the answer */
  entry: ProgressEntry;
}

/**
 * Apply one answer to a player's record: the card's entry, the answer
 * counter and the history log. A card without an entry starts from box 1.
 * Does not mutate the input.
 */
export function recordAnswer(
  player: PlayerRecord,
  cardId: string,
  correct: boolean,
  now: Date
): RecordedAnswer {
  const current = findProgressEntry(player.cards, cardId) ?? createProgressEntry(now);
  const updated = applyAnswer(current, correct, now);
  const event: HistoryEvent = {
    card_id: cardId,
    timestamp: now.toISOString(),
    correct,
  };

  log.info(
    `Player ${player.id} answered ${cardId}: ${correct ? "correct" : "incorrect"} -> box ${updated.box}`
  );

  return {
    player: {
      ...player,
      total_answered: player.total_answered + 1,
      cards: { ...player.cards, [cardId]: updated },
      history: [...player.history, event],
    },
    entry: updated,
  };
}

/**
 * What check-answer reports. The solution is always included so the caller
 * can show it after a miss.
 */
export function toCheckResult(correct: boolean, entry: ProgressEntry, solution: string): CheckResult {
  return { correct, new_box: entry.box, solution };
}
