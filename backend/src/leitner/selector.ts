/**
 * Card Selector
 *
 * Picks the next card to review. Cards are grouped by Leitner box, a box is
 * drawn in proportion to its weight (only non-empty boxes take part), then a
 * card is drawn uniformly from that box. Mastered cards are never drawn.
 */

import type { Card, ProgressEntry } from "@decouvertes/shared";
import { createLogger } from "../logger.js";
import { type BoxSchedule, INITIAL_BOX, isInReviewPool, isMastered } from "./box-weights.js";
import { createProgressEntry, findProgressEntry } from "./progress-store.js";
import { type RandomSource, sampleUniform, sampleWeighted } from "./weighted-sampler.js";

const log = createLogger("selector");

// =============================================================================
// Types
// =============================================================================

/** A player's entries keyed by card id */
export type CardProgress = Record<string, ProgressEntry>;

/**
 * Outcome of a selection: a card with its box, or nothing left to review.
 */
export type Selection = { kind: "card"; card: Card; box: number } | { kind: "done" };

export interface EnsureEntriesResult {
  cards: CardProgress;
  /** Ids of the entries created by this call, in catalog order */
  created: string[];
}

// =============================================================================
// Lazy Entry Creation
// =============================================================================

/**
 * Give every catalog card an entry, creating missing ones at box 1.
 *
 * Returns a new map when something was created and the input map otherwise.
 * Does not mutate the input. Entries for cards that left the catalog are kept.
 */
export function ensureProgressEntries(
  catalog: readonly Card[],
  cards: CardProgress,
  now: Date
): EnsureEntriesResult {
  const additions: [string, ProgressEntry][] = [];
  for (const card of catalog) {
    if (findProgressEntry(cards, card.id) === undefined) {
      additions.push([card.id, createProgressEntry(now)]);
    }
  }

  if (additions.length === 0) {
    return { cards, created: [] };
  }

  log.debug(`Created progress entries for ${additions.length} new cards`);
  return {
    cards: { ...cards, ...Object.fromEntries(additions) },
    created: additions.map(([id]) => id),
  };
}

// =============================================================================
// Selection
// =============================================================================

function boxOf(cards: CardProgress, cardId: string): number {
  return findProgressEntry(cards, cardId)?.box ?? INITIAL_BOX;
}

/**
 * Group catalog cards by box. Only boxes in the review pool appear, in
 * ascending order; cards in any other box are left out.
 */
export function groupByBox(
  catalog: readonly Card[],
  cards: CardProgress,
  schedule: BoxSchedule
): Map<number, Card[]> {
  const boxes = new Map<number, Card[]>();
  for (let box = INITIAL_BOX; box <= schedule.boxCount; box++) {
    boxes.set(box, []);
  }

  for (const card of catalog) {
    const box = boxOf(cards, card.id);
    if (!isInReviewPool(schedule, box)) {
      continue;
    }
    boxes.get(box)?.push(card);
  }

  return boxes;
}

/**
 * Choose the next card for review.
 *
 * Returns `{ kind: "done" }` when no box in the pool has any card, which
 * happens for an empty catalog or once every card is mastered.
 */
export function selectNextCard(
  catalog: readonly Card[],
  cards: CardProgress,
  schedule: BoxSchedule,
  random: RandomSource = Math.random
): Selection {
  const boxes = groupByBox(catalog, cards, schedule);

  const options = [...boxes.entries()]
    .filter(([, members]) => members.length > 0)
    .map(([box, members]) => ({ value: { box, members }, weight: schedule.weightOf(box) }));

  const chosen = sampleWeighted(options, random);
  if (!chosen) {
    const mastered = catalog.filter((card) => isMastered(schedule, boxOf(cards, card.id))).length;
    log.debug(`Nothing to review: ${mastered} of ${catalog.length} cards mastered`);
    return { kind: "done" };
  }

  const card = sampleUniform(chosen.members, random);
  if (!card) {
    return { kind: "done" };
  }

  log.debug(`Selected card ${card.id} from box ${chosen.box}`);
  return { kind: "card", card, box: chosen.box };
}
