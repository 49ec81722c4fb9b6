/**
 * Box Schedule
 *
 * How often each Leitner box is reviewed. Box 1 holds new and failed cards
 * and is drawn most often; every correct answer moves a card up one box,
 * and a card past the last box is mastered and never drawn again.
 */

// =============================================================================
// Constants
// =============================================================================

/** Box every new or failed card starts in */
export const INITIAL_BOX = 1;

export const DEFAULT_BOX_COUNT = 5;

// =============================================================================
// Types
// =============================================================================

/** Relative sampling weight of a box */
export type BoxWeightFn = (box: number) => number;

export interface BoxSchedule {
  /** Boxes 1..boxCount are in the review pool */
  boxCount: number;
  weightOf: BoxWeightFn;
}

// =============================================================================
// Schedules
// =============================================================================

/**
 * Weights that halve at each box: [16, 8, 4, 2, 1] for five boxes.
 */
export function geometricBoxWeights(boxCount: number): number[] {
  return Array.from({ length: boxCount }, (_, index) => 2 ** (boxCount - 1 - index));
}

/**
 * Build a schedule from one weight per box, box 1 first.
 */
export function createBoxSchedule(weights: readonly number[]): BoxSchedule {
  const table = [...weights];
  return {
    boxCount: table.length,
    weightOf: (box) => (isReviewBox(table.length, box) ? table[box - 1] : 0),
  };
}

export const DEFAULT_BOX_SCHEDULE = createBoxSchedule(geometricBoxWeights(DEFAULT_BOX_COUNT));

function isReviewBox(boxCount: number, box: number): boolean {
  return Number.isInteger(box) && box >= INITIAL_BOX && box <= boxCount;
}

/**
 * Whether a card in this box can be drawn.
 */
export function isInReviewPool(schedule: BoxSchedule, box: number): boolean {
  return isReviewBox(schedule.boxCount, box);
}

/**
 * Whether a card in this box has left the pool for good.
 */
export function isMastered(schedule: BoxSchedule, box: number): boolean {
  return box > schedule.boxCount;
}
