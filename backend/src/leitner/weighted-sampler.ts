/**
 * Weighted Sampler
 *
 * Discrete weighted sampling over integer weights. The draw is a uniform
 * integer in [0, total); the winner is the first option whose cumulative
 * weight exceeds it, found by binary search. A draw equal to a boundary
 * belongs to the option after it, and zero-weight options are never chosen.
 */

/** Source of uniform floats in [0, 1), Math.random by default */
export type RandomSource = () => number;

export interface WeightedOption<T> {
  value: T;
  weight: number;
}

/**
 * Running totals of the weights. Negative weights count as zero.
 */
export function cumulativeWeights(weights: readonly number[]): number[] {
  const totals: number[] = [];
  let running = 0;
  for (const weight of weights) {
    running += Math.max(0, weight);
    totals.push(running);
  }
  return totals;
}

/**
 * Index of the first cumulative total strictly greater than the draw.
 * Returns -1 when the draw is outside [0, total).
 */
export function findWeightedIndex(cumulative: readonly number[], draw: number): number {
  const total = cumulative.length > 0 ? cumulative[cumulative.length - 1] : 0;
  if (draw < 0 || draw >= total) {
    return -1;
  }

  let low = 0;
  let high = cumulative.length - 1;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (cumulative[mid] > draw) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }
  return low;
}

/**
 * Uniform integer in [0, bound).
 */
export function randomInt(bound: number, random: RandomSource = Math.random): number {
  return Math.floor(random() * bound);
}

/**
 * Pick one option with probability weight / total.
 * Returns undefined when every weight is zero (or there are no options).
 */
export function sampleWeighted<T>(
  options: readonly WeightedOption<T>[],
  random: RandomSource = Math.random
): T | undefined {
  const cumulative = cumulativeWeights(options.map((option) => option.weight));
  const total = cumulative.length > 0 ? cumulative[cumulative.length - 1] : 0;
  if (total <= 0) {
    return undefined;
  }

  const index = findWeightedIndex(cumulative, randomInt(total, random));
  return index >= 0 ? options[index].value : undefined;
}

/**
 * Pick one element uniformly. Returns undefined for an empty list.
 */
export function sampleUniform<T>(
  items: readonly T[],
  random: RandomSource = Math.random
): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[randomInt(items.length, random)];
}
