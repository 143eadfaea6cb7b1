/**
 * Signed 32-bit rank arithmetic used to order a shuffled queue.
 */

export const RANK_MAX = 2147483647;
export const RANK_MIN = -2147483648;

const RANK_SPAN = 2 ** 32;

/**
 * Uniform random rank over the whole signed 32-bit range
 */
export function randomRank(): number {
  return Math.floor(Math.random() * RANK_SPAN) + RANK_MIN;
}

/**
 * Rank of the entry at `index` in an ordering of `size` entries, spread evenly
 * so that 0 < rank < RANK_MAX for every index.
 */
export function spreadRank(index: number, size: number): number {
  return Math.trunc((index / (size + 1) + 1 / (size + 1)) * RANK_MAX);
}

export function compareRanks(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
