/**
 * RankModel - rank to fungible amount conversion
 *
 * Each rank step doubles the amount, except the maximal rank, which is
 * defined to be worth the whole supply ceiling rather than the next doubling.
 */

import { MAX_RANK, MAX_SUPPLY, MIN_RANK, RANK_DIVISOR, UNIT } from './constants.js'
import type { Rank } from './types.js'

/**
 * Check if a value is a rank the registry may report.
 */
export function isValidRank(rank: number): boolean {
  return Number.isInteger(rank) && rank >= MIN_RANK && rank <= MAX_RANK
}

/**
 * Fungible amount an item of the given rank converts to.
 *
 * @throws RangeError for ranks outside 0..MAX_RANK
 */
export function amountForRank(rank: Rank): bigint {
  if (!isValidRank(rank)) {
    throw new RangeError(`Rank must be an integer in [${MIN_RANK}, ${MAX_RANK}], got ${rank}`)
  }
  if (rank === MAX_RANK) {
    return MAX_SUPPLY
  }
  return ((1n << BigInt(rank)) * UNIT) / RANK_DIVISOR
}

/**
 * The amount for every rank, lowest first.
 */
export function conversionTable(): Array<{ rank: Rank, amount: bigint }> {
  const table: Array<{ rank: Rank, amount: bigint }> = []
  for (let rank = MIN_RANK; rank <= MAX_RANK; rank++) {
    table.push({ rank, amount: amountForRank(rank) })
  }
  return table
}
