// ---------------------------------------------------------------------------
// Sale number generation
//
// Sale numbers are human-facing 10-digit integers. Uniqueness is enforced by
// storage (unique index); the generators below only decide how numbers are
// drawn.
// ---------------------------------------------------------------------------

import { SALE_MESSAGES, SALE_NUMBER_MAX, SALE_NUMBER_MIN } from './constraints'
import { ArgumentError } from './errors'

export type SaleNumberGenerator = () => number

/** Draws a random integer in [SALE_NUMBER_MIN, SALE_NUMBER_MAX]. */
export const randomSaleNumber: SaleNumberGenerator = () =>
  Math.floor(Math.random() * (SALE_NUMBER_MAX - SALE_NUMBER_MIN + 1)) + SALE_NUMBER_MIN

export function isSaleNumberInRange(value: number): boolean {
  return Number.isInteger(value) && value >= SALE_NUMBER_MIN && value <= SALE_NUMBER_MAX
}

/**
 * Returns a generator that yields `start`, `start + 1`, … and throws once
 * the range is exhausted. Collisions within one generator are impossible.
 */
export function createSequentialSaleNumberGenerator(start = SALE_NUMBER_MIN): SaleNumberGenerator {
  if (!isSaleNumberInRange(start)) throw new ArgumentError(SALE_MESSAGES.saleNumberOutOfRange)
  let next = start
  return () => {
    if (next > SALE_NUMBER_MAX) throw new ArgumentError(SALE_MESSAGES.saleNumberOutOfRange)
    const value = next
    next += 1
    return value
  }
}
