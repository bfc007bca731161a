import { describe, it, expect } from 'vitest'
import {
  toCustomerId,
  toBranchId,
  toProductId,
  toSaleId,
  toSaleItemId,
  roundMoney,
  sumMoney,
  discountPercentageFor,
  isDiscountPercentage,
  DISCOUNT_TIERS,
  SALE_STATUSES,
  SALE_MESSAGES,
  saleNotFoundMessage,
  randomSaleNumber,
  isSaleNumberInRange,
  createSequentialSaleNumberGenerator,
  ArgumentError,
} from './index'

// ---------------------------------------------------------------------------
// Branded ID helpers
// ---------------------------------------------------------------------------
describe('branded id factories', () => {
  it('wraps strings without changing them', () => {
    expect(toCustomerId('c-1')).toBe('c-1')
    expect(toBranchId('b-1')).toBe('b-1')
    expect(toProductId('p-1')).toBe('p-1')
    expect(toSaleId('s-1')).toBe('s-1')
    expect(toSaleItemId('i-1')).toBe('i-1')
  })
})

// ---------------------------------------------------------------------------
// Money
// ---------------------------------------------------------------------------
describe('roundMoney', () => {
  it('rounds to cents', () => {
    expect(roundMoney(79.92000000000002)).toBe(79.92)
    expect(roundMoney(6.741)).toBe(6.74)
  })

  it('rounds halves away from zero', () => {
    expect(roundMoney(1.005)).toBe(1.01)
    expect(roundMoney(-1.005)).toBe(-1.01)
  })
})

describe('sumMoney', () => {
  it('sums and rounds', () => {
    expect(sumMoney([0.1, 0.2])).toBe(0.3)
    expect(sumMoney([])).toBe(0)
  })
})

// ---------------------------------------------------------------------------
// Discount tiers
// ---------------------------------------------------------------------------
describe('discountPercentageFor', () => {
  it('follows the tier table for every allowed quantity', () => {
    for (let q = 0; q <= 20; q++) {
      const expected = q >= 10 ? 20 : q >= 4 ? 10 : 0
      expect(discountPercentageFor(q)).toBe(expected)
    }
  })

  it('refuses quantities above the per-product cap', () => {
    expect(() => discountPercentageFor(21)).toThrow(ArgumentError)
  })

  it('lists tiers from the highest threshold down', () => {
    expect(DISCOUNT_TIERS.map((t) => t.from)).toEqual([10, 4])
  })
})

describe('isDiscountPercentage', () => {
  it('accepts only the three tier values', () => {
    expect([0, 10, 20].every(isDiscountPercentage)).toBe(true)
    expect(isDiscountPercentage(15)).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// Statuses & messages
// ---------------------------------------------------------------------------
describe('SALE_STATUSES', () => {
  it('contains CONFIRMED and CANCELLED', () => {
    expect(SALE_STATUSES).toEqual(['CONFIRMED', 'CANCELLED'])
  })
})

describe('messages', () => {
  it('spell the per-product cap with its limit', () => {
    expect(SALE_MESSAGES.quantityCap).toBe('You cannot add more than 20 of the same item to a sale')
  })

  it('include the id in not-found messages', () => {
    expect(saleNotFoundMessage('abc')).toBe('Sale with ID abc not found')
  })
})

// ---------------------------------------------------------------------------
// Sale numbers
// ---------------------------------------------------------------------------
describe('randomSaleNumber', () => {
  it('always stays inside the 10-digit range', () => {
    for (let i = 0; i < 200; i++) {
      expect(isSaleNumberInRange(randomSaleNumber())).toBe(true)
    }
  })
})

describe('createSequentialSaleNumberGenerator', () => {
  it('counts up from the start value', () => {
    const next = createSequentialSaleNumberGenerator(2_000_000_000)
    expect([next(), next(), next()]).toEqual([2_000_000_000, 2_000_000_001, 2_000_000_002])
  })

  it('throws once the range is exhausted', () => {
    const next = createSequentialSaleNumberGenerator(9_999_999_999)
    expect(next()).toBe(9_999_999_999)
    expect(() => next()).toThrow(ArgumentError)
  })

  it('rejects a start outside the range', () => {
    expect(() => createSequentialSaleNumberGenerator(42)).toThrow(ArgumentError)
  })
})
