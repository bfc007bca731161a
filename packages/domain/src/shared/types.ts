// ---------------------------------------------------------------------------
// Shared primitives used across the sales context.
// Nothing in this file may import from a sibling module.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Branding utility
// ---------------------------------------------------------------------------

/** Nominal / branded type: prevents accidental substitution of e.g. SaleId for ProductId. */
export type Brand<T, B extends string> = T & { readonly __brand: B }

// ---------------------------------------------------------------------------
// Cross-cutting ID types
// ---------------------------------------------------------------------------

/** Identifies a customer held by an external system. */
export type CustomerId = Brand<string, 'CustomerId'>

/** Identifies a branch (point of sale) held by an external system. */
export type BranchId = Brand<string, 'BranchId'>

/** Identifies a catalogue product held by an external system. */
export type ProductId = Brand<string, 'ProductId'>

export const toCustomerId = (raw: string): CustomerId => raw as CustomerId
export const toBranchId = (raw: string): BranchId => raw as BranchId
export const toProductId = (raw: string): ProductId => raw as ProductId

/** The all-zero UUID. Treated as "no id" wherever an id is required. */
export const NIL_UUID = '00000000-0000-0000-0000-000000000000'

// ---------------------------------------------------------------------------
// Money arithmetic
// ---------------------------------------------------------------------------

const MONEY_SCALE = 100

/**
 * Rounds a monetary amount to 2 decimal places, half away from zero.
 *
 * Prices and totals are stored as DECIMAL(18,2); rounding after each step
 * keeps binary floating-point noise (e.g. 79.92000000000002) out of totals.
 */
export function roundMoney(value: number): number {
  const sign = value < 0 ? -1 : 1
  return (sign * Math.round((Math.abs(value) + Number.EPSILON) * MONEY_SCALE)) / MONEY_SCALE
}

/** Sums monetary amounts, rounding the result. */
export function sumMoney(values: readonly number[]): number {
  return roundMoney(values.reduce((sum, v) => sum + v, 0))
}

// ---------------------------------------------------------------------------
// Clock
// ---------------------------------------------------------------------------

/** Source of the current time. Injected so timestamps are deterministic in tests. */
export type Clock = () => Date

export const systemClock: Clock = () => new Date()
