// ---------------------------------------------------------------------------
// Sale constraints
//
// The single source of the range limits and literal messages used by the
// HTTP schemas, the command schemas, the aggregate and the storage columns.
// ---------------------------------------------------------------------------

import { ArgumentError } from './errors'

export const NAME_MIN_LENGTH = 1
export const NAME_MAX_LENGTH = 100

/** Upper bound for a single line and for one product across merged lines. */
export const MAX_QUANTITY_PER_PRODUCT = 20

export const MIN_LINE_QUANTITY = 1

export const CANCELLATION_REASON_MAX_LENGTH = 500

/** Largest accepted unit price; 20 units of it still fit a DECIMAL(18,2) column. */
export const MAX_UNIT_PRICE = 1_000_000_000

/** Prices are whole cents. */
export const PRICE_STEP = 0.01

export const SALE_NUMBER_MIN = 1_000_000_000
export const SALE_NUMBER_MAX = 9_999_999_999

// ---------------------------------------------------------------------------
// Discount tiers
// ---------------------------------------------------------------------------

export type DiscountPercentage = 0 | 10 | 20

export interface DiscountTier {
  /** Smallest quantity the tier applies to (inclusive). */
  readonly from: number
  readonly percentage: DiscountPercentage
}

/** Ordered from the highest threshold down; the first match wins. */
export const DISCOUNT_TIERS: readonly DiscountTier[] = [
  { from: 10, percentage: 20 },
  { from: 4, percentage: 10 },
] as const

/**
 * Returns the discount percentage for a line quantity.
 *
 * @rule 1–3 units: no discount. 4–9 units: 10 %. 10–20 units: 20 %.
 * @throws {ArgumentError} above the per-product cap.
 */
export function discountPercentageFor(quantity: number): DiscountPercentage {
  if (quantity > MAX_QUANTITY_PER_PRODUCT) throw new ArgumentError(SALE_MESSAGES.quantityCap)
  const tier = DISCOUNT_TIERS.find((t) => quantity >= t.from)
  return tier?.percentage ?? 0
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export const SALE_MESSAGES = {
  quantityCap: `You cannot add more than ${MAX_QUANTITY_PER_PRODUCT} of the same item to a sale`,
  addToCancelledSale: 'Cannot add items to a cancelled sale',
  removeFromCancelledSale: 'Cannot remove items from a cancelled sale',
  updateCancelledSaleItems: 'Cannot update items in a cancelled sale',
  updateCancelledItemQuantity: 'Cannot update quantity of a cancelled item',
  updateCancelledItemPrice: 'Cannot update price of a cancelled item',
  negativeQuantity: 'Quantity cannot be negative',
  fractionalQuantity: 'Quantity must be a whole number',
  negativeUnitPrice: 'Unit price cannot be negative',
  nonFiniteUnitPrice: 'Unit price must be a finite number',
  unitPriceTooLarge: `Unit price cannot exceed ${MAX_UNIT_PRICE}`,
  alreadyCancelled: 'Sale has already been cancelled',
  cancelledSaleNotUpdatable: 'Canceled sales cannot be updated',
  cancelled: 'Sale has been cancelled successfully',
  saleNumberOutOfRange: `Sale number must be between ${SALE_NUMBER_MIN} and ${SALE_NUMBER_MAX}`,
} as const

export const saleNotFoundMessage = (id: string): string => `Sale with ID ${id} not found`

export function isDiscountPercentage(value: number): value is DiscountPercentage {
  return value === 0 || value === 10 || value === 20
}
