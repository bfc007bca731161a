// ---------------------------------------------------------------------------
// Cancellation notifications
//
// Plain snapshots handed to a notifier after a sale is cancelled. They carry
// denormalized copies so a consumer never has to load the aggregate.
// ---------------------------------------------------------------------------

import type { BranchId, CustomerId, ProductId } from '../shared/types'
import type { Sale } from './sale'
import type { SaleId, SaleItemId, SaleItemSnapshot } from './sale-item'

export const DEFAULT_CANCELLATION_REASON = 'Sale cancelled'

export interface SaleCancelledEvent {
  readonly type: 'SaleCancelled'
  readonly saleId: SaleId
  readonly saleNumber: number
  readonly customerId: CustomerId
  readonly customerName: string
  readonly branchId: BranchId
  readonly branchName: string
  /** Sale total immediately before cancellation. */
  readonly totalAmount: number
  readonly cancelledAt: Date
  readonly cancellationReason: string
}

export interface SaleItemCancelledEvent {
  readonly type: 'SaleItemCancelled'
  readonly id: SaleItemId
  readonly saleId: SaleId
  readonly productId: ProductId
  readonly productName: string
  readonly quantity: number
  readonly unitPrice: number
  readonly cancellationReason: string
}

/**
 * Builds the sale-level notification. `totalBeforeCancel` is passed in
 * because a cancelled sale's own total is always 0.
 */
export function saleCancelledEvent(
  sale: Sale,
  totalBeforeCancel: number,
  cancellationReason = DEFAULT_CANCELLATION_REASON,
): SaleCancelledEvent {
  return {
    type: 'SaleCancelled',
    saleId: sale.id,
    saleNumber: sale.saleNumber,
    customerId: sale.customerId,
    customerName: sale.customerName,
    branchId: sale.branchId,
    branchName: sale.branchName,
    totalAmount: totalBeforeCancel,
    cancelledAt: sale.updatedAt ?? sale.createdAt,
    cancellationReason,
  }
}

export function saleItemCancelledEvent(
  saleId: SaleId,
  item: SaleItemSnapshot,
  cancellationReason = DEFAULT_CANCELLATION_REASON,
): SaleItemCancelledEvent {
  return {
    type: 'SaleItemCancelled',
    id: item.id,
    saleId,
    productId: item.productId,
    productName: item.productName,
    quantity: item.quantity,
    unitPrice: item.unitPrice,
    cancellationReason,
  }
}
