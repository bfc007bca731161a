// ---------------------------------------------------------------------------
// SaleItem — one product line inside a Sale
// ---------------------------------------------------------------------------

import { randomUUID } from 'crypto'
import type { Brand, ProductId } from '../shared/types'
import { roundMoney, toProductId } from '../shared/types'
import {
  MAX_QUANTITY_PER_PRODUCT,
  MAX_UNIT_PRICE,
  SALE_MESSAGES,
  discountPercentageFor,
  type DiscountPercentage,
} from './constraints'
import { ArgumentError, InvalidStateError } from './errors'

/** Uniquely identifies a SaleItem. */
export type SaleItemId = Brand<string, 'SaleItemId'>

/** Uniquely identifies a Sale aggregate. */
export type SaleId = Brand<string, 'SaleId'>

export const toSaleItemId = (raw: string): SaleItemId => raw as SaleItemId
export const toSaleId = (raw: string): SaleId => raw as SaleId

/** Persisted shape of a SaleItem. Amounts are already rounded. */
export interface SaleItemSnapshot {
  readonly id: SaleItemId
  readonly saleId: SaleId | null
  readonly productId: ProductId
  readonly productName: string
  readonly unitPrice: number
  readonly quantity: number
  readonly discountPercentage: DiscountPercentage
  readonly discountAmount: number
  readonly totalAmount: number
  readonly isCancelled: boolean
}

function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity)) throw new ArgumentError(SALE_MESSAGES.fractionalQuantity)
  if (quantity < 0) throw new ArgumentError(SALE_MESSAGES.negativeQuantity)
  if (quantity > MAX_QUANTITY_PER_PRODUCT) throw new ArgumentError(SALE_MESSAGES.quantityCap)
}

function assertUnitPrice(unitPrice: number): void {
  if (!Number.isFinite(unitPrice)) throw new ArgumentError(SALE_MESSAGES.nonFiniteUnitPrice)
  if (unitPrice < 0) throw new ArgumentError(SALE_MESSAGES.negativeUnitPrice)
  if (unitPrice > MAX_UNIT_PRICE) throw new ArgumentError(SALE_MESSAGES.unitPriceTooLarge)
}

/**
 * A single product line.
 *
 * @invariant `discountPercentage` is a function of `quantity` (see DISCOUNT_TIERS).
 * @invariant `totalAmount = unitPrice * quantity - discountAmount`.
 * @invariant Once cancelled, discount and totals are 0 and quantity/price are frozen.
 */
export class SaleItem {
  readonly id: SaleItemId
  readonly productId: ProductId
  readonly productName: string

  private _saleId: SaleId | null = null
  private _unitPrice: number
  private _quantity: number
  private _discountPercentage: DiscountPercentage = 0
  private _discountAmount = 0
  private _totalAmount = 0
  private _isCancelled = false

  constructor(productId: string, productName: string, unitPrice: number, quantity: number, id?: string) {
    assertQuantity(quantity)
    assertUnitPrice(unitPrice)
    this.id = toSaleItemId(id ?? randomUUID())
    this.productId = toProductId(productId)
    this.productName = productName
    this._unitPrice = roundMoney(unitPrice)
    this._quantity = quantity
    this.applyDiscount()
    this.calculateTotal()
  }

  /** Rebuilds an item from storage, keeping the stored amounts and cancelled flag. */
  static restore(snapshot: SaleItemSnapshot): SaleItem {
    const item = new SaleItem(
      snapshot.productId,
      snapshot.productName,
      snapshot.unitPrice,
      snapshot.quantity,
      snapshot.id,
    )
    item._saleId = snapshot.saleId
    item._discountPercentage = snapshot.discountPercentage
    item._discountAmount = snapshot.discountAmount
    item._totalAmount = snapshot.totalAmount
    item._isCancelled = snapshot.isCancelled
    return item
  }

  get saleId(): SaleId | null {
    return this._saleId
  }

  get unitPrice(): number {
    return this._unitPrice
  }

  get quantity(): number {
    return this._quantity
  }

  get discountPercentage(): DiscountPercentage {
    return this._discountPercentage
  }

  get discountAmount(): number {
    return this._discountAmount
  }

  get totalAmount(): number {
    return this._totalAmount
  }

  get isCancelled(): boolean {
    return this._isCancelled
  }

  /** Called by the owning Sale when the item joins its collection. */
  attachTo(saleId: SaleId): void {
    this._saleId = saleId
  }

  /**
   * @throws {ArgumentError} if `newQuantity` is negative, fractional or above the cap.
   * @throws {InvalidStateError} if the item is cancelled.
   */
  updateQuantity(newQuantity: number): void {
    assertQuantity(newQuantity)
    if (this._isCancelled) throw new InvalidStateError(SALE_MESSAGES.updateCancelledItemQuantity)

    this._quantity = newQuantity
    this.applyDiscount()
    this.calculateTotal()
  }

  /**
   * @throws {ArgumentError} if `newUnitPrice` is negative, not finite or above MAX_UNIT_PRICE.
   * @throws {InvalidStateError} if the item is cancelled.
   */
  updateUnitPrice(newUnitPrice: number): void {
    assertUnitPrice(newUnitPrice)
    if (this._isCancelled) throw new InvalidStateError(SALE_MESSAGES.updateCancelledItemPrice)

    this._unitPrice = roundMoney(newUnitPrice)
    this.calculateTotal()
  }

  cancel(): void {
    this._isCancelled = true
    this._discountPercentage = 0
    this._discountAmount = 0
    this._totalAmount = 0
  }

  toSnapshot(): SaleItemSnapshot {
    return {
      id: this.id,
      saleId: this._saleId,
      productId: this.productId,
      productName: this.productName,
      unitPrice: this._unitPrice,
      quantity: this._quantity,
      discountPercentage: this._discountPercentage,
      discountAmount: this._discountAmount,
      totalAmount: this._totalAmount,
      isCancelled: this._isCancelled,
    }
  }

  private applyDiscount(): void {
    this._discountPercentage = discountPercentageFor(this._quantity)
  }

  private calculateTotal(): void {
    const subtotal = roundMoney(this._unitPrice * this._quantity)
    this._discountAmount = roundMoney((subtotal * this._discountPercentage) / 100)
    this._totalAmount = roundMoney(subtotal - this._discountAmount)
  }
}
