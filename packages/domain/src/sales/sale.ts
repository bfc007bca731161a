// ---------------------------------------------------------------------------
// Sale aggregate root
// ---------------------------------------------------------------------------

import { randomUUID } from 'crypto'
import type { BranchId, Clock, CustomerId } from '../shared/types'
import { sumMoney, systemClock, toBranchId, toCustomerId } from '../shared/types'
import { MAX_QUANTITY_PER_PRODUCT, SALE_MESSAGES } from './constraints'
import { ArgumentError, InvalidStateError } from './errors'
import { SaleItem, toSaleId, type SaleId, type SaleItemSnapshot } from './sale-item'
import { isSaleNumberInRange, randomSaleNumber, type SaleNumberGenerator } from './sale-number'

/** Lifecycle status of a Sale. CANCELLED is terminal. */
export type SaleStatus = 'CONFIRMED' | 'CANCELLED'

export const SALE_STATUSES: readonly SaleStatus[] = ['CONFIRMED', 'CANCELLED'] as const

/** Customer and branch references with their denormalized display names. */
export interface SaleParties {
  readonly customerId: string
  readonly customerName: string
  readonly branchId: string
  readonly branchName: string
}

export interface SaleOptions {
  readonly id?: string
  /** Defaults to the creation time. */
  readonly saleDate?: Date
  readonly createdAt?: Date
  readonly generateSaleNumber?: SaleNumberGenerator
  readonly now?: Clock
}

export interface SaleSnapshot {
  readonly id: SaleId
  readonly saleNumber: number
  readonly saleDate: Date
  readonly customerId: CustomerId
  readonly customerName: string
  readonly branchId: BranchId
  readonly branchName: string
  readonly totalAmount: number
  readonly status: SaleStatus
  readonly createdAt: Date
  readonly updatedAt: Date | null
  readonly items: readonly SaleItemSnapshot[]
}

/**
 * The Sale aggregate root.
 *
 * All item mutations go through the methods below; nothing outside the
 * aggregate touches an item's quantity.
 *
 * @invariant `totalAmount` equals the sum of item totals after every mutation.
 * @invariant No product ever exceeds MAX_QUANTITY_PER_PRODUCT units.
 * @invariant Once CANCELLED, the item collection is frozen.
 */
export class Sale {
  readonly id: SaleId
  readonly saleDate: Date
  readonly customerId: CustomerId
  readonly customerName: string
  readonly branchId: BranchId
  readonly branchName: string
  readonly createdAt: Date

  private _saleNumber: number
  private _totalAmount = 0
  private _status: SaleStatus = 'CONFIRMED'
  private _updatedAt: Date | null = null
  private _items: SaleItem[] = []
  private readonly now: Clock

  constructor(parties: SaleParties, options: SaleOptions = {}) {
    this.now = options.now ?? systemClock
    const createdAt = options.createdAt ?? this.now()
    this.id = toSaleId(options.id ?? randomUUID())
    this.customerId = toCustomerId(parties.customerId)
    this.customerName = parties.customerName
    this.branchId = toBranchId(parties.branchId)
    this.branchName = parties.branchName
    this.createdAt = createdAt
    this.saleDate = options.saleDate ?? createdAt
    this._saleNumber = (options.generateSaleNumber ?? randomSaleNumber)()
  }

  /** Rebuilds an aggregate from storage. Stored totals and timestamps are kept as-is. */
  static restore(snapshot: SaleSnapshot, now: Clock = systemClock): Sale {
    const sale = new Sale(snapshot, {
      id: snapshot.id,
      saleDate: snapshot.saleDate,
      createdAt: snapshot.createdAt,
      generateSaleNumber: () => snapshot.saleNumber,
      now,
    })
    sale._totalAmount = snapshot.totalAmount
    sale._status = snapshot.status
    sale._updatedAt = snapshot.updatedAt
    sale._items = snapshot.items.map((item) => SaleItem.restore(item))
    return sale
  }

  get saleNumber(): number {
    return this._saleNumber
  }

  get totalAmount(): number {
    return this._totalAmount
  }

  get status(): SaleStatus {
    return this._status
  }

  get updatedAt(): Date | null {
    return this._updatedAt
  }

  /** Frozen copies of the lines; changes go through the Sale's own methods. */
  get items(): readonly SaleItemSnapshot[] {
    return this._items.map((i) => Object.freeze(i.toSnapshot()))
  }

  get isCancelled(): boolean {
    return this._status === 'CANCELLED'
  }

  findItem(productId: string): SaleItemSnapshot | undefined {
    const line = this.lineFor(productId)
    return line ? Object.freeze(line.toSnapshot()) : undefined
  }

  /**
   * Replaces the sale number, e.g. after storage rejected a duplicate.
   *
   * @throws {ArgumentError} if the number is outside the sale-number range.
   */
  assignSaleNumber(saleNumber: number): void {
    if (!isSaleNumberInRange(saleNumber)) throw new ArgumentError(SALE_MESSAGES.saleNumberOutOfRange)
    this._saleNumber = saleNumber
  }

  /**
   * Adds a line, merging into the existing line for the same product. The
   * aggregate keeps its own copy; `item` itself is never attached.
   *
   * @throws {InvalidStateError} if the sale is cancelled or the merged quantity exceeds the cap.
   */
  addItem(item: SaleItem): void {
    if (this.isCancelled) throw new InvalidStateError(SALE_MESSAGES.addToCancelledSale)

    const existing = this.lineFor(item.productId)
    const mergedQuantity = (existing?.quantity ?? 0) + item.quantity
    if (mergedQuantity > MAX_QUANTITY_PER_PRODUCT) {
      throw new InvalidStateError(SALE_MESSAGES.quantityCap)
    }

    if (existing) {
      existing.updateQuantity(mergedQuantity)
    } else {
      const line = SaleItem.restore(item.toSnapshot())
      line.attachTo(this.id)
      this._items.push(line)
    }

    this.touch()
  }

  /**
   * Removes the line for `productId`. Unknown products are ignored.
   *
   * @throws {InvalidStateError} if the sale is cancelled.
   */
  removeItem(productId: string): void {
    if (this.isCancelled) throw new InvalidStateError(SALE_MESSAGES.removeFromCancelledSale)

    const index = this._items.findIndex((i) => i.productId === productId)
    if (index === -1) return

    this._items.splice(index, 1)
    this.touch()
  }

  /**
   * Sets the quantity of the line for `productId`. A quantity of 0 removes the
   * line; unknown products are ignored.
   *
   * @throws {InvalidStateError} if the sale is cancelled or `quantity` exceeds the cap.
   */
  updateItemQuantity(productId: string, quantity: number): void {
    if (this.isCancelled) throw new InvalidStateError(SALE_MESSAGES.updateCancelledSaleItems)
    if (quantity > MAX_QUANTITY_PER_PRODUCT) throw new InvalidStateError(SALE_MESSAGES.quantityCap)

    if (quantity === 0) {
      this.removeItem(productId)
      return
    }

    const item = this.lineFor(productId)
    if (!item) return

    item.updateQuantity(quantity)
    this.touch()
  }

  /** Cancels the sale and every item. Calling it again yields the same state. */
  cancel(): void {
    this._status = 'CANCELLED'
    this._updatedAt = this.now()
    for (const item of this._items) {
      item.cancel()
    }
    this.recalculateTotal()
  }

  toSnapshot(): SaleSnapshot {
    return {
      id: this.id,
      saleNumber: this._saleNumber,
      saleDate: this.saleDate,
      customerId: this.customerId,
      customerName: this.customerName,
      branchId: this.branchId,
      branchName: this.branchName,
      totalAmount: this._totalAmount,
      status: this._status,
      createdAt: this.createdAt,
      updatedAt: this._updatedAt,
      items: this._items.map((i) => i.toSnapshot()),
    }
  }

  private lineFor(productId: string): SaleItem | undefined {
    return this._items.find((i) => i.productId === productId)
  }

  private touch(): void {
    this.recalculateTotal()
    this._updatedAt = this.now()
  }

  private recalculateTotal(): void {
    this._totalAmount = sumMoney(this._items.map((i) => i.totalAmount))
  }
}
