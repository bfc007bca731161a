import { Op, UniqueConstraintError, type Order, type Sequelize } from 'sequelize'
import type { SaleItemSnapshot, SaleSnapshot } from '@sale-records/domain'
import {
  Sale,
  isDiscountPercentage,
  toBranchId,
  toCustomerId,
  toProductId,
  toSaleId,
  toSaleItemId,
  type Clock,
} from '@sale-records/domain'
import { NotFoundError, SaleNumberConflictError } from '../errors'
import { defineSaleModels, type SaleItemRow, type SaleModels, type SaleRow } from '../lib/sale-models'

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

/**
 * Persistence boundary for the Sale aggregate. Every method reads or writes
 * the whole aggregate (sale row plus all item rows) atomically.
 */
export interface SaleRepository {
  /** Returns the sale with its items, or null when it does not exist. */
  getById(id: string): Promise<Sale | null>
  /** @throws {SaleNumberConflictError} when the sale number is already stored. */
  create(sale: Sale): Promise<Sale>
  /** Replaces the stored sale and its item set with the aggregate's state. */
  update(sale: Sale): Promise<Sale>
  /** Returns false when no sale with `id` existed. Items are removed by cascade. */
  delete(id: string): Promise<boolean>
}

// ---------------------------------------------------------------------------
// Mappers — Sequelize rows → domain snapshots
// ---------------------------------------------------------------------------

function mapItem(row: SaleItemRow): SaleItemSnapshot {
  if (!isDiscountPercentage(row.discountPercentage)) {
    throw new Error(`Sale item ${row.id} has an unsupported discount of ${row.discountPercentage}%`)
  }
  return {
    id: toSaleItemId(row.id),
    saleId: toSaleId(row.saleId),
    productId: toProductId(row.productId),
    productName: row.productName,
    unitPrice: Number(row.unitPrice),
    quantity: row.quantity,
    discountPercentage: row.discountPercentage,
    discountAmount: Number(row.discountAmount),
    totalAmount: Number(row.totalAmount),
    isCancelled: row.isCancelled,
  }
}

function mapSale(row: SaleRow): SaleSnapshot {
  return {
    id: toSaleId(row.id),
    saleNumber: Number(row.saleNumber),
    saleDate: row.saleDate,
    customerId: toCustomerId(row.customerId),
    customerName: row.customerName,
    branchId: toBranchId(row.branchId),
    branchName: row.branchName,
    totalAmount: Number(row.totalAmount),
    status: row.status,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    items: (row.items ?? []).map(mapItem),
  }
}

// ---------------------------------------------------------------------------
// Mappers — domain snapshots → Sequelize attributes
// ---------------------------------------------------------------------------

function toSaleAttributes(s: SaleSnapshot) {
  return {
    id: s.id,
    saleNumber: s.saleNumber,
    saleDate: s.saleDate,
    customerId: s.customerId,
    customerName: s.customerName,
    branchId: s.branchId,
    branchName: s.branchName,
    totalAmount: s.totalAmount,
    status: s.status,
    createdAt: s.createdAt,
    updatedAt: s.updatedAt,
  }
}

function toItemAttributes(s: SaleSnapshot) {
  return s.items.map((item, index) => ({
    id: item.id,
    saleId: s.id,
    lineNumber: index + 1,
    productId: item.productId,
    productName: item.productName,
    unitPrice: item.unitPrice,
    quantity: item.quantity,
    discountPercentage: item.discountPercentage,
    discountAmount: item.discountAmount,
    totalAmount: item.totalAmount,
    isCancelled: item.isCancelled,
  }))
}

const ITEM_UPDATE_FIELDS = [
  'lineNumber',
  'productName',
  'unitPrice',
  'quantity',
  'discountPercentage',
  'discountAmount',
  'totalAmount',
  'isCancelled',
] as const

const SALE_NUMBER_KEYS = ['sale_number', 'saleNumber']

// postgres reports fields as a column → value map, sqlite as a column list;
// both name the column on each error item
function isSaleNumberViolation(err: UniqueConstraintError): boolean {
  return err.errors.some((e) => e.path !== null && SALE_NUMBER_KEYS.includes(e.path))
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export interface SaleRepositoryOptions {
  /** Clock handed to rehydrated aggregates. */
  readonly now?: Clock
  /** Pre-initialised models; defined on `sequelize` when omitted. */
  readonly models?: SaleModels
}

export interface SequelizeSaleRepository extends SaleRepository {
  /** Highest stored sale number, or null when the table is empty. */
  maxSaleNumber(): Promise<number | null>
}

/** Sequelize-backed SaleRepository over the `sales` and `sale_items` tables. */
export function createSaleRepository(
  sequelize: Sequelize,
  options: SaleRepositoryOptions = {},
): SequelizeSaleRepository {
  const { SaleRow, SaleItemRow } = options.models ?? defineSaleModels(sequelize)
  const include = [{ model: SaleItemRow, as: 'items' }]
  const order: Order = [[{ model: SaleItemRow, as: 'items' }, 'lineNumber', 'ASC']]

  async function getById(id: string): Promise<Sale | null> {
    const row = await SaleRow.findByPk(id, { include, order })
    return row ? Sale.restore(mapSale(row), options.now) : null
  }

  async function reload(id: string): Promise<Sale> {
    const sale = await getById(id)
    if (!sale) throw new NotFoundError(id)
    return sale
  }

  return {
    getById,

    async create(sale) {
      const snapshot = sale.toSnapshot()
      try {
        await sequelize.transaction(async (transaction) => {
          await SaleRow.create(toSaleAttributes(snapshot), { transaction })
          await SaleItemRow.bulkCreate(toItemAttributes(snapshot), { transaction })
        })
      } catch (err) {
        if (err instanceof UniqueConstraintError && isSaleNumberViolation(err)) {
          throw new SaleNumberConflictError(snapshot.saleNumber)
        }
        throw err
      }
      return reload(snapshot.id)
    },

    async update(sale) {
      const snapshot = sale.toSnapshot()
      const { id, ...fields } = toSaleAttributes(snapshot)
      const items = toItemAttributes(snapshot)
      const keep = items.map((i) => i.id)

      await sequelize.transaction(async (transaction) => {
        const [affected] = await SaleRow.update(fields, { where: { id }, transaction })
        if (affected === 0) throw new NotFoundError(id)

        // notIn with an empty list is not portable; clear every line instead
        await SaleItemRow.destroy({
          where: keep.length > 0 ? { saleId: id, id: { [Op.notIn]: keep } } : { saleId: id },
          transaction,
        })
        if (items.length > 0) {
          await SaleItemRow.bulkCreate(items, {
            updateOnDuplicate: [...ITEM_UPDATE_FIELDS],
            transaction,
          })
        }
      })
      return reload(id)
    },

    async delete(id) {
      const removed = await SaleRow.destroy({ where: { id } })
      return removed > 0
    },

    async maxSaleNumber() {
      const max: unknown = await SaleRow.max('saleNumber')
      return max == null ? null : Number(max)
    },
  }
}
