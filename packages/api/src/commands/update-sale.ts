import { InvalidStateError, SALE_MESSAGES, SaleItem, type SaleStatus } from '@sale-records/domain'
import { NotFoundError } from '../errors'
import { parseCommand, type CommandContext } from './context'
import { UpdateSaleSchema, type UpdateSaleCommand } from './schemas'

export interface UpdateSaleResult {
  id: string
  saleNumber: number
  totalAmount: number
  status: SaleStatus
  itemCount: number
  updatedAt: Date | null
  itemsAdded: number
  itemsUpdated: number
  itemsRemoved: number
  message: string
}

function summarize(added: number, updated: number, removed: number): string {
  const parts = [
    added > 0 ? `${added} item(s) added` : null,
    updated > 0 ? `${updated} item(s) updated` : null,
    removed > 0 ? `${removed} item(s) removed` : null,
  ].filter((p): p is string => p !== null)
  return `Sale updated successfully: ${parts.length > 0 ? parts.join(', ') : 'no changes'}`
}

/**
 * Applies adds, then quantity updates, then removals to one sale and
 * persists the result once. Nothing is written if any step fails.
 *
 * @throws {ValidationError} when the command is malformed.
 * @throws {NotFoundError} when the sale does not exist.
 * @throws {InvalidStateError} when the sale is cancelled or a product would exceed the cap.
 */
export async function updateSale(
  ctx: CommandContext,
  command: UpdateSaleCommand,
): Promise<UpdateSaleResult> {
  const input = parseCommand(UpdateSaleSchema, command)

  const sale = await ctx.repository.getById(input.id)
  if (!sale) throw new NotFoundError(input.id)
  if (sale.isCancelled) throw new InvalidStateError(SALE_MESSAGES.cancelledSaleNotUpdatable)

  for (const item of input.itemsToAdd) {
    sale.addItem(new SaleItem(item.productId, item.productName, item.unitPrice, item.quantity))
  }
  for (const item of input.itemsToUpdate) {
    sale.updateItemQuantity(item.productId, item.quantity)
  }
  for (const productId of input.productIdsToRemove) {
    sale.removeItem(productId)
  }

  const saved = await ctx.repository.update(sale)
  ctx.logger.info({ saleId: saved.id }, 'sale updated')

  const itemsAdded = input.itemsToAdd.length
  const itemsUpdated = input.itemsToUpdate.length
  const itemsRemoved = input.productIdsToRemove.length
  return {
    id: saved.id,
    saleNumber: saved.saleNumber,
    totalAmount: saved.totalAmount,
    status: saved.status,
    itemCount: saved.items.length,
    updatedAt: saved.updatedAt,
    itemsAdded,
    itemsUpdated,
    itemsRemoved,
    message: summarize(itemsAdded, itemsUpdated, itemsRemoved),
  }
}
