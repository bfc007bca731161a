import {
  InvalidStateError,
  SALE_MESSAGES,
  saleCancelledEvent,
  saleItemCancelledEvent,
} from '@sale-records/domain'
import { NotFoundError } from '../errors'
import { parseCommand, type CommandContext } from './context'
import { CancelSaleSchema, type CancelSaleCommand } from './schemas'

export interface CancelSaleResult {
  success: true
  saleId: string
  saleNumber: number
  message: string
  cancelledAt: Date
}

/**
 * Cancels a sale and every item on it, then notifies. Notifier failures are
 * logged and do not affect the result.
 *
 * @throws {ValidationError} when the command is malformed.
 * @throws {NotFoundError} when the sale does not exist.
 * @throws {InvalidStateError} when the sale is already cancelled.
 */
export async function cancelSale(
  ctx: CommandContext,
  command: CancelSaleCommand,
): Promise<CancelSaleResult> {
  const input = parseCommand(CancelSaleSchema, command)

  const sale = await ctx.repository.getById(input.id)
  if (!sale) throw new NotFoundError(input.id)
  if (sale.isCancelled) throw new InvalidStateError(SALE_MESSAGES.alreadyCancelled)

  const totalBeforeCancel = sale.totalAmount
  const activeItems = sale.items.filter((i) => !i.isCancelled)

  sale.cancel()
  const saved = await ctx.repository.update(sale)
  ctx.logger.info({ saleId: saved.id }, 'sale cancelled')

  const saleEvent = saleCancelledEvent(saved, totalBeforeCancel, input.cancellationReason)
  notify(ctx, () => ctx.notifier.saleCancelled(saleEvent))
  for (const item of activeItems) {
    const itemEvent = saleItemCancelledEvent(saved.id, item, input.cancellationReason)
    notify(ctx, () => ctx.notifier.saleItemCancelled(itemEvent))
  }

  return {
    success: true,
    saleId: saved.id,
    saleNumber: saved.saleNumber,
    message: SALE_MESSAGES.cancelled,
    cancelledAt: saleEvent.cancelledAt,
  }
}

function notify(ctx: CommandContext, send: () => void): void {
  try {
    send()
  } catch (err) {
    ctx.logger.warn({ err }, 'sale notifier failed')
  }
}
