import { NotFoundError } from '../errors'
import { parseCommand, type CommandContext } from './context'
import { DeleteSaleSchema, type DeleteSaleCommand } from './schemas'

/** Hard-deletes a sale and its items. */
export async function deleteSale(
  ctx: CommandContext,
  command: DeleteSaleCommand,
): Promise<{ success: true }> {
  const { id } = parseCommand(DeleteSaleSchema, command)
  const removed = await ctx.repository.delete(id)
  if (!removed) throw new NotFoundError(id)
  ctx.logger.info({ saleId: id }, 'sale deleted')
  return { success: true }
}
