import { NotFoundError } from '../errors'
import { parseCommand, type CommandContext } from './context'
import { GetSaleSchema, type GetSaleCommand } from './schemas'
import { toSaleDto, type SaleDto } from './sale.projection'

export async function getSale(ctx: CommandContext, command: GetSaleCommand): Promise<SaleDto> {
  const { id } = parseCommand(GetSaleSchema, command)
  const sale = await ctx.repository.getById(id)
  if (!sale) throw new NotFoundError(id)
  return toSaleDto(sale)
}
