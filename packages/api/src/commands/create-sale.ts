import { Sale, SaleItem, randomSaleNumber } from '@sale-records/domain'
import { SaleNumberConflictError } from '../errors'
import { clockOption, parseCommand, type CommandContext } from './context'
import { CreateSaleSchema, type CreateSaleCommand } from './schemas'
import { toSaleDto, type SaleDto } from './sale.projection'

/** Attempts made before a sale-number conflict is surfaced to the caller. */
export const MAX_SALE_NUMBER_ATTEMPTS = 3

/**
 * Creates a sale with its initial items. Lines for the same product merge,
 * so the 20-unit cap applies across the whole command.
 *
 * @throws {ValidationError} when the command is malformed.
 * @throws {InvalidStateError} when merged lines exceed the per-product cap.
 * @throws {SaleNumberConflictError} after MAX_SALE_NUMBER_ATTEMPTS duplicate numbers.
 */
export async function createSale(ctx: CommandContext, command: CreateSaleCommand): Promise<SaleDto> {
  const input = parseCommand(CreateSaleSchema, command)
  const generateSaleNumber = ctx.generateSaleNumber ?? randomSaleNumber

  const sale = new Sale(input, { generateSaleNumber, ...clockOption(ctx) })
  for (const item of input.items) {
    sale.addItem(new SaleItem(item.productId, item.productName, item.unitPrice, item.quantity))
  }

  for (let attempt = 1; ; attempt++) {
    try {
      const saved = await ctx.repository.create(sale)
      ctx.logger.info({ saleId: saved.id, saleNumber: saved.saleNumber }, 'sale created')
      return toSaleDto(saved)
    } catch (err) {
      if (!(err instanceof SaleNumberConflictError) || attempt >= MAX_SALE_NUMBER_ATTEMPTS) throw err
      ctx.logger.warn({ saleNumber: sale.saleNumber, attempt }, 'sale number already taken, retrying')
      sale.assignSaleNumber(generateSaleNumber())
    }
  }
}
