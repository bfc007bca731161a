import { describe, it, expect } from 'vitest'
import { createSale } from '../create-sale'
import { deleteSale } from '../delete-sale'
import { getSale } from '../get-sale'
import { NotFoundError } from '../../errors'
import { MISSING_ID, createSaleInput, createTestContext } from '../../__tests__/support/fixtures'

describe('deleteSale', () => {
  it('removes the sale', async () => {
    const { ctx, repository } = createTestContext()
    const sale = await createSale(ctx, createSaleInput())

    await expect(deleteSale(ctx, { id: sale.id })).resolves.toEqual({ success: true })
    expect(repository.size).toBe(0)
    await expect(getSale(ctx, { id: sale.id })).rejects.toBeInstanceOf(NotFoundError)
  })

  it('throws NotFoundError when nothing was deleted', async () => {
    const { ctx } = createTestContext()

    await expect(deleteSale(ctx, { id: MISSING_ID })).rejects.toThrow(`Sale with ID ${MISSING_ID} not found`)
  })
})
