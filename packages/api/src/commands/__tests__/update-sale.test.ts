import { describe, it, expect, vi } from 'vitest'
import { InvalidStateError, SALE_MESSAGES } from '@sale-records/domain'
import { cancelSale } from '../cancel-sale'
import { createSale } from '../create-sale'
import { updateSale } from '../update-sale'
import { NotFoundError } from '../../errors'
import {
  MISSING_ID,
  PRODUCT_A,
  PRODUCT_B,
  PRODUCT_C,
  T0,
  createSaleInput,
  createTestContext,
} from '../../__tests__/support/fixtures'

async function setup() {
  const env = createTestContext()
  const sale = await createSale(
    env.ctx,
    createSaleInput([
      { productId: PRODUCT_A, unitPrice: 10, quantity: 2 },
      { productId: PRODUCT_B, unitPrice: 5, quantity: 1 },
    ]),
  )
  return { ...env, sale }
}

describe('updateSale', () => {
  it('applies adds, updates and removals and reports the counts', async () => {
    const { ctx, repository, sale } = await setup()

    const result = await updateSale(ctx, {
      id: sale.id,
      itemsToAdd: [{ productId: PRODUCT_C, productName: 'Gadget', unitPrice: 2.5, quantity: 4 }],
      itemsToUpdate: [{ productId: PRODUCT_A, quantity: 10 }],
      productIdsToRemove: [PRODUCT_B],
    })

    expect(result).toEqual({
      id: sale.id,
      saleNumber: sale.saleNumber,
      totalAmount: 89,
      status: 'CONFIRMED',
      itemCount: 2,
      updatedAt: T0,
      itemsAdded: 1,
      itemsUpdated: 1,
      itemsRemoved: 1,
      message: 'Sale updated successfully: 1 item(s) added, 1 item(s) updated, 1 item(s) removed',
    })
    expect(repository.snapshot(sale.id)?.items.map((i) => [i.productId, i.quantity, i.totalAmount])).toEqual([
      [PRODUCT_A, 10, 80],
      [PRODUCT_C, 4, 9],
    ])
  })

  it('removes a product added earlier in the same command', async () => {
    const { ctx, repository, sale } = await setup()

    const result = await updateSale(ctx, {
      id: sale.id,
      itemsToAdd: [{ productId: PRODUCT_C, productName: 'Gadget', unitPrice: 2.5, quantity: 5 }],
      productIdsToRemove: [PRODUCT_C],
    })

    expect(result.itemCount).toBe(2)
    expect(result.totalAmount).toBe(25)
    expect(repository.snapshot(sale.id)?.items.map((i) => i.productId)).toEqual([PRODUCT_A, PRODUCT_B])
  })

  it('updates the quantity of a product added earlier in the same command', async () => {
    const { ctx, repository, sale } = await setup()

    const result = await updateSale(ctx, {
      id: sale.id,
      itemsToAdd: [{ productId: PRODUCT_C, productName: 'Gadget', unitPrice: 2.5, quantity: 2 }],
      itemsToUpdate: [{ productId: PRODUCT_C, quantity: 4 }],
    })

    expect(result.totalAmount).toBe(34)
    expect(result.message).toBe('Sale updated successfully: 1 item(s) added, 1 item(s) updated')
    expect(
      repository
        .snapshot(sale.id)
        ?.items.filter((i) => i.productId === PRODUCT_C)
        .map((i) => [i.quantity, i.discountPercentage, i.totalAmount]),
    ).toEqual([[4, 10, 9]])
  })

  it('lists only the categories that were requested', async () => {
    const { ctx, sale } = await setup()

    const result = await updateSale(ctx, { id: sale.id, productIdsToRemove: [PRODUCT_A, PRODUCT_B] })

    expect(result.message).toBe('Sale updated successfully: 2 item(s) removed')
    expect(result.itemCount).toBe(0)
    expect(result.totalAmount).toBe(0)
  })

  it('persists once and reports no changes for an empty command', async () => {
    const { ctx, repository, sale } = await setup()
    const update = vi.spyOn(repository, 'update')

    const result = await updateSale(ctx, { id: sale.id })

    expect(update).toHaveBeenCalledTimes(1)
    expect(result.message).toBe('Sale updated successfully: no changes')
    expect(result.totalAmount).toBe(25)
  })

  it('removes a line whose quantity is updated to 0', async () => {
    const { ctx, repository, sale } = await setup()

    await updateSale(ctx, { id: sale.id, itemsToUpdate: [{ productId: PRODUCT_A, quantity: 0 }] })

    expect(repository.snapshot(sale.id)?.items.map((i) => i.productId)).toEqual([PRODUCT_B])
  })

  it('ignores updates and removals for products not on the sale', async () => {
    const { ctx, sale } = await setup()

    const result = await updateSale(ctx, {
      id: sale.id,
      itemsToUpdate: [{ productId: PRODUCT_C, quantity: 3 }],
      productIdsToRemove: [PRODUCT_C],
    })

    expect(result.itemCount).toBe(2)
    expect(result.totalAmount).toBe(25)
  })

  it('merges an added product into its existing line', async () => {
    const { ctx, repository, sale } = await setup()

    await updateSale(ctx, {
      id: sale.id,
      itemsToAdd: [{ productId: PRODUCT_A, productName: 'Widget', unitPrice: 10, quantity: 2 }],
    })

    const line = repository.snapshot(sale.id)?.items.find((i) => i.productId === PRODUCT_A)
    expect(line).toMatchObject({ quantity: 4, discountPercentage: 10, totalAmount: 36 })
  })

  it('leaves storage untouched when a later step breaks the cap', async () => {
    const { ctx, repository, sale } = await setup()
    const before = repository.snapshot(sale.id)

    await expect(
      updateSale(ctx, {
        id: sale.id,
        itemsToAdd: [
          { productId: PRODUCT_C, productName: 'Gadget', unitPrice: 1, quantity: 1 },
          { productId: PRODUCT_A, productName: 'Widget', unitPrice: 10, quantity: 19 },
        ],
      }),
    ).rejects.toThrow(new InvalidStateError(SALE_MESSAGES.quantityCap))
    expect(repository.snapshot(sale.id)).toBe(before)
  })

  it('refuses to touch a cancelled sale', async () => {
    const { ctx, repository, sale } = await setup()
    await cancelSale(ctx, { id: sale.id })
    const before = repository.snapshot(sale.id)

    await expect(updateSale(ctx, { id: sale.id, productIdsToRemove: [PRODUCT_A] })).rejects.toThrow(
      new InvalidStateError('Canceled sales cannot be updated'),
    )
    expect(repository.snapshot(sale.id)).toBe(before)
  })

  it('throws NotFoundError for an unknown sale', async () => {
    const { ctx } = createTestContext()

    await expect(updateSale(ctx, { id: MISSING_ID })).rejects.toBeInstanceOf(NotFoundError)
  })
})
