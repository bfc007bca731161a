import { describe, it, expect } from 'vitest'
import { parseCommand } from '../context'
import { CancelSaleSchema, CreateSaleSchema, UpdateSaleSchema } from '../schemas'
import { ValidationError } from '../../errors'
import { PRODUCT_A, MISSING_ID, createSaleInput } from '../../__tests__/support/fixtures'

function errorsOf(run: () => unknown) {
  try {
    run()
  } catch (err) {
    if (err instanceof ValidationError) return err.errors
    throw err
  }
  throw new Error('expected a ValidationError')
}

describe('parseCommand', () => {
  it('reports every missing field of CreateSale', () => {
    expect(errorsOf(() => parseCommand(CreateSaleSchema, {}))).toEqual([
      { field: 'customerId', message: 'Customer ID is required' },
      { field: 'customerName', message: 'Customer name is required' },
      { field: 'branchId', message: 'Branch ID is required' },
      { field: 'branchName', message: 'Branch name is required' },
      { field: 'items', message: 'A sale must contain at least one item' },
    ])
  })

  it('joins field errors into the error message', () => {
    expect(() => parseCommand(UpdateSaleSchema, { id: 'x' })).toThrow('id: Sale ID must be a valid UUID')
  })

  it('defaults the UpdateSale lists to empty', () => {
    expect(parseCommand(UpdateSaleSchema, { id: MISSING_ID })).toEqual({
      id: MISSING_ID,
      itemsToAdd: [],
      itemsToUpdate: [],
      productIdsToRemove: [],
    })
  })

  it('accepts quantity 0 in an item update but not a negative one', () => {
    expect(
      parseCommand(UpdateSaleSchema, { id: MISSING_ID, itemsToUpdate: [{ productId: PRODUCT_A, quantity: 0 }] })
        .itemsToUpdate,
    ).toEqual([{ productId: PRODUCT_A, quantity: 0 }])

    expect(
      errorsOf(() =>
        parseCommand(UpdateSaleSchema, { id: MISSING_ID, itemsToUpdate: [{ productId: PRODUCT_A, quantity: -1 }] }),
      ),
    ).toEqual([{ field: 'itemsToUpdate.0.quantity', message: 'Quantity cannot be negative' }])
  })

  it('rejects a nil product id in the removal list', () => {
    expect(
      errorsOf(() =>
        parseCommand(UpdateSaleSchema, {
          id: MISSING_ID,
          productIdsToRemove: ['00000000-0000-0000-0000-000000000000'],
        }),
      ),
    ).toEqual([{ field: 'productIdsToRemove.0', message: 'Product ID to remove cannot be empty' }])
  })

  it('rejects a fractional quantity', () => {
    expect(
      errorsOf(() =>
        parseCommand(UpdateSaleSchema, { id: MISSING_ID, itemsToUpdate: [{ productId: PRODUCT_A, quantity: 1.5 }] }),
      ),
    ).toEqual([{ field: 'itemsToUpdate.0.quantity', message: 'Quantity must be a whole number' }])
  })

  it('accepts unit prices in whole cents', () => {
    const command = parseCommand(CreateSaleSchema, createSaleInput([{ productId: PRODUCT_A, unitPrice: 19.99, quantity: 1 }]))
    expect(command.items[0]?.unitPrice).toBe(19.99)
  })

  it('rejects a unit price with sub-cent digits', () => {
    expect(
      errorsOf(() => parseCommand(CreateSaleSchema, createSaleInput([{ productId: PRODUCT_A, unitPrice: 1.115, quantity: 3 }]))),
    ).toEqual([{ field: 'items.0.unitPrice', message: 'Unit price cannot have more than 2 decimal places' }])
  })

  it('rejects a unit price above the maximum', () => {
    expect(
      errorsOf(() => parseCommand(CreateSaleSchema, createSaleInput([{ productId: PRODUCT_A, unitPrice: 1e17, quantity: 1 }]))),
    ).toEqual([{ field: 'items.0.unitPrice', message: 'Unit price cannot exceed 1000000000' }])
  })

  it('rejects an infinite unit price', () => {
    expect(
      errorsOf(() =>
        parseCommand(CreateSaleSchema, createSaleInput([{ productId: PRODUCT_A, unitPrice: Infinity, quantity: 1 }])),
      ),
    ).toContainEqual({ field: 'items.0.unitPrice', message: 'Unit price must be a finite number' })
  })

  it('bounds the cancellation reason', () => {
    expect(parseCommand(CancelSaleSchema, { id: MISSING_ID, cancellationReason: '  damaged  ' })).toEqual({
      id: MISSING_ID,
      cancellationReason: 'damaged',
    })
    expect(errorsOf(() => parseCommand(CancelSaleSchema, { id: MISSING_ID, cancellationReason: 'r'.repeat(501) }))).toEqual([
      { field: 'cancellationReason', message: 'Cancellation reason must not exceed 500 characters' },
    ])
  })
})
