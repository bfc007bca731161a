// ---------------------------------------------------------------------------
// Command schemas
//
// Shared by the command handlers and the HTTP body validators. Limits and
// messages come from the domain constraints so every layer agrees.
// ---------------------------------------------------------------------------

import { z } from 'zod'
import {
  CANCELLATION_REASON_MAX_LENGTH,
  MAX_QUANTITY_PER_PRODUCT,
  MAX_UNIT_PRICE,
  MIN_LINE_QUANTITY,
  NAME_MAX_LENGTH,
  NAME_MIN_LENGTH,
  NIL_UUID,
  PRICE_STEP,
  SALE_MESSAGES,
} from '@sale-records/domain'

function idSchema(label: string, emptyMessage = `${label} is required`) {
  return z
    .string({ required_error: `${label} is required` })
    .uuid(`${label} must be a valid UUID`)
    .refine((v) => v !== NIL_UUID, emptyMessage)
}

function nameSchema(label: string) {
  return z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(NAME_MIN_LENGTH, `${label} is required`)
    .max(
      NAME_MAX_LENGTH,
      `${label} must contain between ${NAME_MIN_LENGTH} and ${NAME_MAX_LENGTH} characters`,
    )
}

const quantity = z
  .number({ required_error: 'Quantity is required' })
  .int(SALE_MESSAGES.fractionalQuantity)
  .max(MAX_QUANTITY_PER_PRODUCT, SALE_MESSAGES.quantityCap)

export const SaleIdSchema = idSchema('Sale ID', 'Sale ID cannot be empty')

export const SaleItemInputSchema = z.object({
  productId: idSchema('Product ID'),
  productName: nameSchema('Product name'),
  unitPrice: z
    .number({ required_error: 'Unit price is required' })
    .finite(SALE_MESSAGES.nonFiniteUnitPrice)
    .positive('Unit price must be greater than 0')
    .max(MAX_UNIT_PRICE, SALE_MESSAGES.unitPriceTooLarge)
    .multipleOf(PRICE_STEP, 'Unit price cannot have more than 2 decimal places'),
  quantity: quantity.min(MIN_LINE_QUANTITY, 'Quantity must be greater than 0'),
})

/** Quantity 0 is allowed here: it removes the line. */
export const SaleItemUpdateSchema = z.object({
  productId: idSchema('Product ID'),
  quantity: quantity.min(0, SALE_MESSAGES.negativeQuantity),
})

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export const CreateSaleSchema = z.object({
  customerId: idSchema('Customer ID'),
  customerName: nameSchema('Customer name'),
  branchId: idSchema('Branch ID'),
  branchName: nameSchema('Branch name'),
  items: z
    .array(SaleItemInputSchema, { required_error: 'A sale must contain at least one item' })
    .min(1, 'A sale must contain at least one item'),
})

export const GetSaleSchema = z.object({ id: SaleIdSchema })

export const UpdateSaleSchema = z.object({
  id: SaleIdSchema,
  itemsToAdd: z.array(SaleItemInputSchema).default([]),
  itemsToUpdate: z.array(SaleItemUpdateSchema).default([]),
  productIdsToRemove: z
    .array(idSchema('Product ID to remove', 'Product ID to remove cannot be empty'))
    .default([]),
})

export const CancelSaleSchema = z.object({
  id: SaleIdSchema,
  cancellationReason: z
    .string()
    .trim()
    .min(1, 'Cancellation reason cannot be empty')
    .max(
      CANCELLATION_REASON_MAX_LENGTH,
      `Cancellation reason must not exceed ${CANCELLATION_REASON_MAX_LENGTH} characters`,
    )
    .optional(),
})

export const DeleteSaleSchema = z.object({ id: SaleIdSchema })

/** HTTP bodies: the id travels in the path. */
export const UpdateSaleBody = UpdateSaleSchema.omit({ id: true })
export const CancelSaleBody = CancelSaleSchema.omit({ id: true })

export type SaleItemInput = z.input<typeof SaleItemInputSchema>
export type CreateSaleCommand = z.input<typeof CreateSaleSchema>
export type GetSaleCommand = z.input<typeof GetSaleSchema>
export type UpdateSaleCommand = z.input<typeof UpdateSaleSchema>
export type CancelSaleCommand = z.input<typeof CancelSaleSchema>
export type DeleteSaleCommand = z.input<typeof DeleteSaleSchema>
