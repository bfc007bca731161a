// ---------------------------------------------------------------------------
// Application errors
//
// Domain errors (ArgumentError, InvalidStateError) come from
// @sale-records/domain; the classes below belong to the command layer.
// ---------------------------------------------------------------------------

import { saleNotFoundMessage } from '@sale-records/domain'

export interface FieldError {
  readonly field: string
  readonly message: string
}

/** Input failed shape/range validation. Raised before any repository call. */
export class ValidationError extends Error {
  constructor(readonly errors: readonly FieldError[]) {
    super(errors.map((e) => (e.field ? `${e.field}: ${e.message}` : e.message)).join('; '))
    this.name = 'ValidationError'
  }
}

/** The requested sale does not exist. */
export class NotFoundError extends Error {
  constructor(readonly id: string) {
    super(saleNotFoundMessage(id))
    this.name = 'NotFoundError'
  }
}

/** Storage rejected the sale number as a duplicate. */
export class SaleNumberConflictError extends Error {
  constructor(readonly saleNumber: number) {
    super(`Sale number ${saleNumber} is already in use`)
    this.name = 'SaleNumberConflictError'
  }
}
