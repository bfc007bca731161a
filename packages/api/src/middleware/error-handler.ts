// ---------------------------------------------------------------------------
// Error → HTTP response mapping
//
//   ValidationError          400 VALIDATION_ERROR (with field details)
//   ArgumentError            400 INVALID_ARGUMENT
//   NotFoundError            404 NOT_FOUND
//   SaleNumberConflictError  409 CONFLICT
//   InvalidStateError        422 INVALID_STATE
//   anything else            500 INTERNAL_ERROR
// ---------------------------------------------------------------------------

import type { ErrorHandler } from 'hono'
import { HTTPException } from 'hono/http-exception'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { ArgumentError, InvalidStateError } from '@sale-records/domain'
import { NotFoundError, SaleNumberConflictError, ValidationError, type FieldError } from '../errors'
import type { Logger } from '../logger'
import type { AppEnv } from '../types'

export interface ErrorBody {
  error: string
  code: string
  details?: readonly FieldError[]
}

export interface ErrorResponse {
  status: ContentfulStatusCode
  body: ErrorBody
}

export function toErrorResponse(err: Error): ErrorResponse {
  if (err instanceof ValidationError) {
    return { status: 400, body: { error: err.message, code: 'VALIDATION_ERROR', details: err.errors } }
  }
  if (err instanceof ArgumentError) {
    return { status: 400, body: { error: err.message, code: 'INVALID_ARGUMENT' } }
  }
  if (err instanceof NotFoundError) {
    return { status: 404, body: { error: err.message, code: 'NOT_FOUND' } }
  }
  if (err instanceof SaleNumberConflictError) {
    return { status: 409, body: { error: err.message, code: 'CONFLICT' } }
  }
  if (err instanceof InvalidStateError) {
    return { status: 422, body: { error: err.message, code: 'INVALID_STATE' } }
  }
  // e.g. malformed JSON rejected by hono's validator
  if (err instanceof HTTPException && err.status < 500) {
    return { status: err.status, body: { error: err.message, code: 'VALIDATION_ERROR' } }
  }
  return { status: 500, body: { error: 'Internal server error', code: 'INTERNAL_ERROR' } }
}

export function errorHandler(logger: Logger): ErrorHandler<AppEnv> {
  return (err, c) => {
    const { status, body } = toErrorResponse(err)
    if (status === 500) {
      logger.error({ err, method: c.req.method, path: c.req.path }, 'unhandled error')
    }
    return c.json(body, status)
  }
}
