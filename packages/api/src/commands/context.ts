import type { z } from 'zod'
import type { Clock, SaleNumberGenerator, SaleOptions } from '@sale-records/domain'
import { ValidationError, type FieldError } from '../errors'
import type { Logger } from '../logger'
import type { SaleNotifier } from '../notifications'
import type { SaleRepository } from '../repositories'

// ---------------------------------------------------------------------------
// Collaborators handed to every command handler
// ---------------------------------------------------------------------------

export interface CommandContext {
  readonly repository: SaleRepository
  readonly notifier: SaleNotifier
  readonly logger: Logger
  /** Defaults to randomSaleNumber. */
  readonly generateSaleNumber?: SaleNumberGenerator
  /** Defaults to the system clock. */
  readonly now?: Clock
}

export function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message }))
}

/**
 * Validates a command against its schema.
 *
 * @throws {ValidationError} carrying one entry per failed rule.
 */
export function parseCommand<S extends z.ZodTypeAny>(schema: S, command: unknown): z.output<S> {
  const r = schema.safeParse(command)
  if (!r.success) throw new ValidationError(toFieldErrors(r.error))
  return r.data
}

/** Aggregate options derived from the context's clock. */
export function clockOption(ctx: CommandContext): Pick<SaleOptions, 'now'> {
  return ctx.now ? { now: ctx.now } : {}
}
