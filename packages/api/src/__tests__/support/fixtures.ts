import { vi } from 'vitest'
import { createSequentialSaleNumberGenerator, type Clock } from '@sale-records/domain'
import type { CommandContext } from '../../commands'
import { silentLogger } from '../../logger'
import type { SaleNotifier } from '../../notifications'
import { InMemorySaleRepository } from './in-memory-sale-repository'

export const CUSTOMER_ID = '3f1c2a10-8a4b-4c1e-9d2f-0a1b2c3d4e01'
export const BRANCH_ID = '3f1c2a10-8a4b-4c1e-9d2f-0a1b2c3d4e02'
export const PRODUCT_A = '3f1c2a10-8a4b-4c1e-9d2f-0a1b2c3d4ea1'
export const PRODUCT_B = '3f1c2a10-8a4b-4c1e-9d2f-0a1b2c3d4eb2'
export const PRODUCT_C = '3f1c2a10-8a4b-4c1e-9d2f-0a1b2c3d4ec3'
export const MISSING_ID = '3f1c2a10-8a4b-4c1e-9d2f-0a1b2c3d4eff'

export const T0 = new Date('2026-03-02T09:00:00.000Z')

export function fixedClock(at: Date = T0): Clock {
  return () => at
}

export function createSaleInput(
  items: { productId: string; productName?: string; unitPrice: number; quantity: number }[] = [
    { productId: PRODUCT_A, unitPrice: 10, quantity: 2 },
  ],
) {
  return {
    customerId: CUSTOMER_ID,
    customerName: 'Ada Customer',
    branchId: BRANCH_ID,
    branchName: 'Downtown',
    items: items.map((i) => ({ productName: 'Widget', ...i })),
  }
}

export function createNotifier() {
  return {
    saleCancelled: vi.fn<SaleNotifier['saleCancelled']>(),
    saleItemCancelled: vi.fn<SaleNotifier['saleItemCancelled']>(),
  }
}

export function createTestContext(overrides: Partial<CommandContext> = {}) {
  const now = fixedClock()
  const repository = new InMemorySaleRepository(now)
  const notifier = createNotifier()
  const ctx: CommandContext = {
    repository,
    notifier,
    logger: silentLogger(),
    generateSaleNumber: createSequentialSaleNumberGenerator(),
    now,
    ...overrides,
  }
  return { ctx, repository, notifier }
}
