// ---------------------------------------------------------------------------
// Sale notifications
//
// Cancellation is announced through a SaleNotifier. The default
// implementation writes each event to the log; a bus publisher can be
// plugged in behind the same interface.
// ---------------------------------------------------------------------------

import type { SaleCancelledEvent, SaleItemCancelledEvent } from '@sale-records/domain'
import type { Logger } from '../logger'

export interface SaleNotifier {
  saleCancelled(event: SaleCancelledEvent): void
  saleItemCancelled(event: SaleItemCancelledEvent): void
}

export function createLogNotifier(logger: Logger): SaleNotifier {
  const log = logger.child({ module: 'sale-notifier' })
  return {
    saleCancelled(event) {
      log.info({ event }, 'sale cancelled')
    },
    saleItemCancelled(event) {
      log.info({ event }, 'sale item cancelled')
    },
  }
}
