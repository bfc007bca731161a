// ---------------------------------------------------------------------------
// @sale-records/domain — public API
//
// Re-exports the shared primitives and the sales context.
// ---------------------------------------------------------------------------

export * from './shared/types'
export * from './sales/index'
