export * from './sale.repository'
