export * from './sale-notifier'
