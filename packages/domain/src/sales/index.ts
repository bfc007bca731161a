export * from './constraints'
export * from './errors'
export * from './sale-item'
export * from './sale-number'
export * from './sale'
export * from './events'
