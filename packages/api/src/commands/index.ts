export * from './context'
export * from './schemas'
export * from './sale.projection'
export * from './create-sale'
export * from './get-sale'
export * from './update-sale'
export * from './cancel-sale'
export * from './delete-sale'
