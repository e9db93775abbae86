export * from './lib/db/errors'
export * from './lib/db/entity'
export * from './lib/db/filters'
export * from './lib/db/ordering'
export * from './lib/db/transactions'
export * from './lib/db/crud'
export * from './lib/db/config'
export * from './lib/db/orm'
export * from './lib/query/types'
export * from './lib/di/container'
export * from './lib/crud/factory'
