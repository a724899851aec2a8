export * from './custom/address'
export * from './custom/bigint'
export * from './custom/bytes'
export type * from './custom/types'
export * from './parse'
