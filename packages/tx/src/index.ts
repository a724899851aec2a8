export * from './clause'
export * from './creators/from-options'
export * from './creators/from-rlp'
export * from './helpers/gas'
export * from './helpers/serialization'
export * from './helpers/setters'
export * from './helpers/signature'
export * from './helpers/validation'
export * from './params'
export * from './profiles'
export * from './reserved'
export * from './transaction-manager'
export * from './tx-data/dynamic-fee'
export * from './tx-data/legacy'
export * from './types'
