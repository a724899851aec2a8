export * from './await-receipt'
export * from './broadcast'
export * from './schemas'
export * from './thor-client'
