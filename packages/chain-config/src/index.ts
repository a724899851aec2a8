export * from './config'
export * from './defaults'
export * from './networks'
export * from './nonce'
