export * from './buffer'
export * from './compact-fixed-hex-blob'
export * from './composite'
export * from './fixed-hex-blob'
export * from './hex-blob'
export * from './numeric'
export * from './optional-fixed-hex-blob'
export * from './types'
