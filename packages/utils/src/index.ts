/**
 * Address type
 */
export * from './address'
/**
 * Utilities for manipulating bytes, Uint8Arrays, etc.
 */
export * from './bytes'
/**
 * Errors
 */
export * from './errors'
export * from './hash'
export * from './safe'
/**
 * ECDSA signature
 */
export * from './signature'
