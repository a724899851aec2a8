import {
  bigIntToUnpaddedBytes,
  bytesToInt,
  DecodeError,
  FieldValidationError,
} from '@thorkit/utils'
import { MAX_UINT32 } from './params'
import type { Reserved } from './types'

export const FeatureFlag = {
  /** VIP-191 fee delegation */
  Delegation: 1,
} as const

export const EMPTY_RESERVED: Reserved = Object.freeze({
  features: 0,
  unused: Object.freeze([]),
})

export function createReserved(
  features = 0,
  unused: readonly Uint8Array[] = [],
): Reserved {
  if (!Number.isInteger(features) || features < 0 || features > MAX_UINT32) {
    throw new FieldValidationError('features must be an unsigned 32-bit integer', {
      path: 'reserved.features',
    })
  }
  return Object.freeze({
    features,
    unused: Object.freeze(unused.map((entry) => entry.slice())),
  })
}

/**
 * `[features, ...unused]` with trailing empty entries dropped, so the empty
 * reserved record encodes as an empty list.
 */
export function encodeReserved(reserved: Reserved): Uint8Array[] {
  const list = [
    bigIntToUnpaddedBytes(BigInt(reserved.features)),
    ...reserved.unused,
  ]
  while (list.length > 0 && list[list.length - 1].length === 0) {
    list.pop()
  }
  return list
}

export function decodeReserved(
  list: readonly Uint8Array[],
  path = 'transaction.reserved',
): Reserved {
  if (list.length === 0) return EMPTY_RESERVED
  if (list[list.length - 1].length === 0) {
    throw new DecodeError('reserved fields not trimmed', { path })
  }
  const features = list[0]
  if (features.length > 4 || (features.length > 0 && features[0] === 0)) {
    throw new DecodeError('invalid features encoding', { path: `${path}[0]` })
  }
  return createReserved(bytesToInt(features), list.slice(1))
}

export function isFeeDelegated(reserved: Reserved): boolean {
  return (reserved.features & FeatureFlag.Delegation) === FeatureFlag.Delegation
}

export function enableFeeDelegation(reserved: Reserved): Reserved {
  return createReserved(
    (reserved.features | FeatureFlag.Delegation) >>> 0,
    reserved.unused,
  )
}

export function disableFeeDelegation(reserved: Reserved): Reserved {
  return createReserved(
    (reserved.features & ~FeatureFlag.Delegation) >>> 0,
    reserved.unused,
  )
}
