import { Address } from '@thorkit/utils'
import { hexToBytes, isHex } from 'viem'
import { z } from 'zod'
import type { AddressInput } from './types'

interface AddressSchemaOptions {
  errorMessage?: string
}

/**
 * Zod schema for validating and transforming AddressLike inputs to Address instances.
 *
 * Accepts:
 * - Address instances (passed through)
 * - Uint8Array of exactly 20 bytes
 * - 0x-prefixed hex strings of 40 hex chars
 */
export function zAddress(options: AddressSchemaOptions = {}) {
  const { errorMessage } = options

  return z
    .custom<AddressInput>(
      (val) => {
        if (val instanceof Address) return true
        if (val instanceof Uint8Array) return val.length === 20
        if (typeof val === 'string') return /^0x[a-fA-F0-9]{40}$/.test(val)
        return false
      },
      {
        message:
          errorMessage ||
          'Invalid address: must be Address instance, 20-byte Uint8Array, or 0x-prefixed 40-char hex string',
      },
    )
    .transform((val): Address => {
      if (val instanceof Address) return val
      if (val instanceof Uint8Array) return new Address(val)
      return new Address(isHex(val) ? hexToBytes(val) : new Uint8Array(0))
    })
}

/**
 * Address or absent; absent covers `null`, `undefined`, `''` and `'0x'`.
 */
export function zOptionalAddress(options: AddressSchemaOptions = {}) {
  return z
    .union([z.null(), z.undefined(), z.literal(''), z.literal('0x'), zAddress(options)])
    .transform((val): Address | undefined =>
      val instanceof Address ? val : undefined,
    )
}
