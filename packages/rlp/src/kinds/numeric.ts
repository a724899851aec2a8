import {
  bigIntToUnpaddedBytes,
  bytesToBigInt,
  safeResult,
} from '@thorkit/utils'
import { fieldError } from './fail'
import type { ProfileValue, ScalarKind } from './types'

export interface NumericKind extends ScalarKind {
  readonly name: 'numeric'
  readonly maxBytes: number
}

const HEX_INT = /^0x[0-9a-fA-F]+$/
const DEC_INT = /^[0-9]+$/

function toUnsigned(value: ProfileValue): bigint | undefined {
  if (typeof value === 'bigint') return value >= 0n ? value : undefined
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? BigInt(value) : undefined
  }
  if (typeof value === 'string') {
    if (HEX_INT.test(value) || DEC_INT.test(value)) return BigInt(value)
  }
  return undefined
}

/**
 * Unsigned integer stored as minimal big-endian bytes; zero is the empty string.
 */
export function numericKind(maxBytes: number): NumericKind {
  return {
    type: 'scalar',
    name: 'numeric',
    maxBytes,
    encode(value, path) {
      const num = toUnsigned(value)
      if (num === undefined) {
        return fieldError(path, 'expected unsigned integer')
      }
      const bytes = bigIntToUnpaddedBytes(num)
      if (bytes.length > maxBytes) {
        return fieldError(path, `expected integer of at most ${maxBytes} bytes`)
      }
      return safeResult(bytes)
    },
    decode(bytes, path) {
      if (bytes.length > maxBytes) {
        return fieldError(path, `expected integer of at most ${maxBytes} bytes`)
      }
      if (bytes.length > 0 && bytes[0] === 0) {
        return fieldError(path, 'expected canonical integer without leading zero')
      }
      return safeResult(bytesToBigInt(bytes))
    },
  }
}
