import {
  bigIntToUnpaddedBytes,
  DecodeError,
  ErrorCode,
  FieldValidationError,
  hexToBytes,
  padToEven,
  stripHexPrefix,
  utf8ToBytes,
} from '@thorkit/utils'
import type { RLPInput } from './types'

export function toBytes(value: RLPInput): Uint8Array {
  if (value instanceof Uint8Array) {
    return value
  }
  if (typeof value === 'string') {
    return value.startsWith('0x')
      ? hexToBytes(`0x${padToEven(stripHexPrefix(value))}`)
      : utf8ToBytes(value)
  }
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new FieldValidationError(`expected safe integer, got ${value}`)
    }
    return bigIntToUnpaddedBytes(BigInt(value))
  }
  if (typeof value === 'bigint') {
    return bigIntToUnpaddedBytes(value)
  }
  if (value === null || value === undefined) {
    return new Uint8Array(0)
  }
  throw new FieldValidationError('cannot convert a list to a byte string')
}

export function safeSlice(
  input: Uint8Array,
  start: number,
  end: number,
): Uint8Array {
  if (end > input.length) {
    throw new DecodeError(
      `invalid RLP: item ends at ${end} but only ${input.length} bytes remain`,
      { code: ErrorCode.INVALID_RLP },
    )
  }
  return input.slice(start, end)
}
