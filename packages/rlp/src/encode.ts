import { bigIntToUnpaddedBytes, concatBytes } from '@thorkit/utils'
import {
  LIST_OFFSET,
  SHORT_PAYLOAD_MAX,
  SINGLE_BYTE_MAX,
  STRING_OFFSET,
} from './constants'
import type { RLPInput } from './types'
import { toBytes } from './utils'

export function encode(input: RLPInput): Uint8Array {
  if (Array.isArray(input)) {
    const payload = concatBytes(...input.map((item) => encode(item)))
    return concatBytes(lengthPrefix(payload.length, LIST_OFFSET), payload)
  }
  const bytes = toBytes(input)
  if (bytes.length === 1 && bytes[0] <= SINGLE_BYTE_MAX) {
    return bytes
  }
  return concatBytes(lengthPrefix(bytes.length, STRING_OFFSET), bytes)
}

/**
 * Short payloads fold their length into the prefix byte; longer ones put
 * the big-endian length after it.
 */
function lengthPrefix(length: number, offset: number): Uint8Array {
  if (length <= SHORT_PAYLOAD_MAX) {
    return Uint8Array.from([offset + length])
  }
  const lengthBytes = bigIntToUnpaddedBytes(BigInt(length))
  return concatBytes(
    Uint8Array.from([offset + SHORT_PAYLOAD_MAX + lengthBytes.length]),
    lengthBytes,
  )
}
