import { bytesToBigInt, DecodeError, ErrorCode } from '@thorkit/utils'
import {
  LIST_OFFSET,
  MAX_LENGTH_BYTES,
  SHORT_PAYLOAD_MAX,
  SINGLE_BYTE_MAX,
  STRING_OFFSET,
} from './constants'
import type { DecodedStream, RLPList, RLPNode } from './types'
import { safeSlice, toBytes } from './utils'

const LONG_STRING_BASE = STRING_OFFSET + SHORT_PAYLOAD_MAX
const LONG_LIST_BASE = LIST_OFFSET + SHORT_PAYLOAD_MAX

function invalid(message: string): DecodeError {
  return new DecodeError(`invalid RLP: ${message}`, {
    code: ErrorCode.INVALID_RLP,
  })
}

/**
 * Decodes one item. Without `stream` the input must hold exactly that item;
 * with it, the trailing bytes come back as `remainder`.
 */
export function decode(input: Uint8Array | string, stream?: false): RLPNode
export function decode(input: Uint8Array | string, stream: true): DecodedStream
export function decode(
  input: Uint8Array | string,
  stream = false,
): RLPNode | DecodedStream {
  if (input.length === 0) {
    return new Uint8Array(0)
  }

  const decoded = decodeItem(toBytes(input))
  if (stream) {
    return { data: decoded.data, remainder: decoded.remainder.slice() }
  }
  if (decoded.remainder.length !== 0) {
    throw invalid('remainder must be zero')
  }
  return decoded.data
}

function readLength(bytes: Uint8Array): number {
  if (bytes[0] === 0) {
    throw invalid('extra zeros in length')
  }
  if (bytes.length > MAX_LENGTH_BYTES) {
    throw invalid(`length field of ${bytes.length} bytes is too long`)
  }
  return Number(bytesToBigInt(bytes))
}

function decodeList(payload: Uint8Array): RLPList {
  const items: RLPList = []
  let rest = payload
  while (rest.length > 0) {
    const item = decodeItem(rest)
    items.push(item.data)
    rest = item.remainder
  }
  return items
}

function decodeItem(input: Uint8Array): DecodedStream {
  const prefix = input[0]

  if (prefix <= SINGLE_BYTE_MAX) {
    return { data: input.slice(0, 1), remainder: input.subarray(1) }
  }

  if (prefix <= LONG_STRING_BASE) {
    const length = prefix - STRING_OFFSET
    const data = safeSlice(input, 1, 1 + length)
    if (length === 1 && data[0] <= SINGLE_BYTE_MAX) {
      throw invalid('single byte below 0x80 must not be prefixed')
    }
    return { data, remainder: input.subarray(1 + length) }
  }

  if (prefix < LIST_OFFSET) {
    const lengthSize = prefix - LONG_STRING_BASE
    if (input.length - 1 < lengthSize) {
      throw invalid('not enough bytes for string length')
    }
    const length = readLength(safeSlice(input, 1, 1 + lengthSize))
    if (length <= SHORT_PAYLOAD_MAX) {
      throw invalid(`expected string length above ${SHORT_PAYLOAD_MAX}`)
    }
    const end = 1 + lengthSize + length
    return {
      data: safeSlice(input, 1 + lengthSize, end),
      remainder: input.subarray(end),
    }
  }

  if (prefix <= LONG_LIST_BASE) {
    const end = 1 + prefix - LIST_OFFSET
    return {
      data: decodeList(safeSlice(input, 1, end)),
      remainder: input.subarray(end),
    }
  }

  const lengthSize = prefix - LONG_LIST_BASE
  const length = readLength(safeSlice(input, 1, 1 + lengthSize))
  if (length <= SHORT_PAYLOAD_MAX) {
    throw invalid('encoded list too short')
  }
  const end = 1 + lengthSize + length
  if (end > input.length) {
    throw invalid('total length is larger than the data')
  }
  return {
    data: decodeList(safeSlice(input, 1 + lengthSize, end)),
    remainder: input.subarray(end),
  }
}
