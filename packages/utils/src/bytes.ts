import {
  bytesToHex as _bytesToUnprefixedHex,
  concatBytes as _concatBytes,
  equalsBytes as _equalsBytes,
  hexToBytes as _hexToBytes,
  utf8ToBytes as _utf8ToBytes,
} from 'ethereum-cryptography/utils.js'
import { FieldValidationError } from './errors'

export type PrefixedHexString = `0x${string}`

const HEX_REGEX = /^0x[0-9a-fA-F]*$/

export const BIGINT_0 = BigInt(0)

/**
 * Returns true for `0x`-prefixed strings with an even number of hex digits.
 */
export function isHexString(value: string): value is PrefixedHexString {
  return HEX_REGEX.test(value) && value.length % 2 === 0
}

export function stripHexPrefix(str: string): string {
  return str.startsWith('0x') ? str.slice(2) : str
}

export function padToEven(a: string): string {
  return a.length % 2 ? `0${a}` : a
}

export function bytesToHex(bytes: Uint8Array): PrefixedHexString {
  return `0x${_bytesToUnprefixedHex(bytes)}`
}

export function hexToBytes(hex: string): Uint8Array {
  if (!isHexString(hex)) {
    throw new FieldValidationError(
      `expected 0x-prefixed hex string of even length, got ${JSON.stringify(hex)}`,
    )
  }
  return _hexToBytes(hex.slice(2))
}

export function bytesToBigInt(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return BIGINT_0
  return BigInt(`0x${_bytesToUnprefixedHex(bytes)}`)
}

/**
 * Minimal big-endian encoding: zero is the empty byte string.
 */
export function bigIntToUnpaddedBytes(value: bigint): Uint8Array {
  if (value < BIGINT_0) {
    throw new FieldValidationError(`expected unsigned integer, got ${value}`)
  }
  if (value === BIGINT_0) return new Uint8Array(0)
  return hexToBytes(`0x${padToEven(value.toString(16))}`)
}

export function bytesToInt(bytes: Uint8Array): number {
  const value = bytesToBigInt(bytes)
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new FieldValidationError(`value ${value} exceeds MAX_SAFE_INTEGER`)
  }
  return Number(value)
}

/**
 * Left-pads with zero bytes; throws when the input is already longer.
 */
export function setLengthLeft(bytes: Uint8Array, length: number): Uint8Array {
  if (bytes.length > length) {
    throw new FieldValidationError(
      `cannot pad ${bytes.length} bytes to ${length} bytes`,
    )
  }
  const out = new Uint8Array(length)
  out.set(bytes, length - bytes.length)
  return out
}

/**
 * Strips leading zero bytes.
 */
export function unpadBytes(bytes: Uint8Array): Uint8Array {
  let first = 0
  while (first < bytes.length && bytes[first] === 0) first++
  return bytes.slice(first)
}

export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  return _concatBytes(...arrays)
}

export function equalsBytes(a: Uint8Array, b: Uint8Array): boolean {
  return _equalsBytes(a, b)
}

export function utf8ToBytes(utf: string): Uint8Array {
  return _utf8ToBytes(utf)
}
