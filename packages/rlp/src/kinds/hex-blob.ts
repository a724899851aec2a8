import {
  type FieldValidationError,
  hexToBytes,
  isHexString,
  type Safe,
  safeResult,
} from '@thorkit/utils'
import { fieldError } from './fail'
import type { ProfileValue, ScalarKind } from './types'

export interface HexBlobKind extends ScalarKind {
  readonly name: 'hexBlob'
}

/**
 * Accepts a `0x`-prefixed, even-length hex string or raw bytes.
 */
export function toBlobBytes(
  value: ProfileValue,
  path: string,
): Safe<Uint8Array, FieldValidationError> {
  if (value instanceof Uint8Array) return safeResult(value.slice())
  if (typeof value === 'string') {
    if (!isHexString(value)) {
      return fieldError(path, 'expected 0x-prefixed hex string of even length')
    }
    return safeResult(hexToBytes(value))
  }
  return fieldError(path, 'expected hex string or Uint8Array')
}

export function hexBlobKind(): HexBlobKind {
  return {
    type: 'scalar',
    name: 'hexBlob',
    encode: toBlobBytes,
    decode(bytes) {
      return safeResult(bytes)
    },
  }
}
