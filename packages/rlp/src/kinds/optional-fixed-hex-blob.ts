import { safeResult } from '@thorkit/utils'
import { fieldError } from './fail'
import { fixedHexBlobKind } from './fixed-hex-blob'
import type { ProfileValue, ScalarKind } from './types'

export interface OptionalFixedHexBlobKind extends ScalarKind {
  readonly name: 'optionalFixedHexBlob'
  readonly bytes: number
}

function isAbsent(value: ProfileValue): boolean {
  return (
    value === null ||
    value === undefined ||
    value === '' ||
    value === '0x' ||
    (value instanceof Uint8Array && value.length === 0)
  )
}

/**
 * Fixed-length blob where an absent value is the empty byte string.
 */
export function optionalFixedHexBlobKind(
  bytes: number,
): OptionalFixedHexBlobKind {
  const fixed = fixedHexBlobKind(bytes)
  return {
    type: 'scalar',
    name: 'optionalFixedHexBlob',
    bytes,
    encode(value, path) {
      if (isAbsent(value)) return safeResult(new Uint8Array(0))
      return fixed.encode(value, path)
    },
    decode(buf, path) {
      if (buf.length === 0) return safeResult(buf)
      if (buf.length !== bytes) {
        return fieldError(path, `expected ${bytes} bytes, got ${buf.length}`)
      }
      return safeResult(buf)
    },
  }
}
