import { isSafeError, safeResult, setLengthLeft } from '@thorkit/utils'
import { fieldError } from './fail'
import { fixedHexBlobKind } from './fixed-hex-blob'
import type { Safe } from '@thorkit/utils'
import type { KindError, ScalarKind } from './types'

export interface CompactFixedHexBlobKind extends ScalarKind {
  readonly name: 'compactFixedHexBlob'
  readonly bytes: number
  decode(bytes: Uint8Array, path: string): Safe<Uint8Array, KindError>
}

/**
 * Fixed-length blob whose leading zero bytes are dropped on the wire. At least
 * one byte is always kept, so an all-zero value encodes as `0x00`.
 */
export function compactFixedHexBlobKind(
  bytes: number,
): CompactFixedHexBlobKind {
  const fixed = fixedHexBlobKind(bytes)
  return {
    type: 'scalar',
    name: 'compactFixedHexBlob',
    bytes,
    encode(value, path) {
      const res = fixed.encode(value, path)
      if (isSafeError(res)) return res
      const buf = res[1]
      let start = 0
      while (start < buf.length - 1 && buf[start] === 0) start++
      return safeResult(buf.slice(start))
    },
    decode(buf, path) {
      if (buf.length === 0) {
        return fieldError(path, 'expected compact value of at least one byte')
      }
      if (buf.length > bytes) {
        return fieldError(path, `expected at most ${bytes} bytes, got ${buf.length}`)
      }
      if (buf.length > 1 && buf[0] === 0) {
        return fieldError(path, 'expected compact value without leading zero')
      }
      return safeResult(setLengthLeft(buf, bytes))
    },
  }
}
