import { isSafeError, safeResult } from '@thorkit/utils'
import { fieldError } from './fail'
import { toBlobBytes } from './hex-blob'
import type { ScalarKind } from './types'

export interface FixedHexBlobKind extends ScalarKind {
  readonly name: 'fixedHexBlob'
  readonly bytes: number
}

export function fixedHexBlobKind(bytes: number): FixedHexBlobKind {
  return {
    type: 'scalar',
    name: 'fixedHexBlob',
    bytes,
    encode(value, path) {
      const res = toBlobBytes(value, path)
      if (isSafeError(res)) return res
      if (res[1].length !== bytes) {
        return fieldError(path, `expected ${bytes} bytes, got ${res[1].length}`)
      }
      return res
    },
    decode(buf, path) {
      if (buf.length !== bytes) {
        return fieldError(path, `expected ${bytes} bytes, got ${buf.length}`)
      }
      return safeResult(buf)
    },
  }
}
