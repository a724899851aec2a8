import { safeResult } from '@thorkit/utils'
import { fieldError } from './fail'
import type { ScalarKind } from './types'

export interface BufferKind extends ScalarKind {
  readonly name: 'buffer'
}

/**
 * Pass-through for values that are already binary.
 */
export function bufferKind(): BufferKind {
  return {
    type: 'scalar',
    name: 'buffer',
    encode(value, path) {
      if (!(value instanceof Uint8Array)) {
        return fieldError(path, 'expected Uint8Array')
      }
      return safeResult(value)
    },
    decode(bytes) {
      return safeResult(bytes)
    },
  }
}
