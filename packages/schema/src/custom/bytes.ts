import { hexToBytes, isHex } from 'viem'
import { z } from 'zod'
import type { BytesInput } from './types'

interface BytesSchemaOptions {
  /** Exact length the decoded bytes must have */
  byteLength?: number
  errorMessage?: string
}

/**
 * Zod schema turning a Uint8Array or a 0x-prefixed, even-length hex string
 * into a Uint8Array.
 */
export function zBytes(options: BytesSchemaOptions = {}) {
  const { byteLength, errorMessage } = options

  return z
    .custom<BytesInput>(
      (val) => {
        if (val instanceof Uint8Array) return true
        if (typeof val === 'string') {
          return isHex(val, { strict: true }) && val.length % 2 === 0
        }
        return false
      },
      {
        message:
          errorMessage ||
          'Invalid bytes: must be Uint8Array or 0x-prefixed hex string of even length',
      },
    )
    .transform((val, ctx): Uint8Array => {
      const bytes =
        val instanceof Uint8Array
          ? val.slice()
          : isHex(val, { strict: true })
            ? hexToBytes(val)
            : new Uint8Array(0)
      if (byteLength !== undefined && bytes.length !== byteLength) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message:
            errorMessage || `Expected ${byteLength} bytes, got ${bytes.length}`,
        })
        return z.NEVER
      }
      return bytes
    })
}

export const zBytes32 = (errorMessage?: string) =>
  zBytes({ byteLength: 32, errorMessage })
