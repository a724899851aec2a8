import { z } from 'zod'
import type { BigIntInput } from './types'

const HEX_INT = /^0x[0-9a-fA-F]+$/
const DEC_INT = /^[0-9]+$/

interface BigIntSchemaOptions {
  /** Largest accepted value, inclusive */
  max?: bigint
  errorMessage?: string
}

/**
 * Zod schema for unsigned integers given as bigint, safe number, hex or
 * decimal string.
 */
export function zBigInt(options: BigIntSchemaOptions = {}) {
  const { max, errorMessage } = options

  return z
    .custom<BigIntInput>(
      (val) => {
        if (typeof val === 'bigint') return val >= 0n
        if (typeof val === 'number') return Number.isSafeInteger(val) && val >= 0
        if (typeof val === 'string') return HEX_INT.test(val) || DEC_INT.test(val)
        return false
      },
      {
        message:
          errorMessage ||
          'Invalid integer: must be unsigned bigint, safe integer, hex or decimal string',
      },
    )
    .transform((val, ctx): bigint => {
      const num = BigInt(val)
      if (max !== undefined && num > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: errorMessage || `Value ${num} exceeds maximum ${max}`,
        })
        return z.NEVER
      }
      return num
    })
}

/**
 * Unsigned integer bounded to `max` and returned as a number.
 */
export const zUint = (max: number, errorMessage?: string) =>
  zBigInt({ max: BigInt(max), errorMessage }).transform((val) => Number(val))
