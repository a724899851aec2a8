import {
  type AddressInput,
  type BigIntInput,
  type BytesInput,
  parseWith,
  zBigInt,
  zBytes,
  zOptionalAddress,
} from '@thorkit/schema'
import {
  bigIntToUnpaddedBytes,
  ClauseError,
  FieldValidationError,
} from '@thorkit/utils'
import { MAX_UINT256 } from './params'
import type { Clause, ClauseInput } from './types'

/**
 * Wire form of a clause value: zero is the empty string.
 */
export function encodeValue(value: bigint): Uint8Array {
  if (value > MAX_UINT256) {
    throw new FieldValidationError('value exceeds 32 bytes', { path: 'value' })
  }
  return bigIntToUnpaddedBytes(value)
}

/**
 * Normalizes a clause into binary form. A clause without recipient must carry
 * the bytecode to deploy.
 */
export function createClause(input: ClauseInput, path = 'clause'): Clause {
  const to = parseWith(zOptionalAddress(), input.to, `${path}.to`)
  const value =
    input.value === undefined
      ? 0n
      : parseWith(zBigInt({ max: MAX_UINT256 }), input.value, `${path}.value`)
  const data =
    input.data === undefined
      ? new Uint8Array(0)
      : parseWith(zBytes(), input.data, `${path}.data`)

  if (to === undefined && data.length === 0) {
    throw new ClauseError('contract creation clause requires bytecode', {
      path,
    })
  }
  return Object.freeze({ to, value, data })
}

export function transferClause(to: AddressInput, value: BigIntInput): Clause {
  return createClause({ to, value })
}

export function callClause(
  to: AddressInput,
  value: BigIntInput,
  data: BytesInput,
): Clause {
  return createClause({ to, value, data })
}

export function deployClause(bytecode: BytesInput, value: BigIntInput = 0n): Clause {
  return createClause({ to: null, value, data: bytecode })
}

export function isContractCreation(clause: Clause): boolean {
  return clause.to === undefined
}
