import { SIGNATURE_LENGTH } from '@thorkit/utils'
import type { Transaction } from '../types'
import { getIntrinsicGas } from './gas'
import { isDelegated } from './signature'

/**
 * Gets validation errors for a transaction.
 */
export function getValidationErrors(tx: Transaction): string[] {
  const errors: string[] = []

  if (tx.signature !== undefined) {
    const expected = isDelegated(tx) ? SIGNATURE_LENGTH * 2 : SIGNATURE_LENGTH
    if (tx.signature.length !== expected) {
      errors.push(
        `signature length ${tx.signature.length} does not match fee delegation setting, expected ${expected}`,
      )
    }
  }

  const intrinsicGas = getIntrinsicGas(tx.clauses)
  if (intrinsicGas > tx.gas) {
    errors.push(
      `gas is too low. The gas is lower than the intrinsic gas of ${intrinsicGas}, the gas is: ${tx.gas}`,
    )
  }

  tx.clauses.forEach((clause, i) => {
    if (clause.to === undefined && clause.data.length === 0) {
      errors.push(`clauses[${i}]: contract creation clause requires bytecode`)
    }
  })

  return errors
}

/**
 * Checks if a transaction is valid.
 */
export function isValid(tx: Transaction): boolean {
  return getValidationErrors(tx).length === 0
}
