import type { Address } from '@thorkit/utils'
import { getIntrinsicGas } from './helpers/gas'
import { encodeTransaction, toJSON } from './helpers/serialization'
import { appendClause } from './helpers/setters'
import {
  coSignTransaction,
  getDelegatorSigningHash,
  getSigningHash,
  isDelegated,
  isSigned,
  signTransaction,
} from './helpers/signature'
import { getValidationErrors, isValid } from './helpers/validation'
import type { ClauseInput, Transaction, TransactionManager } from './types'

/**
 * Creates a TransactionManager from a frozen transaction.
 * Operations that change the transaction return a new manager.
 */
export function createTransactionManager(
  transaction: Transaction,
): TransactionManager {
  return Object.freeze({
    transaction,

    type: () => transaction.type,
    id: () => transaction.id,
    origin: () => transaction.origin,
    delegator: () => transaction.delegator,

    // Signature
    isSigned: () => isSigned(transaction),
    isDelegated: () => isDelegated(transaction),
    signingHash: () => getSigningHash(transaction),
    delegatorSigningHash: (origin: Address) =>
      getDelegatorSigningHash(transaction, origin),

    // Gas and serialization
    intrinsicGas: () => getIntrinsicGas(transaction.clauses),
    encode: (includeSignature = true) =>
      encodeTransaction(transaction, includeSignature),
    toJSON: () => toJSON(transaction),

    // Validation
    isValid: () => isValid(transaction),
    getValidationErrors: () => getValidationErrors(transaction),

    // Transitions
    appendClause: (clause: ClauseInput) =>
      createTransactionManager(appendClause(transaction, clause)),
    sign: (privateKey: Uint8Array) =>
      createTransactionManager(signTransaction(transaction, privateKey)),
    coSign: (delegatorKey: Uint8Array) =>
      createTransactionManager(coSignTransaction(transaction, delegatorKey)),
  })
}
