import { parseWith, type BytesInput, zBytes } from '@thorkit/schema'
import {
  type Address,
  blake2b256,
  concatBytes,
  createAddressFromPrivateKey,
  ecrecover,
  ecsign,
  ErrorCode,
  publicToAddress,
  SIGNATURE_LENGTH,
  SignatureError,
} from '@thorkit/utils'
import debugDefault from 'debug'
import { isFeeDelegated } from '../reserved'
import type { Transaction } from '../types'
import { encodeTransaction } from './serialization'

const debug = debugDefault('thorkit:tx:signature')

const DELEGATED_SIGNATURE_LENGTH = SIGNATURE_LENGTH * 2

/**
 * blake2b256 of the transaction encoded without its signature.
 */
export function getSigningHash(tx: Transaction): Uint8Array {
  return blake2b256(encodeTransaction(tx, false))
}

/**
 * The hash a gas payer signs: it binds the signing hash to the sender so the
 * delegator signature cannot be reused for another origin.
 */
export function getDelegatorSigningHash(
  tx: Transaction,
  origin: Address,
): Uint8Array {
  return blake2b256(getSigningHash(tx), origin.bytes)
}

export function computeTransactionId(
  signingHash: Uint8Array,
  origin: Address,
): Uint8Array {
  return blake2b256(signingHash, origin.bytes)
}

export interface RecoveredSigners {
  origin: Address
  delegator: Address | undefined
}

/**
 * Recovers the sender from a 65-byte signature, or the sender and the gas
 * payer from a 130-byte one.
 */
export function recoverSigners(
  signingHash: Uint8Array,
  signature: Uint8Array,
): RecoveredSigners {
  if (
    signature.length !== SIGNATURE_LENGTH &&
    signature.length !== DELEGATED_SIGNATURE_LENGTH
  ) {
    throw new SignatureError(
      `signature must be ${SIGNATURE_LENGTH} or ${DELEGATED_SIGNATURE_LENGTH} bytes, got ${signature.length}`,
      { code: ErrorCode.INVALID_SIGNATURE_LENGTH },
    )
  }
  const origin = publicToAddress(
    ecrecover(signingHash, signature.subarray(0, SIGNATURE_LENGTH)),
  )
  if (signature.length === SIGNATURE_LENGTH) {
    return { origin, delegator: undefined }
  }
  const delegator = publicToAddress(
    ecrecover(
      blake2b256(signingHash, origin.bytes),
      signature.subarray(SIGNATURE_LENGTH),
    ),
  )
  return { origin, delegator }
}

/**
 * Attaches a signature, recovering origin (and delegator) and recomputing the id.
 */
export function putSignature<T extends Transaction>(
  tx: T,
  signature: BytesInput,
): T {
  const sig = parseWith(zBytes(), signature, 'transaction.signature')
  const signingHash = getSigningHash(tx)
  const { origin, delegator } = recoverSigners(signingHash, sig)
  const next: T = {
    ...tx,
    signature: sig,
    origin,
    delegator,
    id: computeTransactionId(signingHash, origin),
  }
  Object.freeze(next)
  return next
}

export function isSigned(tx: Transaction): boolean {
  return tx.signature !== undefined
}

export function isDelegated(tx: Transaction): boolean {
  return isFeeDelegated(tx.reserved)
}

export function signTransaction<T extends Transaction>(
  tx: T,
  privateKey: Uint8Array,
): T {
  const signed = putSignature(tx, ecsign(getSigningHash(tx), privateKey))
  debug(`signed transaction origin=${String(signed.origin)}`)
  return signed
}

/**
 * Adds the gas payer signature to a transaction already signed by its sender.
 */
export function coSignTransaction<T extends Transaction>(
  tx: T,
  delegatorKey: Uint8Array,
): T {
  if (!isDelegated(tx)) {
    throw new SignatureError('fee delegation is not enabled on this transaction', {
      code: ErrorCode.DELEGATION_REQUIRED,
    })
  }
  if (
    tx.signature === undefined ||
    tx.origin === undefined ||
    tx.signature.length !== SIGNATURE_LENGTH
  ) {
    throw new SignatureError('transaction must carry the sender signature only', {
      code: ErrorCode.NOT_SIGNED,
    })
  }
  const delegatorSignature = ecsign(
    getDelegatorSigningHash(tx, tx.origin),
    delegatorKey,
  )
  const signed = putSignature(tx, concatBytes(tx.signature, delegatorSignature))
  debug(`co-signed transaction delegator=${String(signed.delegator)}`)
  return signed
}

/**
 * Signs as both sender and gas payer in one step.
 */
export function signAsSenderAndDelegator<T extends Transaction>(
  tx: T,
  senderKey: Uint8Array,
  delegatorKey: Uint8Array,
): T {
  if (!isDelegated(tx)) {
    throw new SignatureError('fee delegation is not enabled on this transaction', {
      code: ErrorCode.DELEGATION_REQUIRED,
    })
  }
  const signingHash = getSigningHash(tx)
  const origin = createAddressFromPrivateKey(senderKey)
  return putSignature(
    tx,
    concatBytes(
      ecsign(signingHash, senderKey),
      ecsign(blake2b256(signingHash, origin.bytes), delegatorKey),
    ),
  )
}
