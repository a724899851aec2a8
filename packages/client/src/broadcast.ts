import {
  encodeTransaction,
  getValidationErrors,
  isDelegated,
  isSigned,
  type Transaction,
} from '@thorkit/tx'
import { bytesToHex, ErrorCode, SIGNATURE_LENGTH, SignatureError } from '@thorkit/utils'
import debugDefault from 'debug'
import { awaitReceipt, type AwaitReceiptOptions } from './await-receipt'
import type { SendTransactionResult, TransactionReceipt } from './schemas'
import type { ThorClient } from './thor-client'

const debug = debugDefault('thorkit:client')

/**
 * Encodes a signed transaction and submits it to the node.
 */
export async function broadcast(
  client: Pick<ThorClient, 'sendTransaction'>,
  tx: Transaction,
): Promise<SendTransactionResult> {
  if (!isSigned(tx)) {
    throw new SignatureError('transaction must be signed before broadcast', {
      code: ErrorCode.NOT_SIGNED,
    })
  }
  if (isDelegated(tx) && tx.signature?.length === SIGNATURE_LENGTH) {
    throw new SignatureError('fee-delegated transaction is missing the delegator signature', {
      code: ErrorCode.NOT_SIGNED,
    })
  }
  const errors = getValidationErrors(tx)
  if (errors.length > 0) {
    debug(`broadcasting transaction with validation errors: ${errors.join('; ')}`)
  }

  const result = await client.sendTransaction(encodeTransaction(tx))
  const localId = tx.id === undefined ? undefined : bytesToHex(tx.id)
  if (localId !== undefined && localId !== result.id.toLowerCase()) {
    debug(`node returned id ${result.id}, expected ${localId}`)
  }
  debug(`broadcast ${result.id}`)
  return result
}

/**
 * Submits a signed transaction and waits for its receipt.
 */
export async function broadcastAndWait(
  client: Pick<ThorClient, 'sendTransaction' | 'getTransactionReceipt'>,
  tx: Transaction,
  options?: AwaitReceiptOptions,
): Promise<TransactionReceipt> {
  const { id } = await broadcast(client, tx)
  return awaitReceipt(client, id, options)
}
