import {
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_RECEIPT_TIMEOUT_MS,
} from '@thorkit/chain-config'
import { ErrorCode, NetworkError, TransactionRevertedError } from '@thorkit/utils'
import debugDefault from 'debug'
import * as _ from 'radash'
import type { TransactionReceipt } from './schemas'
import type { ThorClient } from './thor-client'

const debug = debugDefault('thorkit:client')

export interface AwaitReceiptOptions {
  /** Milliseconds before giving up */
  timeout?: number
  /** Milliseconds between polls */
  interval?: number
}

export function revertReason(receipt: TransactionReceipt): string {
  return receipt.outputs.at(0)?.vmError ?? 'unknown reason'
}

/**
 * Polls for a receipt until it appears or `timeout` elapses. A reverted
 * receipt raises TransactionRevertedError.
 */
export async function awaitReceipt(
  client: Pick<ThorClient, 'getTransactionReceipt'>,
  id: string,
  options: AwaitReceiptOptions = {},
): Promise<TransactionReceipt> {
  const timeout = options.timeout ?? DEFAULT_RECEIPT_TIMEOUT_MS
  const interval = options.interval ?? DEFAULT_POLL_INTERVAL_MS
  const deadline = Date.now() + timeout

  for (let attempt = 1; ; attempt++) {
    const receipt = await client.getTransactionReceipt(id)
    if (receipt !== null) {
      debug(`receipt for ${id} after ${attempt} polls, reverted=${receipt.reverted}`)
      if (receipt.reverted) {
        throw new TransactionRevertedError(id, revertReason(receipt))
      }
      return receipt
    }

    const remaining = deadline - Date.now()
    if (remaining <= 0) {
      throw new NetworkError(`no receipt for ${id} within ${timeout}ms`, {
        code: ErrorCode.TIMEOUT,
      })
    }
    await _.sleep(Math.min(interval, remaining))
  }
}
