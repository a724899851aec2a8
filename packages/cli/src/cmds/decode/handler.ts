import { getNetworkByChainTag } from '@thorkit/chain-config'
import { castTransaction, toJSON } from '@thorkit/tx'
import type { GlobalArgs } from '../../options/globalOptions'
import { normalizeRaw, type RawArgs } from '../raw'

export type DecodeHandlerArgs = RawArgs & GlobalArgs

/**
 * Renders a raw transaction as JSON, including the recovered signers and
 * the network its chain tag belongs to.
 */
export function decodeHandler(args: DecodeHandlerArgs): string {
  const tx = castTransaction(normalizeRaw(args.raw))
  const output = {
    ...toJSON(tx),
    network: getNetworkByChainTag(tx.chainTag)?.name ?? null,
  }
  return args.json ? JSON.stringify(output) : JSON.stringify(output, null, 2)
}
