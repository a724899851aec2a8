import { castTransaction, getIntrinsicGas } from '@thorkit/tx'
import type { GlobalArgs } from '../../options/globalOptions'
import { normalizeRaw, type RawArgs } from '../raw'

export type GasHandlerArgs = RawArgs & GlobalArgs

export function gasHandler(args: GasHandlerArgs): string {
  const tx = castTransaction(normalizeRaw(args.raw))
  const intrinsicGas = getIntrinsicGas(tx.clauses)
  if (args.json) {
    return JSON.stringify({
      intrinsicGas: intrinsicGas.toString(),
      gas: tx.gas.toString(),
      clauses: tx.clauses.length,
    })
  }
  return [
    `intrinsic gas: ${intrinsicGas}`,
    `gas: ${tx.gas}`,
    `clauses: ${tx.clauses.length}`,
  ].join('\n')
}
