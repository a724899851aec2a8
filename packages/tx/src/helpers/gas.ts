import { paramsTx } from '../params'
import type { Clause } from '../types'

/**
 * Calculates the data gas cost of a clause payload.
 */
export function getDataGas(data: Uint8Array): bigint {
  let cost = 0n
  for (let i = 0; i < data.length; i++) {
    cost += data[i] === 0 ? paramsTx.txDataZeroGas : paramsTx.txDataNonZeroGas
  }
  return cost
}

export function getClauseGas(clause: Clause): bigint {
  const base =
    clause.to === undefined
      ? paramsTx.clauseGasContractCreation
      : paramsTx.clauseGas
  return base + getDataGas(clause.data)
}

/**
 * Calculates the intrinsic gas cost for a clause list.
 */
export function getIntrinsicGas(clauses: readonly Clause[]): bigint {
  return clauses.reduce<bigint>((total, clause) => total + getClauseGas(clause), paramsTx.txGas)
}
