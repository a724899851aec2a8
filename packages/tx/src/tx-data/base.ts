import { randomNonce } from '@thorkit/chain-config'
import { parseWith, zBigInt, zBytes, zUint } from '@thorkit/schema'
import { createClause } from '../clause'
import { getIntrinsicGas } from '../helpers/gas'
import {
  BLOCK_REF_LENGTH,
  DEPENDS_ON_LENGTH,
  MAX_UINT8,
  MAX_UINT32,
  MAX_UINT64,
} from '../params'
import { createReserved, EMPTY_RESERVED } from '../reserved'
import type { Transaction, TransactionBase, TxDataBase } from '../types'

type UnsignedState = Pick<
  TransactionBase,
  'signature' | 'origin' | 'delegator' | 'id'
>

export const UNSIGNED_STATE: UnsignedState = Object.freeze({
  signature: undefined,
  origin: undefined,
  delegator: undefined,
  id: undefined,
})

export interface TxDataDefaults {
  expiration: number
}

/**
 * Validates and normalizes the fields shared by both variants. The result is
 * unsigned; a signature in `data` is applied by the variant constructor.
 */
export function normalizeTxBase(
  data: TxDataBase,
  defaults: TxDataDefaults,
): TransactionBase {
  const clauses = Object.freeze(
    (data.clauses ?? []).map((clause, i) =>
      createClause(clause, `transaction.clauses[${i}]`),
    ),
  )
  return {
    chainTag: parseWith(zUint(MAX_UINT8), data.chainTag, 'transaction.chainTag'),
    blockRef: parseWith(
      zBytes({ byteLength: BLOCK_REF_LENGTH }),
      data.blockRef,
      'transaction.blockRef',
    ),
    expiration:
      data.expiration === undefined
        ? defaults.expiration
        : parseWith(zUint(MAX_UINT32), data.expiration, 'transaction.expiration'),
    clauses,
    gas:
      data.gas === undefined
        ? getIntrinsicGas(clauses)
        : parseWith(zBigInt({ max: MAX_UINT64 }), data.gas, 'transaction.gas'),
    dependsOn:
      data.dependsOn === undefined || data.dependsOn === null
        ? undefined
        : parseWith(
            zBytes({ byteLength: DEPENDS_ON_LENGTH }),
            data.dependsOn,
            'transaction.dependsOn',
          ),
    nonce:
      data.nonce === undefined
        ? randomNonce()
        : parseWith(zBigInt({ max: MAX_UINT64 }), data.nonce, 'transaction.nonce'),
    reserved:
      data.reserved === undefined
        ? EMPTY_RESERVED
        : createReserved(data.reserved.features, data.reserved.unused),
    ...UNSIGNED_STATE,
  }
}

export function freezeTx<T extends Transaction>(tx: T): T {
  Object.freeze(tx.clauses)
  Object.freeze(tx)
  return tx
}
