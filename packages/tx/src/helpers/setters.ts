import {
  type BigIntInput,
  type BytesInput,
  parseWith,
  zBigInt,
  zBytes,
  zUint,
} from '@thorkit/schema'
import { createClause } from '../clause'
import {
  BLOCK_REF_LENGTH,
  DEPENDS_ON_LENGTH,
  MAX_UINT8,
  MAX_UINT32,
  MAX_UINT64,
  MAX_UINT256,
} from '../params'
import { createReserved } from '../reserved'
import { freezeTx, UNSIGNED_STATE } from '../tx-data/base'
import type {
  ClauseInput,
  DynamicFeeTransaction,
  LegacyTransaction,
  Reserved,
  Transaction,
} from '../types'
import { getIntrinsicGas } from './gas'

// Every setter changes the signing hash, so any signature is dropped.

/**
 * Appends a clause and recomputes gas from the new clause list.
 */
export function appendClause<T extends Transaction>(tx: T, clause: ClauseInput): T {
  const clauses = [
    ...tx.clauses,
    createClause(clause, `transaction.clauses[${tx.clauses.length}]`),
  ]
  return freezeTx({
    ...tx,
    clauses,
    gas: getIntrinsicGas(clauses),
    ...UNSIGNED_STATE,
  })
}

export function putChainTag<T extends Transaction>(tx: T, chainTag: number): T {
  return freezeTx({
    ...tx,
    chainTag: parseWith(zUint(MAX_UINT8), chainTag, 'transaction.chainTag'),
    ...UNSIGNED_STATE,
  })
}

export function putBlockRef<T extends Transaction>(tx: T, blockRef: BytesInput): T {
  return freezeTx({
    ...tx,
    blockRef: parseWith(
      zBytes({ byteLength: BLOCK_REF_LENGTH }),
      blockRef,
      'transaction.blockRef',
    ),
    ...UNSIGNED_STATE,
  })
}

export function putExpiration<T extends Transaction>(tx: T, expiration: number): T {
  return freezeTx({
    ...tx,
    expiration: parseWith(zUint(MAX_UINT32), expiration, 'transaction.expiration'),
    ...UNSIGNED_STATE,
  })
}

export function putGas<T extends Transaction>(tx: T, gas: BigIntInput): T {
  return freezeTx({
    ...tx,
    gas: parseWith(zBigInt({ max: MAX_UINT64 }), gas, 'transaction.gas'),
    ...UNSIGNED_STATE,
  })
}

export function putDependsOn<T extends Transaction>(
  tx: T,
  dependsOn: BytesInput | null,
): T {
  return freezeTx({
    ...tx,
    dependsOn:
      dependsOn === null
        ? undefined
        : parseWith(
            zBytes({ byteLength: DEPENDS_ON_LENGTH }),
            dependsOn,
            'transaction.dependsOn',
          ),
    ...UNSIGNED_STATE,
  })
}

export function putNonce<T extends Transaction>(tx: T, nonce: BigIntInput): T {
  return freezeTx({
    ...tx,
    nonce: parseWith(zBigInt({ max: MAX_UINT64 }), nonce, 'transaction.nonce'),
    ...UNSIGNED_STATE,
  })
}

export function putReserved<T extends Transaction>(tx: T, reserved: Reserved): T {
  return freezeTx({
    ...tx,
    reserved: createReserved(reserved.features, reserved.unused),
    ...UNSIGNED_STATE,
  })
}

export function putGasPriceCoef(
  tx: LegacyTransaction,
  gasPriceCoef: number,
): LegacyTransaction {
  return freezeTx({
    ...tx,
    gasPriceCoef: parseWith(
      zUint(MAX_UINT8),
      gasPriceCoef,
      'transaction.gasPriceCoef',
    ),
    ...UNSIGNED_STATE,
  })
}

export function putMaxPriorityFeePerGas(
  tx: DynamicFeeTransaction,
  fee: BigIntInput,
): DynamicFeeTransaction {
  return freezeTx({
    ...tx,
    maxPriorityFeePerGas: parseWith(
      zBigInt({ max: MAX_UINT256 }),
      fee,
      'transaction.maxPriorityFeePerGas',
    ),
    ...UNSIGNED_STATE,
  })
}

export function putMaxFeePerGas(
  tx: DynamicFeeTransaction,
  fee: BigIntInput,
): DynamicFeeTransaction {
  return freezeTx({
    ...tx,
    maxFeePerGas: parseWith(
      zBigInt({ max: MAX_UINT256 }),
      fee,
      'transaction.maxFeePerGas',
    ),
    ...UNSIGNED_STATE,
  })
}
