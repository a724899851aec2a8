import {
  DEFAULT_EXPIRATION,
  DEFAULT_MAX_FEE_PER_GAS,
  DEFAULT_MAX_PRIORITY_FEE_PER_GAS,
} from '@thorkit/chain-config'
import { parseWith, zBigInt } from '@thorkit/schema'
import { FieldValidationError } from '@thorkit/utils'
import { putSignature } from '../helpers/signature'
import { MAX_UINT256 } from '../params'
import {
  type DynamicFeeTransaction,
  type DynamicFeeTxData,
  TransactionType,
} from '../types'
import { freezeTx, normalizeTxBase, type TxDataDefaults } from './base'

/**
 * Creates a dynamic-fee transaction. `gasPriceCoef` is rejected.
 */
export function createDynamicFeeTx(
  data: DynamicFeeTxData,
  defaults: TxDataDefaults = { expiration: DEFAULT_EXPIRATION },
): DynamicFeeTransaction {
  if (data.gasPriceCoef !== undefined) {
    throw new FieldValidationError(
      'dynamic-fee transactions do not accept gasPriceCoef',
      { path: 'transaction' },
    )
  }
  const fee = zBigInt({ max: MAX_UINT256 })
  const tx = freezeTx<DynamicFeeTransaction>({
    type: TransactionType.DynamicFee,
    ...normalizeTxBase(data, defaults),
    maxPriorityFeePerGas:
      data.maxPriorityFeePerGas === undefined
        ? DEFAULT_MAX_PRIORITY_FEE_PER_GAS
        : parseWith(fee, data.maxPriorityFeePerGas, 'transaction.maxPriorityFeePerGas'),
    maxFeePerGas:
      data.maxFeePerGas === undefined
        ? DEFAULT_MAX_FEE_PER_GAS
        : parseWith(fee, data.maxFeePerGas, 'transaction.maxFeePerGas'),
  })
  return data.signature === undefined ? tx : putSignature(tx, data.signature)
}
