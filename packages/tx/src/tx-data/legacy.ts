import { DEFAULT_EXPIRATION, DEFAULT_GAS_PRICE_COEF } from '@thorkit/chain-config'
import { parseWith, zUint } from '@thorkit/schema'
import { FieldValidationError } from '@thorkit/utils'
import { putSignature } from '../helpers/signature'
import { MAX_UINT8 } from '../params'
import {
  type LegacyTransaction,
  type LegacyTxData,
  TransactionType,
} from '../types'
import { freezeTx, normalizeTxBase, type TxDataDefaults } from './base'

/**
 * Creates a legacy transaction priced by `gasPriceCoef`. Dynamic-fee fields
 * are rejected.
 */
export function createLegacyTx(
  data: LegacyTxData,
  defaults: TxDataDefaults = { expiration: DEFAULT_EXPIRATION },
): LegacyTransaction {
  if (
    data.maxPriorityFeePerGas !== undefined ||
    data.maxFeePerGas !== undefined
  ) {
    throw new FieldValidationError(
      'legacy transactions do not accept maxPriorityFeePerGas or maxFeePerGas',
      { path: 'transaction' },
    )
  }
  const tx = freezeTx<LegacyTransaction>({
    type: TransactionType.Legacy,
    ...normalizeTxBase(data, defaults),
    gasPriceCoef:
      data.gasPriceCoef === undefined
        ? DEFAULT_GAS_PRICE_COEF
        : parseWith(zUint(MAX_UINT8), data.gasPriceCoef, 'transaction.gasPriceCoef'),
  })
  return data.signature === undefined ? tx : putSignature(tx, data.signature)
}
