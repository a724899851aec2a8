import {
  asRecord,
  type DecodedValue,
  getBigInt,
  getBytes,
  getList,
  getNumber,
  unpackValue,
} from '@thorkit/rlp'
import { type BytesInput, parseWith, zBytes } from '@thorkit/schema'
import { Address, DecodeError, unwrapSafe } from '@thorkit/utils'
import debugDefault from 'debug'
import { putSignature } from '../helpers/signature'
import { classifyTransaction } from '../profiles'
import { decodeReserved } from '../reserved'
import { freezeTx, UNSIGNED_STATE } from '../tx-data/base'
import {
  type Clause,
  type DynamicFeeTransaction,
  type LegacyTransaction,
  type Transaction,
  type TransactionBase,
  TransactionType,
} from '../types'

const debug = debugDefault('thorkit:tx')

function toClause(value: DecodedValue, index: number): Clause {
  const record = asRecord(value, `clauses[${index}]`)
  const to = getBytes(record, 'to')
  return Object.freeze({
    to: to.length === 0 ? undefined : new Address(to),
    value: getBigInt(record, 'value'),
    data: getBytes(record, 'data'),
  })
}

function toReservedEntry(value: DecodedValue, index: number): Uint8Array {
  if (!(value instanceof Uint8Array)) {
    throw new DecodeError('expected byte string', {
      path: `transaction.reserved[${index}]`,
    })
  }
  return value
}

/**
 * Decodes raw transaction bytes, picking the variant from the type prefix
 * and field count, and recovers the signers when a signature is present.
 */
export function castTransaction(raw: BytesInput): Transaction {
  const bytes = parseWith(zBytes(), raw, 'transaction')
  const shape = classifyTransaction(bytes)
  const record = asRecord(
    unwrapSafe(unpackValue(shape.profile.kind, shape.fields, 'transaction')),
    'transaction',
  )

  const dependsOn = getBytes(record, 'dependsOn')
  const base: TransactionBase = {
    chainTag: getNumber(record, 'chainTag'),
    blockRef: getBytes(record, 'blockRef'),
    expiration: getNumber(record, 'expiration'),
    clauses: Object.freeze(getList(record, 'clauses').map(toClause)),
    gas: getBigInt(record, 'gas'),
    dependsOn: dependsOn.length === 0 ? undefined : dependsOn,
    nonce: getBigInt(record, 'nonce'),
    reserved: decodeReserved(getList(record, 'reserved').map(toReservedEntry)),
    ...UNSIGNED_STATE,
  }

  const tx: Transaction =
    shape.type === TransactionType.DynamicFee
      ? freezeTx<DynamicFeeTransaction>({
          type: TransactionType.DynamicFee,
          ...base,
          maxPriorityFeePerGas: getBigInt(record, 'maxPriorityFeePerGas'),
          maxFeePerGas: getBigInt(record, 'maxFeePerGas'),
        })
      : freezeTx<LegacyTransaction>({
          type: TransactionType.Legacy,
          ...base,
          gasPriceCoef: getNumber(record, 'gasPriceCoef'),
        })

  debug(`cast type=${shape.type} signed=${shape.signed} clauses=${base.clauses.length}`)
  return shape.signed ? putSignature(tx, getBytes(record, 'signature')) : tx
}
