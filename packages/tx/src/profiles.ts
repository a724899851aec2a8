import {
  arrayKind,
  bufferKind,
  compactFixedHexBlobKind,
  hexBlobKind,
  numericKind,
  optionalFixedHexBlobKind,
  type Profile,
  parseRLP,
  profile,
  type RLPList,
  structKind,
} from '@thorkit/rlp'
import { DecodeError, ErrorCode, unwrapSafe } from '@thorkit/utils'
import {
  BLOCK_REF_LENGTH,
  DEPENDS_ON_LENGTH,
  DYNAMIC_FEE_TX_PREFIX,
} from './params'
import { TransactionType } from './types'

export const clauseKind = structKind([
  profile('to', optionalFixedHexBlobKind(20)),
  profile('value', numericKind(32)),
  profile('data', hexBlobKind()),
])

const headFields: Profile[] = [
  profile('chainTag', numericKind(1)),
  profile('blockRef', compactFixedHexBlobKind(BLOCK_REF_LENGTH)),
  profile('expiration', numericKind(4)),
  profile('clauses', arrayKind(clauseKind)),
]

const tailFields: Profile[] = [
  profile('gas', numericKind(8)),
  profile('dependsOn', optionalFixedHexBlobKind(DEPENDS_ON_LENGTH)),
  profile('nonce', numericKind(8)),
  profile('reserved', arrayKind(bufferKind())),
]

const legacyFeeFields: Profile[] = [profile('gasPriceCoef', numericKind(1))]

const dynamicFeeFields: Profile[] = [
  profile('maxPriorityFeePerGas', numericKind(32)),
  profile('maxFeePerGas', numericKind(32)),
]

const signatureField = profile('signature', bufferKind())

function txProfile(fields: Profile[]): Profile {
  return profile('transaction', structKind(fields))
}

/**
 * Field order is the wire contract: encode and decode share these lists.
 */
export const TxProfiles = {
  legacyUnsigned: txProfile([...headFields, ...legacyFeeFields, ...tailFields]),
  legacySigned: txProfile([
    ...headFields,
    ...legacyFeeFields,
    ...tailFields,
    signatureField,
  ]),
  dynamicFeeUnsigned: txProfile([
    ...headFields,
    ...dynamicFeeFields,
    ...tailFields,
  ]),
  dynamicFeeSigned: txProfile([
    ...headFields,
    ...dynamicFeeFields,
    ...tailFields,
    signatureField,
  ]),
} as const

export function getTxProfile(type: TransactionType, signed: boolean): Profile {
  if (type === TransactionType.DynamicFee) {
    return signed ? TxProfiles.dynamicFeeSigned : TxProfiles.dynamicFeeUnsigned
  }
  return signed ? TxProfiles.legacySigned : TxProfiles.legacyUnsigned
}

function fieldCount(txProfile: Profile): number {
  return txProfile.kind.type === 'struct' ? txProfile.kind.fields.length : 0
}

export interface ClassifiedTx {
  type: TransactionType
  signed: boolean
  profile: Profile
  /** Decoded RLP list of the transaction fields */
  fields: RLPList
}

/**
 * Decides the variant of a raw transaction from its type prefix and field
 * count. The count must match the unsigned or signed profile of that type.
 */
export function classifyTransaction(raw: Uint8Array): ClassifiedTx {
  if (raw.length === 0) {
    throw new DecodeError('empty transaction bytes', {
      code: ErrorCode.INVALID_RLP,
      path: 'transaction',
    })
  }

  let type: TransactionType
  let payload: Uint8Array
  if (raw[0] === DYNAMIC_FEE_TX_PREFIX) {
    type = TransactionType.DynamicFee
    payload = raw.subarray(1)
  } else if (raw[0] >= 0xc0) {
    type = TransactionType.Legacy
    payload = raw
  } else {
    throw new DecodeError(
      `unknown transaction type prefix 0x${raw[0].toString(16).padStart(2, '0')}`,
      { code: ErrorCode.UNKNOWN_TX_TYPE, path: 'transaction' },
    )
  }

  const node = unwrapSafe(parseRLP(payload, 'transaction'))
  if (node instanceof Uint8Array) {
    throw new DecodeError('expected list, got byte string', {
      path: 'transaction',
    })
  }
  const unsignedProfile = getTxProfile(type, false)
  const signedProfile = getTxProfile(type, true)
  const unsignedCount = fieldCount(unsignedProfile)
  const signedCount = fieldCount(signedProfile)
  if (node.length !== unsignedCount && node.length !== signedCount) {
    throw new DecodeError(
      `expected ${unsignedCount} or ${signedCount} fields, got ${node.length}`,
      { path: 'transaction' },
    )
  }

  const signed = node.length === signedCount
  return {
    type,
    signed,
    profile: signed ? signedProfile : unsignedProfile,
    fields: node,
  }
}
