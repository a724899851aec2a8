import { encodeObject, type ProfileRecord } from '@thorkit/rlp'
import {
  bytesToHex,
  concatBytes,
  type PrefixedHexString,
  unwrapSafe,
} from '@thorkit/utils'
import { DYNAMIC_FEE_TX_PREFIX } from '../params'
import { getTxProfile } from '../profiles'
import { encodeReserved } from '../reserved'
import { type JSONTx, type Transaction, TransactionType } from '../types'

function toProfileRecord(tx: Transaction): ProfileRecord {
  const common = {
    chainTag: tx.chainTag,
    blockRef: tx.blockRef,
    expiration: tx.expiration,
    clauses: tx.clauses.map((clause) => ({
      to: clause.to?.bytes ?? null,
      value: clause.value,
      data: clause.data,
    })),
    gas: tx.gas,
    dependsOn: tx.dependsOn ?? null,
    nonce: tx.nonce,
    reserved: encodeReserved(tx.reserved),
    signature: tx.signature ?? null,
  }
  if (tx.type === TransactionType.DynamicFee) {
    return {
      ...common,
      maxPriorityFeePerGas: tx.maxPriorityFeePerGas,
      maxFeePerGas: tx.maxFeePerGas,
    }
  }
  return { ...common, gasPriceCoef: tx.gasPriceCoef }
}

/**
 * RLP-encodes a transaction. The signature is appended only when requested
 * and present; dynamic-fee payloads carry the 0x51 type prefix.
 */
export function encodeTransaction(
  tx: Transaction,
  includeSignature = true,
): Uint8Array {
  const signed = includeSignature && tx.signature !== undefined
  const encoded = unwrapSafe(
    encodeObject(toProfileRecord(tx), getTxProfile(tx.type, signed)),
  )
  if (tx.type === TransactionType.DynamicFee) {
    return concatBytes(Uint8Array.of(DYNAMIC_FEE_TX_PREFIX), encoded)
  }
  return encoded
}

function bigIntToHex(value: bigint): PrefixedHexString {
  return `0x${value.toString(16)}`
}

function optionalHex(bytes: Uint8Array | undefined): PrefixedHexString | null {
  return bytes === undefined ? null : bytesToHex(bytes)
}

export function toJSON(tx: Transaction): JSONTx {
  const json: JSONTx = {
    type: tx.type,
    id: optionalHex(tx.id),
    chainTag: tx.chainTag,
    blockRef: bytesToHex(tx.blockRef),
    expiration: tx.expiration,
    clauses: tx.clauses.map((clause) => ({
      to: clause.to === undefined ? null : clause.to.toString(),
      value: bigIntToHex(clause.value),
      data: bytesToHex(clause.data),
    })),
    gas: bigIntToHex(tx.gas),
    dependsOn: optionalHex(tx.dependsOn),
    nonce: bigIntToHex(tx.nonce),
    reserved: {
      features: tx.reserved.features,
      unused: tx.reserved.unused.map((entry) => bytesToHex(entry)),
    },
    signature: optionalHex(tx.signature),
    origin: tx.origin === undefined ? null : tx.origin.toString(),
    delegator: tx.delegator === undefined ? null : tx.delegator.toString(),
  }
  if (tx.type === TransactionType.DynamicFee) {
    json.maxPriorityFeePerGas = bigIntToHex(tx.maxPriorityFeePerGas)
    json.maxFeePerGas = bigIntToHex(tx.maxFeePerGas)
  } else {
    json.gasPriceCoef = tx.gasPriceCoef
  }
  return json
}
