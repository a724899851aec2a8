import type { Address, PrefixedHexString } from '@thorkit/utils'
import type { AddressInput, BigIntInput, BytesInput } from '@thorkit/schema'

export type TransactionType =
  (typeof TransactionType)[keyof typeof TransactionType]

export const TransactionType = {
  Legacy: 0,
  DynamicFee: 0x51,
} as const

/**
 * One transfer, call or deployment. `to === undefined` creates a contract.
 */
export interface Clause {
  readonly to: Address | undefined
  readonly value: bigint
  readonly data: Uint8Array
}

export interface ClauseInput {
  to?: AddressInput | null
  value?: BigIntInput
  data?: BytesInput
}

/**
 * Feature flags plus forward-compatible entries the protocol does not use yet.
 */
export interface Reserved {
  readonly features: number
  readonly unused: readonly Uint8Array[]
}

export interface TransactionBase {
  readonly chainTag: number
  readonly blockRef: Uint8Array
  readonly expiration: number
  readonly clauses: readonly Clause[]
  readonly gas: bigint
  readonly dependsOn: Uint8Array | undefined
  readonly nonce: bigint
  readonly reserved: Reserved
  readonly signature: Uint8Array | undefined
  /** Recovered from the first signature half */
  readonly origin: Address | undefined
  /** Recovered from the second signature half of a fee-delegated transaction */
  readonly delegator: Address | undefined
  readonly id: Uint8Array | undefined
}

export interface LegacyTransaction extends TransactionBase {
  readonly type: typeof TransactionType.Legacy
  readonly gasPriceCoef: number
}

export interface DynamicFeeTransaction extends TransactionBase {
  readonly type: typeof TransactionType.DynamicFee
  readonly maxPriorityFeePerGas: bigint
  readonly maxFeePerGas: bigint
}

export type Transaction = LegacyTransaction | DynamicFeeTransaction

export interface TxDataBase {
  chainTag: number
  blockRef: BytesInput
  expiration?: number
  clauses?: readonly ClauseInput[]
  /** Defaults to the intrinsic gas of the clauses */
  gas?: BigIntInput
  dependsOn?: BytesInput | null
  /** Defaults to a random 8-byte value */
  nonce?: BigIntInput
  reserved?: Reserved
  signature?: BytesInput
}

export interface LegacyTxData extends TxDataBase {
  gasPriceCoef?: number
  maxPriorityFeePerGas?: never
  maxFeePerGas?: never
}

export interface DynamicFeeTxData extends TxDataBase {
  maxPriorityFeePerGas?: BigIntInput
  maxFeePerGas?: BigIntInput
  gasPriceCoef?: never
}

export interface JSONClause {
  to: PrefixedHexString | null
  value: PrefixedHexString
  data: PrefixedHexString
}

export interface JSONTx {
  type: TransactionType
  id: PrefixedHexString | null
  chainTag: number
  blockRef: PrefixedHexString
  expiration: number
  clauses: JSONClause[]
  gasPriceCoef?: number
  maxPriorityFeePerGas?: PrefixedHexString
  maxFeePerGas?: PrefixedHexString
  gas: PrefixedHexString
  dependsOn: PrefixedHexString | null
  nonce: PrefixedHexString
  reserved: { features: number; unused: PrefixedHexString[] }
  signature: PrefixedHexString | null
  origin: PrefixedHexString | null
  delegator: PrefixedHexString | null
}

/**
 * Functional wrapper around a frozen transaction.
 */
export interface TransactionManager {
  readonly transaction: Transaction
  type(): TransactionType
  id(): Uint8Array | undefined
  origin(): Address | undefined
  delegator(): Address | undefined
  isSigned(): boolean
  isDelegated(): boolean
  signingHash(): Uint8Array
  delegatorSigningHash(origin: Address): Uint8Array
  intrinsicGas(): bigint
  encode(includeSignature?: boolean): Uint8Array
  toJSON(): JSONTx
  isValid(): boolean
  getValidationErrors(): string[]
  appendClause(clause: ClauseInput): TransactionManager
  sign(privateKey: Uint8Array): TransactionManager
  coSign(delegatorKey: Uint8Array): TransactionManager
}
