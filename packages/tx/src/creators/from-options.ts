import {
  DEFAULT_EXPIRATION,
  getChainTag,
  loadConfig,
  type NonceGenerator,
  type ThorConfig,
} from '@thorkit/chain-config'
import {
  type BigIntInput,
  type BytesInput,
  parseWith,
  zBytes32,
} from '@thorkit/schema'
import { FieldValidationError, NetworkError } from '@thorkit/utils'
import debugDefault from 'debug'
import { BLOCK_REF_LENGTH } from '../params'
import { EMPTY_RESERVED, enableFeeDelegation } from '../reserved'
import { createDynamicFeeTx } from '../tx-data/dynamic-fee'
import { createLegacyTx } from '../tx-data/legacy'
import {
  type ClauseInput,
  type DynamicFeeTransaction,
  type LegacyTransaction,
  type Reserved,
  type Transaction,
  TransactionType,
  type TxDataBase,
} from '../types'

const debug = debugDefault('thorkit:tx')

/**
 * Anything that can report the current best block, such as a ThorClient.
 */
export interface BlockSource {
  getBlock(revision: 'best'): Promise<{ id: string } | null>
}

export interface CreateTxContext {
  /** Used for the default block reference when `blockRef` is omitted */
  blockSource?: BlockSource
  config?: Pick<ThorConfig, 'network' | 'expiration'>
  nonce?: NonceGenerator
}

interface CommonTransactionOptions {
  /** Network name used for the chain tag when `chainTag` is omitted */
  network?: string
  chainTag?: number
  blockRef?: BytesInput
  expiration?: number
  clauses?: readonly ClauseInput[]
  gas?: BigIntInput
  dependsOn?: BytesInput | null
  nonce?: BigIntInput
  reserved?: Reserved
  /** Sets the fee-delegation feature flag */
  feeDelegation?: boolean
}

export interface LegacyTransactionOptions extends CommonTransactionOptions {
  type?: typeof TransactionType.Legacy
  gasPriceCoef?: number
  maxPriorityFeePerGas?: never
  maxFeePerGas?: never
}

export interface DynamicFeeTransactionOptions extends CommonTransactionOptions {
  type: typeof TransactionType.DynamicFee
  maxPriorityFeePerGas?: BigIntInput
  maxFeePerGas?: BigIntInput
  gasPriceCoef?: never
}

export type TransactionOptions =
  | LegacyTransactionOptions
  | DynamicFeeTransactionOptions

/**
 * First 8 bytes of a 32-byte block id.
 */
export function blockRefFromBlockId(blockId: BytesInput): Uint8Array {
  return parseWith(zBytes32(), blockId, 'block.id').slice(0, BLOCK_REF_LENGTH)
}

async function fetchBlockRef(source: BlockSource | undefined): Promise<Uint8Array> {
  if (source === undefined) {
    throw new FieldValidationError(
      'blockRef is required when no block source is given',
      { path: 'transaction.blockRef' },
    )
  }
  const block = await source.getBlock('best')
  if (block === null) {
    throw new NetworkError('best block is not available')
  }
  return blockRefFromBlockId(block.id)
}

function resolveChainTag(
  options: TransactionOptions,
  context: CreateTxContext,
): number {
  if (options.chainTag !== undefined) return options.chainTag
  if (options.network !== undefined) return getChainTag(options.network)
  return (context.config ?? loadConfig()).network.chainTag
}

/**
 * Builds an unsigned transaction, filling chain tag, block reference,
 * expiration, gas, fee fields and nonce from defaults where omitted.
 */
export async function createTransaction(
  options: DynamicFeeTransactionOptions,
  context?: CreateTxContext,
): Promise<DynamicFeeTransaction>
export async function createTransaction(
  options: LegacyTransactionOptions,
  context?: CreateTxContext,
): Promise<LegacyTransaction>
export async function createTransaction(
  options: TransactionOptions,
  context: CreateTxContext = {},
): Promise<Transaction> {
  const reserved = options.reserved ?? EMPTY_RESERVED
  const data: TxDataBase = {
    chainTag: resolveChainTag(options, context),
    blockRef: options.blockRef ?? (await fetchBlockRef(context.blockSource)),
    expiration: options.expiration,
    clauses: options.clauses,
    gas: options.gas,
    dependsOn: options.dependsOn,
    nonce: options.nonce ?? context.nonce?.(),
    reserved: options.feeDelegation ? enableFeeDelegation(reserved) : reserved,
  }
  const defaults = {
    expiration: context.config?.expiration ?? DEFAULT_EXPIRATION,
  }

  const tx =
    options.type === TransactionType.DynamicFee
      ? createDynamicFeeTx(
          {
            ...data,
            maxPriorityFeePerGas: options.maxPriorityFeePerGas,
            maxFeePerGas: options.maxFeePerGas,
            gasPriceCoef: options.gasPriceCoef,
          },
          defaults,
        )
      : createLegacyTx(
          {
            ...data,
            gasPriceCoef: options.gasPriceCoef,
            maxPriorityFeePerGas: options.maxPriorityFeePerGas,
            maxFeePerGas: options.maxFeePerGas,
          },
          defaults,
        )

  debug(
    `created type=${tx.type} chainTag=${tx.chainTag} clauses=${tx.clauses.length} gas=${tx.gas}`,
  )
  return tx
}
