export const paramsTx = {
  txGas: 5000n, // Base cost of every transaction
  clauseGas: 16000n, // Per clause with a recipient
  clauseGasContractCreation: 48000n, // Per clause without a recipient
  txDataZeroGas: 4n, // Per zero byte of clause data
  txDataNonZeroGas: 68n, // Per non-zero byte of clause data
} as const

export const MAX_UINT8 = 0xff
export const MAX_UINT32 = 0xffffffff
export const MAX_UINT64 = 2n ** 64n - 1n
export const MAX_UINT256 = 2n ** 256n - 1n

/**
 * Type byte prepended to the RLP payload of dynamic-fee transactions
 */
export const DYNAMIC_FEE_TX_PREFIX = 0x51

export const BLOCK_REF_LENGTH = 8
export const DEPENDS_ON_LENGTH = 32
