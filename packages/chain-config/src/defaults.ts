export const DEFAULT_EXPIRATION = 32

export const DEFAULT_GAS_PRICE_COEF = 0

export const DEFAULT_MAX_PRIORITY_FEE_PER_GAS = BigInt(400_000)

export const DEFAULT_MAX_FEE_PER_GAS = BigInt(400_000)

export const DEFAULT_RECEIPT_TIMEOUT_MS = 30_000

export const DEFAULT_POLL_INTERVAL_MS = 1_000

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000
