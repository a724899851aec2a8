import type { Address } from '@thorkit/utils'

export type BytesInput = Uint8Array | string

export type BigIntInput = bigint | number | string

export type AddressInput = Address | Uint8Array | string
