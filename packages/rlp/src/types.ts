/**
 * Values accepted by the encoder. Strings with a `0x` prefix are read as
 * hex, other strings as UTF-8; numbers and bigints use their minimal
 * big-endian form.
 */
export type RLPInput =
  | string
  | number
  | bigint
  | Uint8Array
  | RLPInput[]
  | null
  | undefined

/** A decoded item: either a byte string or a list of items */
export type RLPNode = Uint8Array | RLPList

export type RLPList = RLPNode[]

export interface DecodedStream {
  data: RLPNode
  /** Bytes that follow the first complete item */
  remainder: Uint8Array
}
