import { decode } from './decode'
import { encode } from './encode'

export * from './decoded'
export * from './kinds'
export * from './profiler'
export type { DecodedStream, RLPInput, RLPList, RLPNode } from './types'

export const RLP = { encode, decode }
