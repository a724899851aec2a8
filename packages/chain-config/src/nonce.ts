import { bytesToBigInt } from '@thorkit/utils'
import { getRandomBytesSync } from 'ethereum-cryptography/random.js'

export type NonceGenerator = () => bigint

/**
 * Eight random bytes read as an unsigned integer.
 */
export const randomNonce: NonceGenerator = () =>
  bytesToBigInt(getRandomBytesSync(8))
