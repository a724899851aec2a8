import { blake2b } from 'ethereum-cryptography/blake2b.js'
import { keccak256 as _keccak256 } from 'ethereum-cryptography/keccak.js'
import { concatBytes } from './bytes'

/**
 * Blake2b with a 32-byte digest over the concatenation of `data`.
 */
export function blake2b256(...data: Uint8Array[]): Uint8Array {
  return blake2b(concatBytes(...data), 32)
}

export function keccak256(data: Uint8Array): Uint8Array {
  return _keccak256(data)
}
