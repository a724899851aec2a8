import { bytesToHex, equalsBytes, hexToBytes, isHexString } from './bytes'
import { ErrorCode, FieldValidationError } from './errors'
import { keccak256 } from './hash'
import { privateToPublic } from './signature'

export const ADDRESS_LENGTH = 20

/**
 * A 20-byte account address.
 */
export class Address {
  public readonly bytes: Uint8Array

  constructor(bytes: Uint8Array) {
    if (bytes.length !== ADDRESS_LENGTH) {
      throw new FieldValidationError(
        `address must be ${ADDRESS_LENGTH} bytes, got ${bytes.length}`,
        { code: ErrorCode.INVALID_ADDRESS },
      )
    }
    this.bytes = bytes.slice()
  }

  equals(address: Address): boolean {
    return equalsBytes(this.bytes, address.bytes)
  }

  toString(): `0x${string}` {
    return bytesToHex(this.bytes)
  }

  toBytes(): Uint8Array {
    return this.bytes.slice()
  }
}

export function isValidAddress(value: string): boolean {
  return isHexString(value) && value.length === 2 + ADDRESS_LENGTH * 2
}

export function createAddressFromString(value: string): Address {
  if (!isValidAddress(value)) {
    throw new FieldValidationError(`invalid address ${JSON.stringify(value)}`, {
      code: ErrorCode.INVALID_ADDRESS,
    })
  }
  return new Address(hexToBytes(value))
}

/**
 * Last 20 bytes of keccak256 over the raw 64-byte public key.
 */
export function publicToAddress(publicKey: Uint8Array): Address {
  if (publicKey.length !== 64) {
    throw new FieldValidationError(
      `public key must be 64 bytes, got ${publicKey.length}`,
    )
  }
  return new Address(keccak256(publicKey).slice(-ADDRESS_LENGTH))
}

export function createAddressFromPrivateKey(privateKey: Uint8Array): Address {
  return publicToAddress(privateToPublic(privateKey))
}
