import { secp256k1 } from 'ethereum-cryptography/secp256k1.js'
import { concatBytes } from './bytes'
import { ErrorCode, FieldValidationError, SignatureError } from './errors'

export const SIGNATURE_LENGTH = 65

function assertHash(hash: Uint8Array): void {
  if (hash.length !== 32) {
    throw new FieldValidationError(
      `message hash must be 32 bytes, got ${hash.length}`,
    )
  }
}

export function isValidPrivateKey(privateKey: Uint8Array): boolean {
  return privateKey.length === 32 && secp256k1.utils.isValidPrivateKey(privateKey)
}

export function assertPrivateKey(privateKey: Uint8Array): void {
  if (!isValidPrivateKey(privateKey)) {
    throw new FieldValidationError('invalid secp256k1 private key', {
      code: ErrorCode.INVALID_PRIVATE_KEY,
    })
  }
}

/**
 * Uncompressed public key without the leading 0x04 byte (64 bytes).
 */
export function privateToPublic(privateKey: Uint8Array): Uint8Array {
  assertPrivateKey(privateKey)
  return secp256k1.getPublicKey(privateKey, false).slice(1)
}

/**
 * Signs a 32-byte hash, returning `r ‖ s ‖ recovery` (65 bytes).
 */
export function ecsign(hash: Uint8Array, privateKey: Uint8Array): Uint8Array {
  assertHash(hash)
  assertPrivateKey(privateKey)
  const sig = secp256k1.sign(hash, privateKey)
  return concatBytes(sig.toCompactRawBytes(), Uint8Array.of(sig.recovery))
}

/**
 * Recovers the 64-byte public key that produced `signature` over `hash`.
 */
export function ecrecover(hash: Uint8Array, signature: Uint8Array): Uint8Array {
  assertHash(hash)
  if (signature.length !== SIGNATURE_LENGTH) {
    throw new SignatureError(
      `signature must be ${SIGNATURE_LENGTH} bytes, got ${signature.length}`,
      { code: ErrorCode.INVALID_SIGNATURE_LENGTH },
    )
  }
  const recovery = signature[64]
  if (recovery !== 0 && recovery !== 1) {
    throw new SignatureError(`invalid recovery byte ${recovery}`, {
      code: ErrorCode.RECOVERY_FAILED,
    })
  }
  try {
    const point = secp256k1.Signature.fromCompact(signature.subarray(0, 64))
      .addRecoveryBit(recovery)
      .recoverPublicKey(hash)
    return point.toRawBytes(false).slice(1)
  } catch (err) {
    throw new SignatureError('public key recovery failed', {
      code: ErrorCode.RECOVERY_FAILED,
      cause: err,
    })
  }
}
