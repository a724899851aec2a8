import {
  blake2b256,
  bytesToHex,
  concatBytes,
  createAddressFromPrivateKey,
  ecrecover,
  ecsign,
  ErrorCode,
  publicToAddress,
  SignatureError,
} from '@thorkit/utils'
import { assert, describe, it } from 'vitest'
import {
  castTransaction,
  coSignTransaction,
  createDynamicFeeTx,
  createLegacyTx,
  createTransactionManager,
  EMPTY_RESERVED,
  enableFeeDelegation,
  encodeTransaction,
  getDelegatorSigningHash,
  getSigningHash,
  getValidationErrors,
  isDelegated,
  isSigned,
  putGas,
  putSignature,
  signAsSenderAndDelegator,
  signTransaction,
  type Reserved,
  type Transaction,
  TransactionType,
} from '../../src/index'

const senderKey = new Uint8Array(32).fill(1)
const delegatorKey = new Uint8Array(32).fill(2)
const senderAddress = createAddressFromPrivateKey(senderKey)
const delegatorAddress = createAddressFromPrivateKey(delegatorKey)

const to = '0x7567d83b7b8d80addcb281a71d54fc7b3364ffed'

const body = {
  chainTag: 1,
  blockRef: '0x00000000aabbccdd',
  expiration: 32,
  clauses: [{ to, value: 10000, data: '0x000000606060' }],
  nonce: 12345678,
}

interface TxVariant {
  name: string
  type: TransactionType
  build: (reserved?: Reserved) => Transaction
}

const variants: TxVariant[] = [
  {
    name: 'Legacy',
    type: TransactionType.Legacy,
    build: (reserved) => createLegacyTx({ ...body, gasPriceCoef: 128, reserved }),
  },
  {
    name: 'Dynamic-Fee',
    type: TransactionType.DynamicFee,
    build: (reserved) =>
      createDynamicFeeTx({
        ...body,
        maxPriorityFeePerGas: 10,
        maxFeePerGas: 400000,
        reserved,
      }),
  },
]

const delegation = enableFeeDelegation(EMPTY_RESERVED)

function expectSignatureError(fn: () => unknown, code: ErrorCode) {
  try {
    fn()
    assert.fail('expected signature failure')
  } catch (err) {
    if (!(err instanceof SignatureError)) throw err
    assert.equal(err.code, code)
  }
}

for (const variant of variants) {
  describe(`[Signature] ${variant.name}`, () => {
    const tx = variant.build()

    it('should sign and recover the sender', () => {
      const signed = signTransaction(tx, senderKey)
      assert.isTrue(isSigned(signed))
      assert.equal(signed.signature?.length, 65)
      assert.isTrue(signed.origin?.equals(senderAddress))
      assert.isUndefined(signed.delegator)
      assert.equal(
        signed.id && bytesToHex(signed.id),
        bytesToHex(blake2b256(getSigningHash(tx), senderAddress.bytes)),
      )
      assert.isFalse(isSigned(tx))
    })

    it('should keep the signing hash independent of the signature', () => {
      const signed = signTransaction(tx, senderKey)
      assert.deepEqual(getSigningHash(signed), getSigningHash(tx))
    })

    it('should recover signers after a round trip', () => {
      const signed = signTransaction(tx, senderKey)
      const decoded = castTransaction(encodeTransaction(signed))
      assert.equal(decoded.type, variant.type)
      assert.isTrue(decoded.origin?.equals(senderAddress))
      assert.deepEqual(decoded.id, signed.id)
      assert.deepEqual(decoded.signature, signed.signature)
      assert.deepEqual(encodeTransaction(decoded), encodeTransaction(signed))
    })

    it('should reject signatures of the wrong length', () => {
      const signature = ecsign(getSigningHash(tx), senderKey)
      expectSignatureError(
        () => putSignature(tx, signature.subarray(0, 64)),
        ErrorCode.INVALID_SIGNATURE_LENGTH,
      )
      expectSignatureError(
        () => putSignature(tx, concatBytes(signature, new Uint8Array(1))),
        ErrorCode.INVALID_SIGNATURE_LENGTH,
      )
    })

    it('should reject recovery bytes other than 0 and 1', () => {
      const signature = ecsign(getSigningHash(tx), senderKey)
      signature[64] = 27
      expectSignatureError(() => putSignature(tx, signature), ErrorCode.RECOVERY_FAILED)
    })

    it('should reject a 64-byte signature on decode', () => {
      const encoded = encodeTransaction(
        Object.freeze({ ...tx, signature: new Uint8Array(64) }),
      )
      expectSignatureError(() => castTransaction(encoded), ErrorCode.INVALID_SIGNATURE_LENGTH)
    })

    it('should clear the signature when a field changes', () => {
      const signed = signTransaction(tx, senderKey)
      const changed = putGas(signed, 50000)
      assert.isUndefined(changed.signature)
      assert.isUndefined(changed.origin)
      assert.isUndefined(changed.id)
    })
  })

  describe(`[Fee Delegation] ${variant.name}`, () => {
    const tx = variant.build(delegation)

    it('should recover sender and delegator', () => {
      const signed = coSignTransaction(signTransaction(tx, senderKey), delegatorKey)
      assert.isTrue(isDelegated(signed))
      assert.equal(signed.signature?.length, 130)
      assert.isTrue(signed.origin?.equals(senderAddress))
      assert.isTrue(signed.delegator?.equals(delegatorAddress))
      assert.deepEqual(getValidationErrors(signed), [])
    })

    it('should recover both signers after a round trip', () => {
      const signed = signAsSenderAndDelegator(tx, senderKey, delegatorKey)
      const decoded = castTransaction(encodeTransaction(signed))
      assert.equal(decoded.type, variant.type)
      assert.equal(decoded.signature?.length, 130)
      assert.isTrue(decoded.origin?.equals(senderAddress))
      assert.isTrue(decoded.delegator?.equals(delegatorAddress))
      assert.deepEqual(decoded.id, signed.id)
      assert.deepEqual(encodeTransaction(decoded), encodeTransaction(signed))
    })

    it('should match the two-step signing flow', () => {
      const oneStep = signAsSenderAndDelegator(tx, senderKey, delegatorKey)
      const twoStep = coSignTransaction(signTransaction(tx, senderKey), delegatorKey)
      assert.deepEqual(oneStep.signature, twoStep.signature)
    })

    it('should bind the delegator signature to the sender', () => {
      const signingHash = getSigningHash(tx)
      const delegatorHash = getDelegatorSigningHash(tx, senderAddress)
      assert.deepEqual(delegatorHash, blake2b256(signingHash, senderAddress.bytes))

      const delegatorSignature = ecsign(delegatorHash, delegatorKey)
      const recovered = publicToAddress(ecrecover(signingHash, delegatorSignature))
      assert.isFalse(recovered.equals(delegatorAddress))
    })

    it('should recover different signers when the halves are swapped', () => {
      const senderSignature = ecsign(getSigningHash(tx), senderKey)
      const delegatorSignature = ecsign(
        getDelegatorSigningHash(tx, senderAddress),
        delegatorKey,
      )
      const swapped = putSignature(tx, concatBytes(delegatorSignature, senderSignature))
      assert.isFalse(swapped.origin?.equals(senderAddress))
      assert.isFalse(swapped.delegator?.equals(delegatorAddress))
    })

    it('should flag a sender-only signature', () => {
      const signed = signTransaction(tx, senderKey)
      assert.deepEqual(getValidationErrors(signed), [
        'signature length 65 does not match fee delegation setting, expected 130',
      ])
    })

    it('should require fee delegation to co-sign', () => {
      const plain = signTransaction(variant.build(), senderKey)
      expectSignatureError(
        () => coSignTransaction(plain, delegatorKey),
        ErrorCode.DELEGATION_REQUIRED,
      )
      expectSignatureError(
        () => signAsSenderAndDelegator(variant.build(), senderKey, delegatorKey),
        ErrorCode.DELEGATION_REQUIRED,
      )
    })

    it('should require the sender signature to co-sign', () => {
      expectSignatureError(() => coSignTransaction(tx, delegatorKey), ErrorCode.NOT_SIGNED)
    })

    it('should co-sign through the manager', () => {
      const manager = createTransactionManager(tx).sign(senderKey).coSign(delegatorKey)
      assert.isTrue(manager.origin()?.equals(senderAddress))
      assert.isTrue(manager.delegator()?.equals(delegatorAddress))
      assert.isTrue(manager.isValid())
    })
  })
}
