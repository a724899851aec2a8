import { assert, describe, it } from 'vitest'
import {
  bigIntToUnpaddedBytes,
  bytesToBigInt,
  bytesToHex,
  FieldValidationError,
  hexToBytes,
  isHexString,
  setLengthLeft,
  unpadBytes,
} from '../../src'

describe('hex conversion', () => {
  it('should convert between hex and bytes', () => {
    assert.deepEqual(hexToBytes('0x00ff10'), Uint8Array.from([0, 255, 16]))
    assert.equal(bytesToHex(Uint8Array.from([0, 255, 16])), '0x00ff10')
    assert.deepEqual(hexToBytes('0x'), new Uint8Array(0))
  })

  it('should reject unprefixed and odd-length hex', () => {
    assert.throws(() => hexToBytes('00ff'), FieldValidationError)
    assert.throws(() => hexToBytes('0x0ff'), FieldValidationError)
    assert.throws(() => hexToBytes('0xzz'), FieldValidationError)
  })

  it('should detect hex strings', () => {
    assert.isTrue(isHexString('0xabCD'))
    assert.isTrue(isHexString('0x'))
    assert.isFalse(isHexString('abcd'))
    assert.isFalse(isHexString('0xabc'))
  })
})

describe('integer conversion', () => {
  it('should encode zero as the empty byte string', () => {
    assert.equal(bigIntToUnpaddedBytes(0n).length, 0)
    assert.equal(bytesToBigInt(new Uint8Array(0)), 0n)
  })

  it('should use minimal big-endian encoding', () => {
    assert.equal(bytesToHex(bigIntToUnpaddedBytes(256n)), '0x0100')
    assert.equal(bytesToHex(bigIntToUnpaddedBytes(12345678n)), '0xbc614e')
    assert.equal(bytesToBigInt(hexToBytes('0x0100')), 256n)
  })

  it('should reject negative values', () => {
    assert.throws(() => bigIntToUnpaddedBytes(-1n), FieldValidationError)
  })
})

describe('padding', () => {
  it('should pad and unpad', () => {
    assert.equal(
      bytesToHex(setLengthLeft(hexToBytes('0xaabb'), 4)),
      '0x0000aabb',
    )
    assert.equal(bytesToHex(unpadBytes(hexToBytes('0x0000aabb'))), '0xaabb')
    assert.equal(unpadBytes(new Uint8Array(3)).length, 0)
    assert.throws(() => setLengthLeft(new Uint8Array(5), 4))
  })
})
