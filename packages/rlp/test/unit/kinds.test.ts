import {
  bytesToHex,
  FieldValidationError,
  hexToBytes,
  isSafeError,
  unwrapSafe,
} from '@thorkit/utils'
import { assert, describe, it } from 'vitest'
import {
  bufferKind,
  compactFixedHexBlobKind,
  fixedHexBlobKind,
  hexBlobKind,
  numericKind,
  optionalFixedHexBlobKind,
  type ProfileValue,
  type ScalarKind,
} from '../../src'

function encodeHex(kind: ScalarKind, value: ProfileValue): string {
  return bytesToHex(unwrapSafe(kind.encode(value, 'field')))
}

function encodeError(
  kind: ScalarKind,
  value: ProfileValue,
): FieldValidationError {
  const res = kind.encode(value, 'field')
  if (!isSafeError(res)) throw new Error('expected encode to fail')
  const err = res[0]
  if (!(err instanceof FieldValidationError)) throw err
  return err
}

function decodeFails(kind: ScalarKind, hex: string): boolean {
  return isSafeError(kind.decode(hexToBytes(hex), 'field'))
}

describe('numeric kind', () => {
  const kind = numericKind(8)

  it('should encode zero as the empty string', () => {
    assert.equal(encodeHex(kind, 0), '0x')
    assert.equal(encodeHex(kind, 0n), '0x')
    assert.equal(encodeHex(kind, '0x0'), '0x')
    assert.equal(unwrapSafe(kind.decode(new Uint8Array(0), 'field')), 0n)
  })

  it('should accept numbers, bigints, hex and decimal strings', () => {
    assert.equal(encodeHex(kind, 256), '0x0100')
    assert.equal(encodeHex(kind, 256n), '0x0100')
    assert.equal(encodeHex(kind, '0x100'), '0x0100')
    assert.equal(encodeHex(kind, '256'), '0x0100')
    assert.equal(unwrapSafe(kind.decode(hexToBytes('0x0100'), 'field')), 256n)
  })

  it('should reject values outside its range', () => {
    assert.equal(encodeError(kind, 2n ** 64n).path, 'field')
    encodeError(kind, -1)
    encodeError(kind, 1.5)
    encodeError(kind, 'abc')
    encodeError(kind, null)
    encodeError(kind, hexToBytes('0x01'))
  })

  it('should reject oversized and non-canonical encodings', () => {
    assert.isTrue(decodeFails(kind, '0x010203040506070809'))
    assert.isTrue(decodeFails(kind, '0x0001'))
  })

  it('should reject an empty value on decode', () => {
    const res = kind.decode(new Uint8Array(0), 'transaction.blockRef')
    assert.isTrue(isSafeError(res))
    const err = res[0]
    assert.instanceOf(err, FieldValidationError)
    assert.equal(
      err?.message,
      'transaction.blockRef: expected compact value of at least one byte',
    )
  })
})

describe('buffer kind', () => {
  it('should pass bytes through', () => {
    const kind = bufferKind()
    assert.equal(encodeHex(kind, hexToBytes('0x0102')), '0x0102')
    encodeError(kind, '0x0102')
  })
})

describe('hex blob kind', () => {
  const kind = hexBlobKind()

  it('should accept prefixed hex and bytes', () => {
    assert.equal(encodeHex(kind, '0x000000606060'), '0x000000606060')
    assert.equal(encodeHex(kind, '0x'), '0x')
    assert.equal(encodeHex(kind, hexToBytes('0xff')), '0xff')
  })

  it('should reject malformed hex', () => {
    encodeError(kind, '0x123')
    encodeError(kind, '1234')
    encodeError(kind, '0xzz')
    encodeError(kind, 12)
  })
})

describe('fixed hex blob kind', () => {
  const kind = fixedHexBlobKind(4)

  it('should require the exact length', () => {
    assert.equal(encodeHex(kind, '0x12345678'), '0x12345678')
    assert.equal(
      encodeError(kind, '0x1234').message,
      'field: expected 4 bytes, got 2',
    )
    assert.isTrue(decodeFails(kind, '0x123456'))
    assert.isFalse(decodeFails(kind, '0x12345678'))
  })
})

describe('optional fixed hex blob kind', () => {
  const kind = optionalFixedHexBlobKind(20)
  const address = '0x7567d83b7b8d80addcb281a71d54fc7b3364ffed'

  it('should encode absent values as the empty string', () => {
    assert.equal(encodeHex(kind, null), '0x')
    assert.equal(encodeHex(kind, undefined), '0x')
    assert.equal(encodeHex(kind, ''), '0x')
    assert.equal(encodeHex(kind, '0x'), '0x')
    assert.equal(
      unwrapSafe(kind.decode(new Uint8Array(0), 'field')).toString(),
      '',
    )
  })

  it('should enforce the length of present values', () => {
    assert.equal(encodeHex(kind, address), address)
    encodeError(kind, `0x${'11'.repeat(19)}`)
    encodeError(kind, `0x${'11'.repeat(21)}`)
    assert.isTrue(decodeFails(kind, `0x${'11'.repeat(19)}`))
  })
})

describe('compact fixed hex blob kind', () => {
  const kind = compactFixedHexBlobKind(8)

  it('should strip leading zeros on encode', () => {
    assert.equal(encodeHex(kind, '0x00000000aabbccdd'), '0xaabbccdd')
    assert.equal(encodeHex(kind, '0x0000000000000000'), '0x00')
    assert.equal(encodeHex(kind, '0x0102030405060708'), '0x0102030405060708')
  })

  it('should restore the fixed length on decode', () => {
    for (const hex of [
      '0x00000000aabbccdd',
      '0x0000000000000000',
      '0x0000000000000001',
      '0xff00000000000000',
    ]) {
      const encoded = unwrapSafe(kind.encode(hex, 'field'))
      assert.equal(bytesToHex(unwrapSafe(kind.decode(encoded, 'field'))), hex)
    }
  })

  it('should reject wrong lengths and padded input', () => {
    encodeError(kind, '0x00000000aabbcc')
    assert.isTrue(decodeFails(kind, '0x010203040506070809'))
    assert.isTrue(decodeFails(kind, '0x0001'))
  })

  it('should reject an empty value on decode', () => {
    const res = kind.decode(new Uint8Array(0), 'transaction.blockRef')
    assert.isTrue(isSafeError(res))
    const err = res[0]
    assert.instanceOf(err, FieldValidationError)
    assert.equal(
      err?.message,
      'transaction.blockRef: expected compact value of at least one byte',
    )
  })
})
