import { bytesToHex, DecodeError, FieldValidationError, hexToBytes } from '@thorkit/utils'
import { assert, describe, it } from 'vitest'
import {
  createReserved,
  decodeReserved,
  disableFeeDelegation,
  EMPTY_RESERVED,
  enableFeeDelegation,
  encodeReserved,
  isFeeDelegated,
} from '../../src/index'

describe('[Reserved]', () => {
  it('should encode the empty record as an empty list', () => {
    assert.deepEqual(encodeReserved(EMPTY_RESERVED), [])
    assert.deepEqual(encodeReserved(createReserved(0, [new Uint8Array(0)])), [])
  })

  it('should encode non-zero features as the first element', () => {
    const list = encodeReserved(enableFeeDelegation(EMPTY_RESERVED))
    assert.equal(list.length, 1)
    assert.equal(bytesToHex(list[0]), '0x01')
  })

  it('should keep inner empty entries and trim trailing ones', () => {
    const reserved = createReserved(0, [hexToBytes('0xaa'), new Uint8Array(0)])
    const list = encodeReserved(reserved)
    assert.deepEqual(
      list.map((entry) => bytesToHex(entry)),
      ['0x', '0xaa'],
    )
  })

  it('should decode what it encodes', () => {
    const reserved = createReserved(5, [hexToBytes('0xbeef')])
    const decoded = decodeReserved(encodeReserved(reserved))
    assert.equal(decoded.features, 5)
    assert.equal(decoded.unused.length, 1)
    assert.equal(bytesToHex(decoded.unused[0]), '0xbeef')
    assert.equal(decodeReserved([]), EMPTY_RESERVED)
  })

  it('should reject untrimmed lists', () => {
    assert.throws(() => decodeReserved([hexToBytes('0x01'), new Uint8Array(0)]), DecodeError)
  })

  it('should reject oversized and zero-padded features', () => {
    assert.throws(() => decodeReserved([hexToBytes('0x0102030405')]), DecodeError)
    assert.throws(() => decodeReserved([hexToBytes('0x0001')]), DecodeError)
  })

  it('should toggle fee delegation without touching other bits', () => {
    const reserved = createReserved(6)
    assert.isFalse(isFeeDelegated(reserved))
    const enabled = enableFeeDelegation(reserved)
    assert.equal(enabled.features, 7)
    assert.isTrue(isFeeDelegated(enabled))
    assert.equal(disableFeeDelegation(enabled).features, 6)
  })

  it('should reject features outside 32 bits', () => {
    assert.throws(() => createReserved(-1), FieldValidationError)
    assert.throws(() => createReserved(2 ** 32), FieldValidationError)
    assert.throws(() => createReserved(1.5), FieldValidationError)
  })
})
