import { bytesToHex, ClauseError, FieldValidationError, hexToBytes } from '@thorkit/utils'
import { assert, describe, it } from 'vitest'
import {
  callClause,
  createClause,
  deployClause,
  encodeValue,
  isContractCreation,
  transferClause,
} from '../../src/index'

const to = '0x7567d83b7b8d80addcb281a71d54fc7b3364ffed'

describe('[Clause]', () => {
  it('should build a transfer clause', () => {
    const clause = transferClause(to, '0x2710')
    assert.equal(clause.to?.toString(), to)
    assert.equal(clause.value, 10000n)
    assert.equal(clause.data.length, 0)
    assert.isFalse(isContractCreation(clause))
  })

  it('should build call and deploy clauses', () => {
    const call = callClause(hexToBytes(to), 0, '0xa9059cbb')
    assert.equal(bytesToHex(call.data), '0xa9059cbb')

    const deploy = deployClause('0x6060', 5n)
    assert.isUndefined(deploy.to)
    assert.equal(deploy.value, 5n)
    assert.isTrue(isContractCreation(deploy))
  })

  it('should treat null and 0x recipients as contract creation', () => {
    assert.isUndefined(createClause({ to: null, data: '0x60' }).to)
    assert.isUndefined(createClause({ to: '0x', data: '0x60' }).to)
  })

  it('should reject recipients of the wrong length', () => {
    assert.throws(() => transferClause(`0x${'11'.repeat(19)}`, 1), FieldValidationError)
    assert.throws(() => transferClause(`0x${'11'.repeat(21)}`, 1), FieldValidationError)
    assert.throws(() => transferClause(new Uint8Array(19), 1), FieldValidationError)
  })

  it('should reject a contract creation without bytecode', () => {
    assert.throws(() => deployClause('0x'), ClauseError)
    assert.throws(() => createClause({ value: 1 }), ClauseError)
  })

  it('should locate invalid fields', () => {
    try {
      createClause({ to, data: '0x123' }, 'transaction.clauses[2]')
      assert.fail('expected failure')
    } catch (err) {
      if (!(err instanceof FieldValidationError)) throw err
      assert.equal(err.path, 'transaction.clauses[2].data')
    }
  })

  it('should reject negative and oversized values', () => {
    assert.throws(() => transferClause(to, 2n ** 256n), FieldValidationError)
    assert.throws(() => transferClause(to, -1), FieldValidationError)
  })
})

describe('encodeValue', () => {
  it('should encode zero as the empty string', () => {
    assert.equal(encodeValue(0n).length, 0)
  })

  it('should use minimal big-endian bytes', () => {
    assert.equal(bytesToHex(encodeValue(10000n)), '0x2710')
    assert.equal(encodeValue(2n ** 256n - 1n).length, 32)
  })

  it('should reject values above 32 bytes', () => {
    assert.throws(() => encodeValue(2n ** 256n), FieldValidationError)
  })
})
