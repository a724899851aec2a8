import { assert, describe, it } from 'vitest'
import {
  isSafeError,
  safeError,
  safeResult,
  safeSyncTry,
  safeTry,
  unwrapSafe,
} from '../../src'

describe('Safe results', () => {
  it('should unwrap successes and throw errors', () => {
    assert.equal(unwrapSafe(safeResult(5)), 5)
    assert.throws(() => unwrapSafe(safeError(new Error('boom'))), 'boom')
  })

  it('should capture thrown errors', async () => {
    const res = safeSyncTry((): number => {
      throw new Error('sync')
    })
    assert.isTrue(isSafeError(res))
    assert.equal(res[0]?.message, 'sync')

    const asyncRes = await safeTry(async () => 7)
    assert.deepEqual(asyncRes, [undefined, 7])

    const rejected = await safeTry(async (): Promise<number> => {
      throw new Error('async')
    })
    assert.isTrue(isSafeError(rejected))
    assert.equal(rejected[0]?.message, 'async')
  })
})
