import { createTransaction } from '@thorkit/tx'
import { bytesToHex, ErrorCode, hexToBytes, NetworkError } from '@thorkit/utils'
import { assert, describe, it, vi } from 'vitest'
import { ThorClient } from '../../src/index'

const blockId = `0x00000002${'cd'.repeat(28)}`

const blockJson = {
  id: blockId,
  number: 2,
  parentID: `0x00000001${'00'.repeat(28)}`,
  timestamp: 1700000000,
  gasLimit: 10000000,
}

function mockFetch(body: string, status = 200) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    new Response(body, { status }),
  )
}

async function expectNetworkError(promise: Promise<unknown>): Promise<NetworkError> {
  try {
    await promise
  } catch (err) {
    if (err instanceof NetworkError) return err
    throw err
  }
  throw new Error('expected NetworkError')
}

describe('[ThorClient]', () => {
  it('should fetch a block by revision', async () => {
    const fetch = mockFetch(JSON.stringify(blockJson))
    const client = new ThorClient({ url: 'http://node.test/', fetch })
    const block = await client.getBlock('best')
    assert.equal(block?.id, blockId)
    assert.equal(block?.number, 2)
    assert.deepEqual(block?.transactions, [])
    assert.equal(fetch.mock.calls[0][0], 'http://node.test/blocks/best')
    assert.equal(fetch.mock.calls[0][1]?.method, 'GET')
  })

  it('should return null for an unknown block', async () => {
    const client = new ThorClient({ url: 'http://node.test', fetch: mockFetch('null') })
    assert.isNull(await client.getBlock(12345))
  })

  it('should post raw transactions as hex', async () => {
    const id = `0x${'11'.repeat(32)}`
    const fetch = mockFetch(JSON.stringify({ id }))
    const client = new ThorClient({ url: 'http://node.test', fetch })
    const result = await client.sendTransaction(hexToBytes('0xc0'))
    assert.equal(result.id, id)
    assert.equal(fetch.mock.calls[0][0], 'http://node.test/transactions')
    assert.equal(fetch.mock.calls[0][1]?.method, 'POST')
    assert.equal(fetch.mock.calls[0][1]?.body, '{"raw":"0xc0"}')
  })

  it('should request receipts by id', async () => {
    const id = `0x${'22'.repeat(32)}`
    const fetch = mockFetch('null')
    const client = new ThorClient({ url: 'http://node.test', fetch })
    assert.isNull(await client.getTransactionReceipt(id))
    assert.equal(fetch.mock.calls[0][0], `http://node.test/transactions/${id}/receipt`)
  })

  it('should raise on error statuses', async () => {
    const client = new ThorClient({
      url: 'http://node.test',
      fetch: mockFetch('bad tx: insufficient energy\n', 400),
    })
    const err = await expectNetworkError(client.sendTransaction('0xc0'))
    assert.equal(err.status, 400)
    assert.equal(err.code, ErrorCode.REQUEST_FAILED)
    assert.equal(err.message, 'POST /transactions returned 400: bad tx: insufficient energy')
  })

  it('should raise when the request fails', async () => {
    const fetch = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
      throw new TypeError('connection refused')
    })
    const client = new ThorClient({ url: 'http://node.test', fetch })
    const err = await expectNetworkError(client.getBlock())
    assert.equal(err.code, ErrorCode.REQUEST_FAILED)
    assert.equal(err.message, 'GET /blocks/best failed: connection refused')
  })

  it('should reject unexpected bodies', async () => {
    const client = new ThorClient({
      url: 'http://node.test',
      fetch: mockFetch(JSON.stringify({ number: 'two' })),
    })
    const err = await expectNetworkError(client.getBlock())
    assert.match(err.message, /^GET \/blocks\/best returned an unexpected body: /)
  })

  it('should reject invalid JSON', async () => {
    const client = new ThorClient({ url: 'http://node.test', fetch: mockFetch('<html>') })
    const err = await expectNetworkError(client.getBlock())
    assert.equal(err.message, 'GET /blocks/best returned invalid JSON')
  })

  it('should serve as the block source of a new transaction', async () => {
    const client = new ThorClient({
      url: 'http://node.test',
      fetch: mockFetch(JSON.stringify(blockJson)),
    })
    const tx = await createTransaction({ chainTag: 0xf6 }, { blockSource: client })
    assert.equal(bytesToHex(tx.blockRef), '0x00000002cdcdcdcd')
  })

  it('should build from configuration', () => {
    const client = ThorClient.fromConfig({ nodeUrl: 'http://localhost:8669/' })
    assert.equal(client.url, 'http://localhost:8669')
  })
})
