import { DEFAULT_REQUEST_TIMEOUT_MS, type ThorConfig } from '@thorkit/chain-config'
import { type BytesInput, parseWith, zBytes } from '@thorkit/schema'
import type { BlockSource } from '@thorkit/tx'
import {
  bytesToHex,
  ErrorCode,
  isSafeError,
  NetworkError,
  type PrefixedHexString,
  safeSyncTry,
  safeTry,
} from '@thorkit/utils'
import debugDefault from 'debug'
import { z } from 'zod'
import {
  type Block,
  blockSchema,
  receiptSchema,
  type SendTransactionResult,
  sendTransactionResultSchema,
  type TransactionReceipt,
} from './schemas'

const debug = debugDefault('thorkit:client')

export interface ThorClientOptions {
  /** Base URL of the node's REST API */
  url: string
  /** Replaces the global fetch, used by tests */
  fetch?: typeof fetch
  /** Per-request timeout in milliseconds */
  timeout?: number
}

export type BlockRevision = 'best' | 'finalized' | number | PrefixedHexString

/**
 * REST client for a Thor node.
 */
export class ThorClient implements BlockSource {
  private readonly baseUrl: string
  private readonly fetchFn: typeof fetch
  private readonly timeout: number

  constructor(options: ThorClientOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '')
    this.fetchFn = options.fetch ?? globalThis.fetch
    this.timeout = options.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS
  }

  static fromConfig(config: Pick<ThorConfig, 'nodeUrl'>): ThorClient {
    return new ThorClient({ url: config.nodeUrl })
  }

  get url(): string {
    return this.baseUrl
  }

  /**
   * Returns `null` when the node does not know the revision.
   */
  async getBlock(revision: BlockRevision = 'best'): Promise<Block | null> {
    return this.request('GET', `/blocks/${revision}`, blockSchema.nullable())
  }

  async sendTransaction(raw: BytesInput): Promise<SendTransactionResult> {
    const bytes = parseWith(zBytes(), raw, 'raw')
    return this.request('POST', '/transactions', sendTransactionResultSchema, {
      raw: bytesToHex(bytes),
    })
  }

  /**
   * Returns `null` while the transaction is pending.
   */
  async getTransactionReceipt(id: string): Promise<TransactionReceipt | null> {
    return this.request(
      'GET',
      `/transactions/${id}/receipt`,
      receiptSchema.nullable(),
    )
  }

  private async request<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    path: string,
    schema: S,
    body?: unknown,
  ): Promise<z.output<S>> {
    debug(`${method} ${path}`)
    const res = await safeTry(() =>
      this.fetchFn(`${this.baseUrl}${path}`, {
        method,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeout),
      }),
    )
    if (isSafeError(res)) {
      const err = res[0]
      const timedOut = err.name === 'TimeoutError'
      throw new NetworkError(
        timedOut
          ? `${method} ${path} timed out after ${this.timeout}ms`
          : `${method} ${path} failed: ${err.message}`,
        {
          code: timedOut ? ErrorCode.TIMEOUT : ErrorCode.REQUEST_FAILED,
          cause: err,
        },
      )
    }

    const response = res[1]
    const text = await response.text()
    if (!response.ok) {
      debug(`${method} ${path} -> ${response.status}`)
      throw new NetworkError(
        `${method} ${path} returned ${response.status}: ${text.trim() || response.statusText}`,
        { status: response.status },
      )
    }

    const json = safeSyncTry((): unknown => JSON.parse(text))
    if (isSafeError(json)) {
      throw new NetworkError(`${method} ${path} returned invalid JSON`, {
        status: response.status,
        cause: json[0],
      })
    }
    const parsed = schema.safeParse(json[1])
    if (!parsed.success) {
      throw new NetworkError(
        `${method} ${path} returned an unexpected body: ${parsed.error.issues[0].message}`,
        { status: response.status, cause: parsed.error },
      )
    }
    return parsed.data
  }
}
