import { FieldValidationError } from '@thorkit/utils'
import { z } from 'zod'
import {
  DEFAULT_EXPIRATION,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_RECEIPT_TIMEOUT_MS,
} from './defaults'
import { getNetwork, Network, type NetworkConfig } from './networks'

export interface ConfigArgs {
  network?: string
  nodeUrl?: string
  expiration?: number
  receiptTimeout?: number
  pollInterval?: number
}

export interface ThorConfig {
  network: NetworkConfig
  nodeUrl: string
  expiration: number
  receiptTimeout: number
  pollInterval: number
}

export type Env = Record<string, string | undefined>

const configSchema = z.object({
  network: z.enum([Network.Mainnet, Network.Testnet, Network.Solo]),
  nodeUrl: z.string().url().optional(),
  expiration: z.coerce.number().int().positive().max(0xffffffff),
  receiptTimeout: z.coerce.number().int().positive(),
  pollInterval: z.coerce.number().int().positive(),
})

/**
 * Resolves configuration from explicit arguments, then `THOR_*` environment
 * variables, then defaults.
 */
export function loadConfig(args: ConfigArgs = {}, env: Env = process.env): ThorConfig {
  const result = configSchema.safeParse({
    network: args.network ?? env.THOR_NETWORK ?? Network.Testnet,
    nodeUrl: args.nodeUrl ?? env.THOR_NODE_URL,
    expiration: args.expiration ?? env.THOR_EXPIRATION ?? DEFAULT_EXPIRATION,
    receiptTimeout:
      args.receiptTimeout ??
      env.THOR_RECEIPT_TIMEOUT ??
      DEFAULT_RECEIPT_TIMEOUT_MS,
    pollInterval:
      args.pollInterval ?? env.THOR_POLL_INTERVAL ?? DEFAULT_POLL_INTERVAL_MS,
  })
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new FieldValidationError(issue.message, {
      path: ['config', ...issue.path.map(String)].join('.'),
      cause: result.error,
    })
  }

  const network = getNetwork(result.data.network)
  return {
    network,
    nodeUrl: result.data.nodeUrl ?? network.nodeUrl,
    expiration: result.data.expiration,
    receiptTimeout: result.data.receiptTimeout,
    pollInterval: result.data.pollInterval,
  }
}
