import { FieldValidationError } from '@thorkit/utils'

export type NetworkName = (typeof Network)[keyof typeof Network]

export const Network = {
  Mainnet: 'mainnet',
  Testnet: 'testnet',
  Solo: 'solo',
} as const

export interface NetworkConfig {
  name: NetworkName
  /** Last byte of the genesis block id */
  chainTag: number
  /** Default REST endpoint of a node on this network */
  nodeUrl: string
}

export const networks: { [key in NetworkName]: NetworkConfig } = {
  mainnet: {
    name: Network.Mainnet,
    chainTag: 0x4a,
    nodeUrl: 'https://mainnet.veblocks.net',
  },
  testnet: {
    name: Network.Testnet,
    chainTag: 0x27,
    nodeUrl: 'https://testnet.veblocks.net',
  },
  solo: {
    name: Network.Solo,
    chainTag: 0xf6,
    nodeUrl: 'http://localhost:8669',
  },
}

export function isNetworkName(name: string): name is NetworkName {
  return Object.values(Network).some((network) => network === name)
}

export function getNetwork(name: string): NetworkConfig {
  if (!isNetworkName(name)) {
    throw new FieldValidationError(
      `unknown network ${JSON.stringify(name)}, expected one of ${Object.values(Network).join(', ')}`,
      { path: 'network' },
    )
  }
  return networks[name]
}

export function getChainTag(name: string): number {
  return getNetwork(name).chainTag
}

export function getNetworkByChainTag(chainTag: number): NetworkConfig | undefined {
  return Object.values(networks).find((network) => network.chainTag === chainTag)
}
