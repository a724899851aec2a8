import type { PositionalOptions } from 'yargs'

export type RawArgs = {
  raw: string
}

export const rawOption = {
  description: 'RLP-encoded transaction as hex, with or without 0x',
  type: 'string',
  demandOption: true,
} as const satisfies PositionalOptions

export function normalizeRaw(raw: string): string {
  const trimmed = raw.trim()
  return trimmed.startsWith('0x') ? trimmed : `0x${trimmed}`
}
