import type { Options } from 'yargs'

export type GlobalArgs = {
  json: boolean
}

export const globalOptions = {
  json: {
    description: 'Print compact machine-readable JSON',
    type: 'boolean',
    default: false,
  },
} as const satisfies Record<keyof GlobalArgs, Options>
