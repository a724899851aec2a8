import type { CommandModule } from 'yargs'
import type { GlobalArgs } from '../../options/globalOptions'
import { rawOption } from '../raw'
import { type GasHandlerArgs, gasHandler } from './handler'

export const gasCommand: CommandModule<GlobalArgs, GasHandlerArgs> = {
  command: 'gas <raw>',
  describe: 'Print the intrinsic gas of a raw transaction',
  builder: (yargs) => yargs.positional('raw', rawOption),
  handler: (args) => {
    console.log(gasHandler(args))
  },
}
