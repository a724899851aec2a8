import type { CommandModule } from 'yargs'
import type { GlobalArgs } from '../../options/globalOptions'
import { rawOption } from '../raw'
import { type DecodeHandlerArgs, decodeHandler } from './handler'

export const decodeCommand: CommandModule<GlobalArgs, DecodeHandlerArgs> = {
  command: 'decode <raw>',
  describe: 'Decode a raw transaction',
  builder: (yargs) => yargs.positional('raw', rawOption),
  handler: (args) => {
    console.log(decodeHandler(args))
  },
}
