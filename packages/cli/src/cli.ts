import yargs, { type Argv } from 'yargs'
import { hideBin } from 'yargs/helpers'
import { decodeCommand, gasCommand } from './cmds/index'
import { type GlobalArgs, globalOptions } from './options/globalOptions'

const VERSION = '0.1.0'
const topBanner = `thorkit: transaction encoding and signing toolkit
  * Version: ${VERSION}`

export { decodeHandler, gasHandler } from './cmds/index'
export type { DecodeHandlerArgs, GasHandlerArgs } from './cmds/index'
export type { GlobalArgs } from './options/globalOptions'

export function getCli(argv: string[] = hideBin(process.argv)): Argv<GlobalArgs> {
  return yargs(argv)
    .env('THORKIT')
    .parserConfiguration({
      'dot-notation': false,
    })
    .options(globalOptions)
    .scriptName('thorkit')
    .command(decodeCommand)
    .command(gasCommand)
    .demandCommand(1)
    .showHelpOnFail(false)
    .usage(topBanner)
    .version(VERSION)
    .alias('h', 'help')
    .alias('v', 'version')
    .recommendCommands()
    .strict()
}
