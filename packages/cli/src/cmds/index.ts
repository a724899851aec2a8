export { type DecodeHandlerArgs, decodeHandler } from './decode/handler'
export { decodeCommand } from './decode/index'
export { type GasHandlerArgs, gasHandler } from './gas/handler'
export { gasCommand } from './gas/index'
