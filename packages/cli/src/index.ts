#!/usr/bin/env tsx

import { isThorkitError } from '@thorkit/utils'
import { getCli } from './cli'

const cli = getCli()

void cli
  .fail((msg, err) => {
    if (msg?.includes('Not enough non-option arguments')) {
      cli.showHelp()
      console.log('\n')
    }

    const errorMessage =
      err === undefined
        ? msg || 'Unknown error'
        : isThorkitError(err)
          ? err.message
          : err.stack || err.message

    console.error(` ✖ ${errorMessage}\n`)
    process.exit(1)
  })
  .parse()
