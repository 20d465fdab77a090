#!/usr/bin/env node

// Load environment variables first, before any other imports
import '../env.js'

import { loggers } from '../config/logger.js'
import { HarvesterError, errorMessage } from '../errors.js'
import { withCommandContext } from './context.js'
import { parseFlags, readIdFlag } from './parse-flags.js'
import { runBootstrapCommand } from './commands/bootstrap.js'
import { runCategoriesCommand } from './commands/categories.js'
import { runCountCommand } from './commands/count.js'
import { runSyncCommand } from './commands/sync.js'
import { runTokensCommand } from './commands/tokens.js'

function printHelp(): void {
  console.log('Harvester CLI')
  console.log('')
  console.log('Commands:')
  console.log('  sync [--store-id <id>]          Sync products for every store, or one')
  console.log('  tokens [--all]                  Acquire tokens for stores without one (or every store)')
  console.log('  categories [--store-id <id>]    Extract and store categories')
  console.log('  count --store-id <id>           Print the product count for a store')
  console.log('  bootstrap --store-id <id> [--inline]  Queue (or run) token and category bootstrap')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  let exitCode = 2

  switch (command) {
    case 'sync': {
      const storeId = readIdFlag(flags, 'store-id')
      exitCode = await withCommandContext(ctx => runSyncCommand({ storeId }, ctx))
      break
    }
    case 'tokens':
      exitCode = await withCommandContext(ctx => runTokensCommand({ all: flags.all === true }, ctx))
      break
    case 'categories': {
      const storeId = readIdFlag(flags, 'store-id')
      exitCode = await withCommandContext(ctx => runCategoriesCommand({ storeId }, ctx))
      break
    }
    case 'count': {
      const storeId = readIdFlag(flags, 'store-id')
      exitCode = await withCommandContext(ctx => runCountCommand({ storeId }, ctx))
      break
    }
    case 'bootstrap': {
      const storeId = readIdFlag(flags, 'store-id')
      exitCode = await withCommandContext(ctx => runBootstrapCommand({ storeId, inline: flags.inline === true }, ctx))
      break
    }
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch(error => {
  if (error instanceof HarvesterError) {
    console.error(error.message)
    process.exit(2)
  }
  loggers.cli.fatal('Command failed', { error: errorMessage(error) }, error)
  process.exit(1)
})
