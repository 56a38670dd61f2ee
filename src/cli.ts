#!/usr/bin/env node
/**
 * diskmemo CLI
 *
 * Inspect, list and clear the on-disk memoization cache.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdClear } from './cli/commands/clear'
import { cmdConfig } from './cli/commands/config'
import { cmdKeys } from './cli/commands/keys'
import { cmdList } from './cli/commands/list'
import { createLogger } from './logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'list':
        await cmdList(args, logger)
        break

      case 'keys':
        await cmdKeys(args, logger)
        break

      case 'clear':
        await cmdClear(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'diskmemo --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
