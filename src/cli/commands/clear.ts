/**
 * Clear Command
 *
 * Delete the entries of one namespace, or of the whole cache. Everything
 * below the chosen directory goes, including files another codec wrote.
 */

import pluralize from 'pluralize'
import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import { entryStats, findNamespace, openCache } from '../helpers'

export async function cmdClear(args: CLIArgs, logger: Logger): Promise<void> {
  const cache = await openCache(args, logger)

  if (!args.namespace) {
    const { entries } = entryStats(cache)
    cache.eraseEverything()
    logger.success(`Cleared ${pluralize('entry', entries, true)} from ${cache.path}`)
    return
  }

  const dir = findNamespace(cache, args.namespace)
  if (!dir) {
    logger.log(`Nothing cached for ${args.namespace}`)
    return
  }

  const { entries } = entryStats(dir)
  dir.eraseEverything({ keepDirectory: false })
  logger.success(`Cleared ${pluralize('entry', entries, true)} from ${args.namespace}`)
}
