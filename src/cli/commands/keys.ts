/**
 * Keys Command
 *
 * List the entries of one cached function with their creation times.
 */

import pluralize from 'pluralize'
import { fmtDatetime } from '../../format'
import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import { findNamespace, openCache } from '../helpers'

export async function cmdKeys(args: CLIArgs, logger: Logger): Promise<void> {
  const namespace = args.namespace
  if (!namespace) {
    throw new Error('Missing namespace. Usage: diskmemo keys <module>/<function>')
  }

  const cache = await openCache(args, logger)
  const dir = findNamespace(cache, namespace)
  if (!dir) {
    throw new Error(`Nothing cached for ${namespace} in ${cache.path}`)
  }

  const keys = dir.keys()
  logger.log(`\n${namespace}: ${pluralize('entry', keys.length, true)}`)
  for (const key of keys) {
    const created = dir.getCreationTime(key)
    logger.log(`  ${key}  ${created ? fmtDatetime(created) : '-'}`)
  }
}
