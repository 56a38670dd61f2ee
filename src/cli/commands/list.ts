/**
 * List Command
 *
 * Show a table of cached functions.
 */

import pluralize from 'pluralize'
import { fmtBytes } from '../../format'
import type { Logger } from '../../logger'
import type { SubDir } from '../../subdir/subdir'
import type { CLIArgs } from '../args'
import { entryStats, openCache } from '../helpers'

/**
 * One `<module>/<function>` directory below the cache root.
 */
export interface NamespaceStats {
  readonly name: string
  readonly entries: number
  readonly bytes: number
}

/**
 * Pad a string to a given length.
 */
function padEnd(str: string, len: number): string {
  return str.length >= len ? str.slice(0, len) : str + ' '.repeat(len - str.length)
}

/**
 * Collect entry counts for every cached function, sorted by name.
 */
export function listNamespaces(cache: SubDir, logger: Logger): NamespaceStats[] {
  const namespaces: NamespaceStats[] = []

  logger.verbose(`Scanning for cached functions in: ${cache.path}`)

  for (const module of cache.subDirs()) {
    const moduleDir = cache.subDir(module)
    for (const fn of moduleDir.subDirs()) {
      const stats = entryStats(moduleDir.subDir(fn))
      namespaces.push({ name: `${module}/${fn}`, ...stats })
      logger.verbose(`Found ${module}/${fn} (${stats.entries} entries)`)
    }
  }

  return namespaces
}

/**
 * Display cached functions as a table.
 */
export function displayNamespaces(namespaces: readonly NamespaceStats[], logger: Logger): void {
  if (namespaces.length === 0) {
    logger.log('\nNo cached functions found.')
    return
  }

  const nameWidth = 40
  const entriesWidth = 10
  const sizeWidth = 10

  const header = [
    padEnd('Namespace', nameWidth),
    padEnd('Entries', entriesWidth),
    padEnd('Size', sizeWidth)
  ].join(' ')

  logger.log('')
  logger.log(header)
  logger.log('-'.repeat(header.length))

  for (const ns of namespaces) {
    const row = [
      padEnd(ns.name, nameWidth),
      padEnd(ns.entries.toString(), entriesWidth),
      padEnd(fmtBytes(ns.bytes), sizeWidth)
    ].join(' ')
    logger.log(row)
  }

  const total = namespaces.reduce((sum, ns) => sum + ns.entries, 0)
  logger.log('')
  logger.log(
    `Total: ${pluralize('entry', total, true)} in ${pluralize('function', namespaces.length, true)}`
  )
}

/**
 * Run the list command.
 */
export async function cmdList(args: CLIArgs, logger: Logger): Promise<void> {
  const cache = await openCache(args, logger)
  logger.log(`\nCache: ${cache.path}`)
  displayNamespaces(listNamespaces(cache, logger), logger)
}
