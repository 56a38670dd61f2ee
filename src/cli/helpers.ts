/**
 * CLI Helpers
 *
 * Shared utilities for CLI commands.
 */

import { existsSync, statSync } from 'node:fs'
import { isAbsolute, join } from 'node:path'
import type { Logger } from '../logger'
import { getCodec, v8Codec } from '../subdir/codec'
import { root, type SubDir } from '../subdir/subdir'
import type { CLIArgs } from './args'
import { loadConfig, resolveCacheDir } from './config'

// ============================================================================
// Cache Access
// ============================================================================

/**
 * Open the cache root named by the flags, environment and config file.
 */
export async function openCache(args: CLIArgs, logger: Logger): Promise<SubDir> {
  const config = await loadConfig(args.configFile)
  const cacheDir = resolveCacheDir(args.cacheDir, config)
  const codecName = config?.codec ?? v8Codec.name
  const codec = getCodec(codecName)
  if (!codec) {
    throw new Error(`Invalid codec in config: ${codecName}. Valid codecs: v8, json`)
  }
  logger.verbose(`Cache directory: ${cacheDir} (${codec.name})`)
  return root(cacheDir, { codec, logger })
}

/**
 * Find an existing namespace (`<module>` or `<module>/<function>`) below the cache root.
 * Returns null if it does not exist.
 */
export function findNamespace(cache: SubDir, namespace: string): SubDir | null {
  if (isAbsolute(namespace) || namespace.split(/[\\/]/).includes('..')) {
    throw new Error(`Invalid namespace: ${namespace}`)
  }
  const path = join(cache.path, namespace)
  if (!existsSync(path) || !statSync(path).isDirectory()) {
    return null
  }
  return cache.subDir(namespace)
}

// ============================================================================
// Entry Statistics
// ============================================================================

export interface EntryStats {
  readonly entries: number
  readonly bytes: number
}

/**
 * Count the entries and their total size below `dir`, including sub directories.
 */
export function entryStats(dir: SubDir): EntryStats {
  let entries = 0
  let bytes = 0
  for (const key of dir.keys()) {
    entries++
    bytes += statSync(dir.fullKeyName(key)).size
  }
  for (const name of dir.subDirs()) {
    const nested = entryStats(dir.subDir(name))
    entries += nested.entries
    bytes += nested.bytes
  }
  return { entries, bytes }
}
