/**
 * Config Command
 *
 * `diskmemo config` prints every setting with its stored value and the cache
 * directory the other commands would open. `set` and `unset` edit the file.
 */

import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import {
  type ConfigKey,
  getConfigDescription,
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfigValue,
  resolveCacheDir,
  setConfigValue,
  unsetConfigValue
} from '../config'

function requireKey(key: string | undefined, usage: string): ConfigKey {
  if (key && isValidConfigKey(key)) {
    return key
  }
  throw new Error(
    key
      ? `Invalid key: ${key}. Valid keys: ${getValidConfigKeys().join(', ')}`
      : `Missing key. Usage: ${usage}`
  )
}

async function showConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const config = await loadConfig(args.configFile)

  logger.log(`\nConfig file: ${getConfigPath(args.configFile)}\n`)
  for (const key of getValidConfigKeys()) {
    logger.log(`  ${key}: ${config?.[key] ?? '(not set)'}`)
    logger.verbose(`    ${getConfigDescription(key)}`)
  }
  logger.log(`\nCache directory in use: ${resolveCacheDir(args.cacheDir, config)}`)
}

export async function cmdConfig(args: CLIArgs, logger: Logger): Promise<void> {
  if (args.configAction === 'list') {
    await showConfig(args, logger)
    return
  }

  if (args.configAction === 'unset') {
    const key = requireKey(args.configKey, 'diskmemo config unset <key>')
    await unsetConfigValue(key, args.configFile)
    logger.log(`Unset ${key}`)
    return
  }

  const key = requireKey(args.configKey, 'diskmemo config set <key> <value>')
  if (args.configValue === undefined) {
    throw new Error('Missing value. Usage: diskmemo config set <key> <value>')
  }
  const value = parseConfigValue(key, args.configValue)
  await setConfigValue(key, value, args.configFile)
  logger.log(`Set ${key}=${value}`)
}
