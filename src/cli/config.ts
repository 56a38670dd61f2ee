/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/diskmemo/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or DISKMEMO_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { getCodec } from '../subdir/codec'

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** Cache root directory */
  cacheDir?: string | undefined
  /** Entry codec: v8 or json */
  codec?: string | undefined
  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  cacheDir: 'Cache directory path (default: ~/.cache/diskmemo)',
  codec: 'Entry codec, v8 (.bin) or json (.json) (default: v8)'
}

const CONFIG_KEYS: readonly ConfigKey[] = ['cacheDir', 'codec']

export const DEFAULT_CACHE_DIR = '~/.cache/diskmemo'

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get XDG config directory path for diskmemo.
 * Uses ~/.config/diskmemo on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'diskmemo')
}

/**
 * Get the config file path.
 * Priority: configFile arg > DISKMEMO_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env['DISKMEMO_CONFIG']) {
    return process.env['DISKMEMO_CONFIG']
  }
  return join(getDefaultConfigDir(), 'config.json')
}

function stringField(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key]
  return typeof value === 'string' ? value : undefined
}

function toConfig(data: unknown): Config | null {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return null
  }
  const record: Record<string, unknown> = { ...data }
  const config: Config = {}
  for (const key of [...CONFIG_KEYS, 'updatedAt'] as const) {
    const value = stringField(record, key)
    if (value !== undefined) {
      config[key] = value
    }
  }
  return config
}

/**
 * Load config from the config file.
 * Returns null if file doesn't exist or can't be parsed.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  const content = await readFile(path, 'utf-8')
  try {
    return toConfig(JSON.parse(content))
  } catch {
    return null
  }
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/**
 * Validate a string value for a config key.
 * @throws Error when the value is not allowed for the key
 */
export function parseConfigValue(key: ConfigKey, value: string): string {
  if (key === 'codec' && !getCodec(value)) {
    throw new Error(`Invalid codec: ${value}. Valid codecs: v8, json`)
  }
  return value
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...CONFIG_KEYS].sort()
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: string,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  config[key] = value
  await saveConfig(config, configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}

/**
 * Resolve the cache root.
 * Priority: cacheDir arg > DISKMEMO_CACHE_DIR env var > config > ~/.cache/diskmemo
 */
export function resolveCacheDir(cacheDir: string | undefined, config: Config | null): string {
  return cacheDir || process.env['DISKMEMO_CACHE_DIR'] || config?.cacheDir || DEFAULT_CACHE_DIR
}
