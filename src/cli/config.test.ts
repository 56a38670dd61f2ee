/**
 * Tests for CLI Configuration
 */

import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { readFile, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  DEFAULT_CACHE_DIR,
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfigValue,
  resolveCacheDir,
  saveConfig,
  setConfigValue,
  unsetConfigValue
} from './config'

describe('config', () => {
  let tempDir: string
  let configPath: string
  let originalConfigEnv: string | undefined
  let originalCacheEnv: string | undefined

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'diskmemo-config-test-'))
    configPath = join(tempDir, 'config.json')
    originalConfigEnv = process.env['DISKMEMO_CONFIG']
    originalCacheEnv = process.env['DISKMEMO_CACHE_DIR']
    delete process.env['DISKMEMO_CONFIG']
    delete process.env['DISKMEMO_CACHE_DIR']
  })

  afterEach(() => {
    if (tempDir && existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
    if (originalConfigEnv !== undefined) {
      process.env['DISKMEMO_CONFIG'] = originalConfigEnv
    } else {
      delete process.env['DISKMEMO_CONFIG']
    }
    if (originalCacheEnv !== undefined) {
      process.env['DISKMEMO_CACHE_DIR'] = originalCacheEnv
    } else {
      delete process.env['DISKMEMO_CACHE_DIR']
    }
  })

  describe('getConfigPath', () => {
    it('returns explicit config file path when provided', () => {
      expect(getConfigPath('/custom/path/config.json')).toBe('/custom/path/config.json')
    })

    it('returns env var path when set', () => {
      process.env['DISKMEMO_CONFIG'] = '/env/config.json'
      expect(getConfigPath()).toBe('/env/config.json')
    })

    it('returns default XDG path when no override', () => {
      expect(getConfigPath()).toContain(join('.config', 'diskmemo', 'config.json'))
    })

    it('explicit path takes precedence over env var', () => {
      process.env['DISKMEMO_CONFIG'] = '/env/config.json'
      expect(getConfigPath('/explicit/config.json')).toBe('/explicit/config.json')
    })
  })

  describe('loadConfig', () => {
    it('returns null for non-existent file', async () => {
      expect(await loadConfig(configPath)).toBeNull()
    })

    it('loads valid config file', async () => {
      await writeFile(configPath, JSON.stringify({ cacheDir: '/custom/cache', codec: 'json' }))
      expect(await loadConfig(configPath)).toEqual({ cacheDir: '/custom/cache', codec: 'json' })
    })

    it('returns null for invalid JSON', async () => {
      await writeFile(configPath, 'not valid json')
      expect(await loadConfig(configPath)).toBeNull()
    })

    it('returns null for JSON that is not an object', async () => {
      await writeFile(configPath, '[1, 2]')
      expect(await loadConfig(configPath)).toBeNull()
    })

    it('drops unknown keys and values of the wrong type', async () => {
      await writeFile(configPath, JSON.stringify({ cacheDir: 42, codec: 'v8', other: 'x' }))
      expect(await loadConfig(configPath)).toEqual({ codec: 'v8' })
    })
  })

  describe('saveConfig', () => {
    it('saves config with a timestamp', async () => {
      await saveConfig({ cacheDir: '/data/cache' }, configPath)
      const saved: unknown = JSON.parse(await readFile(configPath, 'utf-8'))
      expect(saved).toEqual({ cacheDir: '/data/cache', updatedAt: expect.any(String) })
    })

    it('creates parent directories', async () => {
      const nestedPath = join(tempDir, 'nested', 'dir', 'config.json')
      await saveConfig({ codec: 'json' }, nestedPath)
      expect(existsSync(nestedPath)).toBe(true)
    })
  })

  describe('setConfigValue', () => {
    it('sets a new value in empty config', async () => {
      await setConfigValue('codec', 'json', configPath)
      const config = await loadConfig(configPath)
      expect(config?.codec).toBe('json')
    })

    it('preserves other values when setting', async () => {
      await saveConfig({ codec: 'json' }, configPath)
      await setConfigValue('cacheDir', '/new/cache', configPath)
      const config = await loadConfig(configPath)
      expect(config?.codec).toBe('json')
      expect(config?.cacheDir).toBe('/new/cache')
    })
  })

  describe('unsetConfigValue', () => {
    it('removes a value from config', async () => {
      await saveConfig({ cacheDir: '/data/cache', codec: 'json' }, configPath)
      await unsetConfigValue('cacheDir', configPath)
      const config = await loadConfig(configPath)
      expect(config?.cacheDir).toBeUndefined()
      expect(config?.codec).toBe('json')
    })

    it('creates config file if it does not exist', async () => {
      await unsetConfigValue('codec', configPath)
      expect(existsSync(configPath)).toBe(true)
    })
  })

  describe('parseConfigValue', () => {
    it('accepts paths and known codecs', () => {
      expect(parseConfigValue('cacheDir', '~/memo')).toBe('~/memo')
      expect(parseConfigValue('codec', 'v8')).toBe('v8')
      expect(parseConfigValue('codec', 'json')).toBe('json')
    })

    it('rejects unknown codecs', () => {
      expect(() => parseConfigValue('codec', 'xml')).toThrow('Invalid codec: xml')
    })
  })

  describe('config keys', () => {
    it('lists keys alphabetically', () => {
      expect(getValidConfigKeys()).toEqual(['cacheDir', 'codec'])
    })

    it('validates key names', () => {
      expect(isValidConfigKey('codec')).toBe(true)
      expect(isValidConfigKey('updatedAt')).toBe(false)
      expect(isValidConfigKey('toString')).toBe(false)
    })
  })

  describe('resolveCacheDir', () => {
    it('prefers the flag', () => {
      process.env['DISKMEMO_CACHE_DIR'] = '/env/cache'
      expect(resolveCacheDir('/flag/cache', { cacheDir: '/config/cache' })).toBe('/flag/cache')
    })

    it('falls back to the env var, then config, then the default', () => {
      process.env['DISKMEMO_CACHE_DIR'] = '/env/cache'
      expect(resolveCacheDir(undefined, { cacheDir: '/config/cache' })).toBe('/env/cache')
      delete process.env['DISKMEMO_CACHE_DIR']
      expect(resolveCacheDir(undefined, { cacheDir: '/config/cache' })).toBe('/config/cache')
      expect(resolveCacheDir(undefined, null)).toBe(DEFAULT_CACHE_DIR)
    })
  })
})
