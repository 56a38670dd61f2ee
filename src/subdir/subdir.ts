/**
 * SubDir
 *
 * A directory of encoded entries addressed by key, and the filesystem
 * store behind memoized functions.
 *
 * Directory structure for a memoized function `area` in module `geometry`:
 * ```
 * <root>/
 * └── geometry/
 *     └── area/
 *         ├── 3f1c...e2.bin
 *         └── 9ab0...41.bin
 * ```
 *
 * Roots may start with `~` (home directory), `!` (OS temp directory) or
 * `.` (working directory). Directories are created on construction.
 *
 * @example
 * ```ts
 * const dir = root('!/experiments').subDir('run-1')
 * dir.write('params', { lr: 0.01 })
 * dir.read('params')                // { lr: 0.01 }
 * dir.read('missing', 'fallback')   // 'fallback'
 * dir.get('missing')                // throws NotFoundError
 * ```
 */

import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  rmdirSync,
  rmSync,
  statSync,
  writeFileSync
} from 'node:fs'
import { homedir, tmpdir } from 'node:os'
import { dirname, isAbsolute, join, resolve, sep } from 'node:path'
import { memoize, memoizeAsync } from '../cache/memoize'
import type {
  AsyncMemoizedFunction,
  KeyValueStore,
  MemoizedFunction,
  MemoizeOptions
} from '../cache/types'
import { CorruptDataError, NotFoundError, StructureError } from '../errors'
import { defaultLogger, type Logger } from '../logger'
import { type Codec, v8Codec } from './codec'

export interface SubDirOptions {
  /** Entry file extension. Defaults to the codec's; '' stores keys as plain file names. */
  readonly ext?: string | undefined
  /** Defaults to the v8 codec */
  readonly codec?: Codec | undefined
  readonly logger?: Logger | undefined
}

export type SubDirCacheOptions = Omit<MemoizeOptions, 'store'>

interface DeleteOptions {
  readonly throwOnError?: boolean | undefined
}

interface DeleteContentOptions extends DeleteOptions {
  /** Also remove this directory once it is empty */
  readonly deleteSelf?: boolean | undefined
}

/**
 * Throws if tests try to use the user's real cache directory.
 * Tests must use isolated temp directories.
 */
function guardAgainstUserCache(path: string): void {
  const isTest = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test'
  if (!isTest) return

  const realCacheDir = join(homedir(), '.cache', 'diskmemo')
  if (path === realCacheDir || path.startsWith(realCacheDir + sep)) {
    throw new Error(
      `TEST ERROR: Attempted to access user's real cache directory!\n` +
        `  Cache dir: ${path}\n` +
        `  Tests must use isolated temp directories, not ~/.cache/diskmemo/`
    )
  }
}

/**
 * Expand the `~`, `!` and `.` shortcuts of a root path.
 */
export function expandRoot(rootPath: string): string {
  if (rootPath.length === 0) {
    throw new Error("Root cannot be empty. Use '.', '~' or '!'")
  }
  const shortcuts: Record<string, () => string> = {
    '~': homedir,
    '!': tmpdir,
    '.': () => process.cwd()
  }
  const head = rootPath.slice(0, 1)
  const rest = rootPath.slice(1)
  const base = Object.hasOwn(shortcuts, head) ? shortcuts[head] : undefined

  if (base === undefined || (head === '.' && rest.startsWith('.'))) {
    return resolve(rootPath)
  }
  if (rest.length === 0) {
    return resolve(base())
  }
  if (rest[0] !== '/' && rest[0] !== '\\') {
    if (head === '.') return resolve(rootPath)
    throw new Error(
      `If root starts with '${head}', the second character must be '/'. Found '${rootPath}'`
    )
  }
  return resolve(base(), rest.slice(1))
}

function normalizeExt(ext: string): string {
  if (ext.length === 0) return ''
  if (ext === '.' || ext.includes('/') || ext.includes('\\')) {
    throw new Error(`Invalid extension '${ext}': name missing or contains directory information`)
  }
  return ext.startsWith('.') ? ext : `.${ext}`
}

function validateKey(key: string): void {
  if (key.length === 0) {
    throw new Error('Key is empty')
  }
  if (key.endsWith('/') || key.endsWith('\\')) {
    throw new Error(`Key '${key}' indicates a directory, not a file`)
  }
  if (isAbsolute(key)) {
    throw new Error(`Key '${key}' must be relative`)
  }
}

export class SubDir implements KeyValueStore {
  readonly path: string
  readonly ext: string
  readonly codec: Codec
  private readonly logger: Logger

  /**
   * @param rootDir - root path (with `~`, `!` or `.` shortcuts) or a parent SubDir
   * @param subdir - optional relative sub directory
   */
  constructor(rootDir: string | SubDir, subdir?: string | undefined, options: SubDirOptions = {}) {
    if (rootDir instanceof SubDir) {
      if (options.ext !== undefined && normalizeExt(options.ext) !== rootDir.ext) {
        throw new Error('Cannot specify a different ext when the root is a SubDir')
      }
      this.codec = options.codec ?? rootDir.codec
      this.ext = rootDir.ext
      this.logger = options.logger ?? rootDir.logger
    } else {
      this.codec = options.codec ?? v8Codec
      this.ext = normalizeExt(options.ext ?? this.codec.extension)
      this.logger = options.logger ?? defaultLogger
    }

    const base = rootDir instanceof SubDir ? rootDir.path : expandRoot(rootDir)
    if (subdir === undefined) {
      this.path = base
    } else {
      const trimmed = subdir.replace(/[/\\]+$/, '')
      if (trimmed.length === 0) {
        throw new Error(`Sub directory '${subdir}' is empty or the root symbol`)
      }
      if (isAbsolute(trimmed)) {
        throw new Error(`Sub directory '${subdir}' must be relative`)
      }
      this.path = resolve(base, trimmed)
    }

    if (this.ext.length > 0 && this.path.endsWith(this.ext)) {
      throw new Error(`Cannot use sub directory '${this.path}': it ends in extension '${this.ext}'`)
    }

    guardAgainstUserCache(this.path)

    if (!existsSync(this.path)) {
      mkdirSync(this.path, { recursive: true })
    } else if (!statSync(this.path).isDirectory()) {
      throw new StructureError(
        `Cannot use sub directory ${this.path}: it exists but is not a directory`
      )
    }
  }

  toString(): string {
    return this.ext.length === 0 ? this.path : `${this.path};*${this.ext}`
  }

  /**
   * Fully qualified file name for `key`.
   */
  fullKeyName(key: string): string {
    if (this.ext.length > 0 && !key.endsWith(this.ext)) {
      return join(this.path, `${key}${this.ext}`)
    }
    return join(this.path, key)
  }

  subDir(name: string): SubDir {
    return new SubDir(this, name)
  }

  // ============ Read ============

  /**
   * Read `key`, or return `defaultValue` if it does not exist.
   * Entries that cannot be decoded are deleted with a warning.
   */
  read<T = unknown>(key: string): T | undefined
  read<T>(key: string, defaultValue: T): T
  read<T>(key: string, defaultValue?: T): T | undefined {
    if (!this.exists(key)) {
      return defaultValue
    }
    try {
      return this.get<T>(key)
    } catch (error) {
      if (!(error instanceof CorruptDataError)) {
        throw error
      }
      this.discardCorrupt(key, error)
      return defaultValue
    }
  }

  /**
   * Read `key`.
   * @throws NotFoundError if it does not exist
   * @throws CorruptDataError if it cannot be decoded
   */
  get<T = unknown>(key: string): T {
    validateKey(key)
    const fullPath = this.fullKeyName(key)
    if (!this.exists(key)) {
      throw new NotFoundError(key, fullPath)
    }
    const raw = readFileSync(fullPath)
    try {
      return this.codec.decode(raw) as T
    } catch (error) {
      throw new CorruptDataError(key, fullPath, error)
    }
  }

  /**
   * Read the first line of a text entry (without its line break),
   * or `defaultValue` if it does not exist.
   */
  readString(key: string): string | undefined
  readString(key: string, defaultValue: string): string
  readString(key: string, defaultValue?: string): string | undefined {
    validateKey(key)
    if (!this.exists(key)) {
      return defaultValue
    }
    const content = readFileSync(this.fullKeyName(key), 'utf-8')
    const newline = content.indexOf('\n')
    return newline === -1 ? content : content.slice(0, newline)
  }

  // ============ Write ============

  write(key: string, value: unknown): void {
    validateKey(key)
    const data = this.codec.encode(value)
    writeFileSync(this.ensureParent(key), data)
  }

  /**
   * Write a line of text. A trailing line break is added and not read back.
   */
  writeString(key: string, line: string): void {
    validateKey(key)
    const text = line.endsWith('\n') ? line : `${line}\n`
    writeFileSync(this.ensureParent(key), text, 'utf-8')
  }

  // ============ Iterate ============

  /**
   * Keys in this directory carrying the entry extension, sorted.
   */
  keys(): string[] {
    const extLength = this.ext.length
    return readdirSync(this.path, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter((name) => extLength === 0 || (name.length > extLength && name.endsWith(this.ext)))
      .map((name) => (extLength === 0 ? name : name.slice(0, -extLength)))
      .sort()
  }

  /**
   * Names of the sub directories, sorted.
   */
  subDirs(): string[] {
    return readdirSync(this.path, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort()
  }

  exists(key: string): boolean {
    const fullPath = this.fullKeyName(key)
    if (!existsSync(fullPath)) {
      return false
    }
    if (!statSync(fullPath).isFile()) {
      throw new StructureError(`Key ${key} exists but is not a file (full path ${fullPath})`)
    }
    return true
  }

  /**
   * Creation time of `key`, or null if it does not exist.
   */
  getCreationTime(key: string): Date | null {
    if (!this.exists(key)) {
      return null
    }
    const stats = statSync(this.fullKeyName(key))
    return stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime
  }

  // ============ Delete ============

  /**
   * Delete `key`. Missing keys are ignored unless `throwOnError` is set.
   */
  delete(key: string, options: DeleteOptions = {}): void {
    validateKey(key)
    if (!this.exists(key)) {
      if (options.throwOnError) {
        throw new NotFoundError(key, this.fullKeyName(key))
      }
      return
    }
    rmSync(this.fullKeyName(key))
  }

  /**
   * Delete all entries in this directory. Sub directories are kept.
   */
  deleteAllKeys(options: DeleteOptions = {}): void {
    for (const key of this.keys()) {
      this.delete(key, options)
    }
  }

  /**
   * Delete all entries here and in all sub directories, and the sub directories
   * themselves. Files without the entry extension are kept, so a directory
   * holding them cannot be removed.
   */
  deleteAllContent(options: DeleteContentOptions = {}): void {
    for (const name of this.subDirs()) {
      this.subDir(name).deleteAllContent({ ...options, deleteSelf: true })
    }
    this.deleteAllKeys(options)
    if (!options.deleteSelf) {
      return
    }
    const rest = readdirSync(this.path)
    if (rest.length > 0) {
      const listing = rest.join(', ')
      const shown = listing.length < 50 ? listing : `${listing.slice(0, 47)}...`
      throw new StructureError(
        `Cannot delete ${this.path}: directory not empty, found ${rest.length} object(s): ${shown}`
      )
    }
    rmdirSync(this.path)
  }

  /**
   * Delete the directory and everything in it, including files with other
   * extensions. The empty directory is recreated unless `keepDirectory` is false.
   */
  eraseEverything(options: { readonly keepDirectory?: boolean | undefined } = {}): void {
    rmSync(this.path, { recursive: true, force: true })
    if (options.keepDirectory ?? true) {
      mkdirSync(this.path, { recursive: true })
    }
  }

  // ============ Caching ============

  /**
   * Memoize `fn` with entries stored below this directory.
   * @see memoize
   */
  cache<A extends unknown[], R>(
    fn: (...args: A) => R,
    options: SubDirCacheOptions = {}
  ): MemoizedFunction<A, R> {
    return memoize(fn, { ...options, store: this, logger: options.logger ?? this.logger })
  }

  /**
   * Memoize an async `fn` with entries stored below this directory.
   * @see memoizeAsync
   */
  cacheAsync<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>,
    options: SubDirCacheOptions = {}
  ): AsyncMemoizedFunction<A, R> {
    return memoizeAsync(fn, { ...options, store: this, logger: options.logger ?? this.logger })
  }

  // ============ Internals ============

  private ensureParent(key: string): string {
    const fullPath = this.fullKeyName(key)
    const dir = dirname(fullPath)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }
    return fullPath
  }

  private discardCorrupt(key: string, error: CorruptDataError): void {
    try {
      rmSync(error.fullPath)
      this.logger.warn(`Cannot read ${key}; file deleted (full path ${error.fullPath})`)
    } catch (deleteError) {
      const reason = deleteError instanceof Error ? deleteError.message : String(deleteError)
      this.logger.warn(
        `Cannot read ${key}; attempt to delete file failed (full path ${error.fullPath}): ${reason}`
      )
    }
  }
}

/**
 * Create a root SubDir.
 */
export function root(path: string, options: SubDirOptions = {}): SubDir {
  return new SubDir(path, undefined, options)
}

/** SubDir at the OS temp directory */
export function tempRoot(options: SubDirOptions = {}): SubDir {
  return root('!', options)
}

/** SubDir at the user's home directory */
export function userRoot(options: SubDirOptions = {}): SubDir {
  return root('~', options)
}
