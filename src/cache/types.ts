/**
 * Memoization Cache Types
 *
 * The storage contract the memoizing wrapper needs, and the shape of
 * wrapped functions. `SubDir` (../subdir) is the filesystem implementation.
 */

import type { Logger } from '../logger'
import type { CacheModeInput } from './mode'

/**
 * Minimal key-value storage used by the memoizing wrapper.
 */
export interface KeyValueStore {
  /** Whether an entry exists for `key` */
  exists(key: string): boolean

  /**
   * Read and decode the entry for `key`.
   * @throws NotFoundError if the entry does not exist
   * @throws CorruptDataError if the entry cannot be decoded
   */
  get<T = unknown>(key: string): T

  /** Encode and store `value`, creating directories as needed */
  write(key: string, value: unknown): void

  /**
   * Delete the entry for `key`. Missing entries are ignored unless
   * `throwOnError` is set, in which case NotFoundError is thrown.
   */
  delete(key: string, options?: { readonly throwOnError?: boolean | undefined }): void

  /** Nested store under `name` */
  subDir(name: string): KeyValueStore

  /** Fully qualified location of `key` */
  fullKeyName(key: string): string
}

export interface MemoizeOptions {
  /** Where entries are stored */
  readonly store: KeyValueStore
  /**
   * Module part of the function identity. Defaults to 'main', in which case
   * the function's source also becomes part of every key.
   */
  readonly module?: string | undefined
  /** Function part of the identity. Defaults to `fn.name`; required for anonymous functions. */
  readonly name?: string | undefined
  /** Directory for the module level. Defaults to the first 64 chars of `module`. */
  readonly cacheSubDir?: string | undefined
  /** Directory for the function level. Defaults to the first 64 chars of `name`. */
  readonly cacheName?: string | undefined
  /** Hex length of argument keys. Omit for full SHA-256 keys. */
  readonly length?: number | undefined
  /** Include the source of function arguments in keys */
  readonly parseFunctions?: boolean | undefined
  /** Mode used when a call does not pick one. Defaults to 'on'. */
  readonly caching?: CacheModeInput | undefined
  readonly logger?: Logger | undefined
}

export interface InvokeOptions {
  /** Caching mode for this call */
  readonly caching?: CacheModeInput | undefined
}

/**
 * Outcome of a single call. Unlike the state on the wrapped function,
 * it cannot be overwritten by another call.
 */
export interface CallResult<R> {
  readonly value: R
  /** Whether the value was read from the store */
  readonly cached: boolean
  /** Argument hash, null when caching was off */
  readonly argKey: string | null
  /** Full location of the entry, null when caching was off */
  readonly fullKey: string | null
}

/**
 * State of the most recent call. Shared by all callers of one wrapped
 * function, so interleaved async callers may observe each other's state.
 */
export interface CacheCallState {
  readonly cached: boolean
  readonly cacheArgKey: string | null
  readonly cacheFullKey: string | null
}

export interface MemoizedFunction<A extends unknown[], R> extends CacheCallState {
  (...args: A): R
  /** Call with explicit options, returning the per-call result */
  invoke(args: A, options?: InvokeOptions): CallResult<R>
  /** Same function with a fixed caching mode */
  withCaching(mode: CacheModeInput): (...args: A) => R
  /** Store holding this function's entries */
  readonly store: KeyValueStore
}

export interface AsyncMemoizedFunction<A extends unknown[], R> extends CacheCallState {
  (...args: A): Promise<R>
  invoke(args: A, options?: InvokeOptions): Promise<CallResult<R>>
  withCaching(mode: CacheModeInput): (...args: A) => Promise<R>
  readonly store: KeyValueStore
  /** Number of computations currently in flight */
  readonly inflight: number
}
