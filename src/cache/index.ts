/**
 * Cache Module
 *
 * Disk memoization of function calls, controlled by cache modes.
 */

export { memoize, memoizeAsync, NAMESPACE_NAME_LIMIT } from './memoize'
export { CacheMode, type CacheModeInput, type CacheModeName, isCacheModeName } from './mode'
export type {
  AsyncMemoizedFunction,
  CacheCallState,
  CallResult,
  InvokeOptions,
  KeyValueStore,
  MemoizedFunction,
  MemoizeOptions
} from './types'
