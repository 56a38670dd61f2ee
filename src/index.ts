/**
 * diskmemo Core Library
 *
 * Disk-backed memoization: canonical argument hashing, cache modes and
 * directory stores.
 *
 * @license AGPL-3.0
 */

// Memoization
export {
  type AsyncMemoizedFunction,
  type CacheCallState,
  CacheMode,
  type CacheModeInput,
  type CacheModeName,
  type CallResult,
  type InvokeOptions,
  isCacheModeName,
  type KeyValueStore,
  type MemoizedFunction,
  type MemoizeOptions,
  memoize,
  memoizeAsync,
  NAMESPACE_NAME_LIMIT
} from './cache/index'
// Errors
export {
  AnonymousFunctionError,
  CorruptDataError,
  InvalidModeError,
  NotFoundError,
  StructureError,
  UnserializableValueError,
  UnsupportedTypeError
} from './errors'
// Formatting
export {
  fmtBigNumber,
  fmtBytes,
  fmtDate,
  fmtDatetime,
  fmtList,
  fmtNow,
  fmtSeconds,
  fmtTime
} from './format/index'
// Hashing
export {
  atomicText,
  type CanonicalEncodable,
  canonicalText,
  compressFunctionSource,
  uniqueHash,
  uniqueHash32,
  uniqueHash48,
  uniqueHash64,
  uniqueHashExt,
  type UniqueHashFn,
  type UniqueHashOptions
} from './hashing/index'
// Logging
export { createLogger, type Logger } from './logger'
// Records
export {
  bind,
  type KeyOrder,
  plain,
  type PlainOptions,
  type PlainValue,
  PrettyRecord
} from './record/index'
// Stores
export {
  type Codec,
  expandRoot,
  getCodec,
  jsonCodec,
  root,
  SubDir,
  type SubDirCacheOptions,
  type SubDirOptions,
  tempRoot,
  userRoot,
  v8Codec
} from './subdir/index'

export const VERSION = '0.1.0'
