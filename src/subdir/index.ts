/**
 * SubDir Module
 *
 * Filesystem directories of encoded entries, used as memoization stores.
 */

export { type Codec, getCodec, jsonCodec, v8Codec } from './codec'
export {
  expandRoot,
  root,
  SubDir,
  type SubDirCacheOptions,
  type SubDirOptions,
  tempRoot,
  userRoot
} from './subdir'
