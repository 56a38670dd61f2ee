/**
 * Hashing Module
 *
 * Canonical, order-independent hash keys for call signatures.
 */

export { atomicText, canonicalText, compressFunctionSource, encodeCanonical } from './canonical'
export { uniqueHash, uniqueHash32, uniqueHash48, uniqueHash64, uniqueHashExt } from './key'
export type { CanonicalEncodable, UniqueHashFn, UniqueHashOptions } from './types'
