/**
 * Unique Hash Keys
 *
 * Generates deterministic hash keys for any collection of values, the basis
 * of memoization cache keys.
 *
 * The full form is a SHA-256 hex digest (64 chars). A requested length
 * switches to a SHAKE-128 digest cut to exactly that many hex chars. The two
 * forms are not prefixes of each other.
 */

import { createHash, type Hash } from 'node:crypto'
import { encodeCanonical } from './canonical'
import type { UniqueHashFn, UniqueHashOptions } from './types'

const TOKEN_SEPARATOR = '\u0000'

function createDigest(length: number | undefined): Hash {
  if (length === undefined) {
    return createHash('sha256')
  }
  if (!Number.isInteger(length) || length <= 0) {
    throw new RangeError(`Hash length must be a positive integer, got ${length}`)
  }
  return createHash('shake128', { outputLength: Math.ceil(length / 2) })
}

/**
 * Returns a hash function producing keys of `length` hex chars, or full-width
 * SHA-256 keys when no length is given.
 *
 * @example
 * ```ts
 * const hash16 = uniqueHashExt({ length: 16 })
 * hash16('model', { lr: 0.1, layers: [64, 64] }) // 16 hex chars
 * ```
 */
export function uniqueHashExt(options: UniqueHashOptions = {}): UniqueHashFn {
  const { length, parseFunctions = false } = options
  // Validate eagerly so a bad length fails where the hasher is configured
  createDigest(length)

  return (...parts: readonly unknown[]): string => {
    const digest = createDigest(length)
    encodeCanonical(
      parts,
      (token) => {
        digest.update(token, 'utf8')
        digest.update(TOKEN_SEPARATOR, 'utf8')
      },
      parseFunctions
    )
    const hex = digest.digest('hex')
    return length === undefined ? hex : hex.slice(0, length)
  }
}

const fullHash = uniqueHashExt()
const hash32 = uniqueHashExt({ length: 32 })
const hash48 = uniqueHashExt({ length: 48 })
const hash64 = uniqueHashExt({ length: 64 })

/**
 * Full-width (64 char) hash of the given values.
 *
 * - mapping keys are sorted, so `{ a: 1, b: 2 }` and `{ b: 2, a: 1 }` agree
 * - array order matters
 * - keys and string elements starting with `_` are ignored
 * - functions are ignored
 */
export function uniqueHash(...parts: readonly unknown[]): string {
  return fullHash(...parts)
}

export function uniqueHash32(...parts: readonly unknown[]): string {
  return hash32(...parts)
}

export function uniqueHash48(...parts: readonly unknown[]): string {
  return hash48(...parts)
}

export function uniqueHash64(...parts: readonly unknown[]): string {
  return hash64(...parts)
}
