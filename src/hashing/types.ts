/**
 * Hashing Types
 */

/**
 * Opt-in trait for class instances that take part in cache keys.
 *
 * The hasher does not reflect over arbitrary objects. A class whose
 * instances are passed to a memoized function returns a plain value
 * (string, number, array, plain object, ...) describing its identity.
 *
 * @example
 * ```ts
 * class Point implements CanonicalEncodable {
 *   constructor(readonly x: number, readonly y: number) {}
 *   toCanonical() {
 *     return { x: this.x, y: this.y }
 *   }
 * }
 * ```
 */
export interface CanonicalEncodable {
  toCanonical(): unknown
}

export interface UniqueHashOptions {
  /** Hex length of the digest. Omit for the full SHA-256 digest (64 chars). */
  readonly length?: number | undefined
  /** Feed the whitespace-stripped source of functions instead of skipping them */
  readonly parseFunctions?: boolean | undefined
}

export type UniqueHashFn = (...parts: readonly unknown[]) => string
