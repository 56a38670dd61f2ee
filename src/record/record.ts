/**
 * Pretty Records
 *
 * A typed record with named accessors, a default-taking getter and
 * positional access in key order. Records hash as the mapping of their
 * fields, so they can be passed to memoized functions.
 *
 * @example
 * ```ts
 * const params = new PrettyRecord({ lr: 0.01, layers: 3 }, 'sorted')
 * params.get('lr')            // 0.01
 * params.set('layers', 4)
 * params.keys()               // ['layers', 'lr']
 * params.at(-1)               // 0.01
 * ```
 */

import { isDeepStrictEqual } from 'node:util'
import type { CanonicalEncodable } from '../hashing'

export type KeyOrder = 'insertion' | 'sorted'

export class PrettyRecord<T extends Record<string, unknown>> implements CanonicalEncodable {
  readonly order: KeyOrder
  private readonly data: T

  constructor(fields: T, order: KeyOrder = 'insertion') {
    this.data = { ...fields }
    this.order = order
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  /**
   * Value of `key`, or `fallback` when the field is missing or undefined.
   */
  getOr<K extends keyof T & string, D>(key: K, fallback: D): T[K] | D {
    const value = this.data[key]
    return value === undefined ? fallback : value
  }

  set<K extends keyof T & string>(key: K, value: T[K]): this {
    this.data[key] = value
    return this
  }

  has(key: string): key is keyof T & string {
    return Object.hasOwn(this.data, key)
  }

  get size(): number {
    return this.keys().length
  }

  /**
   * Field names in insertion order, or sorted for 'sorted' records.
   */
  keys(): Array<keyof T & string> {
    const keys = Object.keys(this.data).filter((key): key is keyof T & string => this.has(key))
    return this.order === 'sorted' ? keys.sort() : keys
  }

  values(): Array<T[keyof T & string]> {
    return this.keys().map((key) => this.data[key])
  }

  entries(): Array<[keyof T & string, T[keyof T & string]]> {
    return this.keys().map((key) => [key, this.data[key]])
  }

  /** Field name at `position`; negative positions count from the end */
  keyAt(position: number): (keyof T & string) | undefined {
    return this.keys().at(position)
  }

  /** Field value at `position`; negative positions count from the end */
  at(position: number): T[keyof T & string] | undefined {
    const key = this.keyAt(position)
    return key === undefined ? undefined : this.data[key]
  }

  /** Values between two positions, as Array.prototype.slice takes them */
  slice(start?: number, end?: number): Array<T[keyof T & string]> {
    return this.values().slice(start, end)
  }

  /** Copy of the fields as a plain object */
  toObject(): T {
    return { ...this.data }
  }

  /** Frozen copy of the fields */
  freeze(): Readonly<T> {
    return Object.freeze(this.toObject())
  }

  /**
   * Deep equality of fields. Key order is not compared.
   */
  equals(other: PrettyRecord<T> | T): boolean {
    const fields = other instanceof PrettyRecord ? other.data : other
    return isDeepStrictEqual(this.data, fields)
  }

  toCanonical(): T {
    return this.toObject()
  }
}
