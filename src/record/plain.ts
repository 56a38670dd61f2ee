/**
 * Plain Data
 *
 * `plain` turns class instances, records and collections into data made of
 * primitives, dates, binary views, arrays and plain objects. The result can
 * be stored by either codec's rules for its parts and read back without the
 * classes that produced it.
 *
 * `bind` fixes defaults for a function that takes a single options object.
 */

import { UnsupportedTypeError } from '../errors'
import { PrettyRecord } from './record'

export type PlainValue =
  | null
  | string
  | number
  | boolean
  | bigint
  | Date
  | ArrayBuffer
  | ArrayBufferView
  | PlainValue[]
  | { [key: string]: PlainValue }

export interface PlainOptions {
  /** Emit object keys in sorted order */
  readonly sortKeys?: boolean | undefined
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value
}

/**
 * Convert `value` into plain data.
 *
 * - null, undefined, functions and symbols become null
 * - Map keys are converted with String()
 * - other iterables (Set included) become arrays
 * - class instances become objects of their own enumerable fields, minus methods
 *
 * @throws TypeError on cyclic structures
 */
export function plain(value: unknown, options: PlainOptions = {}): PlainValue {
  const ancestors = new Set<object>()

  const toObject = (entries: ReadonlyArray<readonly [string, unknown]>): PlainValue => {
    const ordered = options.sortKeys
      ? [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      : entries
    const out: { [key: string]: PlainValue } = {}
    for (const [key, item] of ordered) {
      out[key] = visit(item)
    }
    return out
  }

  const visitObject = (inn: object): PlainValue => {
    if (inn instanceof PrettyRecord) {
      return toObject(inn.entries())
    }
    if (inn instanceof Map) {
      return toObject([...inn.entries()].map(([key, item]) => [String(key), item] as const))
    }
    if (isPlainObject(inn)) {
      return toObject(Object.entries(inn))
    }
    if (isIterable(inn)) {
      return Array.from(inn, (item) => visit(item))
    }
    return toObject(Object.entries(inn).filter(([, item]) => typeof item !== 'function'))
  }

  const visit = (inn: unknown): PlainValue => {
    switch (typeof inn) {
      case 'string':
      case 'number':
      case 'boolean':
      case 'bigint':
        return inn
      case 'undefined':
      case 'function':
      case 'symbol':
        return null
      case 'object':
        break
      default:
        throw new UnsupportedTypeError(typeof inn)
    }
    if (inn === null || inn instanceof Date || inn instanceof ArrayBuffer) {
      return inn
    }
    if (ArrayBuffer.isView(inn)) {
      return inn
    }
    if (ancestors.has(inn)) {
      throw new TypeError('Cannot convert a cyclic structure to plain data')
    }
    ancestors.add(inn)
    try {
      return visitObject(inn)
    } finally {
      ancestors.delete(inn)
    }
  }

  return visit(value)
}

/**
 * Fix default options of `fn`. Options passed to the returned function
 * override the defaults key by key. The result keeps `fn`'s name, so it can
 * be memoized without a name option.
 *
 * @example
 * ```ts
 * const scale = (o: { x: number; factor: number }) => o.x * o.factor
 * const double = bind(scale, { x: 0, factor: 2 })
 * double({ x: 4 })              // 8
 * double({ x: 4, factor: 3 })   // 12
 * ```
 */
export function bind<O extends object, R>(
  fn: (options: O) => R,
  defaults: O
): (overrides?: Partial<O>) => R {
  const bound = (overrides: Partial<O> = {}): R => fn({ ...defaults, ...overrides })
  Object.defineProperty(bound, 'name', { value: fn.name })
  return bound
}
