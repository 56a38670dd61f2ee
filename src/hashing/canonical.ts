/**
 * Canonical Encoding
 *
 * Walks an arbitrary value and emits a stream of text tokens that is
 * independent of mapping insertion order. The token stream feeds the
 * digest in ./key.ts.
 *
 * Rules:
 * - null and undefined emit nothing
 * - functions emit nothing unless parseFunctions is set
 * - strings, numbers, bigints, booleans, dates and binary views are atomic
 * - typed arrays print their elements, so keys do not depend on byte order;
 *   ArrayBuffer and DataView print raw bytes in hex and do
 * - Map and plain objects are mappings: keys sorted, `_`-prefixed keys skipped
 * - other iterables keep their order; `_`-prefixed string elements are skipped
 * - class instances must implement toCanonical()
 *
 * Floats are emitted through String(n), so equality is exact to the shortest
 * round-trip representation and no further.
 */

import { UnsupportedTypeError } from '../errors'
import type { CanonicalEncodable } from './types'

export type TokenSink = (token: string) => void

const MAPPING_OPEN = '{'
const MAPPING_CLOSE = '}'
const COLLECTION_OPEN = '['
const COLLECTION_CLOSE = ']'

function isHidden(key: unknown): boolean {
  return typeof key === 'string' && key.startsWith('_')
}

function compareText(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

function isCanonicalEncodable(value: object): value is CanonicalEncodable {
  return 'toCanonical' in value && typeof value.toCanonical === 'function'
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function isTypedArray(value: unknown): value is ArrayBufferView & ArrayLike<number | bigint> {
  return ArrayBuffer.isView(value) && !(value instanceof DataView)
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value
}

function typeNameOf(value: unknown): string {
  if (typeof value !== 'object' || value === null) {
    return typeof value
  }
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'object'
}

/**
 * Normalized source text of a function: all whitespace removed.
 */
export function compressFunctionSource(fn: Function): string {
  return Function.prototype.toString.call(fn).replace(/\s+/g, '')
}

/**
 * Text form of an atomic value, or null if the value is not atomic.
 */
export function atomicText(value: unknown): string | null {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value)
    case 'number':
    case 'boolean':
      return String(value)
    case 'bigint':
      return `${value}n`
    case 'object':
      break
    default:
      return null
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Date(Invalid)' : `Date(${value.toISOString()})`
  }
  if (value instanceof ArrayBuffer) {
    return `ArrayBuffer(${Buffer.from(value).toString('hex')})`
  }
  if (value instanceof DataView) {
    const bytes = Buffer.from(value.buffer, value.byteOffset, value.byteLength)
    return `DataView(${bytes.toString('hex')})`
  }
  if (isTypedArray(value)) {
    return `${typeNameOf(value)}[${Array.from(value, (item) => String(item)).join(',')}]`
  }
  return null
}

/**
 * Emit the canonical token stream of `value` into `sink`.
 */
export function encodeCanonical(value: unknown, sink: TokenSink, parseFunctions = false): void {
  const visit = (inn: unknown): void => {
    if (inn === null || inn === undefined) {
      return
    }

    if (typeof inn === 'function') {
      if (parseFunctions) sink(compressFunctionSource(inn))
      return
    }

    const atomic = atomicText(inn)
    if (atomic !== null) {
      sink(atomic)
      return
    }

    if (typeof inn !== 'object') {
      throw new UnsupportedTypeError(typeof inn)
    }

    if (isCanonicalEncodable(inn)) {
      visit(inn.toCanonical())
      return
    }

    if (inn instanceof Map) {
      visitMapping([...inn.entries()])
      return
    }

    if (isPlainObject(inn)) {
      visitMapping(Object.entries(inn))
      return
    }

    if (isIterable(inn)) {
      sink(COLLECTION_OPEN)
      for (const item of inn) {
        if (isHidden(item)) continue
        visit(item)
      }
      sink(COLLECTION_CLOSE)
      return
    }

    throw new UnsupportedTypeError(typeNameOf(inn))
  }

  const visitMapping = (entries: ReadonlyArray<readonly [unknown, unknown]>): void => {
    const keyed = entries
      .filter(([key]) => !isHidden(key))
      .map(([key, val]) => {
        const text = atomicText(key)
        if (text === null) {
          throw new UnsupportedTypeError(`mapping key ${typeNameOf(key)}`)
        }
        return { text, val }
      })
      .sort((a, b) => compareText(a.text, b.text))

    sink(MAPPING_OPEN)
    for (const { text, val } of keyed) {
      sink(text)
      visit(val)
    }
    sink(MAPPING_CLOSE)
  }

  visit(value)
}

/**
 * Canonical text of the given parts, one token per line.
 * Mostly useful to see why two calls do or do not share a key.
 */
export function canonicalText(parts: readonly unknown[], parseFunctions = false): string {
  const tokens: string[] = []
  encodeCanonical(parts, (token) => tokens.push(token), parseFunctions)
  return tokens.join('\n')
}
