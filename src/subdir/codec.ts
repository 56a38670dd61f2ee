/**
 * Entry Codecs
 *
 * Turn stored values into bytes and back. The v8 codec keeps Dates, Maps,
 * Sets, bigints and typed arrays intact; the JSON codec writes readable
 * files but only round-trips JSON values.
 *
 * Both codecs refuse values they would not read back unchanged (class
 * instances, and for JSON anything beyond plain data) before any bytes are
 * produced, so a refused value never reaches the disk.
 */

import { deserialize, serialize } from 'node:v8'
import { UnserializableValueError } from '../errors'

export interface Codec {
  readonly name: string
  /** File extension including the leading dot */
  readonly extension: string
  /** @throws UnserializableValueError when `value` would not decode to an equal value */
  encode(value: unknown): Buffer
  /** @throws when `data` is not a valid encoding */
  decode(data: Buffer): unknown
}

interface ValueRules {
  /** Accepts a non-object value (null included) */
  readonly primitive: (value: unknown) => boolean
  /** Prototypes of objects that decode with the same prototype */
  readonly prototypes: ReadonlySet<unknown>
}

function typeNameOf(value: unknown): string {
  if (typeof value !== 'object' || value === null) {
    return typeof value === 'number' ? String(value) : typeof value
  }
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'object'
}

/**
 * Walk `value` and throw on the first part the rules do not accept.
 * Paths read like `$.items[2]` or `$<Map value 1>`.
 */
function assertEncodable(codec: string, value: unknown, rules: ValueRules): void {
  const seen = new Set<object>()

  const visit = (inn: unknown, path: string): void => {
    if (typeof inn !== 'object' || inn === null) {
      if (!rules.primitive(inn)) {
        throw new UnserializableValueError(codec, path, typeNameOf(inn))
      }
      return
    }
    if (seen.has(inn)) return
    seen.add(inn)

    if (!rules.prototypes.has(Object.getPrototypeOf(inn))) {
      throw new UnserializableValueError(codec, path, typeNameOf(inn))
    }

    if (inn instanceof Map) {
      let index = 0
      for (const [key, item] of inn) {
        visit(key, `${path}<Map key ${index}>`)
        visit(item, `${path}<Map value ${index}>`)
        index++
      }
      return
    }
    if (inn instanceof Set) {
      let index = 0
      for (const item of inn) {
        visit(item, `${path}<Set item ${index}>`)
        index++
      }
      return
    }
    if (Array.isArray(inn)) {
      inn.forEach((item: unknown, index) => visit(item, `${path}[${index}]`))
      return
    }
    if (inn instanceof Date || inn instanceof RegExp || inn instanceof ArrayBuffer) {
      return
    }
    if (ArrayBuffer.isView(inn)) {
      return
    }
    for (const [key, item] of Object.entries(inn)) {
      visit(item, `${path}.${key}`)
    }
  }

  visit(value, '$')
}

const V8_RULES: ValueRules = {
  primitive: (value) => typeof value !== 'function' && typeof value !== 'symbol',
  prototypes: new Set<unknown>([
    null,
    Object.prototype,
    Array.prototype,
    Date.prototype,
    RegExp.prototype,
    Map.prototype,
    Set.prototype,
    ArrayBuffer.prototype,
    DataView.prototype,
    Int8Array.prototype,
    Uint8Array.prototype,
    Uint8ClampedArray.prototype,
    Int16Array.prototype,
    Uint16Array.prototype,
    Int32Array.prototype,
    Uint32Array.prototype,
    Float32Array.prototype,
    Float64Array.prototype,
    BigInt64Array.prototype,
    BigUint64Array.prototype
  ])
}

// NaN and the infinities print as null; undefined drops out of objects
const JSON_RULES: ValueRules = {
  primitive: (value) =>
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value)),
  prototypes: new Set<unknown>([null, Object.prototype, Array.prototype])
}

export const v8Codec: Codec = {
  name: 'v8',
  extension: '.bin',
  encode: (value) => {
    assertEncodable('v8', value, V8_RULES)
    return serialize(value)
  },
  decode: (data) => {
    const value: unknown = deserialize(data)
    return value
  }
}

export const jsonCodec: Codec = {
  name: 'json',
  extension: '.json',
  encode: (value) => {
    assertEncodable('json', value, JSON_RULES)
    return Buffer.from(JSON.stringify(value, null, 2), 'utf-8')
  },
  decode: (data) => {
    const value: unknown = JSON.parse(data.toString('utf-8'))
    return value
  }
}

const CODECS = new Map<string, Codec>([
  [v8Codec.name, v8Codec],
  [jsonCodec.name, jsonCodec]
])

/**
 * Look up a codec by name ('v8' or 'json').
 */
export function getCodec(name: string): Codec | null {
  return CODECS.get(name) ?? null
}
