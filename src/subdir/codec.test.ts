import { describe, expect, it } from 'vitest'
import { UnserializableValueError } from '../errors'
import { getCodec, jsonCodec, v8Codec } from './codec'

describe('codecs', () => {
  it('v8 keeps dates and maps', () => {
    const value = { at: new Date(0), index: new Map([[1, 'one']]) }
    expect(v8Codec.decode(v8Codec.encode(value))).toEqual(value)
  })

  it('json writes readable text', () => {
    expect(jsonCodec.encode({ a: 1 }).toString('utf-8')).toBe('{\n  "a": 1\n}')
  })

  it('v8 keeps null-prototype objects, regexes and typed arrays', () => {
    const bare: Record<string, unknown> = Object.create(null)
    bare['n'] = 1
    const value = [bare, /a+b/g, new Int16Array([-1, 2]), new Set([10n])]
    expect(v8Codec.decode(v8Codec.encode(value))).toEqual(value)
  })

  it('v8 refuses class instances anywhere in the value', () => {
    class Celsius {
      constructor(readonly degrees: number) {}
    }
    expect(() => v8Codec.encode(new Celsius(3))).toThrow(UnserializableValueError)
    expect(() => v8Codec.encode({ readings: [1, new Celsius(3)] })).toThrow(
      'cannot store Celsius at $.readings[1]'
    )
    expect(() => v8Codec.encode(new Map([['k', new Celsius(3)]]))).toThrow(
      'cannot store Celsius at $<Map value 0>'
    )
  })

  it('v8 refuses subclasses of built-in collections and functions', () => {
    class Registry extends Map<string, number> {}
    expect(() => v8Codec.encode(new Registry())).toThrow('cannot store Registry at $')
    expect(() => v8Codec.encode({ run: () => 1 })).toThrow('cannot store function at $.run')
  })

  it('v8 accepts cyclic plain data', () => {
    const node: { name: string; self?: unknown } = { name: 'loop' }
    node.self = node
    const decoded = v8Codec.decode(v8Codec.encode(node))
    expect(decoded).toEqual(node)
  })

  it('json round-trips plain data', () => {
    const value = { name: 'x', tags: ['a'], nested: { ok: true, none: null, ratio: 0.25 } }
    expect(jsonCodec.decode(jsonCodec.encode(value))).toEqual(value)
  })

  it('json refuses values it would change', () => {
    expect(() => jsonCodec.encode(undefined)).toThrow('cannot store undefined at $')
    expect(() => jsonCodec.encode({ a: undefined })).toThrow('cannot store undefined at $.a')
    expect(() => jsonCodec.encode([Number.NaN])).toThrow('cannot store NaN at $[0]')
    expect(() => jsonCodec.encode({ at: new Date(0) })).toThrow('cannot store Date at $.at')
    expect(() => jsonCodec.encode(new Set([1]))).toThrow('cannot store Set at $')
    expect(() => jsonCodec.encode({ n: 1n })).toThrow('cannot store bigint at $.n')
  })

  it('json decode throws on invalid text', () => {
    expect(() => jsonCodec.decode(Buffer.from('{{{', 'utf-8'))).toThrow()
  })

  it('looks codecs up by name', () => {
    expect(getCodec('v8')).toBe(v8Codec)
    expect(getCodec('json')).toBe(jsonCodec)
    expect(getCodec('pickle')).toBeNull()
  })
})
