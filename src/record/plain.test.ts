import { describe, expect, it } from 'vitest'
import { bind, plain } from './plain'
import { PrettyRecord } from './record'

class Point {
  readonly label = 'pt'
  readonly onMove = (): void => undefined

  constructor(
    readonly x: number,
    readonly y: number
  ) {}

  norm(): number {
    return Math.hypot(this.x, this.y)
  }
}

describe('plain', () => {
  it('keeps primitives, dates and binary views', () => {
    const at = new Date(0)
    const bytes = new Uint8Array([1, 2])
    expect(plain('a')).toBe('a')
    expect(plain(1.5)).toBe(1.5)
    expect(plain(7n)).toBe(7n)
    expect(plain(false)).toBe(false)
    expect(plain(at)).toBe(at)
    expect(plain(bytes)).toBe(bytes)
  })

  it('turns missing values, functions and symbols into null', () => {
    expect(plain(undefined)).toBeNull()
    expect(plain(null)).toBeNull()
    expect(plain(() => 1)).toBeNull()
    expect(plain({ f: () => 1 })).toEqual({ f: null })
    expect(plain(Symbol('s'))).toBeNull()
  })

  it('turns class instances into their data fields', () => {
    expect(plain(new Point(3, 4))).toEqual({ label: 'pt', x: 3, y: 4 })
    expect(plain({ at: [new Point(1, 0)] })).toEqual({ at: [{ label: 'pt', x: 1, y: 0 }] })
  })

  it('turns collections into arrays and objects', () => {
    expect(plain(new Set([1, 2]))).toEqual([1, 2])
    expect(plain(new Map<unknown, number>([[1, 10], ['b', 20]]))).toEqual({ '1': 10, b: 20 })
    expect(plain(new PrettyRecord({ b: 1, a: 2 }, 'sorted'))).toEqual({ a: 2, b: 1 })
  })

  it('sorts keys when asked', () => {
    const out = plain({ b: 1, a: { d: 2, c: 3 } }, { sortKeys: true })
    expect(JSON.stringify(out)).toBe('{"a":{"c":3,"d":2},"b":1}')
  })

  it('allows shared but not cyclic references', () => {
    const shared = { n: 1 }
    expect(plain([shared, shared])).toEqual([{ n: 1 }, { n: 1 }])

    const loop: { self?: unknown } = {}
    loop.self = loop
    expect(() => plain(loop)).toThrow('cyclic')
  })
})

describe('bind', () => {
  function scale(options: { x: number; factor: number }): number {
    return options.x * options.factor
  }

  it('fills in defaults', () => {
    const double = bind(scale, { x: 0, factor: 2 })
    expect(double({ x: 4 })).toBe(8)
    expect(double()).toBe(0)
  })

  it('lets call options override defaults', () => {
    const double = bind(scale, { x: 0, factor: 2 })
    expect(double({ x: 4, factor: 3 })).toBe(12)
  })

  it('keeps the function name', () => {
    expect(bind(scale, { x: 0, factor: 1 }).name).toBe('scale')
  })
})
