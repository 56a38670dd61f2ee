import { describe, expect, it } from 'vitest'
import { uniqueHash } from '../hashing'
import { PrettyRecord } from './record'

describe('PrettyRecord', () => {
  it('reads and writes fields by name', () => {
    const params = new PrettyRecord({ lr: 0.01, layers: 3 })
    expect(params.get('lr')).toBe(0.01)
    params.set('layers', 4).set('lr', 0.1)
    expect(params.toObject()).toEqual({ lr: 0.1, layers: 4 })
  })

  it('does not share fields with the object it was built from', () => {
    const fields = { a: 1 }
    const record = new PrettyRecord(fields)
    record.set('a', 2)
    expect(fields.a).toBe(1)
  })

  it('falls back for missing fields', () => {
    const record = new PrettyRecord<{ name: string; nickname?: string }>({ name: 'ada' })
    expect(record.getOr('nickname', '-')).toBe('-')
    expect(record.getOr('name', '-')).toBe('ada')
    expect(record.has('nickname')).toBe(false)
    expect(record.has('name')).toBe(true)
  })

  it('keeps insertion order', () => {
    const record = new PrettyRecord({ b: 1, a: 2, c: 3 })
    expect(record.keys()).toEqual(['b', 'a', 'c'])
    expect(record.values()).toEqual([1, 2, 3])
    expect(record.size).toBe(3)
  })

  it('sorts keys when asked', () => {
    const record = new PrettyRecord({ b: 1, a: 2, c: 3 }, 'sorted')
    expect(record.keys()).toEqual(['a', 'b', 'c'])
    expect(record.entries()).toEqual([
      ['a', 2],
      ['b', 1],
      ['c', 3]
    ])
  })

  it('reads fields by position', () => {
    const record = new PrettyRecord({ x: 'first', y: 'second', z: 'third' })
    expect(record.at(0)).toBe('first')
    expect(record.at(-1)).toBe('third')
    expect(record.at(5)).toBeUndefined()
    expect(record.keyAt(1)).toBe('y')
    expect(record.slice(1)).toEqual(['second', 'third'])
    expect(record.slice(0, 2)).toEqual(['first', 'second'])
  })

  it('compares fields deeply, ignoring order', () => {
    const a = new PrettyRecord({ x: 1, tags: ['t'] })
    const b = new PrettyRecord({ tags: ['t'], x: 1 })
    expect(a.equals(b)).toBe(true)
    expect(a.equals({ x: 1, tags: ['u'] })).toBe(false)
  })

  it('freezes a copy', () => {
    const record = new PrettyRecord({ x: 1 })
    const frozen = record.freeze()
    expect(Object.isFrozen(frozen)).toBe(true)
    record.set('x', 2)
    expect(frozen.x).toBe(1)
  })

  it('hashes like its fields', () => {
    const record = new PrettyRecord({ lr: 0.01, layers: 3 }, 'sorted')
    expect(uniqueHash(record)).toBe(uniqueHash({ layers: 3, lr: 0.01 }))
  })
})
