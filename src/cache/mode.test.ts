import { describe, expect, it } from 'vitest'
import { InvalidModeError } from '../errors'
import { CacheMode, type CacheModeName } from './mode'

describe('CacheMode', () => {
  describe('parse', () => {
    it('defaults to on', () => {
      expect(CacheMode.parse().mode).toBe('on')
      expect(CacheMode.parse(undefined).isOn).toBe(true)
    })

    it('returns an existing CacheMode unchanged', () => {
      const mode = CacheMode.parse('gen')
      expect(CacheMode.parse(mode)).toBe(mode)
    })

    it('accepts all six names', () => {
      for (const name of CacheMode.MODES) {
        expect(CacheMode.parse(name).toString()).toBe(name)
      }
    })

    it('rejects unknown tokens', () => {
      expect(() => CacheMode.parse('yes')).toThrow(InvalidModeError)
      expect(() => CacheMode.parse('')).toThrow(InvalidModeError)
    })

    it('is case-sensitive', () => {
      expect(() => CacheMode.parse('On')).toThrow(InvalidModeError)
    })

    it('does not accept inherited property names', () => {
      expect(() => CacheMode.parse('toString')).toThrow(InvalidModeError)
    })

    it('reports the bad token', () => {
      try {
        CacheMode.parse('sometimes')
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidModeError)
        if (error instanceof InvalidModeError) {
          expect(error.mode).toBe('sometimes')
        }
      }
    })
  })

  describe('facets', () => {
    const table: Array<[CacheModeName, boolean, boolean, boolean, boolean]> = [
      ['on', true, true, false, true],
      ['gen', true, true, false, false],
      ['off', false, false, false, false],
      ['update', false, true, false, true],
      ['clear', false, false, true, true],
      ['readonly', true, false, false, false]
    ]

    it.each(table)(
      '%s has read=%s write=%s delete=%s delIncompatible=%s',
      (name, read, write, del, delIncompatible) => {
        const mode = CacheMode.parse(name)
        expect(mode.read).toBe(read)
        expect(mode.write).toBe(write)
        expect(mode.delete).toBe(del)
        expect(mode.delIncompatible).toBe(delIncompatible)
      }
    )
  })

  describe('predicates', () => {
    it('flags exactly one mode', () => {
      const mode = CacheMode.parse('readonly')
      expect(mode.isReadonly).toBe(true)
      expect(mode.isOn).toBe(false)
      expect(mode.isGen).toBe(false)
      expect(mode.isOff).toBe(false)
      expect(mode.isUpdate).toBe(false)
      expect(mode.isClear).toBe(false)
    })
  })

  describe('equals', () => {
    it('compares against names and modes', () => {
      expect(CacheMode.parse('clear').equals('clear')).toBe(true)
      expect(CacheMode.parse('clear').equals(CacheMode.parse('clear'))).toBe(true)
      expect(CacheMode.parse('clear').equals('update')).toBe(false)
    })
  })
})
