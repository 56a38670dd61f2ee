/**
 * Cache Mode
 *
 * Standard behaviour of a caching strategy:
 *
 * ```
 *                                          on   gen  off  update  clear  readonly
 * load from disk on start if it exists     x    x    -    -       -      x
 * write updates to disk                    x    x    -    x       -      -
 * delete existing entry on start           -    -    -    -       x      -
 * delete existing entry if incompatible    x    -    -    x       x      -
 * ```
 *
 * No compatibility check exists: "delete if incompatible" modes drop the
 * entry whenever they do not read it.
 */

import { InvalidModeError } from '../errors'

export type CacheModeName = 'on' | 'gen' | 'off' | 'update' | 'clear' | 'readonly'

export type CacheModeInput = CacheModeName | CacheMode

interface CacheModeFacets {
  readonly read: boolean
  readonly write: boolean
  readonly delete: boolean
  readonly delIncompatible: boolean
}

const FACETS: Record<CacheModeName, CacheModeFacets> = {
  on: { read: true, write: true, delete: false, delIncompatible: true },
  gen: { read: true, write: true, delete: false, delIncompatible: false },
  off: { read: false, write: false, delete: false, delIncompatible: false },
  update: { read: false, write: true, delete: false, delIncompatible: true },
  clear: { read: false, write: false, delete: true, delIncompatible: true },
  readonly: { read: true, write: false, delete: false, delIncompatible: false }
}

export function isCacheModeName(value: string): value is CacheModeName {
  return Object.hasOwn(FACETS, value)
}

export class CacheMode {
  static readonly ON = 'on'
  static readonly GEN = 'gen'
  static readonly OFF = 'off'
  static readonly UPDATE = 'update'
  static readonly CLEAR = 'clear'
  static readonly READONLY = 'readonly'

  static readonly MODES: readonly CacheModeName[] = [
    'on',
    'gen',
    'off',
    'update',
    'clear',
    'readonly'
  ]

  static readonly HELP =
    "'on' for standard caching; 'gen' for caching but keep existing incompatible files; " +
    "'off' to turn off; 'update' to overwrite any existing cache; " +
    "'clear' to clear existing caches; " +
    "'readonly' to read existing caches but not write new ones"

  readonly mode: CacheModeName
  private readonly facets: CacheModeFacets

  private constructor(mode: CacheModeName) {
    this.mode = mode
    this.facets = FACETS[mode]
  }

  /**
   * Parse a mode token. Missing tokens mean 'on'; matching is exact and case-sensitive.
   * @throws InvalidModeError for unknown tokens
   */
  static parse(token?: string | CacheMode | undefined): CacheMode {
    if (token === undefined) {
      return new CacheMode('on')
    }
    if (token instanceof CacheMode) {
      return token
    }
    if (!isCacheModeName(token)) {
      throw new InvalidModeError(token, CacheMode.HELP)
    }
    return new CacheMode(token)
  }

  /** Whether to load existing data when starting */
  get read(): boolean {
    return this.facets.read
  }

  /** Whether to write results to disk */
  get write(): boolean {
    return this.facets.write
  }

  /** Whether to delete existing data when starting */
  get delete(): boolean {
    return this.facets.delete
  }

  /** Whether to delete existing data if it is not compatible */
  get delIncompatible(): boolean {
    return this.facets.delIncompatible
  }

  get isOn(): boolean {
    return this.mode === 'on'
  }

  get isGen(): boolean {
    return this.mode === 'gen'
  }

  get isOff(): boolean {
    return this.mode === 'off'
  }

  get isUpdate(): boolean {
    return this.mode === 'update'
  }

  get isClear(): boolean {
    return this.mode === 'clear'
  }

  get isReadonly(): boolean {
    return this.mode === 'readonly'
  }

  equals(other: string | CacheMode): boolean {
    return this.mode === (other instanceof CacheMode ? other.mode : other)
  }

  toString(): string {
    return this.mode
  }
}
