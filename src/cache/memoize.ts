/**
 * Memoizing Wrapper
 *
 * Turns a function into a disk-cached function. The cache key is a
 * canonical hash of (module, name, args); entries live in
 * `<store>/<module>/<name>/<key>`. Without a `module` option the function's
 * whitespace-free source joins the identity, so two functions that share a
 * name in different files keep separate entries. Anonymous functions need a
 * `name` option.
 *
 * Per-call protocol, driven only by the CacheMode facets:
 * 1. off: call through, no I/O
 * 2. delete (clear): drop the entry, compute, never write
 * 3. delIncompatible without read (update): drop the entry before recomputing
 * 4. read: return the stored value if present
 * 5. otherwise compute, and write if the mode writes
 *
 * Trailing options objects act as keyword arguments: their `_`-prefixed keys
 * never reach the key, so `fn(x, { verbose: true, _trace: id })` and
 * `fn(x, { verbose: true })` share an entry.
 *
 * @example
 * ```ts
 * const cacheDir = root('!/caching')
 * const slowSquare = memoize((x: number) => x * x, {
 *   store: cacheDir,
 *   module: 'maths',
 *   name: 'slowSquare'
 * })
 *
 * slowSquare(4)                          // computed
 * slowSquare(4)                          // read from disk
 * slowSquare.cached                      // true
 * slowSquare.withCaching('update')(4)    // recomputed and rewritten
 * ```
 */

import { AnonymousFunctionError, CorruptDataError } from '../errors'
import { compressFunctionSource, uniqueHashExt } from '../hashing'
import type { UniqueHashFn } from '../hashing'
import { defaultLogger, type Logger } from '../logger'
import { CacheMode, type CacheModeInput } from './mode'
import type {
  AsyncMemoizedFunction,
  CacheCallState,
  CallResult,
  InvokeOptions,
  KeyValueStore,
  MemoizedFunction,
  MemoizeOptions
} from './types'

/** Directory names derived from module and function names are cut to this length */
export const NAMESPACE_NAME_LIMIT = 64

const DEFAULT_MODULE = 'main'

interface Namespace {
  /** Leading parts of every key: module, name and, without a module option, the source */
  readonly identity: readonly string[]
  readonly store: KeyValueStore
  readonly hash: UniqueHashFn
  readonly defaultMode: CacheMode
  readonly logger: Logger
}

type CallPlan =
  | { readonly kind: 'direct'; readonly mode: CacheMode }
  | {
      readonly kind: 'keyed'
      readonly mode: CacheMode
      readonly argKey: string
      readonly fullKey: string
    }

type Lookup<R> = { readonly found: true; readonly value: R } | { readonly found: false }

type KeyedPlan = Extract<CallPlan, { kind: 'keyed' }>

const MISS = { found: false } as const

const INITIAL_STATE: CacheCallState = { cached: false, cacheArgKey: null, cacheFullKey: null }

function createNamespace(fn: Function, options: MemoizeOptions): Namespace {
  const name = options.name ?? fn.name
  if (!name) {
    throw new AnonymousFunctionError()
  }
  // option errors surface before any directory is created
  const defaultMode = CacheMode.parse(options.caching)
  const hash = uniqueHashExt({ length: options.length, parseFunctions: options.parseFunctions })
  const module = options.module ?? DEFAULT_MODULE
  const identity =
    options.module === undefined ? [module, name, compressFunctionSource(fn)] : [module, name]
  const store = options.store
    .subDir(options.cacheSubDir ?? module.slice(0, NAMESPACE_NAME_LIMIT))
    .subDir(options.cacheName ?? name.slice(0, NAMESPACE_NAME_LIMIT))

  return {
    identity,
    store,
    hash,
    defaultMode,
    logger: options.logger ?? defaultLogger
  }
}

function planCall(
  ns: Namespace,
  args: readonly unknown[],
  caching: CacheModeInput | undefined
): CallPlan {
  const mode = caching === undefined ? ns.defaultMode : CacheMode.parse(caching)
  if (mode.isOff) {
    return { kind: 'direct', mode }
  }
  const argKey = ns.hash(...ns.identity, args)
  return { kind: 'keyed', mode, argKey, fullKey: ns.store.fullKeyName(argKey) }
}

/**
 * Apply the delete facets before anything is read or computed.
 */
function applyDeletes(ns: Namespace, mode: CacheMode, argKey: string): void {
  if (mode.delete || (mode.delIncompatible && !mode.read)) {
    ns.store.delete(argKey)
  }
}

/**
 * Read an entry. Entries that fail to decode are deleted and reported as a miss.
 */
function lookup<R>(ns: Namespace, argKey: string): Lookup<R> {
  if (!ns.store.exists(argKey)) {
    return MISS
  }
  try {
    return { found: true, value: ns.store.get<R>(argKey) }
  } catch (error) {
    if (!(error instanceof CorruptDataError)) {
      throw error
    }
    try {
      ns.store.delete(argKey)
      ns.logger.warn(`Cannot read ${argKey}; entry deleted (full path ${error.fullPath})`)
    } catch (deleteError) {
      const reason = deleteError instanceof Error ? deleteError.message : String(deleteError)
      ns.logger.warn(
        `Cannot read ${argKey}; attempt to delete entry failed ` +
          `(full path ${error.fullPath}): ${reason}`
      )
    }
    return MISS
  }
}

function stateOf(plan: CallPlan, cached: boolean): CacheCallState {
  return plan.kind === 'direct'
    ? { cached: false, cacheArgKey: null, cacheFullKey: null }
    : { cached, cacheArgKey: plan.argKey, cacheFullKey: plan.fullKey }
}

function resultOf<R>(plan: CallPlan, value: R, cached: boolean): CallResult<R> {
  return plan.kind === 'direct'
    ? { value, cached: false, argKey: null, fullKey: null }
    : { value, cached, argKey: plan.argKey, fullKey: plan.fullKey }
}

/**
 * Wrap a synchronous function with a disk cache.
 *
 * The wrapped function keeps `fn`'s signature. After each call,
 * `cached`, `cacheArgKey` and `cacheFullKey` describe that call.
 */
export function memoize<A extends unknown[], R>(
  fn: (...args: A) => R,
  options: MemoizeOptions
): MemoizedFunction<A, R> {
  const ns = createNamespace(fn, options)

  const invoke = (args: A, invokeOptions: InvokeOptions = {}): CallResult<R> => {
    const plan = planCall(ns, args, invokeOptions.caching)
    Object.assign(memoized, stateOf(plan, false))

    if (plan.kind === 'direct') {
      return resultOf(plan, fn(...args), false)
    }

    const { mode, argKey } = plan
    applyDeletes(ns, mode, argKey)

    if (mode.read) {
      const hit = lookup<R>(ns, argKey)
      if (hit.found) {
        Object.assign(memoized, stateOf(plan, true))
        return resultOf(plan, hit.value, true)
      }
    }

    const value = fn(...args)
    if (mode.write) {
      ns.store.write(argKey, value)
    }
    return resultOf(plan, value, false)
  }

  const memoized = Object.assign((...args: A): R => invoke(args).value, INITIAL_STATE, {
    store: ns.store,
    invoke,
    withCaching: (mode: CacheModeInput) => {
      const parsed = CacheMode.parse(mode)
      return (...args: A): R => invoke(args, { caching: parsed }).value
    }
  })

  return memoized
}

/**
 * Wrap an async function with a disk cache.
 *
 * Values are written once the promise resolves; rejections are never
 * stored. Concurrent calls that share a key and mode share one computation,
 * so two simultaneous misses compute once and write once.
 */
export function memoizeAsync<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  options: MemoizeOptions
): AsyncMemoizedFunction<A, R> {
  const ns = createNamespace(fn, options)
  const inflight = new Map<string, Promise<CallResult<R>>>()

  const run = async (plan: KeyedPlan, args: A): Promise<CallResult<R>> => {
    const { mode, argKey } = plan
    applyDeletes(ns, mode, argKey)

    if (mode.read) {
      const hit = lookup<R>(ns, argKey)
      if (hit.found) {
        return resultOf(plan, hit.value, true)
      }
    }

    const value = await fn(...args)
    if (mode.write) {
      ns.store.write(argKey, value)
    }
    return resultOf(plan, value, false)
  }

  const invoke = async (args: A, invokeOptions: InvokeOptions = {}): Promise<CallResult<R>> => {
    const plan = planCall(ns, args, invokeOptions.caching)
    Object.assign(memoized, stateOf(plan, false))

    if (plan.kind === 'direct') {
      return resultOf(plan, await fn(...args), false)
    }

    const flightKey = `${plan.mode.mode}:${plan.argKey}`
    let flight = inflight.get(flightKey)
    if (!flight) {
      flight = run(plan, args).finally(() => inflight.delete(flightKey))
      inflight.set(flightKey, flight)
    }

    const result = await flight
    Object.assign(memoized, stateOf(plan, result.cached))
    return result
  }

  const call = (...args: A): Promise<R> => invoke(args).then((r) => r.value)
  const memoized = Object.assign(call, INITIAL_STATE, {
    inflight: 0,
    store: ns.store,
    invoke,
    withCaching: (mode: CacheModeInput) => {
      const parsed = CacheMode.parse(mode)
      return (...args: A): Promise<R> => invoke(args, { caching: parsed }).then((r) => r.value)
    }
  })

  Object.defineProperty(memoized, 'inflight', { enumerable: true, get: () => inflight.size })

  return memoized
}
