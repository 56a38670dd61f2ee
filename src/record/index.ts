/**
 * Record Module
 *
 * Typed records and conversion of arbitrary values into plain data.
 */

export { bind, plain, type PlainOptions, type PlainValue } from './plain'
export { type KeyOrder, PrettyRecord } from './record'
