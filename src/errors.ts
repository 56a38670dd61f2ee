/**
 * Error Types
 *
 * Named errors raised by the hasher, the cache mode policy and the
 * directory store. Callers narrow with `instanceof`.
 */

/**
 * Thrown when a caching mode token is not one of the known modes.
 */
export class InvalidModeError extends Error {
  readonly mode: string

  constructor(mode: string, help: string) {
    super(`Invalid caching mode "${mode}". Use ${help}`)
    this.name = 'InvalidModeError'
    this.mode = mode
  }
}

/**
 * Thrown when the hasher meets a value it has no canonical form for.
 */
export class UnsupportedTypeError extends Error {
  readonly typeName: string

  constructor(typeName: string) {
    super(
      `Cannot hash value of type ${typeName}. ` +
        'Implement toCanonical() on the class to make it hashable.'
    )
    this.name = 'UnsupportedTypeError'
    this.typeName = typeName
  }
}

/**
 * Thrown when a function without a name is memoized and no `name` option is given.
 */
export class AnonymousFunctionError extends Error {
  constructor() {
    super('Cannot memoize an anonymous function. Pass a name option or use a named function.')
    this.name = 'AnonymousFunctionError'
  }
}

/**
 * Thrown when a codec cannot store a value so that it reads back unchanged.
 */
export class UnserializableValueError extends Error {
  readonly codec: string
  readonly path: string
  readonly typeName: string

  constructor(codec: string, path: string, typeName: string) {
    super(
      `The ${codec} codec cannot store ${typeName} at ${path}: ` +
        'it would not read back as the same value.'
    )
    this.name = 'UnserializableValueError'
    this.codec = codec
    this.path = path
    this.typeName = typeName
  }
}

/**
 * Thrown when a key is read or deleted (with throwOnError) but does not exist.
 */
export class NotFoundError extends Error {
  readonly key: string

  constructor(key: string, fullPath: string) {
    super(`Key "${key}" not found (full path ${fullPath})`)
    this.name = 'NotFoundError'
    this.key = key
  }
}

/**
 * Thrown when a stored entry exists but cannot be decoded.
 */
export class CorruptDataError extends Error {
  readonly key: string
  readonly fullPath: string

  constructor(key: string, fullPath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Cannot decode "${key}" (full path ${fullPath}): ${reason}`, { cause })
    this.name = 'CorruptDataError'
    this.key = key
    this.fullPath = fullPath
  }
}

/**
 * Thrown when the filesystem layout does not match what a directory store expects,
 * e.g. a file sits where a sub directory should be.
 */
export class StructureError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'StructureError'
  }
}
