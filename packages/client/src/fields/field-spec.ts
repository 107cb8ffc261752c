/** One raw item as returned by the server */
export type WireRecord = Record<string, unknown>

/**
 * Where a field's raw value lives in a wire record: a dotted path, or several
 * dotted paths whose values are passed to the transform as a tuple.
 */
export type WirePath = string | readonly string[]

/** A named projection rule from a wire record to a renderable value */
export interface FieldSpec {
  /** Stable identifier used on input and as the structured-output key */
  readonly key: string
  readonly wirePath: WirePath
  /** Column header / label for human output */
  readonly displayName: string
  /** Alternate name accepted on input, e.g. the pre-rename wire name */
  readonly altName?: string
  /** raw -> value emitted by structured formats. May throw. */
  readonly transform?: (raw: unknown) => unknown
  /** value -> text for the table format. May throw. */
  readonly humanize?: (value: unknown) => string
  /** Oldest server version that exposes this field */
  readonly minServerVersion?: string
}

/** Ordered projection with unique keys; frozen once resolved */
export type FieldSet = readonly FieldSpec[]

export interface FieldOptions {
  wirePath?: WirePath
  displayName?: string
  altName?: string
  transform?: (raw: unknown) => unknown
  humanize?: (value: unknown) => string
  minServerVersion?: string
}

/** Turn `created_at` into `Created At` */
export function humanizeKey(key: string): string {
  return key
    .split(/[_.]/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ')
}

/**
 * Declare a field. The wire path defaults to the key, the display name to the
 * humanized key.
 */
export function defineField(key: string, options: FieldOptions = {}): FieldSpec {
  return Object.freeze({
    key,
    wirePath: options.wirePath ?? key,
    displayName: options.displayName ?? humanizeKey(key),
    altName: options.altName,
    transform: options.transform,
    humanize: options.humanize,
    minServerVersion: options.minServerVersion,
  })
}

export function fieldSetKeys(fieldSet: FieldSet): string[] {
  return fieldSet.map((field) => field.key)
}

/** Top-level wire keys a field set reads; used for server-side projection */
export function requiredWireKeys(fieldSet: FieldSet): string[] {
  const keys = new Set<string>()
  for (const field of fieldSet) {
    const paths = typeof field.wirePath === 'string' ? [field.wirePath] : field.wirePath
    for (const path of paths) {
      keys.add(path.split('.')[0])
    }
  }
  return [...keys]
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readPath(record: WireRecord, path: string): unknown {
  let current: unknown = record
  for (const segment of path.split('.')) {
    if (!isPlainObject(current)) {
      return undefined
    }
    current = current[segment]
  }
  return current
}

/** Extract a field's raw value; undefined when the path is absent */
export function extractWireValue(record: WireRecord, wirePath: WirePath): unknown {
  if (typeof wirePath === 'string') {
    return readPath(record, wirePath)
  }
  const values = wirePath.map((path) => readPath(record, path))
  return values.every((value) => value === undefined) ? undefined : values
}
