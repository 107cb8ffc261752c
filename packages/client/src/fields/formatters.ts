/**
 * Reusable value transforms and humanizers for field declarations.
 *
 * Transforms produce the value structured output emits; humanizers turn that
 * value into table text. Both throw on malformed input so the projection can
 * report the cell instead of printing garbage.
 */

import type { FieldOptions } from './field-spec.js'

const BYTE_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB'] as const

export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) {
    throw new Error(`Invalid byte size: ${bytes}`)
  }
  let value = bytes
  let unit = 0
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024
    unit++
  }
  const text = unit === 0 ? String(value) : value.toFixed(1).replace(/\.0$/, '')
  return `${text} ${BYTE_UNITS[unit]}`
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function describe(value: unknown): string {
  return typeof value === 'string' ? `"${value}"` : JSON.stringify(value) ?? String(value)
}

export function toNumber(raw: unknown): number {
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return raw
  }
  if (typeof raw === 'string' && raw.trim() !== '' && Number.isFinite(Number(raw))) {
    return Number(raw)
  }
  throw new Error(`Not a number: ${describe(raw)}`)
}

export function toBoolean(raw: unknown): boolean {
  if (typeof raw === 'boolean') {
    return raw
  }
  if (raw === 'true' || raw === 1) return true
  if (raw === 'false' || raw === 0) return false
  throw new Error(`Not a boolean: ${describe(raw)}`)
}

/** Normalizes server timestamps to ISO-8601 UTC */
export function toTimestamp(raw: unknown): string {
  if (typeof raw !== 'string' && typeof raw !== 'number') {
    throw new Error(`Invalid timestamp: ${describe(raw)}`)
  }
  const date = new Date(raw)
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid timestamp: ${describe(raw)}`)
  }
  return date.toISOString()
}

export function toStringList(raw: unknown): string[] {
  if (!Array.isArray(raw)) {
    throw new Error(`Not a list: ${describe(raw)}`)
  }
  return raw.map((item) => (typeof item === 'string' ? item : JSON.stringify(item)))
}

/**
 * Resource slots arrive as `{ cpu: "4", mem: "8589934592", "cuda.device": "1" }`
 * with decimal strings; normalize to numbers keyed by slot name.
 */
export function toResourceSlots(raw: unknown): Record<string, number> {
  const source: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw
  if (!isRecord(source)) {
    throw new Error(`Invalid resource slots: ${describe(raw)}`)
  }
  const slots: Record<string, number> = {}
  for (const [name, amount] of Object.entries(source)) {
    slots[name] = toNumber(amount)
  }
  return slots
}

function humanizeSlots(value: unknown): string {
  const slots = toResourceSlots(value)
  return Object.entries(slots)
    .map(([name, amount]) => `${name}:${name === 'mem' ? formatBytes(amount) : amount}`)
    .join(' ')
}

function humanizeList(value: unknown): string {
  return toStringList(value).join(', ')
}

/** Field option presets, spread into `defineField` declarations */
export const valueFormats = {
  boolean: {
    transform: toBoolean,
    humanize: (value: unknown) => (value === true ? 'yes' : 'no'),
  },
  number: {
    transform: toNumber,
  },
  bytes: {
    transform: toNumber,
    humanize: (value: unknown) => formatBytes(toNumber(value)),
  },
  timestamp: {
    transform: toTimestamp,
  },
  list: {
    transform: toStringList,
    humanize: humanizeList,
  },
  resourceSlots: {
    transform: toResourceSlots,
    humanize: humanizeSlots,
  },
  json: {
    humanize: (value: unknown) => JSON.stringify(value),
  },
} satisfies Record<string, Pick<FieldOptions, 'transform' | 'humanize'>>

/** Pick one property out of each element of a list of objects, e.g. group names */
export function pluck(property: string): Pick<FieldOptions, 'transform' | 'humanize'> {
  return {
    transform: (raw: unknown) => {
      if (!Array.isArray(raw)) {
        throw new Error(`Not a list: ${describe(raw)}`)
      }
      return raw.map((item: unknown) => {
        if (!isRecord(item) || !(property in item)) {
          throw new Error(`List item has no "${property}": ${describe(item)}`)
        }
        return item[property]
      })
    },
    humanize: humanizeList,
  }
}
