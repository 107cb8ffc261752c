import { InvalidArgumentError } from 'commander'
import type { QueryFilters } from '@computectl/client'
import type { CommandOptions } from '../../output/index.js'

/** A resource-specific list filter, passed to the server under `filterKey` */
export interface ResourceFilterOption {
  flags: string
  description: string
  /** Commander's camel-cased option name */
  optionKey: string
  filterKey: string
}

/** Filters shared by every listing: free-form filter and order expressions */
export const commonFilterOptions: readonly ResourceFilterOption[] = [
  { flags: '--filter <expr>', description: 'query filter expression', optionKey: 'filter', filterKey: 'filter' },
  { flags: '--order <expr>', description: 'query ordering expression', optionKey: 'order', filterKey: 'order' },
]

export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.')
  }
  return parsed
}

/** Split `--fields id,status , owner` into keys; undefined when not given */
export function parseFieldList(raw: unknown): string[] | undefined {
  if (typeof raw !== 'string') {
    return undefined
  }
  const keys = raw
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0)
  return keys.length > 0 ? keys : undefined
}

export function collectFilters(options: CommandOptions, filterOptions: readonly ResourceFilterOption[]): QueryFilters {
  const filters: QueryFilters = {}
  for (const option of filterOptions) {
    const value = options[option.optionKey]
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      filters[option.filterKey] = value
    }
  }
  return filters
}

export function optionalInt(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined
}
