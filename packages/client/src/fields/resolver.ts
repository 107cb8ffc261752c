import type pino from 'pino'
import { supportsVersion, type CompatibilityContext } from '../compat/compatibility.js'
import { EmptyProjectionError, IncompatibleFieldError, UnknownFieldError } from '../errors.js'
import type { QueryWarning } from '../warnings.js'
import type { FieldSet, FieldSpec } from './field-spec.js'
import type { FieldRegistry, ProjectionMode } from './registry.js'

/** A field reference from the caller: a key, or a FieldSpec used as given */
export type FieldSelector = string | FieldSpec

export interface ResolveFieldSetOptions {
  mode: ProjectionMode
  requested?: readonly FieldSelector[]
  compat: CompatibilityContext
  /** Fail the request instead of dropping unknown or too-new fields */
  strict?: boolean
  logger?: pino.Logger
}

export interface ResolvedFieldSet {
  fieldSet: FieldSet
  warnings: QueryWarning[]
}

export function resolveFieldSet(
  registry: FieldRegistry,
  options: ResolveFieldSetOptions
): ResolvedFieldSet {
  const strict = options.strict ?? false
  const warnings: QueryWarning[] = []

  const requested = options.requested ?? []
  const candidates: FieldSpec[] = []
  if (requested.length === 0) {
    candidates.push(...registry.defaults(options.mode))
  } else {
    for (const selector of requested) {
      if (typeof selector !== 'string') {
        candidates.push(selector)
        continue
      }
      try {
        candidates.push(registry.lookup(selector.trim()))
      } catch (error) {
        if (strict || !(error instanceof UnknownFieldError)) {
          throw error
        }
        warnings.push({ code: 'FIELD_DROPPED', message: error.message })
      }
    }
  }

  const seen = new Set<string>()
  const fields: FieldSpec[] = []
  for (const field of candidates) {
    if (seen.has(field.key)) {
      continue
    }
    seen.add(field.key)

    if (field.minServerVersion && !supportsVersion(options.compat, field.minServerVersion)) {
      if (strict) {
        throw new IncompatibleFieldError({
          fieldKey: field.key,
          requiredVersion: field.minServerVersion,
          serverVersion: options.compat.serverVersion ?? 'unknown',
        })
      }
      warnings.push({
        code: 'FIELD_DROPPED',
        message: `${field.key} dropped: requires ${field.minServerVersion}+`,
      })
      continue
    }
    fields.push(field)
  }

  if (fields.length === 0) {
    throw new EmptyProjectionError({
      resourceKind: registry.kind,
      reasons: warnings.map((warning) => warning.message),
    })
  }

  options.logger?.debug(
    { kind: registry.kind, mode: options.mode, fields: fields.map((field) => field.key) },
    'resolved field set'
  )

  return { fieldSet: Object.freeze(fields), warnings }
}
