/**
 * Error kinds raised by the query core.
 *
 * Every error carries a machine-readable `code` so the CLI can render it as a
 * structured error without knowing the concrete class.
 */

import type { QueryWarning } from './warnings.js'

export type ComputectlErrorCode =
  | 'UNKNOWN_FIELD'
  | 'EMPTY_PROJECTION'
  | 'INCOMPATIBLE_FIELD'
  | 'TRANSPORT_FAILURE'
  | 'RENDER_FAILURE'
  | 'RECORD_NOT_FOUND'
  | 'CANCELLED'
  | 'INVALID_CONFIG'

export class ComputectlError extends Error {
  readonly code: ComputectlErrorCode
  readonly details?: string
  /** Warnings the failed command had collected before it failed */
  warnings: readonly QueryWarning[] = []

  constructor(code: ComputectlErrorCode, message: string, options?: { details?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'ComputectlError'
    this.code = code
    this.details = options?.details
  }
}

export class UnknownFieldError extends ComputectlError {
  readonly resourceKind: string
  readonly fieldKey: string
  readonly suggestions: readonly string[]
  readonly validKeys: readonly string[]

  constructor(params: {
    resourceKind: string
    fieldKey: string
    suggestions: readonly string[]
    validKeys: readonly string[]
  }) {
    const hint =
      params.suggestions.length > 0 ? ` Did you mean: ${params.suggestions.join(', ')}?` : ''
    super(
      'UNKNOWN_FIELD',
      `Unknown field "${params.fieldKey}" for ${params.resourceKind}.${hint}`,
      { details: `Valid fields: ${params.validKeys.join(', ')}` }
    )
    this.name = 'UnknownFieldError'
    this.resourceKind = params.resourceKind
    this.fieldKey = params.fieldKey
    this.suggestions = params.suggestions
    this.validKeys = params.validKeys
  }
}

export class EmptyProjectionError extends ComputectlError {
  readonly resourceKind: string

  constructor(params: { resourceKind: string; reasons: readonly string[] }) {
    super('EMPTY_PROJECTION', `No displayable fields remain for ${params.resourceKind}.`, {
      details: params.reasons.length > 0 ? params.reasons.join('\n') : undefined,
    })
    this.name = 'EmptyProjectionError'
    this.resourceKind = params.resourceKind
  }
}

export class IncompatibleFieldError extends ComputectlError {
  readonly fieldKey: string
  readonly requiredVersion: string
  readonly serverVersion: string

  constructor(params: { fieldKey: string; requiredVersion: string; serverVersion: string }) {
    super(
      'INCOMPATIBLE_FIELD',
      `Field "${params.fieldKey}" requires server ${params.requiredVersion}+ (connected server is ${params.serverVersion}).`
    )
    this.name = 'IncompatibleFieldError'
    this.fieldKey = params.fieldKey
    this.requiredVersion = params.requiredVersion
    this.serverVersion = params.serverVersion
  }
}

export class TransportError extends ComputectlError {
  readonly status?: number

  constructor(message: string, options?: { status?: number; cause?: unknown; details?: string }) {
    super('TRANSPORT_FAILURE', message, { cause: options?.cause, details: options?.details })
    this.name = 'TransportError'
    this.status = options?.status
  }
}

export class RenderError extends ComputectlError {
  constructor(message: string) {
    super('RENDER_FAILURE', message)
    this.name = 'RenderError'
  }
}

export class RecordNotFoundError extends ComputectlError {
  constructor(params: { resourceKind: string; id: string }) {
    super('RECORD_NOT_FOUND', `No matching ${params.resourceKind} found for "${params.id}".`)
    this.name = 'RecordNotFoundError'
  }
}

export class CancelledError extends ComputectlError {
  constructor(message = 'Operation cancelled.') {
    super('CANCELLED', message)
    this.name = 'CancelledError'
  }
}

export class ConfigError extends ComputectlError {
  constructor(message: string, details?: string) {
    super('INVALID_CONFIG', message, { details })
    this.name = 'ConfigError'
  }
}

export function isComputectlError(error: unknown): error is ComputectlError {
  return error instanceof ComputectlError
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
