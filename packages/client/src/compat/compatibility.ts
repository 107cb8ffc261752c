import type pino from 'pino'
import type { QueryWarning } from '../warnings.js'
import { compareVersionParts, parseVersion } from './version.js'

/** Oldest API revision this client is known to work against */
export const MIN_API_VERSION = 'v5.20191215'

export type CompatibilityState = 'compatible' | 'degraded'

/**
 * What the connected server supports, derived once per session.
 * Frozen after construction.
 */
export interface CompatibilityContext {
  readonly serverVersion?: string
  readonly apiVersion?: string
  readonly minApiVersion: string
  readonly state: CompatibilityState
  /** Session-level warning, present only in the degraded state */
  readonly warning?: QueryWarning
}

export interface EvaluateCompatibilityParams {
  serverVersion?: string
  apiVersion?: string
  minApiVersion?: string
  logger?: pino.Logger
}

export function evaluateCompatibility(params: EvaluateCompatibilityParams): CompatibilityContext {
  const minApiVersion = params.minApiVersion ?? MIN_API_VERSION
  const base = {
    serverVersion: params.serverVersion,
    apiVersion: params.apiVersion,
    minApiVersion,
  }

  const minimum = parseVersion(minApiVersion)
  if (!minimum) {
    throw new Error(`Invalid minimum API version "${minApiVersion}"`)
  }

  const reported = params.apiVersion === undefined ? null : parseVersion(params.apiVersion)
  if (!reported) {
    params.logger?.debug(
      { apiVersion: params.apiVersion },
      'server did not report a usable API version; assuming compatible'
    )
    return freezeContext({ ...base, state: 'compatible' })
  }

  if (compareVersionParts(reported, minimum) < 0) {
    params.logger?.debug({ apiVersion: params.apiVersion, minApiVersion }, 'server API is older than supported')
    return freezeContext({
      ...base,
      state: 'degraded',
      warning: {
        code: 'SERVER_VERSION_DEGRADED',
        message: `Server API ${params.apiVersion} is older than the minimum supported ${minApiVersion}; some requests may fail.`,
      },
    })
  }

  return freezeContext({ ...base, state: 'compatible' })
}

function freezeContext(context: CompatibilityContext): CompatibilityContext {
  if (context.warning) {
    Object.freeze(context.warning)
  }
  return Object.freeze(context)
}

/**
 * Whether a field with the given minimum version can be served.
 * An unknown or unparseable server version never blocks a field.
 */
export function supportsVersion(context: CompatibilityContext, minVersion: string): boolean {
  if (context.serverVersion === undefined) {
    return true
  }
  const server = parseVersion(context.serverVersion)
  const required = parseVersion(minVersion)
  if (!server || !required) {
    return true
  }
  return compareVersionParts(server, required) >= 0
}
