import { existsSync, readFileSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { ConfigError } from './errors.js'
import type { ResolvedLogConfig } from './logger.js'

export const OUTPUT_FORMATS = ['table', 'json', 'yaml'] as const

const LogConfigSchema = z
  .object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
    format: z.enum(['pretty', 'json']).optional(),
  })
  .strict()

/** Shape of `$COMPUTECTL_HOME/config.json`; every key optional */
export const PersistedConfigSchema = z
  .object({
    endpoint: z.string().url().optional(),
    pageSize: z.number().int().min(1).max(1000).optional(),
    maxItems: z.number().int().nonnegative().optional(),
    strictFieldVersionCheck: z.boolean().optional(),
    output: z.enum(OUTPUT_FORMATS).optional(),
    timeoutMs: z.number().int().positive().optional(),
    log: LogConfigSchema.optional(),
  })
  .strict()

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>

export const ClientConfigSchema = z.object({
  endpoint: z.string().url(),
  pageSize: z.number().int().min(1).max(1000),
  maxItems: z.number().int().nonnegative().optional(),
  strictFieldVersionCheck: z.boolean(),
  output: z.enum(OUTPUT_FORMATS),
  timeoutMs: z.number().int().positive(),
  log: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    format: z.enum(['pretty', 'json']),
  }),
})

export type ClientConfig = z.infer<typeof ClientConfigSchema>

/** Values taken from command-line flags; highest precedence */
export type CliConfigOverrides = Partial<Omit<ClientConfig, 'log'>> & {
  log?: Partial<ResolvedLogConfig>
}

export const DEFAULT_CONFIG: ClientConfig = {
  endpoint: 'http://127.0.0.1:8090',
  pageSize: 20,
  strictFieldVersionCheck: false,
  output: 'table',
  timeoutMs: 30000,
  log: { level: 'warn', format: 'pretty' },
}

function expandHomeDir(input: string): string {
  if (input.startsWith('~/')) {
    return path.join(os.homedir(), input.slice(2))
  }
  if (input === '~') {
    return os.homedir()
  }
  return input
}

export function resolveComputectlHome(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(expandHomeDir(env.COMPUTECTL_HOME ?? '~/.computectl'))
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n')
}

export function loadPersistedConfig(home: string): PersistedConfig | undefined {
  const configPath = path.join(home, 'config.json')
  if (!existsSync(configPath)) {
    return undefined
  }

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf8'))
  } catch (error) {
    throw new ConfigError(`Cannot parse ${configPath}`, error instanceof Error ? error.message : undefined)
  }

  const parsed = PersistedConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration in ${configPath}`, formatIssues(parsed.error))
  }
  return parsed.data
}

function readInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]
  if (raw === undefined || raw === '') {
    return undefined
  }
  const parsed = Number(raw)
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`)
  }
  return parsed
}

function readBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name]
  if (raw === undefined || raw === '') {
    return undefined
  }
  return raw === '1' || raw.toLowerCase() === 'true'
}

/** Environment layer: COMPUTECTL_* variables, unvalidated */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const log: Record<string, unknown> = {}
  if (env.COMPUTECTL_LOG) log.level = env.COMPUTECTL_LOG
  if (env.COMPUTECTL_LOG_FORMAT) log.format = env.COMPUTECTL_LOG_FORMAT

  const config: Record<string, unknown> = {
    endpoint: env.COMPUTECTL_ENDPOINT || undefined,
    pageSize: readInt(env, 'COMPUTECTL_PAGE_SIZE'),
    maxItems: readInt(env, 'COMPUTECTL_MAX_ITEMS'),
    strictFieldVersionCheck: readBool(env, 'COMPUTECTL_STRICT_FIELDS'),
    output: env.COMPUTECTL_OUTPUT || undefined,
    timeoutMs: readInt(env, 'COMPUTECTL_TIMEOUT_MS'),
  }
  if (Object.keys(log).length > 0) {
    config.log = log
  }
  return config
}

function definedEntries(input: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined))
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv
  overrides?: CliConfigOverrides
  /** Skip reading config.json */
  ignorePersisted?: boolean
}

/**
 * Resolve the effective configuration: defaults, then config.json, then the
 * environment, then command-line overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): ClientConfig {
  const env = options.env ?? process.env
  const persisted = options.ignorePersisted ? undefined : loadPersistedConfig(resolveComputectlHome(env))
  const fromEnv = readEnvConfig(env)
  const overrides = options.overrides ?? {}

  const layers = [persisted ?? {}, fromEnv, overrides].map(definedEntries)
  const merged: Record<string, unknown> = Object.assign({}, DEFAULT_CONFIG, ...layers)
  merged.log = Object.assign(
    {},
    DEFAULT_CONFIG.log,
    ...layers.map((layer) => (typeof layer.log === 'object' && layer.log !== null ? definedEntries(layer.log) : {}))
  )

  const parsed = ClientConfigSchema.safeParse(merged)
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', formatIssues(parsed.error))
  }
  return parsed.data
}
