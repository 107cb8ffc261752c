import type pino from 'pino'
import {
  HttpTransport,
  ResourceQueryClient,
  resolvePackageVersion,
  type ClientConfig,
  type RegistryCatalog,
} from '@computectl/client'

export interface ConnectOptions {
  config: ClientConfig
  catalog: RegistryCatalog
  logger: pino.Logger
  signal?: AbortSignal
}

let cachedUserAgent: string | undefined

/** `computectl/<version>`, sent with every request */
export function getUserAgent(): string {
  if (!cachedUserAgent) {
    const version = resolvePackageVersion({ moduleUrl: import.meta.url, packageName: '@computectl/cli' })
    cachedUserAgent = `computectl/${version}`
  }
  return cachedUserAgent
}

/**
 * Get the API endpoint from the resolved configuration, without trailing slashes
 */
export function getEndpoint(config: ClientConfig): string {
  return config.endpoint.replace(/\/+$/, '')
}

/**
 * Create the HTTP transport and open a session against the server.
 * Throws TransportError if the server cannot be reached.
 */
export async function connectToServer(options: ConnectOptions): Promise<ResourceQueryClient> {
  const transport = new HttpTransport({
    endpoint: getEndpoint(options.config),
    userAgent: getUserAgent(),
    timeoutMs: options.config.timeoutMs,
    logger: options.logger,
  })

  return ResourceQueryClient.connect({
    transport,
    catalog: options.catalog,
    logger: options.logger,
    strictFieldVersionCheck: options.config.strictFieldVersionCheck,
    signal: options.signal,
  })
}
