import type pino from 'pino'
import { z } from 'zod'
import { CancelledError, TransportError, getErrorMessage } from '../errors.js'
import type { WireRecord } from '../fields/field-spec.js'
import type {
  FetchOneRequest,
  FetchPageRequest,
  Page,
  QueryFilters,
  ServerInfo,
  Transport,
} from './transport-types.js'

const WireRecordSchema = z.record(z.unknown())

const PageResponseSchema = z.object({
  items: z.array(WireRecordSchema),
  total_count: z.number().int().nonnegative().nullish(),
  has_more: z.boolean().nullish(),
})

const ServerInfoResponseSchema = z.object({
  version: z.string().optional(),
  manager: z.string().optional(),
})

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface HttpTransportOptions {
  /** Base URL of the API, e.g. `http://127.0.0.1:8090` */
  endpoint: string
  userAgent?: string
  timeoutMs?: number
  fetch?: FetchLike
  logger?: pino.Logger
}

const DEFAULT_TIMEOUT_MS = 30000

/**
 * JSON-over-HTTP transport.
 *
 * - `GET /` -> `{ version, manager }`
 * - `GET {path}?offset&limit&fields&...filters` -> `{ items, total_count?, has_more? }`
 * - `GET {path}/{id}?fields` -> record, or 404 when there is none
 */
export class HttpTransport implements Transport {
  private readonly endpoint: string
  private readonly userAgent?: string
  private readonly timeoutMs: number
  private readonly fetchImpl: FetchLike
  private readonly logger?: pino.Logger

  constructor(options: HttpTransportOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '')
    this.userAgent = options.userAgent
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
    this.logger = options.logger
  }

  async serverInfo(signal?: AbortSignal): Promise<ServerInfo> {
    const response = await this.request('/', new URLSearchParams(), signal)
    const body = await this.readJson(response, ServerInfoResponseSchema, '/')
    return { apiVersion: body.version, serverVersion: body.manager }
  }

  async fetchPage(request: FetchPageRequest): Promise<Page> {
    const params = buildFilterParams(request.filters)
    params.set('offset', String(request.offset))
    params.set('limit', String(request.limit))
    if (request.fields.length > 0) {
      params.set('fields', request.fields.join(','))
    }

    const response = await this.request(request.path, params, request.signal)
    const body = await this.readJson(response, PageResponseSchema, request.path)
    return {
      records: body.items,
      offset: request.offset,
      limit: request.limit,
      totalCount: body.total_count ?? undefined,
      hasMore: body.has_more ?? undefined,
    }
  }

  async fetchOne(request: FetchOneRequest): Promise<WireRecord | null> {
    const params = new URLSearchParams()
    if (request.fields.length > 0) {
      params.set('fields', request.fields.join(','))
    }
    const path = `${request.path}/${encodeURIComponent(request.id)}`
    const response = await this.request(path, params, request.signal, [404])
    if (response.status === 404) {
      return null
    }
    return this.readJson(response, WireRecordSchema, path)
  }

  private async request(
    path: string,
    params: URLSearchParams,
    signal: AbortSignal | undefined,
    allowedStatuses: readonly number[] = []
  ): Promise<Response> {
    if (signal?.aborted) {
      throw new CancelledError()
    }
    const query = params.toString()
    const url = `${this.endpoint}${path}${query ? `?${query}` : ''}`
    const headers: Record<string, string> = { Accept: 'application/json' }
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent
    }

    const controller = new AbortController()
    const onAbort = () => controller.abort()
    signal?.addEventListener('abort', onAbort, { once: true })
    const timer = setTimeout(() => controller.abort(), this.timeoutMs)

    this.logger?.debug({ url }, 'GET')
    try {
      const response = await this.fetchImpl(url, { method: 'GET', headers, signal: controller.signal })
      if (!response.ok && !allowedStatuses.includes(response.status)) {
        const text = await response.text().catch(() => '')
        throw new TransportError(`GET ${path} failed: ${response.status} ${response.statusText}`, {
          status: response.status,
          details: text || undefined,
        })
      }
      return response
    } catch (error) {
      if (error instanceof TransportError) {
        throw error
      }
      if (signal?.aborted) {
        throw new CancelledError()
      }
      if (controller.signal.aborted) {
        throw new TransportError(`GET ${path} timed out after ${this.timeoutMs}ms`, { cause: error })
      }
      throw new TransportError(`GET ${path} failed: ${getErrorMessage(error)}`, { cause: error })
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }
  }

  private async readJson<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>, path: string): Promise<T> {
    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new TransportError(`GET ${path} returned a body that is not JSON`, { cause: error })
    }
    const parsed = schema.safeParse(body)
    if (!parsed.success) {
      throw new TransportError(`GET ${path} returned an unexpected response shape`, {
        details: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n'),
      })
    }
    return parsed.data
  }
}

function buildFilterParams(filters: QueryFilters): URLSearchParams {
  const params = new URLSearchParams()
  for (const [key, value] of Object.entries(filters)) {
    if (value !== undefined) {
      params.set(key, String(value))
    }
  }
  return params
}
