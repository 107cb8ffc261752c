import { CancelledError, TransportError } from '../errors.js'
import type { WireRecord } from '../fields/field-spec.js'
import type {
  FetchOneRequest,
  FetchPageRequest,
  Page,
  ServerInfo,
  Transport,
} from './transport-types.js'

export interface InMemoryCollection {
  records: WireRecord[]
  /** Wire key matched against the detail identifier; defaults to `id` */
  idKey?: string
}

export interface InMemoryTransportOptions {
  serverInfo?: ServerInfo
  collections?: Record<string, InMemoryCollection>
  /** Leave `total_count` out of page responses */
  omitTotalCount?: boolean
  /** Leave `has_more` out of page responses */
  omitHasMore?: boolean
  /** Fail the page request starting at this offset */
  failAtOffset?: number
}

export type TransportCall =
  | { method: 'serverInfo' }
  | { method: 'fetchPage'; path: string; offset: number; limit: number; fields: readonly string[]; filters: Record<string, unknown> }
  | { method: 'fetchOne'; path: string; id: string; fields: readonly string[] }

/**
 * In-process transport for tests and offline use: serves fixed collections
 * keyed by API path, with equality filters and offset paging.
 */
export class InMemoryTransport implements Transport {
  readonly calls: TransportCall[] = []
  private readonly options: InMemoryTransportOptions

  constructor(options: InMemoryTransportOptions = {}) {
    this.options = options
  }

  async serverInfo(signal?: AbortSignal): Promise<ServerInfo> {
    this.checkSignal(signal)
    this.calls.push({ method: 'serverInfo' })
    return { ...(this.options.serverInfo ?? {}) }
  }

  async fetchPage(request: FetchPageRequest): Promise<Page> {
    this.checkSignal(request.signal)
    this.calls.push({
      method: 'fetchPage',
      path: request.path,
      offset: request.offset,
      limit: request.limit,
      fields: request.fields,
      filters: { ...request.filters },
    })
    if (this.options.failAtOffset !== undefined && request.offset >= this.options.failAtOffset) {
      throw new TransportError(`GET ${request.path} failed: 503 Service Unavailable`, { status: 503 })
    }

    const matching = this.collection(request.path).records.filter((record) =>
      Object.entries(request.filters).every(
        ([key, value]) => value === undefined || String(record[key]) === String(value)
      )
    )
    const records = matching.slice(request.offset, request.offset + request.limit)
    return {
      records,
      offset: request.offset,
      limit: request.limit,
      totalCount: this.options.omitTotalCount ? undefined : matching.length,
      hasMore: this.options.omitHasMore ? undefined : request.offset + records.length < matching.length,
    }
  }

  async fetchOne(request: FetchOneRequest): Promise<WireRecord | null> {
    this.checkSignal(request.signal)
    this.calls.push({ method: 'fetchOne', path: request.path, id: request.id, fields: request.fields })
    const collection = this.collection(request.path)
    const idKey = collection.idKey ?? 'id'
    return collection.records.find((record) => String(record[idKey]) === request.id) ?? null
  }

  pageOffsets(): number[] {
    return this.calls.flatMap((call) => (call.method === 'fetchPage' ? [call.offset] : []))
  }

  private collection(path: string): InMemoryCollection {
    const collection = this.options.collections?.[path]
    if (!collection) {
      throw new TransportError(`GET ${path} failed: 404 Not Found`, { status: 404 })
    }
    return collection
  }

  private checkSignal(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new CancelledError()
    }
  }
}
