import type { WireRecord } from '../fields/field-spec.js'

export type FilterValue = string | number | boolean

/** Query filters passed through to the server as-is */
export type QueryFilters = Record<string, FilterValue | undefined>

/** Versions the server advertises about itself */
export interface ServerInfo {
  /** API revision, e.g. `v6.20220615` */
  apiVersion?: string
  /** Server release, e.g. `22.09.3`; field minimum versions compare against this */
  serverVersion?: string
}

export interface Page {
  records: WireRecord[]
  offset: number
  limit: number
  totalCount?: number
  hasMore?: boolean
}

export interface FetchPageRequest {
  kind: string
  path: string
  filters: QueryFilters
  /** Top-level wire keys the projection reads, for server-side projection */
  fields: readonly string[]
  offset: number
  limit: number
  signal?: AbortSignal
}

export interface FetchOneRequest {
  kind: string
  path: string
  id: string
  fields: readonly string[]
  signal?: AbortSignal
}

/**
 * How the core talks to the API. Implementations raise TransportError on any
 * failure; timeout and retry policy belong here, not in the core.
 */
export interface Transport {
  serverInfo(signal?: AbortSignal): Promise<ServerInfo>
  fetchPage(request: FetchPageRequest): Promise<Page>
  /** Resolves to null when the server has no such record */
  fetchOne(request: FetchOneRequest): Promise<WireRecord | null>
}
