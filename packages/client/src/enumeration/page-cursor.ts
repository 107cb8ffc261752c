import type pino from 'pino'
import { CancelledError } from '../errors.js'
import type { WireRecord } from '../fields/field-spec.js'
import type { Page, QueryFilters, Transport } from '../transport/transport-types.js'

export const DEFAULT_PAGE_SIZE = 20

export interface PageCursorOptions {
  transport: Transport
  kind: string
  path: string
  filters?: QueryFilters
  /** Top-level wire keys to ask the server for */
  fields?: readonly string[]
  pageSize?: number
  /** Stop after this many records in total */
  maxItems?: number
  initialOffset?: number
  /** Request the next page while the current one is being consumed */
  prefetch?: boolean
  signal?: AbortSignal
  logger?: pino.Logger
}

export interface EnumerationSummary {
  /** Records handed out so far */
  fetched: number
  /** Last total count the server reported, if any */
  totalCount?: number
  pagesFetched: number
  /** Offset the enumeration started from; the records before it were skipped */
  initialOffset: number
  /** Stopped at maxItems while the server may hold more */
  truncated: boolean
}

interface PendingPage {
  offset: number
  limit: number
  promise: Promise<Page>
}

/**
 * Pull-based pager over one list query. Holds the whole enumeration state
 * (offset, counts, exhaustion) so consumers can drive it page by page.
 *
 * Pages are requested sequentially. With `prefetch`, the request for page
 * N+1 is issued as soon as page N arrives; its failure surfaces only from the
 * `next()` call that would have returned it.
 */
export class PageCursor {
  private readonly options: PageCursorOptions
  private readonly pageSize: number
  private readonly initialOffset: number
  private offset: number
  private fetched = 0
  private totalCount?: number
  private pagesFetched = 0
  private exhausted = false
  private truncated = false
  private pending?: PendingPage

  constructor(options: PageCursorOptions) {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new RangeError(`Page size must be a positive integer, got ${pageSize}`)
    }
    if (options.maxItems !== undefined && (!Number.isInteger(options.maxItems) || options.maxItems < 0)) {
      throw new RangeError(`Max items must be a non-negative integer, got ${options.maxItems}`)
    }
    this.options = options
    this.pageSize = pageSize
    this.initialOffset = options.initialOffset ?? 0
    this.offset = this.initialOffset
    if (options.maxItems === 0) {
      this.exhausted = true
    }
  }

  get isExhausted(): boolean {
    return this.exhausted
  }

  summary(): EnumerationSummary {
    return {
      fetched: this.fetched,
      totalCount: this.totalCount,
      pagesFetched: this.pagesFetched,
      initialOffset: this.initialOffset,
      truncated: this.truncated,
    }
  }

  throwIfCancelled(): void {
    if (this.options.signal?.aborted) {
      this.exhausted = true
      throw new CancelledError()
    }
  }

  /** Next non-empty page, or null once the enumeration is over */
  async next(): Promise<Page | null> {
    if (this.exhausted) {
      return null
    }
    this.throwIfCancelled()

    const request = this.pending ?? this.request(this.offset, this.nextLimit())
    this.pending = undefined

    let page: Page
    try {
      page = await request.promise
    } catch (error) {
      this.exhausted = true
      throw error
    }
    this.throwIfCancelled()

    const records: WireRecord[] = page.records.slice(0, request.limit)
    this.pagesFetched++
    this.fetched += records.length
    this.offset += records.length
    if (page.totalCount !== undefined) {
      this.totalCount = page.totalCount
    }

    const endReached =
      records.length === 0 ||
      records.length < request.limit ||
      page.hasMore === false ||
      (this.totalCount !== undefined && this.offset >= this.totalCount)
    const limitReached = this.options.maxItems !== undefined && this.fetched >= this.options.maxItems

    this.options.logger?.debug(
      {
        kind: this.options.kind,
        offset: request.offset,
        limit: request.limit,
        received: records.length,
        totalCount: this.totalCount,
        hasMore: page.hasMore,
      },
      'fetched page'
    )

    if (endReached || limitReached) {
      this.exhausted = true
      this.truncated = limitReached && !endReached
    } else if (this.options.prefetch) {
      this.pending = this.request(this.offset, this.nextLimit())
    }

    if (records.length === 0) {
      return null
    }
    return { ...page, records }
  }

  private nextLimit(): number {
    if (this.options.maxItems === undefined) {
      return this.pageSize
    }
    return Math.min(this.pageSize, this.options.maxItems - this.fetched)
  }

  private request(offset: number, limit: number): PendingPage {
    const promise = this.options.transport.fetchPage({
      kind: this.options.kind,
      path: this.options.path,
      filters: this.options.filters ?? {},
      fields: this.options.fields ?? [],
      offset,
      limit,
      signal: this.options.signal,
    })
    // Observed later by next(); keeps an early prefetch failure from being reported as unhandled.
    promise.catch(() => undefined)
    return { offset, limit, promise }
  }
}

/** Records of a cursor as one lazy sequence, checking for cancellation between records */
export async function* enumerateRecords(cursor: PageCursor): AsyncGenerator<WireRecord, void, undefined> {
  while (true) {
    const page = await cursor.next()
    if (!page) {
      return
    }
    for (const record of page.records) {
      cursor.throwIfCancelled()
      yield record
    }
  }
}
