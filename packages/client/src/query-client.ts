import type pino from 'pino'
import { evaluateCompatibility, type CompatibilityContext } from './compat/compatibility.js'
import { enumerateRecords, PageCursor, type EnumerationSummary } from './enumeration/page-cursor.js'
import { RecordNotFoundError, isComputectlError } from './errors.js'
import { requiredWireKeys, type FieldSet } from './fields/field-spec.js'
import { projectRecord, type ProjectedRow } from './fields/projection.js'
import type { RegistryCatalog } from './fields/registry.js'
import { resolveFieldSet, type FieldSelector } from './fields/resolver.js'
import { createSilentLogger } from './logger.js'
import type { QueryFilters, Transport } from './transport/transport-types.js'
import { WarningLog } from './warnings.js'

export interface ConnectOptions {
  transport: Transport
  catalog: RegistryCatalog
  logger?: pino.Logger
  minApiVersion?: string
  /** Default for queries that do not set `strict` */
  strictFieldVersionCheck?: boolean
  signal?: AbortSignal
}

export interface ListQueryOptions {
  filters?: QueryFilters
  fields?: readonly FieldSelector[]
  pageSize?: number
  maxItems?: number
  offset?: number
  prefetch?: boolean
  strict?: boolean
  signal?: AbortSignal
}

export interface DetailQueryOptions {
  fields?: readonly FieldSelector[]
  strict?: boolean
  signal?: AbortSignal
}

export interface ListQueryResult {
  kind: string
  fieldSet: FieldSet
  /** Single-use lazy row sequence; pages are fetched as it is consumed */
  rows: AsyncIterable<ProjectedRow>
  /** Grows while `rows` is consumed; complete once it ends */
  warnings: WarningLog
  summary(): EnumerationSummary
}

export interface DetailQueryResult {
  kind: string
  fieldSet: FieldSet
  row: ProjectedRow
  warnings: WarningLog
}

interface ResourceQueryClientParams {
  transport: Transport
  catalog: RegistryCatalog
  compat: CompatibilityContext
  logger?: pino.Logger
  strictFieldVersionCheck?: boolean
}

/**
 * List and detail queries over one server session. The registry catalog and
 * compatibility context are shared read-only; each query gets its own warnings.
 */
export class ResourceQueryClient {
  readonly compat: CompatibilityContext
  readonly catalog: RegistryCatalog
  private readonly transport: Transport
  private readonly logger: pino.Logger
  private readonly strictByDefault: boolean
  private sessionWarningReported = false

  constructor(params: ResourceQueryClientParams) {
    this.transport = params.transport
    this.catalog = params.catalog
    this.compat = params.compat
    this.logger = params.logger ?? createSilentLogger()
    this.strictByDefault = params.strictFieldVersionCheck ?? false
  }

  /** Ask the server for its versions and open a session against it */
  static async connect(options: ConnectOptions): Promise<ResourceQueryClient> {
    const logger = options.logger ?? createSilentLogger()
    const info = await options.transport.serverInfo(options.signal)
    const compat = evaluateCompatibility({
      apiVersion: info.apiVersion,
      serverVersion: info.serverVersion,
      minApiVersion: options.minApiVersion,
      logger,
    })
    logger.debug({ ...info, state: compat.state }, 'connected')
    return new ResourceQueryClient({
      transport: options.transport,
      catalog: options.catalog,
      compat,
      logger,
      strictFieldVersionCheck: options.strictFieldVersionCheck,
    })
  }

  listQuery(kind: string, options: ListQueryOptions = {}): ListQueryResult {
    const registry = this.catalog.get(kind)
    const warnings = this.startWarnings()
    const resolved = withWarnings(warnings, () =>
      resolveFieldSet(registry, {
        mode: 'list',
        requested: options.fields,
        compat: this.compat,
        strict: options.strict ?? this.strictByDefault,
        logger: this.logger,
      })
    )
    warnings.addAll(resolved.warnings)
    const { fieldSet } = resolved

    const cursor = new PageCursor({
      transport: this.transport,
      kind,
      path: registry.path,
      filters: options.filters,
      fields: requiredWireKeys(fieldSet),
      pageSize: options.pageSize,
      maxItems: options.maxItems,
      initialOffset: options.offset,
      prefetch: options.prefetch,
      signal: options.signal,
      logger: this.logger,
    })

    async function* rows(): AsyncGenerator<ProjectedRow, void, undefined> {
      let index = 0
      for await (const record of enumerateRecords(cursor)) {
        const projected = projectRecord(record, fieldSet, index++)
        if (projected.warning) {
          warnings.add(projected.warning.code, projected.warning.message)
        }
        yield projected.row
      }
      const summary = cursor.summary()
      if (summary.truncated) {
        warnings.add(
          'LISTING_TRUNCATED',
          `Listing stopped after ${summary.fetched} items; more are available.`
        )
      }
    }

    this.markSessionWarningReported()
    return {
      kind,
      fieldSet,
      rows: rows(),
      warnings,
      summary: () => cursor.summary(),
    }
  }

  async detailQuery(kind: string, id: string, options: DetailQueryOptions = {}): Promise<DetailQueryResult> {
    const registry = this.catalog.get(kind)
    const warnings = this.startWarnings()
    const result = await withWarningsAsync(warnings, async () => {
      const resolved = resolveFieldSet(registry, {
        mode: 'detail',
        requested: options.fields,
        compat: this.compat,
        strict: options.strict ?? this.strictByDefault,
        logger: this.logger,
      })
      warnings.addAll(resolved.warnings)

      const record = await this.transport.fetchOne({
        kind,
        path: registry.path,
        id,
        fields: requiredWireKeys(resolved.fieldSet),
        signal: options.signal,
      })
      if (!record) {
        throw new RecordNotFoundError({ resourceKind: kind, id })
      }

      const projected = projectRecord(record, resolved.fieldSet, 0)
      if (projected.warning) {
        warnings.add(projected.warning.code, projected.warning.message)
      }
      return { kind, fieldSet: resolved.fieldSet, row: projected.row, warnings }
    })
    this.markSessionWarningReported()
    return result
  }

  /**
   * New per-command log, seeded with the session warning until a query has
   * returned a result carrying it
   */
  private startWarnings(): WarningLog {
    const warnings = new WarningLog()
    if (this.compat.warning && !this.sessionWarningReported) {
      warnings.add(this.compat.warning.code, this.compat.warning.message)
    }
    return warnings
  }

  private markSessionWarningReported(): void {
    if (this.compat.warning) {
      this.sessionWarningReported = true
    }
  }
}

/** Hand the warnings collected so far to a query error before it propagates */
function attachWarnings(error: unknown, warnings: WarningLog): unknown {
  if (isComputectlError(error) && warnings.size > 0) {
    error.warnings = [...error.warnings, ...warnings.list()]
  }
  return error
}

function withWarnings<T>(warnings: WarningLog, run: () => T): T {
  try {
    return run()
  } catch (error) {
    throw attachWarnings(error, warnings)
  }
}

async function withWarningsAsync<T>(warnings: WarningLog, run: () => Promise<T>): Promise<T> {
  try {
    return await run()
  } catch (error) {
    throw attachWarnings(error, warnings)
  }
}
