/**
 * Query core for the compute resource-management API.
 *
 * @example
 * ```typescript
 * import { HttpTransport, ResourceQueryClient, createBuiltinCatalog } from '@computectl/client'
 *
 * const client = await ResourceQueryClient.connect({
 *   transport: new HttpTransport({ endpoint: 'http://127.0.0.1:8090' }),
 *   catalog: createBuiltinCatalog(),
 * })
 *
 * const result = client.listQuery('job', { fields: ['id', 'status'], pageSize: 50 })
 * for await (const row of result.rows) {
 *   console.log(row.cells.map((cell) => cell.value))
 * }
 * console.error(result.warnings.list())
 * ```
 */

// Errors and warnings
export {
  ComputectlError,
  UnknownFieldError,
  EmptyProjectionError,
  IncompatibleFieldError,
  TransportError,
  RenderError,
  RecordNotFoundError,
  CancelledError,
  ConfigError,
  isComputectlError,
  getErrorMessage,
  type ComputectlErrorCode,
} from './errors.js'
export { WarningLog, type QueryWarning, type WarningCode } from './warnings.js'

// Fields
export {
  defineField,
  humanizeKey,
  fieldSetKeys,
  requiredWireKeys,
  extractWireValue,
  type FieldSpec,
  type FieldSet,
  type FieldOptions,
  type WirePath,
  type WireRecord,
} from './fields/field-spec.js'
export { valueFormats, pluck, formatBytes } from './fields/formatters.js'
export {
  FieldRegistry,
  RegistryCatalog,
  createRegistryCatalog,
  type ProjectionMode,
  type ResourceDefinition,
} from './fields/registry.js'
export { resolveFieldSet, type FieldSelector, type ResolvedFieldSet } from './fields/resolver.js'
export {
  projectRecord,
  type ProjectedRow,
  type ProjectedCell,
  type CellStatus,
  type ProjectionResult,
} from './fields/projection.js'
export { suggestClosest } from './fields/suggest.js'

// Compatibility
export {
  evaluateCompatibility,
  supportsVersion,
  MIN_API_VERSION,
  type CompatibilityContext,
  type CompatibilityState,
} from './compat/compatibility.js'
export { parseVersion, compareVersions } from './compat/version.js'

// Enumeration
export {
  PageCursor,
  enumerateRecords,
  DEFAULT_PAGE_SIZE,
  type PageCursorOptions,
  type EnumerationSummary,
} from './enumeration/page-cursor.js'

// Transport
export type {
  Transport,
  Page,
  ServerInfo,
  QueryFilters,
  FilterValue,
  FetchPageRequest,
  FetchOneRequest,
} from './transport/transport-types.js'
export { HttpTransport, type HttpTransportOptions, type FetchLike } from './transport/http-transport.js'
export {
  InMemoryTransport,
  type InMemoryTransportOptions,
  type InMemoryCollection,
  type TransportCall,
} from './transport/in-memory-transport.js'

// Queries
export {
  ResourceQueryClient,
  type ConnectOptions,
  type ListQueryOptions,
  type ListQueryResult,
  type DetailQueryOptions,
  type DetailQueryResult,
} from './query-client.js'

// Resources
export { builtinResources, createBuiltinCatalog } from './resources/index.js'

// Ambient
export {
  loadConfig,
  loadPersistedConfig,
  readEnvConfig,
  resolveComputectlHome,
  ClientConfigSchema,
  PersistedConfigSchema,
  DEFAULT_CONFIG,
  OUTPUT_FORMATS,
  type ClientConfig,
  type PersistedConfig,
  type CliConfigOverrides,
  type LoadConfigOptions,
} from './config.js'
export { createRootLogger, createSilentLogger, type LogLevel, type LogFormat, type ResolvedLogConfig } from './logger.js'
export { resolvePackageVersion, PackageVersionResolutionError } from './package-version.js'
