/**
 * Output abstraction layer for the computectl CLI.
 *
 * This module provides structured output rendering with support for multiple formats:
 * - table: Human-readable aligned tables (default)
 * - json: Machine-readable JSON
 * - yaml: Machine-readable YAML
 * - quiet: Minimal output (first column only)
 *
 * @example
 * ```typescript
 * import { render, renderToString, createOutputOptions } from './output/index.js'
 *
 * const result = client.listQuery('job', { fields: ['id', 'status'] })
 * const text = await renderToString(
 *   render(result.rows, result.fieldSet, createOutputOptions({ format: 'json' }))
 * )
 * ```
 */

// Types
export type {
  OutputFormat,
  OutputOptions,
  OutputFormatter,
  RenderSummary,
  CommandOutput,
  SingleOutput,
  ListOutput,
  CommandError,
} from './types.js'

// Renderers
export { TableFormatter, renderDetailTable } from './table.js'
export { JsonFormatter, renderJsonDetail } from './json.js'
export { YamlFormatter, renderYamlDetail } from './yaml.js'
export { QuietFormatter } from './quiet.js'
export { cellText, cellValue, rowToObject } from './cells.js'

// Main render functions
export {
  render,
  renderDetail,
  renderToString,
  renderError,
  renderWarnings,
  toCommandError,
  createFormatter,
  isOutputFormat,
  defaultOutputOptions,
  OUTPUT_FORMATS,
  type RenderStreamOptions,
} from './render.js'

// Command wrapper
export {
  withOutput,
  writeCommandOutput,
  reportCommandError,
  extractOutputOptions,
  extractConfigOverrides,
  createOutputOptions,
  EXIT_FAILURE,
  EXIT_INTERRUPTED,
  type CliRuntime,
  type CommandContext,
  type CommandHandler,
  type CommandIO,
  type CommandOptions,
  type OutputSink,
} from './with-output.js'
