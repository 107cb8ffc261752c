/**
 * Main render dispatcher for CLI output.
 *
 * Selects one formatter per command from the output options and drives it
 * over the row stream.
 */

import chalk from 'chalk'
import YAML from 'yaml'
import {
  RenderError,
  isComputectlError,
  type FieldSet,
  type ProjectedRow,
  type QueryWarning,
} from '@computectl/client'
import type { CommandError, OutputFormat, OutputFormatter, OutputOptions, RenderSummary } from './types.js'
import { TableFormatter, renderDetailTable } from './table.js'
import { JsonFormatter, renderJsonDetail } from './json.js'
import { YamlFormatter, renderYamlDetail } from './yaml.js'
import { QuietFormatter, quietLine } from './quiet.js'

/** Default output options */
export const defaultOutputOptions: OutputOptions = {
  format: 'table',
  quiet: false,
  noHeaders: false,
  noColor: false,
  nullPlaceholder: '-',
  errorPlaceholder: '#ERR',
  tableBufferRows: 50,
}

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'yaml']

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value)
}

/** Build the formatter for one command. Quiet mode takes precedence. */
export function createFormatter(options: OutputOptions): OutputFormatter {
  if (options.quiet) {
    return new QuietFormatter(options)
  }

  const format: string = options.format
  switch (format) {
    case 'table':
      return new TableFormatter(options)
    case 'json':
      return new JsonFormatter(options)
    case 'yaml':
      return new YamlFormatter(options)
    default:
      throw new RenderError(`Unsupported output format "${format}". Use one of: ${OUTPUT_FORMATS.join(', ')}`)
  }
}

export interface RenderStreamOptions {
  /** Totals for the footer; read once the rows are exhausted */
  summary?: () => { totalCount?: number; initialOffset?: number; truncated: boolean }
}

/**
 * Render a row stream as output chunks, incrementally. If the stream fails,
 * rows the table formatter is still holding are emitted before the error is
 * re-thrown, so completed rows are never lost.
 */
export async function* render(
  rows: AsyncIterable<ProjectedRow> | Iterable<ProjectedRow>,
  fieldSet: FieldSet,
  options: OutputOptions,
  streamOptions: RenderStreamOptions = {}
): AsyncGenerator<string, void, undefined> {
  const formatter = createFormatter(options)
  yield* formatter.renderHeader(fieldSet)

  let count = 0
  try {
    for await (const row of rows) {
      count++
      yield* formatter.renderRow(row)
    }
  } catch (error) {
    if (formatter instanceof TableFormatter && count > 0) {
      yield* formatter.flush()
    }
    throw error
  }

  const totals = streamOptions.summary?.()
  const summary: RenderSummary = {
    count,
    totalCount: totals?.totalCount,
    offset: totals?.initialOffset ?? 0,
    truncated: totals?.truncated ?? false,
  }
  yield* formatter.renderFooter(summary)
}

/** Render a single record in one piece */
export function renderDetail(row: ProjectedRow, options: OutputOptions): string {
  if (options.quiet) {
    return quietLine(row, options)
  }

  const format: string = options.format
  switch (format) {
    case 'table':
      return renderDetailTable(row, options)
    case 'json':
      return renderJsonDetail(row, options)
    case 'yaml':
      return renderYamlDetail(row, options)
    default:
      throw new RenderError(`Unsupported output format "${format}". Use one of: ${OUTPUT_FORMATS.join(', ')}`)
  }
}

/** Collect a rendered stream into one string; for tests and small outputs */
export async function renderToString(chunks: AsyncIterable<string>): Promise<string> {
  let output = ''
  for await (const chunk of chunks) {
    output += chunk
  }
  return output
}

/** Convert an unknown error to a CommandError */
export function toCommandError(error: unknown): CommandError {
  if (isComputectlError(error)) {
    return {
      code: error.code,
      message: error.message,
      ...(error.details !== undefined ? { details: error.details } : {}),
    }
  }

  if (isCommandError(error)) {
    return error
  }

  if (error instanceof Error) {
    return {
      code: 'UNKNOWN_ERROR',
      message: error.message,
      details: error.stack,
    }
  }

  return {
    code: 'UNKNOWN_ERROR',
    message: String(error),
  }
}

/** Type guard for CommandError */
function isCommandError(error: unknown): error is CommandError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    'message' in error &&
    typeof error.code === 'string' &&
    typeof error.message === 'string'
  )
}

/** Render an error to string based on output options */
export function renderError(error: CommandError, options: Partial<OutputOptions> = {}): string {
  const opts: OutputOptions = { ...defaultOutputOptions, ...options }

  if (opts.format === 'json') {
    return JSON.stringify({ error }, null, 2)
  }

  if (opts.format === 'yaml') {
    return YAML.stringify({ error }).trimEnd()
  }

  // Table/default format: human-readable error
  const prefix = opts.noColor ? 'Error: ' : chalk.red('Error: ')
  const message = error.message

  if (error.details && typeof error.details === 'string') {
    return `${prefix}${message}\n${error.details}`
  }

  return `${prefix}${message}`
}

/** Render accumulated warnings for stderr; empty string when there are none */
export function renderWarnings(warnings: readonly QueryWarning[], options: Partial<OutputOptions> = {}): string {
  if (warnings.length === 0) {
    return ''
  }
  const opts: OutputOptions = { ...defaultOutputOptions, ...options }

  if (opts.format === 'json') {
    return JSON.stringify({ warnings }, null, 2)
  }

  if (opts.format === 'yaml') {
    return YAML.stringify({ warnings }).trimEnd()
  }

  const prefix = opts.noColor ? 'Warning: ' : chalk.yellow('Warning: ')
  return warnings.map((warning) => `${prefix}${warning.message}`).join('\n')
}
