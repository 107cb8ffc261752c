/**
 * Output format types for the computectl CLI.
 *
 * Commands return a CommandOutput (field set, rows, warnings); the render layer
 * turns it into text for the selected format.
 */

import type { EnumerationSummary, FieldSet, ProjectedRow, QueryWarning } from '@computectl/client'

/** Supported output formats */
export type OutputFormat = 'table' | 'json' | 'yaml'

/** Options controlling output rendering */
export interface OutputOptions {
  /** Output format (table, json, yaml) */
  format: OutputFormat
  /** Minimal output - first column only */
  quiet: boolean
  /** Omit table headers */
  noHeaders: boolean
  /** Disable color output */
  noColor: boolean
  /** Table text for missing values */
  nullPlaceholder: string
  /** Text for cells that could not be rendered */
  errorPlaceholder: string
  /** Rows buffered to size table columns before streaming at fixed widths */
  tableBufferRows: number
}

/** Totals handed to a formatter's footer */
export interface RenderSummary {
  count: number
  totalCount?: number
  /** Records skipped before the first row */
  offset: number
  truncated: boolean
}

/**
 * One renderer bound to one output mode for one command. Each method returns
 * the chunks to write, possibly none.
 */
export interface OutputFormatter {
  renderHeader(fieldSet: FieldSet): string[]
  renderRow(row: ProjectedRow): string[]
  renderFooter(summary: RenderSummary): string[]
}

/** Result type for commands returning a single record */
export interface SingleOutput {
  type: 'single'
  fieldSet: FieldSet
  row: ProjectedRow
  warnings: { list(): readonly QueryWarning[] }
}

/** Result type for commands returning a listing */
export interface ListOutput {
  type: 'list'
  fieldSet: FieldSet
  rows: AsyncIterable<ProjectedRow>
  warnings: { list(): readonly QueryWarning[] }
  summary(): EnumerationSummary
}

/** Union type for all command results */
export type CommandOutput = SingleOutput | ListOutput

/** Structured error for command failures */
export interface CommandError {
  /** Machine-readable error code */
  code: string
  /** Human-readable message */
  message: string
  /** Additional context */
  details?: unknown
}
