/**
 * Table renderer for CLI output.
 *
 * Renders projected rows as aligned columns with optional color support.
 * Column widths come from the header and the first `tableBufferRows` rows;
 * later rows stream at those widths.
 */

import chalk from 'chalk'
import type { FieldSet, ProjectedCell, ProjectedRow } from '@computectl/client'
import { cellText } from './cells.js'
import type { OutputFormatter, OutputOptions, RenderSummary } from './types.js'

// ANSI escape code regex for stripping colors when measuring width
const ANSI_REGEX =
  // eslint-disable-next-line no-control-regex
  /[\u001b\u009b][[()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><]/g

const COLUMN_GAP = '  '

/** Strip ANSI escape codes from a string */
function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, '')
}

/** Get visible string length (excluding ANSI codes) */
function visibleLength(str: string): number {
  return stripAnsi(str).length
}

/** Pad a cell to the specified width */
function padCell(cell: string, width: number): string {
  return cell + ' '.repeat(Math.max(0, width - visibleLength(cell)))
}

function joinLine(cells: string[]): string {
  return cells.join(COLUMN_GAP).replace(/\s+$/, '') + '\n'
}

function colorCell(cell: ProjectedCell, text: string, options: OutputOptions): string {
  if (options.noColor) {
    return text
  }
  if (cell.status === 'error' || cell.textError !== undefined) return chalk.red(text)
  if (cell.status === 'null') return chalk.dim(text)
  return text
}

function headerLabel(displayName: string): string {
  return displayName.toUpperCase()
}

export class TableFormatter implements OutputFormatter {
  private readonly options: OutputOptions
  private headers: string[] = []
  private buffered: ProjectedRow[] = []
  private widths: number[] | null = null

  constructor(options: OutputOptions) {
    this.options = options
  }

  renderHeader(fieldSet: FieldSet): string[] {
    this.headers = fieldSet.map((field) => headerLabel(field.displayName))
    return []
  }

  renderRow(row: ProjectedRow): string[] {
    if (this.widths) {
      return [this.formatRow(row, this.widths)]
    }
    this.buffered.push(row)
    return this.buffered.length >= this.options.tableBufferRows ? this.flush() : []
  }

  renderFooter(summary: RenderSummary): string[] {
    if (summary.count === 0) {
      this.buffered = []
      return ['No matching items.\n']
    }
    const chunks = this.flush()
    if (summary.totalCount !== undefined && summary.offset + summary.count < summary.totalCount) {
      chunks.push(`\nShowing ${summary.count} of ${summary.totalCount} items.\n`)
    } else if (summary.truncated) {
      chunks.push(`\nShowing the first ${summary.count} items.\n`)
    }
    return chunks
  }

  /** Emit the header and any rows still held for width calculation */
  flush(): string[] {
    if (this.widths) {
      return []
    }
    const widths = this.calculateWidths()
    this.widths = widths
    const chunks: string[] = []
    if (!this.options.noHeaders) {
      const header = joinLine(this.headers.map((label, i) => padCell(label, widths[i])))
      chunks.push(this.options.noColor ? header : chalk.bold(header.trimEnd()) + '\n')
    }
    for (const row of this.buffered) {
      chunks.push(this.formatRow(row, widths))
    }
    this.buffered = []
    return chunks
  }

  private calculateWidths(): number[] {
    return this.headers.map((label, i) => {
      let width = this.options.noHeaders ? 0 : label.length
      for (const row of this.buffered) {
        width = Math.max(width, visibleLength(cellText(row.cells[i], this.options)))
      }
      return width
    })
  }

  private formatRow(row: ProjectedRow, widths: number[]): string {
    return joinLine(
      row.cells.map((cell, i) => padCell(colorCell(cell, cellText(cell, this.options), this.options), widths[i]))
    )
  }
}

/** Vertical FIELD / VALUE layout for a single record */
export function renderDetailTable(row: ProjectedRow, options: OutputOptions): string {
  const labels = row.cells.map((cell) => cell.field.displayName)
  const width = Math.max(options.noHeaders ? 0 : 'FIELD'.length, ...labels.map((label) => label.length))
  const lines: string[] = []

  if (!options.noHeaders) {
    const header = joinLine([padCell('FIELD', width), 'VALUE'])
    lines.push(options.noColor ? header : chalk.bold(header.trimEnd()) + '\n')
  }
  row.cells.forEach((cell, i) => {
    lines.push(joinLine([padCell(labels[i], width), colorCell(cell, cellText(cell, options), options)]))
  })
  return lines.join('')
}
