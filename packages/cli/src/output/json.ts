/**
 * JSON renderer for CLI output.
 *
 * Streams a listing as one JSON array, one object per row, keyed by field key
 * in field-set order. The assembled output equals `JSON.stringify(rows, null, 2)`.
 */

import type { ProjectedRow } from '@computectl/client'
import { rowToObject } from './cells.js'
import type { OutputFormatter, OutputOptions, RenderSummary } from './types.js'

function indent(text: string, prefix: string): string {
  return text
    .split('\n')
    .map((line) => prefix + line)
    .join('\n')
}

export class JsonFormatter implements OutputFormatter {
  private readonly options: OutputOptions
  private count = 0

  constructor(options: OutputOptions) {
    this.options = options
  }

  renderHeader(): string[] {
    return ['[']
  }

  renderRow(row: ProjectedRow): string[] {
    const separator = this.count === 0 ? '\n' : ',\n'
    this.count++
    return [separator + indent(JSON.stringify(rowToObject(row, this.options), null, 2), '  ')]
  }

  renderFooter(_summary: RenderSummary): string[] {
    return [this.count === 0 ? ']\n' : '\n]\n']
  }
}

/** Render a single record as one JSON object */
export function renderJsonDetail(row: ProjectedRow, options: OutputOptions): string {
  return JSON.stringify(rowToObject(row, options), null, 2) + '\n'
}
