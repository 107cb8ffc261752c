/**
 * Quiet renderer for CLI output.
 *
 * Outputs only the first field of each row, one per line. Useful for scripting
 * and pipelines.
 */

import type { ProjectedRow } from '@computectl/client'
import { cellText } from './cells.js'
import type { OutputFormatter, OutputOptions } from './types.js'

/** First-column text of a row */
export function quietLine(row: ProjectedRow, options: OutputOptions): string {
  const first = row.cells[0]
  return first ? cellText(first, options) + '\n' : '\n'
}

export class QuietFormatter implements OutputFormatter {
  private readonly options: OutputOptions

  constructor(options: OutputOptions) {
    this.options = options
  }

  renderHeader(): string[] {
    return []
  }

  renderRow(row: ProjectedRow): string[] {
    return [quietLine(row, this.options)]
  }

  renderFooter(): string[] {
    return []
  }
}
