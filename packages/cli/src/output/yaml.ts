/**
 * YAML renderer for CLI output.
 *
 * Streams a listing as a YAML sequence of mappings, one per row.
 */

import YAML from 'yaml'
import type { ProjectedRow } from '@computectl/client'
import { rowToObject } from './cells.js'
import type { OutputFormatter, OutputOptions, RenderSummary } from './types.js'

export class YamlFormatter implements OutputFormatter {
  private readonly options: OutputOptions
  private count = 0

  constructor(options: OutputOptions) {
    this.options = options
  }

  renderHeader(): string[] {
    return []
  }

  renderRow(row: ProjectedRow): string[] {
    this.count++
    return [YAML.stringify([rowToObject(row, this.options)])]
  }

  renderFooter(_summary: RenderSummary): string[] {
    return this.count === 0 ? ['[]\n'] : []
  }
}

/** Render a single record as one YAML document */
export function renderYamlDetail(row: ProjectedRow, options: OutputOptions): string {
  return YAML.stringify(rowToObject(row, options))
}
