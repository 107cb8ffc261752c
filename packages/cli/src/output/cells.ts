import type { ProjectedCell, ProjectedRow } from '@computectl/client'
import type { OutputOptions } from './types.js'

/** Table text of a cell, before coloring */
export function cellText(cell: ProjectedCell, options: OutputOptions): string {
  switch (cell.status) {
    case 'null':
      return options.nullPlaceholder
    case 'error':
      return options.errorPlaceholder
    case 'ok':
    default:
      if (cell.textError !== undefined) {
        return options.errorPlaceholder
      }
      return (cell.text ?? '').replace(/\r?\n/g, ' ')
  }
}

/** Value of a cell in structured output */
export function cellValue(cell: ProjectedCell, options: OutputOptions): unknown {
  if (cell.status === 'error') {
    return options.errorPlaceholder
  }
  return cell.status === 'null' ? null : cell.value
}

/** Structured form of a row: field keys in field-set order, nothing else */
export function rowToObject(row: ProjectedRow, options: OutputOptions): Record<string, unknown> {
  const object: Record<string, unknown> = {}
  for (const cell of row.cells) {
    object[cell.field.key] = cellValue(cell, options)
  }
  return object
}
