import { getErrorMessage } from '../errors.js'
import type { QueryWarning } from '../warnings.js'
import { extractWireValue, type FieldSet, type FieldSpec, type WireRecord } from './field-spec.js'

export type CellStatus = 'ok' | 'null' | 'error'

export interface ProjectedCell {
  readonly field: FieldSpec
  readonly status: CellStatus
  /** Transformed value; null for missing and failed cells */
  readonly value: unknown
  /** Table text for `ok` cells */
  readonly text?: string
  readonly error?: string
  /** Set when only `humanize` failed; the value stays usable for structured output */
  readonly textError?: string
}

/** One record after projection: exactly one cell per field, in field-set order */
export interface ProjectedRow {
  /** Position in the output, starting at 0 */
  readonly index: number
  readonly cells: readonly ProjectedCell[]
}

export interface ProjectionResult {
  row: ProjectedRow
  /** At most one warning, naming every cell of the row that failed */
  warning?: QueryWarning
}

function stringifyValue(value: unknown): string {
  if (typeof value === 'string') {
    return value
  }
  if (typeof value === 'object') {
    return JSON.stringify(value)
  }
  return String(value)
}

function projectCell(record: WireRecord, field: FieldSpec): ProjectedCell {
  const raw = extractWireValue(record, field.wirePath)
  if (raw === undefined || raw === null) {
    return { field, status: 'null', value: null }
  }
  let value: unknown
  try {
    value = field.transform ? field.transform(raw) : raw
  } catch (error) {
    return { field, status: 'error', value: null, error: getErrorMessage(error) }
  }
  if (value === undefined || value === null) {
    return { field, status: 'null', value: null }
  }
  if (!field.humanize) {
    return { field, status: 'ok', value, text: stringifyValue(value) }
  }
  try {
    return { field, status: 'ok', value, text: field.humanize(value) }
  } catch (error) {
    return { field, status: 'ok', value, textError: getErrorMessage(error) }
  }
}

export function projectRecord(record: WireRecord, fieldSet: FieldSet, index: number): ProjectionResult {
  const cells = fieldSet.map((field) => projectCell(record, field))
  const failed = cells.filter((cell) => cell.status === 'error' || cell.textError !== undefined)
  const row: ProjectedRow = { index, cells }
  if (failed.length === 0) {
    return { row }
  }
  const details = failed.map((cell) => `${cell.field.key} (${cell.error ?? cell.textError})`).join('; ')
  return {
    row,
    warning: {
      code: 'CELL_RENDER_FAILED',
      message: `row ${index + 1}: could not render ${details}`,
    },
  }
}

