/**
 * Renderers: table, JSON, YAML, quiet, errors and warnings.
 */

import YAML from 'yaml'
import { describe, expect, it } from 'vitest'
import {
  RecordNotFoundError,
  defineField,
  projectRecord,
  valueFormats,
  type ProjectedRow,
} from '@computectl/client'
import {
  createOutputOptions,
  render,
  renderDetail,
  renderError,
  renderToString,
  renderWarnings,
  toCommandError,
  type OutputOptions,
} from '../src/output/index.js'

const fieldSet = [
  defineField('id', { displayName: 'ID' }),
  defineField('status'),
  defineField('size', { ...valueFormats.bytes }),
]

const rows: ProjectedRow[] = [
  projectRecord({ id: 'a1', status: 'RUNNING', size: 1536 }, fieldSet, 0).row,
  projectRecord({ id: 'b22', status: null, size: 'huge' }, fieldSet, 1).row,
]

function renderRows(
  options: Partial<OutputOptions>,
  input: ProjectedRow[] = rows,
  summary: { totalCount?: number; initialOffset?: number; truncated: boolean } = { truncated: false }
): Promise<string> {
  return renderToString(render(input, fieldSet, createOutputOptions({ noColor: true, ...options }), { summary: () => summary }))
}

describe('table output', () => {
  it('aligns columns with placeholders for null and failed cells', async () => {
    expect(await renderRows({})).toBe(
      [
        'ID   STATUS   SIZE',
        'a1   RUNNING  1.5 KiB',
        'b22  -        #ERR',
        '',
      ].join('\n')
    )
  })

  it('omits the header with noHeaders', async () => {
    expect(await renderRows({ noHeaders: true })).toBe('a1   RUNNING  1.5 KiB\nb22  -        #ERR\n')
  })

  it('reports an empty listing', async () => {
    expect(await renderRows({}, [])).toBe('No matching items.\n')
  })

  it('notes partial listings in the footer', async () => {
    expect(await renderRows({}, rows, { totalCount: 10, truncated: true })).toBe(
      'ID   STATUS   SIZE\na1   RUNNING  1.5 KiB\nb22  -        #ERR\n\nShowing 2 of 10 items.\n'
    )
    expect(await renderRows({}, rows, { truncated: true })).toMatch(/\nShowing the first 2 items\.\n$/)
  })

  it('counts skipped records when deciding whether a listing is partial', async () => {
    expect(await renderRows({ noHeaders: true }, rows, { totalCount: 4, initialOffset: 2, truncated: false })).toBe(
      'a1   RUNNING  1.5 KiB\nb22  -        #ERR\n'
    )
    expect(await renderRows({ noHeaders: true }, rows, { totalCount: 5, initialOffset: 2, truncated: true })).toBe(
      'a1   RUNNING  1.5 KiB\nb22  -        #ERR\n\nShowing 2 of 5 items.\n'
    )
  })

  it('streams rows after the width buffer fills', async () => {
    const chunks: string[] = []
    for await (const chunk of render(rows, fieldSet, createOutputOptions({ noColor: true, tableBufferRows: 1 }))) {
      chunks.push(chunk)
    }
    expect(chunks).toEqual(['ID  STATUS   SIZE\n', 'a1  RUNNING  1.5 KiB\n', 'b22  -        #ERR\n'])
  })

  it('emits the rows it holds before a stream failure', async () => {
    async function* failing(): AsyncGenerator<ProjectedRow> {
      yield rows[0]
      throw new Error('connection reset')
    }
    const chunks: string[] = []
    const consume = async () => {
      for await (const chunk of render(failing(), fieldSet, createOutputOptions({ noColor: true }))) {
        chunks.push(chunk)
      }
    }

    await expect(consume()).rejects.toThrow('connection reset')
    expect(chunks.join('')).toBe('ID  STATUS   SIZE\na1  RUNNING  1.5 KiB\n')
  })

  it('renders a single record as FIELD / VALUE lines', () => {
    expect(renderDetail(rows[1], createOutputOptions({ noColor: true }))).toBe(
      ['FIELD   VALUE', 'ID      b22', 'Status  -', 'Size    #ERR', ''].join('\n')
    )
  })
})

describe('structured output', () => {
  it('renders JSON that parses back to one object per row, keyed in field order', async () => {
    const output = await renderRows({ format: 'json' })
    const parsed: unknown = JSON.parse(output)

    expect(parsed).toEqual([
      { id: 'a1', status: 'RUNNING', size: 1536 },
      { id: 'b22', status: null, size: '#ERR' },
    ])
    expect(output).toBe(
      JSON.stringify(
        [
          { id: 'a1', status: 'RUNNING', size: 1536 },
          { id: 'b22', status: null, size: '#ERR' },
        ],
        null,
        2
      ) + '\n'
    )
  })

  it('renders an empty JSON listing as []', async () => {
    expect(await renderRows({ format: 'json' }, [])).toBe('[]\n')
  })

  it('renders YAML sequences', async () => {
    const output = await renderRows({ format: 'yaml' })
    expect(YAML.parse(output)).toEqual([
      { id: 'a1', status: 'RUNNING', size: 1536 },
      { id: 'b22', status: null, size: '#ERR' },
    ])
    expect(await renderRows({ format: 'yaml' }, [])).toBe('[]\n')
  })

  it('renders single records as one object', () => {
    expect(renderDetail(rows[0], createOutputOptions({ format: 'json' }))).toBe(
      '{\n  "id": "a1",\n  "status": "RUNNING",\n  "size": 1536\n}\n'
    )
    expect(renderDetail(rows[0], createOutputOptions({ format: 'yaml' }))).toBe('id: a1\nstatus: RUNNING\nsize: 1536\n')
  })

  it('keeps the value in structured output when only the table text fails', () => {
    const row = projectRecord({ id: 'c3', status: 'PENDING', size: -1 }, fieldSet, 2).row

    expect(renderDetail(row, createOutputOptions({ noColor: true }))).toBe(
      ['FIELD   VALUE', 'ID      c3', 'Status  PENDING', 'Size    #ERR', ''].join('\n')
    )
    expect(renderDetail(row, createOutputOptions({ format: 'json' }))).toBe(
      '{\n  "id": "c3",\n  "status": "PENDING",\n  "size": -1\n}\n'
    )
  })

  it('prints only the first column in quiet mode', async () => {
    expect(await renderRows({ quiet: true, format: 'json' })).toBe('a1\nb22\n')
  })
})

describe('errors and warnings', () => {
  const notFound = toCommandError(new RecordNotFoundError({ resourceKind: 'job', id: 'x' }))

  it('keeps the error code of query errors', () => {
    expect(notFound).toEqual({ code: 'RECORD_NOT_FOUND', message: 'No matching job found for "x".' })
  })

  it('renders errors per format', () => {
    expect(renderError(notFound, { noColor: true })).toBe('Error: No matching job found for "x".')
    expect(JSON.parse(renderError(notFound, { format: 'json' }))).toEqual({
      error: { code: 'RECORD_NOT_FOUND', message: 'No matching job found for "x".' },
    })
    expect(renderError({ code: 'E', message: 'failed', details: 'more' }, { noColor: true })).toBe('Error: failed\nmore')
  })

  it('renders warnings per format', () => {
    const warnings = [{ code: 'FIELD_DROPPED' as const, message: 'owner dropped: requires 20.03+' }]

    expect(renderWarnings([], { noColor: true })).toBe('')
    expect(renderWarnings(warnings, { noColor: true })).toBe('Warning: owner dropped: requires 20.03+')
    expect(JSON.parse(renderWarnings(warnings, { format: 'json' }))).toEqual({ warnings })
    expect(YAML.parse(renderWarnings(warnings, { format: 'yaml' }))).toEqual({ warnings })
  })
})
