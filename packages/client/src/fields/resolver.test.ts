import { describe, expect, it } from 'vitest'
import { evaluateCompatibility } from '../compat/compatibility.js'
import { EmptyProjectionError, IncompatibleFieldError, UnknownFieldError } from '../errors.js'
import { jobResource } from '../resources/job.js'
import { defineField } from './field-spec.js'
import { FieldRegistry } from './registry.js'
import { resolveFieldSet } from './resolver.js'

const registry = new FieldRegistry(jobResource)
const modernServer = evaluateCompatibility({ serverVersion: '23.09.1', apiVersion: 'v7.20230615' })
const oldServer = evaluateCompatibility({ serverVersion: '19.09', apiVersion: 'v5.20191215' })

function keys(result: { fieldSet: readonly { key: string }[] }): string[] {
  return result.fieldSet.map((field) => field.key)
}

describe('resolveFieldSet', () => {
  it('uses the mode defaults when nothing is requested', () => {
    expect(keys(resolveFieldSet(registry, { mode: 'list', compat: modernServer }))).toEqual([
      'id',
      'status',
      'created_at',
    ])
    expect(keys(resolveFieldSet(registry, { mode: 'list', requested: [], compat: modernServer }))).toEqual([
      'id',
      'status',
      'created_at',
    ])
  })

  it('keeps the requested order and drops duplicates', () => {
    const result = resolveFieldSet(registry, {
      mode: 'list',
      requested: ['status', ' id ', 'session_id', 'status'],
      compat: modernServer,
    })
    expect(keys(result)).toEqual(['status', 'id'])
    expect(result.warnings).toEqual([])
  })

  it('drops fields newer than the server with a warning', () => {
    const result = resolveFieldSet(registry, { mode: 'list', requested: ['id', 'owner'], compat: oldServer })

    expect(keys(result)).toEqual(['id'])
    expect(result.warnings).toEqual([{ code: 'FIELD_DROPPED', message: 'owner dropped: requires 20.03+' }])
  })

  it('drops version-gated fields from the defaults too', () => {
    const result = resolveFieldSet(registry, { mode: 'detail', compat: oldServer })
    expect(keys(result)).not.toContain('owner')
    expect(keys(result)).toHaveLength(10)
  })

  it('raises IncompatibleFieldError for too-new fields in strict mode', () => {
    expect(() =>
      resolveFieldSet(registry, { mode: 'list', requested: ['id', 'owner'], compat: oldServer, strict: true })
    ).toThrow(IncompatibleFieldError)
  })

  it('drops unknown keys with a warning unless strict', () => {
    const result = resolveFieldSet(registry, { mode: 'list', requested: ['id', 'colour'], compat: modernServer })
    expect(keys(result)).toEqual(['id'])
    expect(result.warnings).toHaveLength(1)
    expect(result.warnings[0].code).toBe('FIELD_DROPPED')

    expect(() =>
      resolveFieldSet(registry, { mode: 'list', requested: ['id', 'colour'], compat: modernServer, strict: true })
    ).toThrow(UnknownFieldError)
  })

  it('fails when no field survives resolution', () => {
    try {
      resolveFieldSet(registry, { mode: 'list', requested: ['owner'], compat: oldServer })
      expect.unreachable('resolution should fail')
    } catch (error) {
      expect(error).toBeInstanceOf(EmptyProjectionError)
      if (!(error instanceof EmptyProjectionError)) return
      expect(error.message).toBe('No displayable fields remain for job.')
      expect(error.details).toBe('owner dropped: requires 20.03+')
    }
  })

  it('accepts ad-hoc field specs as given', () => {
    const custom = defineField('slot_count', { wirePath: 'occupied_slots' })
    const result = resolveFieldSet(registry, { mode: 'list', requested: ['id', custom], compat: modernServer })
    expect(result.fieldSet[1]).toBe(custom)
  })

  it('returns a frozen field set', () => {
    expect(Object.isFrozen(resolveFieldSet(registry, { mode: 'list', compat: modernServer }).fieldSet)).toBe(true)
  })
})
