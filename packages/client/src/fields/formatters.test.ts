import { describe, expect, it } from 'vitest'
import { formatBytes, pluck, toBoolean, toResourceSlots, valueFormats } from './formatters.js'

describe('formatBytes', () => {
  it('uses binary units with one decimal', () => {
    expect(formatBytes(512)).toBe('512 B')
    expect(formatBytes(1536)).toBe('1.5 KiB')
    expect(formatBytes(1073741824)).toBe('1 GiB')
  })

  it('rejects negative sizes', () => {
    expect(() => formatBytes(-1)).toThrow('Invalid byte size: -1')
  })
})

describe('value formats', () => {
  it('normalizes booleans', () => {
    expect(toBoolean('true')).toBe(true)
    expect(toBoolean(0)).toBe(false)
    expect(() => toBoolean('maybe')).toThrow('Not a boolean: "maybe"')
    expect(valueFormats.boolean.humanize(true)).toBe('yes')
  })

  it('parses resource slots from objects and JSON text', () => {
    expect(toResourceSlots({ cpu: '4', mem: '8589934592' })).toEqual({ cpu: 4, mem: 8589934592 })
    expect(toResourceSlots('{"cuda.device":"1"}')).toEqual({ 'cuda.device': 1 })
    expect(valueFormats.resourceSlots.humanize({ cpu: 2, mem: 1073741824 })).toBe('cpu:2 mem:1 GiB')
  })

  it('plucks a property from each list item', () => {
    const groups = pluck('name')
    const value = groups.transform?.([{ name: 'default' }, { name: 'research' }])
    expect(value).toEqual(['default', 'research'])
    expect(groups.humanize?.(value)).toBe('default, research')
    expect(() => groups.transform?.([{ id: 1 }])).toThrow('List item has no "name": {"id":1}')
  })
})
