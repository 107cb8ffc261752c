import { defineField } from '../fields/field-spec.js'
import { valueFormats } from '../fields/formatters.js'
import type { ResourceDefinition } from '../fields/registry.js'

export const imageResource: ResourceDefinition = {
  kind: 'image',
  path: '/images',
  fields: [
    defineField('name'),
    defineField('registry'),
    defineField('tag'),
    defineField('architecture', { minServerVersion: '21.09' }),
    defineField('digest'),
    defineField('size_bytes', { displayName: 'Size', ...valueFormats.bytes }),
    defineField('aliases', { ...valueFormats.list }),
    defineField('labels', { ...valueFormats.json }),
    defineField('resource_limits', { ...valueFormats.json }),
    defineField('installed', { ...valueFormats.boolean }),
  ],
  defaults: {
    list: ['name', 'registry', 'tag', 'digest', 'size_bytes', 'aliases'],
    detail: ['name', 'registry', 'tag', 'digest', 'size_bytes', 'aliases', 'labels', 'resource_limits', 'installed'],
  },
}
