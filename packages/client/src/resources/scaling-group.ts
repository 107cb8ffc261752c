import { defineField } from '../fields/field-spec.js'
import { valueFormats } from '../fields/formatters.js'
import type { ResourceDefinition } from '../fields/registry.js'

/** Scaling groups, a.k.a. resource groups */
export const scalingGroupResource: ResourceDefinition = {
  kind: 'scaling_group',
  path: '/admin/scaling-groups',
  fields: [
    defineField('name'),
    defineField('description'),
    defineField('is_active', { displayName: 'Active', ...valueFormats.boolean }),
    defineField('created_at', { ...valueFormats.timestamp }),
    defineField('driver'),
    defineField('driver_opts', { ...valueFormats.json }),
    defineField('scheduler'),
    defineField('scheduler_opts', { ...valueFormats.json }),
    defineField('wsproxy_addr', { displayName: 'WSProxy Address', minServerVersion: '21.09' }),
  ],
  defaults: {
    list: ['name', 'description', 'is_active', 'created_at', 'driver', 'scheduler'],
    detail: ['name', 'description', 'is_active', 'created_at', 'driver', 'driver_opts', 'scheduler', 'scheduler_opts'],
  },
}
