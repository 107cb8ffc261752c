import { defineField } from '../fields/field-spec.js'
import { valueFormats } from '../fields/formatters.js'
import type { ResourceDefinition } from '../fields/registry.js'

/** Compute sessions ("jobs") */
export const jobResource: ResourceDefinition = {
  kind: 'job',
  path: '/sessions',
  fields: [
    defineField('id', { wirePath: 'session_id', displayName: 'ID', altName: 'session_id' }),
    defineField('name', { wirePath: 'session_name', altName: 'session_name' }),
    defineField('status'),
    defineField('status_info'),
    defineField('type', { wirePath: 'session_type', altName: 'session_type' }),
    defineField('image'),
    defineField('owner', { wirePath: 'owner_email', minServerVersion: '20.03' }),
    defineField('group', { wirePath: 'group_name', altName: 'group_name' }),
    defineField('scaling_group', { minServerVersion: '20.09' }),
    defineField('occupied_slots', { ...valueFormats.resourceSlots }),
    defineField('containers', { wirePath: 'container_count', ...valueFormats.number }),
    defineField('created_at', { ...valueFormats.timestamp }),
    defineField('terminated_at', { ...valueFormats.timestamp }),
    defineField('idle_checks', { minServerVersion: '22.09', ...valueFormats.json }),
  ],
  defaults: {
    list: ['id', 'status', 'created_at'],
    detail: [
      'id',
      'name',
      'status',
      'status_info',
      'type',
      'image',
      'owner',
      'group',
      'occupied_slots',
      'created_at',
      'terminated_at',
    ],
  },
}
