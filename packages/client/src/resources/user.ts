import { defineField } from '../fields/field-spec.js'
import { pluck, valueFormats } from '../fields/formatters.js'
import type { ResourceDefinition } from '../fields/registry.js'

const userFields = [
  'uuid',
  'username',
  'role',
  'email',
  'full_name',
  'need_password_change',
  'status',
  'status_info',
  'created_at',
  'domain_name',
  'groups',
]

export const userResource: ResourceDefinition = {
  kind: 'user',
  path: '/admin/users',
  fields: [
    defineField('uuid', { wirePath: 'id', displayName: 'UUID', altName: 'id' }),
    defineField('username'),
    defineField('email'),
    defineField('full_name'),
    defineField('role'),
    defineField('description'),
    defineField('need_password_change', { ...valueFormats.boolean }),
    defineField('status'),
    defineField('status_info'),
    defineField('created_at', { ...valueFormats.timestamp }),
    defineField('modified_at', { minServerVersion: '21.03', ...valueFormats.timestamp }),
    defineField('domain_name'),
    defineField('groups', { ...pluck('name') }),
    defineField('totp_activated', { displayName: 'TOTP Activated', minServerVersion: '23.03', ...valueFormats.boolean }),
  ],
  defaults: {
    list: userFields,
    detail: userFields,
  },
}
