import { defineField } from '../fields/field-spec.js'
import { valueFormats } from '../fields/formatters.js'
import type { ResourceDefinition } from '../fields/registry.js'

const policyFields = [
  'name',
  'created_at',
  'default_for_unspecified',
  'total_resource_slots',
  'max_concurrent_sessions',
  'max_containers_per_session',
  'idle_timeout',
  'max_vfolder_count',
  'max_vfolder_size',
  'allowed_vfolder_hosts',
]

export const keypairResourcePolicyResource: ResourceDefinition = {
  kind: 'keypair_resource_policy',
  path: '/admin/resource-policies/keypair',
  fields: [
    defineField('name'),
    defineField('created_at', { ...valueFormats.timestamp }),
    defineField('default_for_unspecified'),
    defineField('total_resource_slots', { ...valueFormats.resourceSlots }),
    defineField('max_concurrent_sessions', { ...valueFormats.number }),
    defineField('max_containers_per_session', { ...valueFormats.number }),
    defineField('idle_timeout', { displayName: 'Idle Timeout (s)', ...valueFormats.number }),
    defineField('max_vfolder_count', { ...valueFormats.number }),
    defineField('max_vfolder_size', { ...valueFormats.bytes }),
    defineField('allowed_vfolder_hosts', { ...valueFormats.list }),
    defineField('max_session_lifetime', { minServerVersion: '22.03', ...valueFormats.number }),
  ],
  defaults: {
    list: policyFields,
    detail: policyFields,
  },
}
