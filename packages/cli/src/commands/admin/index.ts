import { Command } from 'commander'
import type { CliRuntime } from '../../output/index.js'
import { createResourceCommand } from '../resource/index.js'

export function createAdminCommand(runtime: CliRuntime): Command {
  const admin = new Command('admin').description('Inspect users, images, scaling groups and resource policies')

  admin.addCommand(
    createResourceCommand(runtime, {
      name: 'user',
      kind: 'user',
      description: 'Inspect user accounts',
      idArgument: '<email>',
      idDescription: 'user email',
      filters: [
        { flags: '--status <status>', description: 'only users in this status', optionKey: 'status', filterKey: 'status' },
        { flags: '--group <id>', description: 'only members of this group', optionKey: 'group', filterKey: 'group_id' },
      ],
    })
  )

  admin.addCommand(
    createResourceCommand(runtime, {
      name: 'image',
      kind: 'image',
      description: 'Inspect container images',
      idArgument: '<name>',
      idDescription: 'image reference or alias',
      filters: [
        {
          flags: '--operation',
          description: 'include images used for internal operations',
          optionKey: 'operation',
          filterKey: 'operation',
        },
      ],
    })
  )

  admin.addCommand(
    createResourceCommand(runtime, {
      name: 'scaling-group',
      kind: 'scaling_group',
      description: 'Inspect scaling groups',
      idArgument: '<name>',
      idDescription: 'scaling group name',
      filters: [
        { flags: '--group <name>', description: 'only scaling groups bound to this group', optionKey: 'group', filterKey: 'group' },
      ],
    })
  )

  admin.addCommand(
    createResourceCommand(runtime, {
      name: 'keypair-resource-policy',
      kind: 'keypair_resource_policy',
      description: 'Inspect keypair resource policies',
      idArgument: '<name>',
      idDescription: 'policy name',
    })
  )

  return admin
}
