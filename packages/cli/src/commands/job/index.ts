import type { Command } from 'commander'
import type { CliRuntime } from '../../output/index.js'
import { createResourceCommand } from '../resource/index.js'

export function createJobCommand(runtime: CliRuntime): Command {
  return createResourceCommand(runtime, {
    name: 'job',
    kind: 'job',
    description: 'Inspect compute sessions',
    idArgument: '<id>',
    idDescription: 'session ID or name',
    filters: [
      { flags: '--status <status>', description: 'only sessions in this status', optionKey: 'status', filterKey: 'status' },
      { flags: '--group <name>', description: 'only sessions of this project group', optionKey: 'group', filterKey: 'group_name' },
      {
        flags: '--scaling-group <name>',
        description: 'only sessions on this scaling group',
        optionKey: 'scalingGroup',
        filterKey: 'scaling_group',
      },
      { flags: '--owner <email>', description: 'only sessions owned by this user', optionKey: 'owner', filterKey: 'owner_email' },
    ],
  })
}
