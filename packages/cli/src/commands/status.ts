import { Command } from 'commander'
import {
  WarningLog,
  defineField,
  projectRecord,
  type FieldSet,
} from '@computectl/client'
import { withOutput, type CliRuntime, type CommandContext, type SingleOutput } from '../output/index.js'
import { getEndpoint } from '../utils/client.js'

export const statusFieldSet: FieldSet = Object.freeze([
  defineField('endpoint'),
  defineField('server_version', { displayName: 'Server Version' }),
  defineField('api_version', { displayName: 'API Version' }),
  defineField('min_api_version', { displayName: 'Minimum API Version' }),
  defineField('state'),
])

/** Connect and report the server's versions and the compatibility state */
export async function runStatusCommand(context: CommandContext): Promise<SingleOutput> {
  const client = await context.connect()
  const { compat } = client
  const warnings = new WarningLog()
  if (compat.warning) {
    warnings.add(compat.warning.code, compat.warning.message)
  }

  const { row } = projectRecord(
    {
      endpoint: getEndpoint(context.config),
      server_version: compat.serverVersion,
      api_version: compat.apiVersion,
      min_api_version: compat.minApiVersion,
      state: compat.state,
    },
    statusFieldSet,
    0
  )

  return { type: 'single', fieldSet: statusFieldSet, row, warnings }
}

export function createStatusCommand(runtime: CliRuntime): Command {
  return new Command('status')
    .description('Show the server version and whether this client supports it')
    .action(withOutput(runtime, (context) => runStatusCommand(context)))
}
