import { Command, Option } from 'commander'
import { withOutput, type CliRuntime } from '../../output/index.js'
import { runInfoCommand } from './info.js'
import { runLsCommand } from './ls.js'
import { commonFilterOptions, parseNonNegativeInt, parsePositiveInt, type ResourceFilterOption } from './options.js'

export interface ResourceCommandSpec {
  /** Command name, e.g. `scaling-group` */
  name: string
  /** Registry kind, e.g. `scaling_group` */
  kind: string
  description: string
  /** Argument placeholder for `info`, e.g. `<email>` */
  idArgument: string
  idDescription: string
  filters?: readonly ResourceFilterOption[]
}

/** `<name> ls` and `<name> info <id>` for one resource kind */
export function createResourceCommand(runtime: CliRuntime, spec: ResourceCommandSpec): Command {
  const command = new Command(spec.name).description(spec.description)
  const filterOptions = [...commonFilterOptions, ...(spec.filters ?? [])]

  const ls = command
    .command('ls')
    .alias('list')
    .description(`List ${spec.kind.replace(/_/g, ' ')}s`)
    .option('--fields <keys>', 'comma-separated field keys to show (see `computectl fields`)')
    .addOption(new Option('--page-size <n>', 'records per request').argParser(parsePositiveInt))
    .addOption(new Option('--max-items <n>', 'stop after this many records').argParser(parseNonNegativeInt))
    .addOption(new Option('--offset <n>', 'skip this many records first').argParser(parseNonNegativeInt))

  for (const filter of filterOptions) {
    ls.option(filter.flags, filter.description)
  }

  ls.action(withOutput(runtime, (context, _args, options) => runLsCommand(spec.kind, filterOptions, context, options)))

  command
    .command('info')
    .description(`Show one ${spec.kind.replace(/_/g, ' ')}`)
    .argument(spec.idArgument, spec.idDescription)
    .option('--fields <keys>', 'comma-separated field keys to show (see `computectl fields`)')
    .action(withOutput(runtime, (context, args, options) => runInfoCommand(spec.kind, args[0], context, options)))

  return command
}
