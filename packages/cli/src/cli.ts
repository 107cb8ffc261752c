import { Command, Option } from 'commander'
import { resolvePackageVersion } from '@computectl/client'
import { createAdminCommand } from './commands/admin/index.js'
import { createFieldsCommand } from './commands/fields.js'
import { createJobCommand } from './commands/job/index.js'
import { createStatusCommand } from './commands/status.js'
import { OUTPUT_FORMATS, type CliRuntime } from './output/index.js'

export function createCli(runtime: CliRuntime): Command {
  const program = new Command()
  const version = resolvePackageVersion({ moduleUrl: import.meta.url, packageName: '@computectl/cli' })

  program
    .name('computectl')
    .description('Query sessions, users, images and policies of a compute cluster')
    .version(version, '-v, --version', 'output the version number')
    // Global output options
    .addOption(new Option('-o, --output <format>', 'output format').choices([...OUTPUT_FORMATS]))
    .option('-q, --quiet', 'minimal output (first column only)')
    .option('--no-headers', 'omit table headers')
    .option('--no-color', 'disable colored output')
    // Connection options
    .option('--endpoint <url>', 'API endpoint (default: $COMPUTECTL_ENDPOINT or config.json)')
    .option('--strict-fields', 'fail instead of dropping fields the server is too old for')
    .configureOutput({
      writeOut: (text) => runtime.stdout.write(text),
      writeErr: (text) => runtime.stderr.write(text),
    })

  program.addCommand(createJobCommand(runtime))
  program.addCommand(createAdminCommand(runtime))
  program.addCommand(createFieldsCommand(runtime))
  program.addCommand(createStatusCommand(runtime))

  return program
}
