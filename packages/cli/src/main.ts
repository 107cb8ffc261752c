import { createBuiltinCatalog, createRootLogger } from '@computectl/client'
import { createCli } from './cli.js'
import type { CliRuntime } from './output/index.js'
import { connectToServer } from './utils/client.js'

export function createProcessRuntime(): CliRuntime {
  const catalog = createBuiltinCatalog()
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    catalog,
    createLogger: (config) => createRootLogger(config.log),
    connect: (params) => connectToServer({ ...params, catalog }),
    onInterrupt(handler) {
      process.once('SIGINT', handler)
      return () => {
        process.removeListener('SIGINT', handler)
      }
    },
    setExitCode(code) {
      process.exitCode = code
    },
  }
}

export async function main(argv: string[]): Promise<void> {
  const program = createCli(createProcessRuntime())
  await program.parseAsync(argv)
}
