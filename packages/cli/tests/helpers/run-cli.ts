import { mkdtempSync, rmSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import {
  ResourceQueryClient,
  createBuiltinCatalog,
  createSilentLogger,
  type InMemoryTransport,
} from '@computectl/client'
import { createCli } from '../../src/cli.js'
import type { CliRuntime, OutputSink } from '../../src/output/index.js'
import { createFixtureTransport } from './fixtures.js'

export interface CliRun {
  stdout: string
  stderr: string
  exitCode: number
  transport: InMemoryTransport
}

export interface RunCliOptions {
  /** A transport, or a factory that also gets a function simulating Ctrl-C */
  transport?: InMemoryTransport | ((interrupt: () => void) => InMemoryTransport)
  env?: Record<string, string>
}

class StringSink implements OutputSink {
  text = ''

  write(chunk: string): boolean {
    this.text += chunk
    return true
  }
}

/** Run the CLI in process against an in-memory server */
export async function runCli(args: string[], options: RunCliOptions = {}): Promise<CliRun> {
  const home = mkdtempSync(path.join(os.tmpdir(), 'computectl-cli-'))
  const stdout = new StringSink()
  const stderr = new StringSink()
  const interruptHandlers = new Set<() => void>()
  const interrupt = () => {
    for (const handler of interruptHandlers) handler()
  }
  const transport =
    typeof options.transport === 'function'
      ? options.transport(interrupt)
      : (options.transport ?? createFixtureTransport())
  const catalog = createBuiltinCatalog()
  let exitCode = 0

  const runtime: CliRuntime = {
    stdout,
    stderr,
    env: { COMPUTECTL_HOME: home, ...options.env },
    catalog,
    createLogger: () => createSilentLogger(),
    connect: ({ config, logger, signal }) =>
      ResourceQueryClient.connect({
        transport,
        catalog,
        logger,
        strictFieldVersionCheck: config.strictFieldVersionCheck,
        signal,
      }),
    onInterrupt(handler) {
      interruptHandlers.add(handler)
      return () => {
        interruptHandlers.delete(handler)
      }
    },
    setExitCode(code) {
      exitCode = code
    },
  }

  try {
    await createCli(runtime).parseAsync(['node', 'computectl', ...args])
  } finally {
    rmSync(home, { recursive: true, force: true })
  }
  return { stdout: stdout.text, stderr: stderr.text, exitCode, transport }
}
