/**
 * Command wrapper for automatic output rendering.
 *
 * Wraps command handlers to stream their rows to stdout, report warnings and
 * errors on stderr, and cancel the query on interrupt.
 */

import type { Command } from 'commander'
import type pino from 'pino'
import {
  CancelledError,
  RenderError,
  isComputectlError,
  loadConfig,
  type ClientConfig,
  type CliConfigOverrides,
  type RegistryCatalog,
  type ResourceQueryClient,
} from '@computectl/client'
import type { CommandOutput, OutputOptions } from './types.js'
import {
  defaultOutputOptions,
  isOutputFormat,
  render,
  renderDetail,
  renderError,
  renderWarnings,
  toCommandError,
} from './render.js'

/** Where rendered text goes; process.stdout and process.stderr satisfy it */
export interface OutputSink {
  write(chunk: string): unknown
}

export interface CommandIO {
  stdout: OutputSink
  stderr: OutputSink
}

/** Process-level collaborators, replaceable in tests */
export interface CliRuntime extends CommandIO {
  env: NodeJS.ProcessEnv
  catalog: RegistryCatalog
  createLogger(config: ClientConfig): pino.Logger
  connect(params: { config: ClientConfig; logger: pino.Logger; signal: AbortSignal }): Promise<ResourceQueryClient>
  /** Subscribe to user interrupts; returns the unsubscribe function */
  onInterrupt(handler: () => void): () => void
  setExitCode(code: number): void
}

/** What a handler gets besides its arguments */
export interface CommandContext {
  config: ClientConfig
  logger: pino.Logger
  signal: AbortSignal
  catalog: RegistryCatalog
  /** Open the server session; only commands that talk to the server call this */
  connect(): Promise<ResourceQueryClient>
}

/** Options that include output settings from global options */
export interface CommandOptions {
  [key: string]: unknown
}

export type CommandHandler = (
  context: CommandContext,
  args: string[],
  options: CommandOptions
) => Promise<CommandOutput>

export const EXIT_FAILURE = 1
export const EXIT_INTERRUPTED = 130

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

/** Extract output options from command options, falling back to the config */
export function extractOutputOptions(options: CommandOptions, config?: ClientConfig): OutputOptions {
  const format = optionalString(options.output) ?? config?.output ?? defaultOutputOptions.format
  if (!isOutputFormat(format)) {
    throw new RenderError(`Unsupported output format "${format}". Use one of: table, json, yaml`)
  }
  return {
    ...defaultOutputOptions,
    format,
    quiet: options.quiet === true,
    noHeaders: options.headers === false, // Commander uses --no-headers -> headers: false
    noColor: options.color === false, // Commander uses --no-color -> color: false
  }
}

/** Map global flags onto configuration overrides */
export function extractConfigOverrides(options: CommandOptions): CliConfigOverrides {
  const overrides: CliConfigOverrides = {}
  const endpoint = optionalString(options.endpoint)
  if (endpoint !== undefined) overrides.endpoint = endpoint
  if (options.strictFields === true) overrides.strictFieldVersionCheck = true
  const output = optionalString(options.output)
  if (output !== undefined && isOutputFormat(output)) overrides.output = output
  return overrides
}

/**
 * Write a command's output: rows to stdout as they are rendered, then the
 * warnings to stderr. Warnings are written even when the stream fails midway.
 */
export async function writeCommandOutput(output: CommandOutput, options: OutputOptions, io: CommandIO): Promise<void> {
  try {
    if (output.type === 'single') {
      io.stdout.write(renderDetail(output.row, options))
      return
    }
    const chunks = render(output.rows, output.fieldSet, options, { summary: () => output.summary() })
    for await (const chunk of chunks) {
      io.stdout.write(chunk)
    }
  } finally {
    const warnings = renderWarnings(output.warnings.list(), options)
    if (warnings) {
      io.stderr.write(warnings + '\n')
    }
  }
}

/**
 * Render an error to stderr and return the exit code it maps to. Warnings the
 * failed query had collected are written first.
 */
export function reportCommandError(error: unknown, options: Partial<OutputOptions>, io: CommandIO): number {
  const warnings = isComputectlError(error) ? renderWarnings(error.warnings, options) : ''
  if (warnings) {
    io.stderr.write(warnings + '\n')
  }
  io.stderr.write(renderError(toCommandError(error), options) + '\n')
  return error instanceof CancelledError ? EXIT_INTERRUPTED : EXIT_FAILURE
}

/**
 * Wrap a command handler to automatically render output.
 *
 * The wrapper will:
 * 1. Resolve configuration from config.json, the environment and global flags
 * 2. Call the handler with a context (config, logger, abort signal, connect)
 * 3. Stream the result to stdout in the selected format
 * 4. Render warnings and errors to stderr and set the exit code
 *
 * @example
 * ```typescript
 * program
 *   .command('ls')
 *   .action(withOutput(runtime, async (context, _args, options) => {
 *     const client = await context.connect()
 *     return listOutput(client.listQuery('job', { signal: context.signal }))
 *   }))
 * ```
 */
export function withOutput(
  runtime: CliRuntime,
  handler: CommandHandler
): (this: Command, ...args: unknown[]) => Promise<void> {
  return async function (this: Command, ...args: unknown[]) {
    const options: CommandOptions = this.optsWithGlobals()
    const positional = args.slice(0, this.registeredArguments.length).filter((arg): arg is string => typeof arg === 'string')
    let outputOptions: Partial<OutputOptions> = { noColor: options.color === false }

    const controller = new AbortController()
    const unsubscribe = runtime.onInterrupt(() => controller.abort())

    try {
      const config = loadConfig({ env: runtime.env, overrides: extractConfigOverrides(options) })
      outputOptions = extractOutputOptions(options, config)
      const logger = runtime.createLogger(config)
      const context: CommandContext = {
        config,
        logger,
        signal: controller.signal,
        catalog: runtime.catalog,
        connect: () => runtime.connect({ config, logger, signal: controller.signal }),
      }

      const output = await handler(context, positional, options)
      await writeCommandOutput(output, { ...defaultOutputOptions, ...outputOptions }, runtime)
    } catch (error) {
      runtime.setExitCode(reportCommandError(error, outputOptions, runtime))
    } finally {
      unsubscribe()
    }
  }
}

/**
 * Helper to create output options from partial input.
 * Useful for testing or manual rendering.
 */
export function createOutputOptions(partial: Partial<OutputOptions> = {}): OutputOptions {
  return { ...defaultOutputOptions, ...partial }
}
