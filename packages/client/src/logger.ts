import pino from 'pino'

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent'
export type LogFormat = 'pretty' | 'json'

export interface ResolvedLogConfig {
  level: LogLevel
  format: LogFormat
}

const STDERR_FD = 2

/**
 * Root logger for a CLI run. Always writes to stderr so stdout carries only
 * command output.
 */
export function createRootLogger(config: ResolvedLogConfig): pino.Logger {
  if (config.format === 'pretty') {
    return pino({
      level: config.level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          singleLine: true,
          ignore: 'pid,hostname',
          destination: STDERR_FD,
        },
      },
    })
  }
  return pino({ level: config.level }, pino.destination(STDERR_FD))
}

/** Logger that drops everything; the default for library callers */
export function createSilentLogger(): pino.Logger {
  return pino({ level: 'silent' })
}
