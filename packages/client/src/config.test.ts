import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { DEFAULT_CONFIG, loadConfig, readEnvConfig } from './config.js'
import { ConfigError } from './errors.js'

describe('loadConfig', () => {
  let home: string

  beforeEach(() => {
    home = mkdtempSync(path.join(os.tmpdir(), 'computectl-config-'))
  })

  afterEach(() => {
    rmSync(home, { recursive: true, force: true })
  })

  function writeConfig(config: unknown): void {
    writeFileSync(path.join(home, 'config.json'), JSON.stringify(config))
  }

  it('returns the defaults when nothing is configured', () => {
    expect(loadConfig({ env: { COMPUTECTL_HOME: home } })).toEqual(DEFAULT_CONFIG)
  })

  it('layers config.json, then the environment, then overrides', () => {
    writeConfig({ endpoint: 'http://file.test', pageSize: 50, output: 'yaml', log: { level: 'info' } })

    const config = loadConfig({
      env: { COMPUTECTL_HOME: home, COMPUTECTL_PAGE_SIZE: '75', COMPUTECTL_LOG_FORMAT: 'json' },
      overrides: { endpoint: 'http://flag.test' },
    })

    expect(config).toEqual({
      ...DEFAULT_CONFIG,
      endpoint: 'http://flag.test',
      pageSize: 75,
      output: 'yaml',
      log: { level: 'info', format: 'json' },
    })
  })

  it('rejects unknown keys in config.json', () => {
    writeConfig({ endpoint: 'http://file.test', colour: true })
    expect(() => loadConfig({ env: { COMPUTECTL_HOME: home } })).toThrow(ConfigError)
  })

  it('rejects config.json that is not JSON', () => {
    writeFileSync(path.join(home, 'config.json'), '{ endpoint: ')
    expect(() => loadConfig({ env: { COMPUTECTL_HOME: home } })).toThrow(`Cannot parse ${path.join(home, 'config.json')}`)
  })

  it('validates the merged result', () => {
    expect(() => loadConfig({ env: { COMPUTECTL_HOME: home, COMPUTECTL_PAGE_SIZE: '0' } })).toThrow(
      'Invalid configuration'
    )
    expect(() => loadConfig({ env: { COMPUTECTL_HOME: home, COMPUTECTL_PAGE_SIZE: 'lots' } })).toThrow(
      'COMPUTECTL_PAGE_SIZE must be an integer, got "lots"'
    )
  })

  it('can skip config.json', () => {
    writeConfig({ pageSize: 50 })
    expect(loadConfig({ env: { COMPUTECTL_HOME: home }, ignorePersisted: true }).pageSize).toBe(20)
  })
})

describe('readEnvConfig', () => {
  it('maps COMPUTECTL_* variables', () => {
    expect(
      readEnvConfig({
        COMPUTECTL_ENDPOINT: 'http://env.test',
        COMPUTECTL_MAX_ITEMS: '10',
        COMPUTECTL_STRICT_FIELDS: 'true',
        COMPUTECTL_LOG: 'debug',
      })
    ).toEqual({
      endpoint: 'http://env.test',
      pageSize: undefined,
      maxItems: 10,
      strictFieldVersionCheck: true,
      output: undefined,
      timeoutMs: undefined,
      log: { level: 'debug' },
    })
  })
})
