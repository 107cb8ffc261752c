import { describe, expect, it } from 'vitest'
import { createRootLogger, createSilentLogger } from './logger.js'

describe('logger', () => {
  it('silent logger drops every level', () => {
    const logger = createSilentLogger()
    expect(logger.level).toBe('silent')
    expect(logger.isLevelEnabled('error')).toBe(false)
  })

  it('root logger takes its level from the config', () => {
    const logger = createRootLogger({ level: 'debug', format: 'json' })
    expect(logger.level).toBe('debug')
    expect(logger.isLevelEnabled('debug')).toBe(true)
    expect(logger.isLevelEnabled('trace')).toBe(false)
  })
})
