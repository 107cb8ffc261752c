import { describe, expect, it } from 'vitest'
import { MIN_API_VERSION, evaluateCompatibility, supportsVersion } from './compatibility.js'

describe('evaluateCompatibility', () => {
  it('is compatible when the API version meets the minimum', () => {
    const compat = evaluateCompatibility({ serverVersion: '23.09.1', apiVersion: 'v7.20230615' })

    expect(compat.state).toBe('compatible')
    expect(compat.warning).toBeUndefined()
    expect(compat.minApiVersion).toBe(MIN_API_VERSION)
  })

  it('degrades with a session warning when the API is older than the minimum', () => {
    const compat = evaluateCompatibility({ serverVersion: '19.03', apiVersion: 'v4.20190615' })

    expect(compat.state).toBe('degraded')
    expect(compat.warning).toEqual({
      code: 'SERVER_VERSION_DEGRADED',
      message: 'Server API v4.20190615 is older than the minimum supported v5.20191215; some requests may fail.',
    })
  })

  it('assumes compatible when the API version is missing or unparseable', () => {
    expect(evaluateCompatibility({}).state).toBe('compatible')
    expect(evaluateCompatibility({ apiVersion: 'unknown' }).state).toBe('compatible')
  })

  it('honors a custom minimum', () => {
    const compat = evaluateCompatibility({ apiVersion: 'v6.20220615', minApiVersion: 'v7' })
    expect(compat.state).toBe('degraded')
  })

  it('returns a frozen context', () => {
    const compat = evaluateCompatibility({ apiVersion: 'v4.20190615' })
    expect(Object.isFrozen(compat)).toBe(true)
    expect(Object.isFrozen(compat.warning)).toBe(true)
  })
})

describe('supportsVersion', () => {
  it('compares the server version against the field minimum', () => {
    const compat = evaluateCompatibility({ serverVersion: '20.09.3' })

    expect(supportsVersion(compat, '20.03')).toBe(true)
    expect(supportsVersion(compat, '20.09')).toBe(true)
    expect(supportsVersion(compat, '21.03')).toBe(false)
  })

  it('never blocks a field when the server version is unknown', () => {
    expect(supportsVersion(evaluateCompatibility({}), '99.0')).toBe(true)
    expect(supportsVersion(evaluateCompatibility({ serverVersion: 'devel' }), '99.0')).toBe(true)
  })
})
