import { describe, expect, it } from 'vitest'
import { TransportError } from '../errors.js'
import { InMemoryTransport } from './in-memory-transport.js'

const transport = new InMemoryTransport({
  serverInfo: { apiVersion: 'v7.20230615', serverVersion: '23.09.1' },
  collections: {
    '/sessions': {
      idKey: 'session_id',
      records: [
        { session_id: 'a', status: 'RUNNING' },
        { session_id: 'b', status: 'TERMINATED' },
        { session_id: 'c', status: 'RUNNING' },
      ],
    },
  },
})

describe('InMemoryTransport', () => {
  it('applies equality filters before paging', async () => {
    const page = await transport.fetchPage({
      kind: 'job',
      path: '/sessions',
      filters: { status: 'RUNNING' },
      fields: [],
      offset: 0,
      limit: 1,
    })
    expect(page.records).toEqual([{ session_id: 'a', status: 'RUNNING' }])
    expect(page.totalCount).toBe(2)
    expect(page.hasMore).toBe(true)
  })

  it('finds single records by id key', async () => {
    const request = { kind: 'job', path: '/sessions', fields: [] }
    expect(await transport.fetchOne({ ...request, id: 'b' })).toEqual({ session_id: 'b', status: 'TERMINATED' })
    expect(await transport.fetchOne({ ...request, id: 'z' })).toBeNull()
  })

  it('fails for unknown collections', async () => {
    await expect(
      transport.fetchPage({ kind: 'x', path: '/nowhere', filters: {}, fields: [], offset: 0, limit: 1 })
    ).rejects.toThrow(new TransportError('GET /nowhere failed: 404 Not Found'))
  })
})
