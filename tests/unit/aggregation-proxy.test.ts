import { describe, it, expect, vi } from 'vitest'
import {
  AggregationProxy,
  classifyCall,
} from '../../src/aggregation-proxy'
import { createLoader } from '../../src/loader'
import { DeferredValue } from '../../src/deferred-value'
import { createSchema } from '../../src/schema'
import type { QueryRunner, Row } from '../../src/types'
import { MODELS, THROUGH } from '../fixtures/schema'

const schema = createSchema({ models: MODELS, through: THROUGH })

function setup(postRows: Row[] = []) {
  const runQuery = vi.fn<QueryRunner>(async (_query, meta) =>
    meta.method === 'findMany' ? postRows : [{ k: '1', v: '3' }],
  )
  const records = [{ id: 1, name: 'a' }, { id: 2, name: 'b' }]
  const loader = createLoader(
    { model: 'User', records },
    { schema, dialect: 'postgres', schemaName: 'public', runQuery },
  )
  return { runQuery, loader, records }
}

describe('classifyCall', () => {
  it('should classify aggregate calls', () => {
    expect(classifyCall('count', [])).toEqual({ kind: 'aggregate', fn: 'count', column: '*' })
    expect(classifyCall('sum', ['score'])).toEqual({ kind: 'aggregate', fn: 'sum', column: 'score' })
  })

  it('should route row functions to the fallback', () => {
    const compute = (row: Row) => row.id
    expect(classifyCall('max', [compute])).toEqual({ kind: 'fallback', fn: 'max', compute })
  })

  it('should recognize deferred names', () => {
    expect(classifyCall('asyncCount', [])).toEqual({ kind: 'deferred', fn: 'count', column: '*' })
    expect(classifyCall('asyncSum', ['score'])).toEqual({ kind: 'deferred', fn: 'sum', column: 'score' })
  })

  it('should treat anything else as a chain operation', () => {
    expect(classifyCall('where', [{ title: 'x' }])).toEqual({
      kind: 'chain',
      operation: 'where',
      args: [{ title: 'x' }],
    })
    expect(classifyCall('asyncFoo', [])).toEqual({ kind: 'chain', operation: 'asyncFoo', args: [] })

    const call = classifyCall('filter', [(row: Row) => row.id])
    expect(call.kind).toBe('chain')
    if (call.kind === 'chain') {
      expect(call.args).toEqual([])
      expect(call.block?.({ id: 0 })).toBe(false)
      expect(call.block?.({ id: 2 })).toBe(true)
    }
  })

  it('should reject non-column arguments', () => {
    expect(() => classifyCall('sum', [42])).toThrow(/takes a column name or a row function/)
  })
})

describe('AggregationProxy', () => {
  it('should not query when built or chained', () => {
    const { runQuery, loader, records } = setup()
    const proxy = loader.proxyFor(records[0], 'posts')
    const chained = proxy.where({ title: 'x' }).orderBy({ score: 'desc' }).take(2)

    expect(chained).toBeInstanceOf(AggregationProxy)
    expect(chained).not.toBe(proxy)
    expect(proxy.filterChain.length).toBe(0)
    expect(chained.filterChain.length).toBe(3)
    expect(runQuery).not.toHaveBeenCalled()
  })

  it('should reject unknown relations up front', () => {
    const { loader, records } = setup()
    expect(() => loader.proxyFor(records[0], 'nope')).toThrow(/Unknown relation 'nope'/)
  })

  it('should batch aggregates across the loader records', async () => {
    const { runQuery, loader, records } = setup()

    const [first, second] = await Promise.all(
      records.map((r) => loader.proxyFor(r, 'posts').count()),
    )

    expect(first).toBe(3)
    expect(second).toBe(0)
    expect(runQuery).toHaveBeenCalledTimes(1)
    expect(loader.cacheStats).toEqual({ hits: 1, misses: 1, executions: 1, size: 1 })
  })

  it('should dispatch calls by name', async () => {
    const { loader, records } = setup()
    const proxy = loader.proxyFor(records[0], 'posts')

    expect(await proxy.call('count')).toBe(3)
    expect(proxy.call('asyncCount')).toBeInstanceOf(DeferredValue)
    expect(proxy.call('where', { title: 'x' })).toBeInstanceOf(AggregationProxy)
  })

  it('should defer until value() is read', async () => {
    const { runQuery, loader, records } = setup()
    const deferred = loader.proxyFor(records[0], 'posts').asyncCount()

    expect(runQuery).not.toHaveBeenCalled()
    expect(await deferred.value()).toBe(3)
    expect(runQuery).toHaveBeenCalledTimes(1)
  })

  it('should reject an unknown chain operation when read', async () => {
    const { runQuery, loader, records } = setup()
    const proxy = loader.proxyFor(records[0], 'posts').chain('limit', 2)

    await expect(proxy.count()).rejects.toMatchObject({ code: 'INVALID_OPERATOR' })
    expect(runQuery).not.toHaveBeenCalled()
  })

  it('should refuse aggregate names as chain operations', () => {
    const { loader, records } = setup()
    expect(() => loader.proxyFor(records[0], 'posts').chain('count')).toThrow(
      /is an aggregate, not a chain operation/,
    )
  })

  it('should enumerate related rows', async () => {
    const rows = [{ id: 10, score: 4 }, { id: 11, score: 1 }]
    const { loader, records } = setup(rows)
    const proxy = loader.proxyFor(records[0], 'posts')

    expect(await proxy.findMany()).toEqual(rows)

    const seen: Row[] = []
    for await (const row of proxy.filter((r) => r.score === 4)) {
      seen.push(row)
    }
    expect(seen).toEqual([{ id: 10, score: 4 }])
  })

  it('should compute row functions in memory', async () => {
    const rows = [{ id: 10, score: 4 }, { id: 11, score: 1 }]
    const { loader, records } = setup(rows)
    const proxy = loader.proxyFor(records[0], 'posts')

    expect(await proxy.sum((row) => Number(row.score) * 2)).toBe(10)
    expect(loader.cacheStats.executions).toBe(0)
  })
})
