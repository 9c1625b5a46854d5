import { describe, it, expect, vi } from 'vitest'
import { ResultCache, lookupAggregate } from '../../src/result-cache'
import { createDescriptor } from '../../src/descriptor'
import { FilterChain } from '../../src/filter-chain'
import { createSchema } from '../../src/schema'
import type { ResultMapping } from '../../src/types'
import { MODELS, THROUGH } from '../fixtures/schema'

function mapping(entries: [string, number][]): ResultMapping {
  return { fn: 'count', parentKeyField: 'id', values: new Map(entries) }
}

describe('ResultCache', () => {
  const schema = createSchema({ models: MODELS, through: THROUGH })
  const user = schema.getModel('User')
  const count = createDescriptor(user, 'posts', FilterChain.EMPTY, 'count')
  const sum = createDescriptor(user, 'posts', FilterChain.EMPTY, 'sum', 'score')

  it('should compute once for concurrent readers', async () => {
    const cache = new ResultCache()
    const compute = vi.fn(async () => mapping([['1', 3]]))

    const [a, b] = await Promise.all([
      cache.getOrCompute(count, compute),
      cache.getOrCompute(count, compute),
    ])

    expect(a).toBe(b)
    expect(compute).toHaveBeenCalledTimes(1)
    expect(cache.stats).toEqual({ hits: 1, misses: 1, executions: 1, size: 1 })
  })

  it('should keep descriptors independent', async () => {
    const cache = new ResultCache()
    await cache.getOrCompute(count, async () => mapping([['1', 3]]))
    await cache.getOrCompute(sum, async () => mapping([['1', 9]]))

    expect(cache.stats.executions).toBe(2)
    expect(cache.has(count)).toBe(true)
    expect(cache.has(sum)).toBe(true)
  })

  it('should drop a rejected entry so the next read recomputes', async () => {
    const cache = new ResultCache()
    await expect(
      cache.getOrCompute(count, async () => {
        throw new Error('boom')
      }),
    ).rejects.toThrow('boom')

    expect(cache.has(count)).toBe(false)

    const result = await cache.getOrCompute(count, async () => mapping([['1', 2]]))
    expect(result.values.get('1')).toBe(2)
    expect(cache.stats.executions).toBe(2)
  })

  it('should turn a synchronous throw into a rejection', async () => {
    const cache = new ResultCache()
    const promise = cache.getOrCompute(count, () => {
      throw new Error('sync')
    })
    await expect(promise).rejects.toThrow('sync')
  })

  it('should not call compute before the microtask runs', () => {
    const cache = new ResultCache()
    const compute = vi.fn(async () => mapping([]))
    const pending = cache.getOrCompute(count, compute)

    expect(compute).not.toHaveBeenCalled()
    return pending
  })
})

describe('lookupAggregate', () => {
  it('should return stored values by normalized key', () => {
    expect(lookupAggregate(mapping([['1', 3]]), 'count', 1)).toBe(3)
    expect(lookupAggregate(mapping([['1', 3]]), 'count', 1n)).toBe(3)
  })

  it('should fall back to absence values', () => {
    const empty = mapping([])
    expect(lookupAggregate(empty, 'count', 1)).toBe(0)
    expect(lookupAggregate(empty, 'sum', 1)).toBe(0)
    expect(lookupAggregate(empty, 'avg', 1)).toBeNull()
    expect(lookupAggregate(empty, 'max', 1)).toBeNull()
    expect(lookupAggregate(empty, 'min', 1)).toBeNull()
    expect(lookupAggregate(empty, 'exists', 1)).toBe(false)
  })

  it('should report exists for any present key', () => {
    expect(lookupAggregate(mapping([['4', 1]]), 'exists', 4)).toBe(true)
  })
})
