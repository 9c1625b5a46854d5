import { describe, it, expect } from 'vitest'
import { FilterChain } from '../../src/filter-chain'
import {
  createDescriptor,
  descriptorKey,
  descriptorsEqual,
} from '../../src/descriptor'
import { createSchema } from '../../src/schema'
import { MODELS, THROUGH } from '../fixtures/schema'

describe('AggregationDescriptor', () => {
  const schema = createSchema({ models: MODELS, through: THROUGH })
  const user = schema.getModel('User')
  const where = (input: Record<string, unknown>) =>
    FilterChain.EMPTY.append('where', [input])

  it('should build a canonical key', () => {
    const d = createDescriptor(user, 'posts', where({ b: 1, a: 2 }), 'count')
    expect(d.relationPath).toBe('User.posts')
    expect(descriptorKey(d)).toBe(
      '["User.posts",[["where",[{"a":2,"b":1}]]],"count","*"]',
    )
  })

  it('should ignore object key order', () => {
    const a = createDescriptor(user, 'posts', where({ b: 1, a: 2 }), 'count')
    const b = createDescriptor(user, 'posts', where({ a: 2, b: 1 }), 'count')
    expect(descriptorsEqual(a, b)).toBe(true)
  })

  it('should be sensitive to chain order', () => {
    const first = FilterChain.EMPTY.append('where', [{ title: 'x' }]).append(
      'take',
      [2],
    )
    const second = FilterChain.EMPTY.append('take', [2]).append('where', [
      { title: 'x' },
    ])
    expect(
      descriptorsEqual(
        createDescriptor(user, 'posts', first, 'count'),
        createDescriptor(user, 'posts', second, 'count'),
      ),
    ).toBe(false)
  })

  it('should distinguish functions and columns', () => {
    const chain = FilterChain.EMPTY
    const sum = createDescriptor(user, 'posts', chain, 'sum', 'score')
    expect(descriptorsEqual(sum, createDescriptor(user, 'posts', chain, 'max', 'score'))).toBe(false)
    expect(descriptorsEqual(sum, createDescriptor(user, 'posts', chain, 'sum', 'id'))).toBe(false)
    expect(descriptorsEqual(sum, createDescriptor(user, 'comments', chain, 'sum', 'score'))).toBe(false)
  })

  it('should encode bigint and Date values apart from strings', () => {
    const big = createDescriptor(user, 'posts', where({ id: 1n }), 'count')
    const str = createDescriptor(user, 'posts', where({ id: '1' }), 'count')
    expect(descriptorsEqual(big, str)).toBe(false)
    expect(descriptorKey(big)).toContain('"__bigint__1"')

    const iso = '2024-01-01T00:00:00.000Z'
    const date = createDescriptor(user, 'posts', where({ at: new Date(iso) }), 'count')
    const text = createDescriptor(user, 'posts', where({ at: iso }), 'count')
    expect(descriptorsEqual(date, text)).toBe(false)
  })

  it('should keep non-finite numbers apart', () => {
    const low = createDescriptor(user, 'posts', where({ score: { gt: -Infinity } }), 'count')
    const high = createDescriptor(user, 'posts', where({ score: { gt: Infinity } }), 'count')
    const nan = createDescriptor(user, 'posts', where({ score: { gt: NaN } }), 'count')
    const none = createDescriptor(user, 'posts', where({ score: { gt: null } }), 'count')
    expect(descriptorsEqual(low, high)).toBe(false)
    expect(descriptorsEqual(high, nan)).toBe(false)
    expect(descriptorsEqual(nan, none)).toBe(false)
    expect(descriptorKey(low)).toBe(
      '["User.posts",[["where",[{"score":{"gt":"__number__-Infinity"}}]]],"count","*"]',
    )
  })

  it('should ignore blocks', () => {
    const a = FilterChain.EMPTY.append('filter', [], () => true)
    const b = FilterChain.EMPTY.append('filter', [], () => false)
    expect(
      descriptorsEqual(
        createDescriptor(user, 'posts', a, 'count'),
        createDescriptor(user, 'posts', b, 'count'),
      ),
    ).toBe(true)
  })

  it('should refuse functions inside arguments', () => {
    const d = createDescriptor(user, 'posts', where({ title: () => 'x' }), 'count')
    expect(() => descriptorKey(d)).toThrow(
      /Cannot build an aggregation key from a function/,
    )
  })
})
