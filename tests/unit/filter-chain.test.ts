import { describe, it, expect } from 'vitest'
import { FilterChain } from '../../src/filter-chain'
import { ScopeBuilder } from '../../src/builder/scope'
import { createSchema } from '../../src/schema'
import { SqlBuilderError } from '../../src/builder/shared/errors'
import { MODELS, THROUGH } from '../fixtures/schema'
import { captureError } from '../helpers/errors'

describe('FilterChain', () => {
  const schema = createSchema({ models: MODELS, through: THROUGH })
  const post = schema.getModel('Post')
  const base = () => ScopeBuilder.for(schema, post)

  it('should return a new chain on append without touching the receiver', () => {
    const a = FilterChain.EMPTY.append('where', [{ title: 'x' }])
    const b = a.append('take', [2])

    expect(FilterChain.EMPTY.length).toBe(0)
    expect(a.length).toBe(1)
    expect(b.length).toBe(2)
    expect(a.identity()).toEqual([{ operation: 'where', args: [{ title: 'x' }] }])
  })

  it('should freeze recorded arguments', () => {
    const chain = FilterChain.EMPTY.append('take', [3])
    expect(Object.isFrozen(chain.entries[0].args)).toBe(true)
    expect(Object.isFrozen(chain.entries)).toBe(true)
  })

  it('should leave blocks out of the identity', () => {
    const chain = FilterChain.EMPTY.append('filter', [], () => true)

    expect(chain.hasBlocks).toBe(true)
    expect(chain.identity()).toEqual([{ operation: 'filter', args: [] }])
    expect(FilterChain.EMPTY.append('where', [{}]).hasBlocks).toBe(false)
  })

  it('should replay operations in order onto a scope', () => {
    const state = FilterChain.EMPTY.append('where', [{ title: 'Even' }])
      .append('orderBy', [{ score: 'desc' }])
      .append('skip', [1])
      .append('take', [2])
      .materialize(base())

    expect(state.where).toEqual([{ title: 'Even' }])
    expect(state.orderBy).toEqual([{ field: 'score', direction: 'desc' }])
    expect(state.skip).toBe(1)
    expect(state.take).toBe(2)
    expect(state.predicates).toEqual([])
  })

  it('should expand named scopes with their arguments', () => {
    const state = FilterChain.EMPTY.append('scope', ['minScore', 4])
      .append('scope', ['published'])
      .materialize(base())

    expect(state.where).toEqual([{ score: { gte: 4 } }, { published: true }])
  })

  it('should collect filter blocks as predicates', () => {
    const predicate = () => false
    const state = FilterChain.EMPTY.append('filter', [], predicate).materialize(
      base(),
    )
    expect(state.predicates).toEqual([predicate])
  })

  it('should record joined relations and check they exist', () => {
    const state = FilterChain.EMPTY.append('joins', ['comments'])
      .append('joins', ['user', 'postCategories'])
      .materialize(base())
    expect(state.joins).toEqual(['comments', 'user', 'postCategories'])

    const error = captureError(() =>
      FilterChain.EMPTY.append('joins', ['tags']).materialize(base()),
    )
    expect(error).toMatchObject({ code: 'RELATION_ERROR' })
    expect(() =>
      FilterChain.EMPTY.append('joins', []).materialize(base()),
    ).toThrow('joins expects at least one relation name')
  })

  it('should reject operations the scope does not know', () => {
    const error = captureError(() =>
      FilterChain.EMPTY.append('limit', [1]).materialize(base()),
    )
    expect(error).toBeInstanceOf(SqlBuilderError)
    expect(error).toMatchObject({ code: 'INVALID_OPERATOR' })
  })

  it('should reject invalid take values and unknown scopes', () => {
    expect(() =>
      FilterChain.EMPTY.append('take', [-1]).materialize(base()),
    ).toThrow(/non-negative integer/)
    expect(() =>
      FilterChain.EMPTY.append('scope', ['missing']).materialize(base()),
    ).toThrow(/Unknown scope 'missing'/)
  })
})
