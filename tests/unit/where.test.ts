import { describe, it, expect } from 'vitest'
import { buildWhereClause } from '../../src/builder/where'
import { createSchema } from '../../src/schema'
import { SqlBuilderError } from '../../src/builder/shared/errors'
import { MODELS, THROUGH } from '../fixtures/schema'
import { buildContext } from '../helpers/context'
import { captureError } from '../helpers/errors'

describe('buildWhereClause', () => {
  const schema = createSchema({ models: MODELS, through: THROUGH })
  const ctx = () => buildContext(schema, 'Post', 'p')

  it('should compile equality shorthand', () => {
    const c = ctx()
    expect(buildWhereClause({ title: 'Hello' }, c)).toBe('p.title = $1')
    expect(c.params.snapshot()).toEqual(['Hello'])
  })

  it('should join several operators with AND', () => {
    const c = ctx()
    expect(buildWhereClause({ score: { gte: 1, lt: 5 } }, c)).toBe(
      '(p.score >= $1) AND (p.score < $2)',
    )
    expect(c.params.snapshot()).toEqual([1, 5])
  })

  it('should compile OR and NOT', () => {
    expect(
      buildWhereClause({ OR: [{ title: 'a' }, { title: 'b' }] }, ctx()),
    ).toBe('(p.title = $1) OR (p.title = $2)')
    expect(buildWhereClause({ OR: [] }, ctx())).toBe('0=1')
    expect(buildWhereClause({ NOT: { published: true } }, ctx())).toBe(
      'NOT (p.published = $1)',
    )
  })

  it('should escape LIKE patterns', () => {
    const c = ctx()
    expect(buildWhereClause({ title: { contains: '50%_off' } }, c)).toBe(
      "p.title LIKE $1 ESCAPE '\\'",
    )
    expect(c.params.snapshot()).toEqual(['%50\\%\\_off%'])
  })

  it('should compile null checks', () => {
    expect(buildWhereClause({ title: null }, ctx())).toBe('p.title IS NULL')
    expect(buildWhereClause({ title: { not: null } }, ctx())).toBe(
      'p.title IS NOT NULL',
    )
  })

  it('should quote mixed-case columns in lists', () => {
    const c = ctx()
    expect(buildWhereClause({ userId: { in: [1, 2] } }, c)).toBe(
      'p."userId" = ANY($1)',
    )
    expect(c.params.snapshot()).toEqual([[1, 2]])
  })

  it('should skip undefined entries', () => {
    expect(buildWhereClause({ title: undefined }, ctx())).toBe('')
  })

  it('should reject unknown fields and operators', () => {
    const unknownField = captureError(() => buildWhereClause({ nope: 1 }, ctx()))
    expect(unknownField).toBeInstanceOf(SqlBuilderError)
    expect(unknownField).toMatchObject({ code: 'FIELD_NOT_FOUND' })

    const unknownOp = captureError(() =>
      buildWhereClause({ title: { like: 'x' } }, ctx()),
    )
    expect(unknownOp).toMatchObject({ code: 'INVALID_OPERATOR' })
  })

  it('should compile some as a correlated EXISTS', () => {
    const c = ctx()
    expect(
      buildWhereClause({ comments: { some: { likes: { gt: 3 } } } }, c),
    ).toBe(
      'EXISTS (SELECT 1 FROM "public"."Post" AS post_0 INNER JOIN "public"."Comment" AS comment_1 ON comment_1."postId" = post_0.id WHERE (post_0.id = p.id) AND (comment_1.likes > $1))',
    )
    expect(c.params.snapshot()).toEqual([3])
  })

  it('should compile every as NOT EXISTS over the negated filter', () => {
    expect(
      buildWhereClause({ comments: { every: { likes: { gt: 3 } } } }, ctx()),
    ).toBe(
      'NOT EXISTS (SELECT 1 FROM "public"."Post" AS post_0 INNER JOIN "public"."Comment" AS comment_1 ON comment_1."postId" = post_0.id WHERE (post_0.id = p.id) AND (NOT (comment_1.likes > $1)))',
    )
    expect(buildWhereClause({ comments: { every: {} } }, ctx())).toBe('')
  })

  it('should compile none and to-one filters', () => {
    expect(buildWhereClause({ comments: { none: {} } }, ctx())).toMatch(
      /^NOT EXISTS \(SELECT 1 FROM "public"."Post" AS post_0 /,
    )
    expect(buildWhereClause({ user: null }, ctx())).toMatch(/^NOT EXISTS \(/)
    expect(buildWhereClause({ user: { is: { name: 'x' } } }, ctx())).toMatch(
      /^EXISTS \(/,
    )
  })

  it('should render sqlite table names without a schema', () => {
    const c = buildContext(schema, 'Post', 'p', 'sqlite')
    expect(buildWhereClause({ comments: { some: {} } }, c)).toBe(
      'EXISTS (SELECT 1 FROM "Post" AS post_0 INNER JOIN "Comment" AS comment_1 ON comment_1."postId" = post_0.id WHERE post_0.id = p.id)',
    )
  })
})
