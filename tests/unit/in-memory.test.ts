import { describe, it, expect } from 'vitest'
import { computeInMemory } from '../../src/in-memory'

const rows = [
  { id: 1, score: 4, title: 'b' },
  { id: 2, score: null, title: 'c' },
  { id: 3, score: 2, title: 'a' },
]

describe('computeInMemory', () => {
  it('should count and test rows without a column', () => {
    expect(computeInMemory('count', rows)).toBe(3)
    expect(computeInMemory('exists', rows)).toBe(true)
    expect(computeInMemory('count', [])).toBe(0)
    expect(computeInMemory('exists', [])).toBe(false)
  })

  it('should skip nulls in numeric aggregates', () => {
    expect(computeInMemory('sum', rows, 'score')).toBe(6)
    expect(computeInMemory('avg', rows, 'score')).toBe(3)
    expect(computeInMemory('count', rows, 'score')).toBe(2)
  })

  it('should give absence values on empty input', () => {
    expect(computeInMemory('sum', [], 'score')).toBe(0)
    expect(computeInMemory('avg', [], 'score')).toBeNull()
    expect(computeInMemory('max', [], 'score')).toBeNull()
    expect(computeInMemory('min', [], 'score')).toBeNull()
  })

  it('should compare strings and numbers', () => {
    expect(computeInMemory('max', rows, 'title')).toBe('c')
    expect(computeInMemory('min', rows, 'title')).toBe('a')
    expect(computeInMemory('max', rows, 'score')).toBe(4)
    expect(computeInMemory('min', rows, 'score')).toBe(2)
  })

  it('should accept a row function', () => {
    expect(
      computeInMemory('count', rows, (row) => Number(row.id) > 1),
    ).toBe(2)
    expect(computeInMemory('sum', rows, (row) => Number(row.id) * 10)).toBe(60)
  })

  it('should count false column values like the grouped SQL', () => {
    const drafts = [{ published: false }, { published: false }, { published: null }]
    expect(computeInMemory('count', drafts, 'published')).toBe(2)
    expect(computeInMemory('exists', drafts, 'published')).toBe(true)
    expect(computeInMemory('exists', [{ published: null }], 'published')).toBe(false)
  })

  it('should leave out rows a row function answers false for', () => {
    const drafts = [{ published: false }, { published: true }]
    expect(computeInMemory('count', drafts, (row) => row.published)).toBe(1)
    expect(computeInMemory('exists', [drafts[0]], (row) => row.published)).toBe(false)
  })

  it('should require a column for numeric functions', () => {
    expect(() => computeInMemory('sum', rows)).toThrow('sum() needs a column')
  })

  it('should reject non-numeric sums', () => {
    expect(() => computeInMemory('sum', rows, 'title')).toThrow(
      /Cannot aggregate non-numeric value/,
    )
  })
})
