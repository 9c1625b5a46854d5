import type { AggregateFunction, Model } from './types'
import type { ChainIdentityEntry, FilterChain } from './filter-chain'
import { createError } from './builder/shared/errors'

export const ALL_COLUMNS = '*'

export interface AggregationDescriptor {
  readonly relationPath: string
  readonly chain: readonly ChainIdentityEntry[]
  readonly fn: AggregateFunction
  readonly column: string
}

export function createDescriptor(
  model: Model,
  relation: string,
  chain: FilterChain,
  fn: AggregateFunction,
  column: string = ALL_COLUMNS,
): AggregationDescriptor {
  return Object.freeze({
    relationPath: `${model.name}.${relation}`,
    chain: chain.identity(),
    fn,
    column,
  })
}

function canonicalize(value: unknown, path: string): unknown {
  if (typeof value === 'bigint') return `__bigint__${value.toString()}`
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return `__number__${String(value)}`
  }
  if (value instanceof Date) return { __date__: value.toISOString() }
  if (typeof value === 'function') {
    throw createError(
      `Cannot build an aggregation key from a function at ${path}`,
      { value: value.name || '<anonymous>' },
      'INVALID_VALUE',
    )
  }
  if (Array.isArray(value)) {
    return value.map((v, i) => canonicalize(v, `${path}[${i}]`))
  }
  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, canonicalize(v, `${path}.${k}`)]),
    )
  }
  return value
}

/**
 * Stable string form of a descriptor. Chain order is significant; object
 * keys inside arguments are not.
 */
export function descriptorKey(descriptor: AggregationDescriptor): string {
  return JSON.stringify([
    descriptor.relationPath,
    descriptor.chain.map((e, i) => [
      e.operation,
      canonicalize(e.args, `chain[${i}].${e.operation}`),
    ]),
    descriptor.fn,
    descriptor.column,
  ])
}

export function descriptorsEqual(
  a: AggregationDescriptor,
  b: AggregationDescriptor,
): boolean {
  return descriptorKey(a) === descriptorKey(b)
}
