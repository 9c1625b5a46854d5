import type {
  AggregateFunction,
  AggregateValue,
  Row,
  RowCompute,
  ScalarValue,
} from './types'
import { ALL_COLUMNS } from './descriptor'
import { createError } from './builder/shared/errors'
import { isScalarValue } from './builder/shared/validators/type-guards'
import { REGEX_CACHE } from './builder/shared/constants'

function toNumber(value: ScalarValue): number {
  if (typeof value === 'number') return value
  if (typeof value === 'bigint') return Number(value)
  if (typeof value === 'string' && REGEX_CACHE.NUMERIC_STRING.test(value)) {
    return parseFloat(value)
  }
  throw createError(
    `Cannot aggregate non-numeric value ${String(value)}`,
    { value },
    'INVALID_VALUE',
  )
}

function compareValues(a: ScalarValue, b: ScalarValue): number {
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime()
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0
  }
  return toNumber(a) - toNumber(b)
}

function extractValues(
  rows: readonly Row[],
  column: string | RowCompute,
): unknown[] {
  if (typeof column === 'function') return rows.map((row) => column(row))
  return rows.map((row) => row[column])
}

function present(values: readonly unknown[]): ScalarValue[] {
  const out: ScalarValue[] = []
  for (const v of values) {
    if (v === null || v === undefined) continue
    if (!isScalarValue(v)) {
      throw createError(
        'Aggregated values must be scalars',
        { value: v },
        'INVALID_VALUE',
      )
    }
    out.push(v)
  }
  return out
}

function pick(
  values: readonly ScalarValue[],
  keep: (order: number) => boolean,
): AggregateValue {
  if (values.length === 0) return null
  return values.reduce((best, v) => (keep(compareValues(v, best)) ? v : best))
}

/**
 * Same semantics as the grouped SQL over rows that were already loaded:
 * nulls are ignored, and an empty set gives the absence value.
 */
export function computeInMemory(
  fn: AggregateFunction,
  rows: readonly Row[],
  column: string | RowCompute = ALL_COLUMNS,
): AggregateValue {
  if (column === ALL_COLUMNS) {
    if (fn === 'count') return rows.length
    if (fn === 'exists') return rows.length > 0
    throw createError(`${fn}() needs a column`, { operator: fn }, 'INVALID_VALUE')
  }

  const raw = extractValues(rows, column)
  // Row functions may answer false to leave a row out; columns keep it.
  const counted =
    typeof column === 'function'
      ? (v: unknown) => v !== null && v !== undefined && v !== false
      : (v: unknown) => v !== null && v !== undefined

  switch (fn) {
    case 'count':
      return raw.filter(counted).length
    case 'exists':
      return raw.some(counted)
    case 'sum':
      return present(raw).reduce<number>((acc, v) => acc + toNumber(v), 0)
    case 'avg': {
      const values = present(raw)
      if (values.length === 0) return null
      return values.reduce<number>((acc, v) => acc + toNumber(v), 0) / values.length
    }
    case 'max':
      return pick(present(raw), (order) => order > 0)
    case 'min':
      return pick(present(raw), (order) => order < 0)
  }
}
