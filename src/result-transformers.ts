import type { AggregateFunction, AggregateValue, Row } from './types'
import { RESULT_COLUMNS, REGEX_CACHE } from './builder/shared/constants'
import { isScalarValue } from './builder/shared/validators/type-guards'
import { toLookupKey } from './utils/normalize-value'

function parseAggregateValue(value: unknown): unknown {
  if (typeof value === 'string' && REGEX_CACHE.NUMERIC_STRING.test(value)) {
    return parseFloat(value)
  }
  if (typeof value === 'bigint') return Number(value)
  return value
}

function toScalar(value: unknown): AggregateValue {
  if (value === null || value === undefined) return null
  if (isScalarValue(value)) return value
  return String(value)
}

function transformCount(value: unknown): AggregateValue {
  const parsed = parseAggregateValue(value)
  return typeof parsed === 'number' ? parsed : Number(parsed ?? 0)
}

function transformSum(value: unknown): AggregateValue {
  const parsed = parseAggregateValue(value)
  return parsed === null || parsed === undefined ? 0 : toScalar(parsed)
}

function transformNumeric(value: unknown): AggregateValue {
  return toScalar(parseAggregateValue(value))
}

export const RESULT_TRANSFORMERS: Record<
  AggregateFunction,
  (value: unknown) => AggregateValue
> = {
  count: transformCount,
  sum: transformSum,
  avg: transformNumeric,
  max: toScalar,
  min: toScalar,
  exists: () => true,
}

/** Value reported for a parent that has no rows in the result. */
export const ABSENT_VALUES: Record<AggregateFunction, AggregateValue> = {
  count: 0,
  sum: 0,
  avg: null,
  max: null,
  min: null,
  exists: false,
}

export function transformGroupedRows(
  fn: AggregateFunction,
  rows: readonly Row[],
  numericColumn = false,
): Map<string, AggregateValue> {
  // int8 and numeric columns arrive as strings from the postgres driver.
  const transform =
    numericColumn && (fn === 'max' || fn === 'min')
      ? transformNumeric
      : RESULT_TRANSFORMERS[fn]
  const values = new Map<string, AggregateValue>()
  for (const row of rows) {
    values.set(
      toLookupKey(row[RESULT_COLUMNS.KEY]),
      transform(row[RESULT_COLUMNS.VALUE]),
    )
  }
  return values
}
