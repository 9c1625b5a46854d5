import type { Model } from '../../types'
import type { OrderByTerm } from '../scope'
import { col } from './sql-utils'
import { SQL_SEPARATORS } from './constants'
import { assertScalarField } from './validators/field-assertions'

/**
 * Appends the primary key (ascending) unless already ordered on, so windows
 * and pages are stable across runs.
 */
export function ensureDeterministicOrderBy(
  terms: readonly OrderByTerm[],
  pk: readonly string[],
): OrderByTerm[] {
  const seen = new Set(terms.map((t) => t.field))
  const tiebreakers = pk
    .filter((f) => !seen.has(f))
    .map((field): OrderByTerm => ({ field, direction: 'asc' }))
  return [...terms, ...tiebreakers]
}

export function renderOrderBy(
  terms: readonly OrderByTerm[],
  alias: string,
  model: Model,
): string {
  return terms
    .map((t) => {
      assertScalarField(model, t.field, 'orderBy')
      return `${col(alias, t.field, model)} ${t.direction.toUpperCase()}`
    })
    .join(SQL_SEPARATORS.ORDER_BY)
}
