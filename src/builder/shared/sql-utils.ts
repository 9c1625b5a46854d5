import type { SqlDialect } from '../../sql-builder-dialect'
import { needsQuoting } from './validators/sql-validators'
import { isEmptyString } from './validators/type-guards'
import type { Model } from '../../types'
import { getColumnMap, getQuotedColumn } from './model-field-cache'
import { SQL_SEPARATORS } from './constants'

const COL_EXPR_CACHE = new WeakMap<Model, Map<string, string>>()

function containsControlChars(s: string): boolean {
  for (let i = 0; i < s.length; i++) {
    const code = s.charCodeAt(i)
    if ((code >= 0 && code <= 31) || code === 127) {
      return true
    }
  }
  return false
}

function quoteRawIdent(id: string): string {
  return `"${id.replace(/"/g, '""')}"`
}

export function quote(id: string): string {
  if (isEmptyString(id)) {
    throw new Error('quote: identifier is required and cannot be empty')
  }

  if (containsControlChars(id)) {
    throw new Error(
      `quote: identifier contains invalid characters: ${JSON.stringify(id)}`,
    )
  }

  if (needsQuoting(id)) {
    return quoteRawIdent(id)
  }

  return id
}

function getOrCreateCache<K extends object, V>(
  weakMap: WeakMap<K, Map<string, V>>,
  key: K,
): Map<string, V> {
  let cache = weakMap.get(key)
  if (!cache) {
    cache = new Map()
    weakMap.set(key, cache)
  }
  return cache
}

export function col(alias: string, field: string, model?: Model): string {
  if (!model) return `${alias}.${quote(field)}`

  const cache = getOrCreateCache(COL_EXPR_CACHE, model)
  const cacheKey = `${alias}.${field}`

  let cached = cache.get(cacheKey)
  if (cached) return cached

  const quotedCol = getQuotedColumn(model, field) || quote(field)
  cached = `${alias}.${quotedCol}`
  cache.set(cacheKey, cached)
  return cached
}

/**
 * Column reference that comes back under the Prisma field name, so rows
 * read the same whatever `@map` says.
 */
export function colWithAlias(
  alias: string,
  field: string,
  model: Model,
): string {
  if (isEmptyString(alias)) {
    throw new Error('colWithAlias: alias is required and cannot be empty')
  }

  const columnName = getColumnMap(model).get(field) || field
  const columnRef = col(alias, field, model)

  return columnName !== field ? `${columnRef} AS ${quote(field)}` : columnRef
}

export function buildTableReference(
  schemaName: string,
  tableName: string,
  dialect: SqlDialect,
): string {
  if (isEmptyString(tableName)) {
    throw new Error(
      'buildTableReference: tableName is required and cannot be empty',
    )
  }

  if (containsControlChars(tableName)) {
    throw new Error(
      'buildTableReference: tableName contains invalid characters',
    )
  }

  if (dialect === 'sqlite') {
    return quote(tableName)
  }

  if (isEmptyString(schemaName)) {
    throw new Error(
      'buildTableReference: schemaName is required and cannot be empty',
    )
  }

  if (containsControlChars(schemaName)) {
    throw new Error(
      'buildTableReference: schemaName contains invalid characters',
    )
  }

  const safeSchema = schemaName.replace(/"/g, '""')
  const safeTable = tableName.replace(/"/g, '""')
  return `"${safeSchema}"."${safeTable}"`
}

export function andAll(conditions: readonly string[]): string {
  const parts = conditions.filter((c) => c.length > 0)
  if (parts.length === 0) return ''
  if (parts.length === 1) return parts[0]
  return parts.map((c) => `(${c})`).join(SQL_SEPARATORS.CONDITION_AND)
}
