import { normalizeValue } from './utils/normalize-value'
import {
  EMPTY_WHERE_CLAUSE,
  LIMITS,
  SQL_TEMPLATES,
} from './builder/shared/constants'
import type { ParamStore } from './builder/shared/param-store'
import type { SqlResult } from './types'

export type SqlDialect = 'postgres' | 'sqlite'

function assertNonEmpty(value: string, name: string): void {
  if (!value || value.trim().length === 0) {
    throw new Error(`${name} is required and cannot be empty`)
  }
}

export function inArray(
  column: string,
  value: string,
  dialect: SqlDialect,
): string {
  assertNonEmpty(column, 'inArray column')
  assertNonEmpty(value, 'inArray value')

  if (dialect === 'postgres') {
    return `${column} = ANY(${value})`
  }

  return `${column} IN (SELECT value FROM json_each(${value}))`
}

export function notInArray(
  column: string,
  value: string,
  dialect: SqlDialect,
): string {
  assertNonEmpty(column, 'notInArray column')
  assertNonEmpty(value, 'notInArray value')

  if (dialect === 'postgres') {
    return `${column} <> ALL(${value})`
  }

  return `${column} NOT IN (SELECT value FROM json_each(${value}))`
}

export function prepareArrayParam(
  value: readonly unknown[],
  dialect: SqlDialect,
): unknown {
  if (dialect === 'postgres') {
    return value.map((v) => normalizeValue(v))
  }
  return JSON.stringify(value.map((v) => normalizeSqliteParam(v)))
}

/**
 * `expr IN (...)` for a value list. Short SQLite lists are inlined as
 * placeholders; anything longer goes through one array param.
 */
export function buildInList(
  expr: string,
  values: readonly unknown[],
  params: ParamStore,
  dialect: SqlDialect,
  negate = false,
): string {
  if (values.length === 0) {
    return negate ? '1=1' : EMPTY_WHERE_CLAUSE
  }

  if (values.length > LIMITS.MAX_ARRAY_SIZE && dialect === 'sqlite') {
    throw new Error(
      `IN list too large (${values.length}); max ${LIMITS.MAX_ARRAY_SIZE} for sqlite`,
    )
  }

  if (dialect === 'sqlite' && values.length <= LIMITS.SQLITE_INLINE_IN) {
    const list = values.map((v) => params.add(v)).join(', ')
    return negate ? `${expr} NOT IN (${list})` : `${expr} IN (${list})`
  }

  const placeholder = params.add(prepareArrayParam(values, dialect))
  return negate
    ? notInArray(expr, placeholder, dialect)
    : inArray(expr, placeholder, dialect)
}

export function buildLimitOffset(
  take: number | undefined,
  skip: number | undefined,
  params: ParamStore,
  dialect: SqlDialect,
): string {
  const parts: string[] = []

  if (take !== undefined) {
    parts.push(`${SQL_TEMPLATES.LIMIT} ${params.add(take)}`)
  } else if (skip !== undefined && dialect === 'sqlite') {
    parts.push(`${SQL_TEMPLATES.LIMIT} -1`)
  }

  if (skip !== undefined) {
    parts.push(`${SQL_TEMPLATES.OFFSET} ${params.add(skip)}`)
  }

  return parts.join(' ')
}

function normalizeSqliteParam(value: unknown): unknown {
  if (typeof value === 'boolean') return value ? 1 : 0
  return normalizeValue(value)
}

type ScanMode = 'normal' | 'single' | 'double'

/**
 * Renumbers `$n` placeholders into SQLite's positional `?`, reordering the
 * params to match their textual order. Quoted literals and identifiers are
 * copied through untouched.
 */
export function toSqliteParams(
  sql: string,
  params: readonly unknown[],
): SqlResult {
  const n = sql.length
  let mode: ScanMode = 'normal'
  let out = ''
  const reordered: unknown[] = []
  let i = 0

  while (i < n) {
    const ch = sql.charCodeAt(i)

    if (mode === 'single' || mode === 'double') {
      out += sql[i]
      const closing = mode === 'single' ? 39 : 34
      if (ch === closing) {
        if (i + 1 < n && sql.charCodeAt(i + 1) === closing) {
          out += sql[i + 1]
          i += 2
          continue
        }
        mode = 'normal'
      }
      i++
      continue
    }

    if (ch === 39 || ch === 34) {
      mode = ch === 39 ? 'single' : 'double'
      out += sql[i]
      i++
      continue
    }

    if (ch === 36) {
      let j = i + 1
      let num = 0
      while (j < n && sql.charCodeAt(j) >= 48 && sql.charCodeAt(j) <= 57) {
        num = num * 10 + (sql.charCodeAt(j) - 48)
        j++
      }

      if (j > i + 1) {
        if (num < 1 || num > params.length) {
          throw new Error(`Param $${num} out of bounds (have ${params.length})`)
        }
        out += '?'
        reordered.push(normalizeSqliteParam(params[num - 1]))
        i = j
        continue
      }
    }

    out += sql[i]
    i++
  }

  return { sql: out, params: reordered }
}

export function finalizeSql(
  sql: string,
  params: readonly unknown[],
  dialect: SqlDialect,
): SqlResult {
  return dialect === 'sqlite'
    ? toSqliteParams(sql, params)
    : { sql, params: [...params] }
}
