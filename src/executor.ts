import type {
  PostgresClient,
  QueryInfo,
  QueryMeta,
  QueryRunner,
  Row,
  SqliteClient,
  SqlResult,
} from './types'
import { finalizeSql, type SqlDialect } from './sql-builder-dialect'
import { isRow } from './builder/shared/validators/type-guards'
import { validateParamConsistency } from './builder/shared/validators/sql-validators'

export type DatabaseClient =
  | { dialect: 'postgres'; client: PostgresClient }
  | { dialect: 'sqlite'; client: SqliteClient }

export interface QueryRunnerOptions {
  debug: boolean
  onQuery?: (info: QueryInfo) => void
}

function toRows(results: readonly unknown[]): Row[] {
  return results.filter(isRow)
}

async function executePostgres(
  client: PostgresClient,
  sql: string,
  params: unknown[],
): Promise<Row[]> {
  return toRows(await client.unsafe(sql, params))
}

function executeSqlite(
  db: SqliteClient,
  sql: string,
  params: unknown[],
): Row[] {
  return toRows(db.prepare(sql).all(...params))
}

function describe(dialect: SqlDialect, meta: QueryMeta): string {
  const target = meta.relation ? `${meta.model}.${meta.relation}` : meta.model
  return `[${dialect}] ${target}.${meta.method}`
}

function logQueryError(
  debug: boolean,
  dialect: SqlDialect,
  meta: QueryMeta,
  error: unknown,
): void {
  if (!debug) return
  console.error(`${describe(dialect, meta)} failed:`, error)
}

/**
 * Runs finished SQL on the configured client. `$n` placeholders are
 * renumbered for SQLite here, so builders never deal with `?`.
 */
export function createQueryRunner(
  database: DatabaseClient,
  options: QueryRunnerOptions,
): QueryRunner {
  const { dialect } = database

  return async function executeWithTiming(
    query: SqlResult,
    meta: QueryMeta,
  ): Promise<Row[]> {
    const startTime = Date.now()
    validateParamConsistency(query.sql, query.params)
    const { sql, params } = finalizeSql(query.sql, query.params, dialect)

    if (options.debug) {
      console.log(describe(dialect, meta))
      console.log('SQL:', sql)
      console.log('Params:', params)
    }

    let rows: Row[]
    try {
      rows =
        database.dialect === 'postgres'
          ? await executePostgres(database.client, sql, params)
          : executeSqlite(database.client, sql, params)
    } catch (error) {
      logQueryError(options.debug, dialect, meta, error)
      throw error
    }

    options.onQuery?.({
      ...meta,
      sql,
      params,
      duration: Date.now() - startTime,
    })

    return rows
  }
}
