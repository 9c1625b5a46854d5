import type { DMMF } from '@prisma/generator-helper'
import type { SqlDialect } from './sql-builder-dialect'
import type { SchemaRegistry } from './schema'

export interface Field {
  name: string
  dbName: string
  type: string
  isRequired: boolean
  isList: boolean
  isRelation: boolean
  isId?: boolean
  relatedModel?: string
  relationName?: string
  foreignKey?: string[]
  references?: string[]
  isForeignKeyLocal?: boolean
}

export type WhereInput = Record<string, unknown>

export type ScalarValue = string | number | bigint | boolean | Date

export type ScopeArg = ScalarValue | null

export type ScopeDefinition =
  | WhereInput
  | ((...args: ScopeArg[]) => WhereInput)

export interface Model {
  name: string
  tableName: string
  fields: Field[]
  /** Composite `@@id`; single ids are flagged with `Field.isId`. */
  primaryKey?: string[]
  scopes?: Record<string, ScopeDefinition>
}

/**
 * `model.name` reached through the to-many relation `through` on `model`,
 * then `source` (defaults to `name`) on the intermediate model.
 */
export interface ThroughRelation {
  model: string
  name: string
  through: string
  source?: string
  filter?: WhereInput
}

/** Built-in filter applied to every read of `model.relation`. */
export interface RelationFilter {
  model: string
  relation: string
  where: WhereInput
}

export type AggregateFunction = 'count' | 'sum' | 'avg' | 'max' | 'min' | 'exists'

export type AggregateValue = ScalarValue | null

export type Row = Record<string, unknown>

export type SortOrder = 'asc' | 'desc'

export type OrderByInput = Record<string, SortOrder>

export type RowPredicate = (row: Row) => boolean

export type RowCompute = (row: Row) => unknown

export interface SqlResult {
  sql: string
  params: unknown[]
}

export interface QueryMeta {
  model: string
  relation?: string
  method: string
}

export interface QueryInfo extends QueryMeta {
  sql: string
  params: unknown[]
  duration: number
}

export type QueryRunner = (
  query: SqlResult,
  meta: QueryMeta,
) => Promise<Row[]>

export interface PostgresClient {
  unsafe(query: string, parameters?: unknown[]): PromiseLike<readonly unknown[]>
}

export interface SqliteStatement {
  all(...params: unknown[]): unknown[]
}

export interface SqliteClient {
  prepare(source: string): SqliteStatement
}

export interface SchemaConfig {
  models?: Model[]
  dmmf?: DMMF.Document
  through?: ThroughRelation[]
  relationFilters?: RelationFilter[]
}

export interface EagerAggregatesConfig extends SchemaConfig {
  postgres?: PostgresClient
  sqlite?: SqliteClient
  /** Table schema for PostgreSQL references. Defaults to `public`. */
  schemaName?: string
  debug?: boolean
  onQuery?: (info: QueryInfo) => void
}

export interface LoaderContext {
  readonly schema: SchemaRegistry
  readonly dialect: SqlDialect
  readonly schemaName: string
  readonly runQuery: QueryRunner
}

export interface FindArgs {
  where?: WhereInput
  orderBy?: OrderByInput | OrderByInput[]
  take?: number
  skip?: number
}

export interface FindEachOptions {
  where?: WhereInput
  batchSize?: number
  order?: SortOrder
  start?: ScalarValue
  finish?: ScalarValue
}

/** Per-parent values of one aggregation, keyed by `toLookupKey(parentId)`. */
export interface ResultMapping {
  readonly fn: AggregateFunction
  readonly parentKeyField: string
  readonly values: ReadonlyMap<string, AggregateValue>
}
