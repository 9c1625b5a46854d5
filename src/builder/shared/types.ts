import type { Model, SqlResult } from '../../types'
import type { SqlDialect } from '../../sql-builder-dialect'
import type { SchemaRegistry } from '../../schema'
import type { ParamStore } from './param-store'

export type { SqlResult }

export interface AliasGenerator {
  next(baseName: string): string
}

/**
 * What every SQL fragment builder needs to know about where it renders:
 * the schema to resolve relations against, the dialect, and the table
 * schema prefix used for PostgreSQL table references.
 */
export interface SqlTarget {
  readonly schema: SchemaRegistry
  readonly dialect: SqlDialect
  readonly schemaName: string
  readonly aliasGen: AliasGenerator
}

export interface BuildContext extends SqlTarget {
  readonly alias: string
  readonly model: Model
  readonly path: readonly string[]
  readonly params: ParamStore
  readonly depth: number
}

export interface JoinStep {
  readonly table: string
  readonly alias: string
  readonly on: string
}

export interface JoinPlan {
  readonly joins: readonly JoinStep[]
  readonly alias: string
  readonly model: Model
}

export interface ErrorContext {
  field?: string
  operator?: string
  value?: unknown
  path?: readonly string[]
  modelName?: string
  relation?: string
  availableFields?: readonly string[]
}
