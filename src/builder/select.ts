import type { Model, Row, WhereInput } from '../types'
import type { SchemaRegistry } from '../schema'
import type { SqlDialect } from '../sql-builder-dialect'
import type { OrderByTerm, ScopeState } from './scope'
import type { BuildContext, SqlResult, SqlTarget } from './shared/types'
import { buildLimitOffset } from '../sql-builder-dialect'
import { SQL_SEPARATORS, SQL_TEMPLATES } from './shared/constants'
import { andAll, col, colWithAlias } from './shared/sql-utils'
import { createAliasGenerator } from './shared/alias-generator'
import { createParamStore, type ParamStore } from './shared/param-store'
import { getScalarFieldNames } from './shared/model-field-cache'
import {
  ensureDeterministicOrderBy,
  renderOrderBy,
} from './shared/order-by-utils'
import {
  joinScopeRelations,
  renderFrom,
  resolveRelationPath,
} from './relation-path'
import { buildWhereClause } from './where'
import { buildTargetConditions } from './grouped-aggregate'

interface SelectTarget {
  readonly schema: SchemaRegistry
  readonly dialect: SqlDialect
  readonly schemaName: string
}

export interface RelationRowsInput extends SelectTarget {
  readonly parentModel: Model
  readonly relation: string
  readonly scope: ScopeState
  readonly parent: Row
  readonly parentKey?: (record: Row) => unknown
}

export interface ModelSelectInput extends SelectTarget {
  readonly model: Model
  readonly where?: WhereInput
  readonly orderBy?: readonly OrderByTerm[]
  readonly take?: number
  readonly skip?: number
}

function selectColumns(alias: string, model: Model): string {
  return getScalarFieldNames(model)
    .map((f) => colWithAlias(alias, f, model))
    .join(SQL_SEPARATORS.FIELD_LIST)
}

function buildTail(
  terms: readonly OrderByTerm[],
  alias: string,
  model: Model,
  pk: readonly string[],
  take: number | undefined,
  skip: number | undefined,
  params: ParamStore,
  dialect: SqlDialect,
): string {
  const order = renderOrderBy(ensureDeterministicOrderBy(terms, pk), alias, model)
  const limit = buildLimitOffset(take, skip, params, dialect)
  const tail = `${SQL_TEMPLATES.ORDER_BY} ${order}`
  return limit ? `${tail} ${limit}` : tail
}

function newTarget(input: SelectTarget): SqlTarget {
  return {
    schema: input.schema,
    dialect: input.dialect,
    schemaName: input.schemaName,
    aliasGen: createAliasGenerator(),
  }
}

/**
 * Rows of one parent's relation after the chain's `where`, order and
 * window. Through relations are matched with `EXISTS` so each target row
 * comes back once however many paths lead to it.
 */
export function buildRelationRowsSql(input: RelationRowsInput): SqlResult {
  const target = newTarget(input)
  const params = createParamStore()
  const path = joinScopeRelations(
    target,
    resolveRelationPath(target, input.parentModel, input.relation),
    input.scope.joins,
  )
  const model = path.targetModel
  const pk = input.schema.primaryKey(model)

  const ctx: BuildContext = {
    ...target,
    alias: path.targetAlias,
    model,
    path: [input.parentModel.name, input.relation],
    params,
    depth: 0,
  }

  const parentId = input.parentKey
    ? input.parentKey(input.parent)
    : input.parent[path.parentKeyField]
  const ids = parentId === null || parentId === undefined ? [] : [parentId]
  const conditions = buildTargetConditions(path, input.scope, ids, ctx)
  const fromJoined = renderFrom(target, model, path.targetAlias, path.joins)

  let rowAlias = path.targetAlias
  let body: string

  if (path.requiresDistinct) {
    rowAlias = target.aliasGen.next(model.tableName)
    const match = pk
      .map((f) => `${col(path.targetAlias, f, model)} = ${col(rowAlias, f, model)}`)
      .join(' AND ')
    body = `${renderFrom(target, model, rowAlias, [])} WHERE ${SQL_TEMPLATES.EXISTS} (SELECT 1 ${fromJoined} WHERE ${andAll([match, conditions])})`
  } else {
    body = `${fromJoined} WHERE ${conditions}`
  }

  const tail = buildTail(
    input.scope.orderBy,
    rowAlias,
    model,
    pk,
    input.scope.take,
    input.scope.skip,
    params,
    input.dialect,
  )

  return {
    sql: `${SQL_TEMPLATES.SELECT} ${selectColumns(rowAlias, model)} ${body} ${tail}`,
    params: [...params.snapshot()],
  }
}

export function buildModelSelectSql(input: ModelSelectInput): SqlResult {
  const target = newTarget(input)
  const params = createParamStore()
  const model = input.model
  const alias = target.aliasGen.next(model.tableName)

  const ctx: BuildContext = {
    ...target,
    alias,
    model,
    path: [model.name],
    params,
    depth: 0,
  }

  const where = input.where ? buildWhereClause(input.where, ctx) : ''
  const tail = buildTail(
    input.orderBy ?? [],
    alias,
    model,
    input.schema.primaryKey(model),
    input.take,
    input.skip,
    params,
    input.dialect,
  )

  const parts = [
    `${SQL_TEMPLATES.SELECT} ${selectColumns(alias, model)}`,
    renderFrom(target, model, alias, []),
  ]
  if (where) parts.push(`${SQL_TEMPLATES.WHERE} ${where}`)
  parts.push(tail)

  return { sql: parts.join(' '), params: [...params.snapshot()] }
}
