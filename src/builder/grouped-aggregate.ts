import type {
  AggregateFunction,
  Field,
  Model,
  QueryRunner,
  ResultMapping,
  Row,
} from '../types'
import type { SchemaRegistry } from '../schema'
import type { SqlDialect } from '../sql-builder-dialect'
import type { ScopeState } from './scope'
import type { BuildContext, SqlResult } from './shared/types'
import { buildInList } from '../sql-builder-dialect'
import { RESULT_COLUMNS, SQL_TEMPLATES } from './shared/constants'
import { andAll, col, quote } from './shared/sql-utils'
import { createAliasGenerator } from './shared/alias-generator'
import { createParamStore } from './shared/param-store'
import { createError } from './shared/errors'
import {
  assertNumericField,
  assertScalarField,
  isNumericType,
} from './shared/validators/field-assertions'
import {
  ensureDeterministicOrderBy,
  renderOrderBy,
} from './shared/order-by-utils'
import {
  joinScopeRelations,
  renderFrom,
  resolveRelationPath,
  tableRef,
  type ResolvedRelationPath,
} from './relation-path'
import { buildWhereClause, compilePendingFilters } from './where'
import { transformGroupedRows } from '../result-transformers'
import { ALL_COLUMNS } from '../descriptor'
import { toLookupKey } from '../utils/normalize-value'

export interface GroupedAggregateInput {
  readonly schema: SchemaRegistry
  readonly dialect: SqlDialect
  readonly schemaName: string
  readonly parentModel: Model
  readonly relation: string
  readonly scope: ScopeState
  readonly fn: AggregateFunction
  readonly column: string
  /** Extracts the id a parent is grouped under; defaults to its key field. */
  readonly parentKey?: (record: Row) => unknown
  readonly parents: readonly Row[]
}

export interface GroupedAggregatePlan extends SqlResult {
  readonly path: ResolvedRelationPath
  readonly parentIds: readonly unknown[]
  readonly numericColumn: boolean
}

const K = quote(RESULT_COLUMNS.KEY)
const V = quote(RESULT_COLUMNS.VALUE)
const ROW_K = quote(RESULT_COLUMNS.ROW_KEY)
const ROW_V = quote(RESULT_COLUMNS.ROW_VALUE)
const ROW_N = quote(RESULT_COLUMNS.ROW_NUMBER)
const ROWS = quote(RESULT_COLUMNS.ROWS)
const PAIRS = quote(RESULT_COLUMNS.PAIRS)

function assertColumn(
  fn: AggregateFunction,
  column: string,
  model: Model,
): Field | undefined {
  const label = `${fn}()`
  if (column === ALL_COLUMNS) {
    if (fn === 'count' || fn === 'exists') return undefined
    throw createError(
      `${label} needs a column`,
      { modelName: model.name, operator: fn },
      'INVALID_VALUE',
    )
  }
  return fn === 'sum' || fn === 'avg'
    ? assertNumericField(model, column, label)
    : assertScalarField(model, column, label)
}

function aggregateExpr(fn: AggregateFunction, valueExpr: string | null): string {
  if (valueExpr === null) return SQL_TEMPLATES.COUNT_ALL
  return `${fn.toUpperCase()}(${valueExpr})`
}

export function collectParentIds(
  parents: readonly Row[],
  keyOf: (record: Row) => unknown,
): unknown[] {
  const seen = new Set<string>()
  const ids: unknown[] = []
  for (const record of parents) {
    const id = keyOf(record)
    if (id === null || id === undefined) continue
    const key = toLookupKey(id)
    if (seen.has(key)) continue
    seen.add(key)
    ids.push(id)
  }
  return ids
}

/**
 * Conditions on the target rows before any window or deduplication: the
 * batch's parent ids, relation filters, then the chain's `where` inputs.
 */
export function buildTargetConditions(
  path: ResolvedRelationPath,
  scope: ScopeState,
  parentIds: readonly unknown[],
  ctx: BuildContext,
): string {
  const conditions = [
    buildInList(path.groupByExpr, parentIds, ctx.params, ctx.dialect),
    ...compilePendingFilters(path.filters, ctx),
  ]
  if (path.builtinFilter) {
    conditions.push(buildWhereClause(path.builtinFilter, ctx))
  }
  for (const where of scope.where) {
    conditions.push(buildWhereClause(where, ctx))
  }
  return andAll(conditions)
}

function windowConditions(scope: ScopeState, ctx: BuildContext): string {
  const skip = scope.skip ?? 0
  const parts: string[] = []
  if (skip > 0) parts.push(`${ROW_N} > ${ctx.params.add(skip)}`)
  if (scope.take !== undefined) {
    parts.push(`${ROW_N} <= ${ctx.params.add(skip + scope.take)}`)
  }
  return andAll(parts)
}

function hasWindow(scope: ScopeState): boolean {
  return scope.take !== undefined || scope.skip !== undefined
}

function buildDirectSql(
  input: GroupedAggregateInput,
  path: ResolvedRelationPath,
  where: string,
  ctx: BuildContext,
): string {
  const { targetModel: model, targetAlias: t } = path
  const from = renderFrom(ctx, model, t, path.joins)
  const valueExpr =
    input.column === ALL_COLUMNS ? null : col(t, input.column, model)

  if (input.fn === 'exists') {
    const conditions = valueExpr
      ? andAll([where, `${valueExpr} ${SQL_TEMPLATES.IS_NOT_NULL}`])
      : where
    return `${SQL_TEMPLATES.SELECT_DISTINCT} ${path.groupByExpr} AS ${K} ${from} WHERE ${conditions}`
  }

  return `${SQL_TEMPLATES.SELECT} ${path.groupByExpr} AS ${K}, ${aggregateExpr(input.fn, valueExpr)} AS ${V} ${from} WHERE ${where} ${SQL_TEMPLATES.GROUP_BY} ${path.groupByExpr}`
}

function buildRowsSql(
  input: GroupedAggregateInput,
  path: ResolvedRelationPath,
  where: string,
  ctx: BuildContext,
): string {
  const { targetModel: model, targetAlias: t } = path
  const pk = input.schema.primaryKey(model)
  const targetFrom = renderFrom(ctx, model, t, path.joins)

  let rowAlias = t
  let keyExpr = path.groupByExpr
  let from = `${targetFrom} WHERE ${where}`

  if (path.requiresDistinct) {
    const pkColumns = pk.map(
      (f, i) => `${col(t, f, model)} AS ${quote(`${RESULT_COLUMNS.ROW_PK_PREFIX}${i}`)}`,
    )
    const pairs = `${SQL_TEMPLATES.SELECT_DISTINCT} ${path.groupByExpr} AS ${ROW_K}, ${pkColumns.join(', ')} ${from}`
    rowAlias = ctx.aliasGen.next(model.tableName)
    keyExpr = `${PAIRS}.${ROW_K}`
    const on = pk
      .map(
        (f, i) =>
          `${col(rowAlias, f, model)} = ${PAIRS}.${quote(`${RESULT_COLUMNS.ROW_PK_PREFIX}${i}`)}`,
      )
      .join(' AND ')
    from = `${SQL_TEMPLATES.FROM} (${pairs}) AS ${PAIRS} ${SQL_TEMPLATES.INNER_JOIN} ${tableRef(ctx, model)} AS ${rowAlias} ON ${on}`
  }

  const columns = [`${keyExpr} AS ${ROW_K}`]
  if (input.column !== ALL_COLUMNS) {
    columns.push(`${col(rowAlias, input.column, model)} AS ${ROW_V}`)
  }
  if (hasWindow(input.scope)) {
    const order = renderOrderBy(
      ensureDeterministicOrderBy(input.scope.orderBy, pk),
      rowAlias,
      model,
    )
    columns.push(
      `ROW_NUMBER() OVER (PARTITION BY ${keyExpr} ${SQL_TEMPLATES.ORDER_BY} ${order}) AS ${ROW_N}`,
    )
  }

  return `${SQL_TEMPLATES.SELECT} ${columns.join(', ')} ${from}`
}

function buildWrappedSql(
  input: GroupedAggregateInput,
  path: ResolvedRelationPath,
  where: string,
  ctx: BuildContext,
): string {
  const rows = buildRowsSql(input, path, where, ctx)
  const valueExpr = input.column === ALL_COLUMNS ? null : ROW_V
  const conditions = [windowConditions(input.scope, ctx)]

  if (input.fn === 'exists') {
    if (valueExpr) conditions.push(`${valueExpr} ${SQL_TEMPLATES.IS_NOT_NULL}`)
    const filter = andAll(conditions)
    return `${SQL_TEMPLATES.SELECT_DISTINCT} ${ROW_K} AS ${K} ${SQL_TEMPLATES.FROM} (${rows}) AS ${ROWS}${filter ? ` WHERE ${filter}` : ''}`
  }

  const filter = andAll(conditions)
  return `${SQL_TEMPLATES.SELECT} ${ROW_K} AS ${K}, ${aggregateExpr(input.fn, valueExpr)} AS ${V} ${SQL_TEMPLATES.FROM} (${rows}) AS ${ROWS}${filter ? ` WHERE ${filter}` : ''} ${SQL_TEMPLATES.GROUP_BY} ${ROW_K}`
}

/**
 * Plans one grouped statement for a whole parent batch. Resolution errors
 * surface here, the first time the aggregation is computed.
 */
export function planGroupedAggregate(
  input: GroupedAggregateInput,
): GroupedAggregatePlan {
  const aliasGen = createAliasGenerator()
  const params = createParamStore()
  const target = {
    schema: input.schema,
    dialect: input.dialect,
    schemaName: input.schemaName,
    aliasGen,
  }

  const path = joinScopeRelations(
    target,
    resolveRelationPath(target, input.parentModel, input.relation),
    input.scope.joins,
  )
  const field = assertColumn(input.fn, input.column, path.targetModel)

  const keyField = path.parentKeyField
  const parentIds = collectParentIds(
    input.parents,
    input.parentKey ?? ((record) => record[keyField]),
  )

  const ctx: BuildContext = {
    ...target,
    alias: path.targetAlias,
    model: path.targetModel,
    path: [input.parentModel.name, input.relation],
    params,
    depth: 0,
  }

  const where = buildTargetConditions(path, input.scope, parentIds, ctx)
  const sql =
    path.requiresDistinct || hasWindow(input.scope)
      ? buildWrappedSql(input, path, where, ctx)
      : buildDirectSql(input, path, where, ctx)

  return {
    sql,
    params: [...params.snapshot()],
    path,
    parentIds,
    numericColumn: field !== undefined && isNumericType(field.type),
  }
}

export function buildGroupedAggregateSql(
  input: GroupedAggregateInput,
): SqlResult {
  const { sql, params } = planGroupedAggregate(input)
  return { sql, params }
}

export async function executeGroupedAggregate(
  input: GroupedAggregateInput,
  runQuery: QueryRunner,
): Promise<ResultMapping> {
  const plan = planGroupedAggregate(input)
  const base = { fn: input.fn, parentKeyField: plan.path.parentKeyField }

  if (plan.parentIds.length === 0) {
    return { ...base, values: new Map() }
  }

  const rows = await runQuery(
    { sql: plan.sql, params: plan.params },
    { model: input.parentModel.name, relation: input.relation, method: input.fn },
  )
  return {
    ...base,
    values: transformGroupedRows(input.fn, rows, plan.numericColumn),
  }
}
