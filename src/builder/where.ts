import type { Field, WhereInput } from '../types'
import type { RelationInfo } from '../schema'
import type { BuildContext } from './shared/types'
import {
  EMPTY_WHERE_CLAUSE,
  LIMITS,
  LogicalOps,
  Ops,
  RelationFilters,
  SQL_SEPARATORS,
  SQL_TEMPLATES,
  Wildcards,
} from './shared/constants'
import { andAll, col } from './shared/sql-utils'
import { createError } from './shared/errors'
import { getFieldInfo } from './shared/model-field-cache'
import {
  isPlainObject,
  isScalarValue,
} from './shared/validators/type-guards'
import { buildInList } from '../sql-builder-dialect'
import {
  expandRelationJoins,
  renderFrom,
  type PendingFilter,
} from './relation-path'

const COMPARISON_OPS: Record<string, string> = {
  [Ops.EQUALS]: '=',
  [Ops.NOT]: '<>',
  [Ops.GT]: '>',
  [Ops.GTE]: '>=',
  [Ops.LT]: '<',
  [Ops.LTE]: '<=',
}

function nested(ctx: BuildContext, segment: string): BuildContext {
  if (ctx.depth >= LIMITS.MAX_QUERY_DEPTH) {
    throw createError(
      `Filter nesting too deep (max ${LIMITS.MAX_QUERY_DEPTH} levels)`,
      { path: ctx.path, modelName: ctx.model.name },
    )
  }
  return { ...ctx, path: [...ctx.path, segment], depth: ctx.depth + 1 }
}

function toWhereList(value: unknown, key: string, ctx: BuildContext): WhereInput[] {
  if (isPlainObject(value)) return [value]
  if (Array.isArray(value)) {
    return value.map((entry) => {
      if (!isPlainObject(entry)) {
        throw createError(
          `${key} entries must be objects`,
          { path: ctx.path, modelName: ctx.model.name },
          'INVALID_VALUE',
        )
      }
      return entry
    })
  }
  throw createError(
    `${key} must be an object or array of objects`,
    { path: ctx.path, modelName: ctx.model.name },
    'INVALID_VALUE',
  )
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`)
}

function scalarOperand(
  value: unknown,
  field: Field,
  op: string,
  ctx: BuildContext,
): unknown {
  if (isScalarValue(value)) return value
  throw createError(
    `Operator '${op}' on '${field.name}' needs a scalar value`,
    { field: field.name, operator: op, value, path: ctx.path, modelName: ctx.model.name },
    'INVALID_VALUE',
  )
}

function buildScalarOperator(
  column: string,
  field: Field,
  op: string,
  operand: unknown,
  ctx: BuildContext,
): string {
  switch (op) {
    case Ops.EQUALS:
      if (operand === null) return `${column} ${SQL_TEMPLATES.IS_NULL}`
      return `${column} = ${ctx.params.add(scalarOperand(operand, field, op, ctx))}`
    case Ops.NOT:
      if (operand === null) return `${column} ${SQL_TEMPLATES.IS_NOT_NULL}`
      if (isPlainObject(operand)) {
        const inner = buildScalarCondition(field, operand, ctx)
        return inner ? `${SQL_TEMPLATES.NOT} (${inner})` : ''
      }
      return `${column} <> ${ctx.params.add(scalarOperand(operand, field, op, ctx))}`
    case Ops.GT:
    case Ops.GTE:
    case Ops.LT:
    case Ops.LTE:
      return `${column} ${COMPARISON_OPS[op]} ${ctx.params.add(scalarOperand(operand, field, op, ctx))}`
    case Ops.IN:
    case Ops.NOT_IN: {
      if (!Array.isArray(operand)) {
        throw createError(
          `Operator '${op}' on '${field.name}' needs an array`,
          { field: field.name, operator: op, path: ctx.path, modelName: ctx.model.name },
          'INVALID_VALUE',
        )
      }
      const values = operand.map((v) => scalarOperand(v, field, op, ctx))
      return buildInList(column, values, ctx.params, ctx.dialect, op === Ops.NOT_IN)
    }
    case Ops.CONTAINS:
    case Ops.STARTS_WITH:
    case Ops.ENDS_WITH: {
      if (typeof operand !== 'string') {
        throw createError(
          `Operator '${op}' on '${field.name}' needs a string`,
          { field: field.name, operator: op, path: ctx.path, modelName: ctx.model.name },
          'INVALID_VALUE',
        )
      }
      const pattern = Wildcards[op](escapeLike(operand))
      return `${column} ${SQL_TEMPLATES.LIKE} ${ctx.params.add(pattern)} ESCAPE '\\'`
    }
    default:
      throw createError(
        `Unsupported operator '${op}' on '${field.name}'`,
        { field: field.name, operator: op, path: ctx.path, modelName: ctx.model.name },
        'INVALID_OPERATOR',
      )
  }
}

function buildScalarCondition(
  field: Field,
  value: unknown,
  ctx: BuildContext,
): string {
  const column = col(ctx.alias, field.name, ctx.model)

  if (value === null) return `${column} ${SQL_TEMPLATES.IS_NULL}`
  if (isScalarValue(value)) return `${column} = ${ctx.params.add(value)}`

  if (!isPlainObject(value)) {
    throw createError(
      `Invalid filter value for '${field.name}'`,
      { field: field.name, value, path: ctx.path, modelName: ctx.model.name },
      'INVALID_VALUE',
    )
  }

  const parts: string[] = []
  for (const [op, operand] of Object.entries(value)) {
    if (operand === undefined) continue
    parts.push(buildScalarOperator(column, field, op, operand, ctx))
  }
  return andAll(parts)
}

export function compilePendingFilters(
  filters: readonly PendingFilter[],
  ctx: BuildContext,
): string[] {
  return filters
    .map((f) =>
      buildWhereClause(f.where, {
        ...nested(ctx, 'filter'),
        model: f.model,
        alias: f.alias,
      }),
    )
    .filter((c) => c.length > 0)
}

function buildExistsSubquery(
  relation: RelationInfo,
  filter: WhereInput | undefined,
  negateFilter: boolean,
  ctx: BuildContext,
): string {
  const inner = nested(ctx, relation.name)
  const selfAlias = ctx.aliasGen.next(ctx.model.tableName)
  const plan = expandRelationJoins(ctx, ctx.model, selfAlias, relation.name)
  const pk = ctx.schema.primaryKey(ctx.model)

  const conditions = pk.map(
    (f) => `${col(selfAlias, f, ctx.model)} = ${col(ctx.alias, f, ctx.model)}`,
  )
  conditions.push(...compilePendingFilters(plan.filters, inner))

  if (filter) {
    const clause = buildWhereClause(filter, {
      ...inner,
      model: plan.model,
      alias: plan.alias,
    })
    if (clause) {
      conditions.push(negateFilter ? `${SQL_TEMPLATES.NOT} (${clause})` : clause)
    } else if (negateFilter) {
      conditions.push(EMPTY_WHERE_CLAUSE)
    }
  }

  return `SELECT 1 ${renderFrom(ctx, ctx.model, selfAlias, plan.joins)} WHERE ${andAll(conditions)}`
}

function relationFilterValue(
  value: unknown,
  key: string,
  ctx: BuildContext,
): WhereInput | undefined {
  if (value === undefined) return undefined
  if (isPlainObject(value)) return value
  throw createError(
    `Relation filter '${key}' must be an object`,
    { path: ctx.path, modelName: ctx.model.name },
    'INVALID_VALUE',
  )
}

function buildToManyCondition(
  relation: RelationInfo,
  value: unknown,
  ctx: BuildContext,
): string {
  if (!isPlainObject(value)) {
    throw createError(
      `Filter on list relation '${relation.name}' needs some/every/none`,
      { field: relation.name, path: ctx.path, modelName: ctx.model.name },
      'INVALID_VALUE',
    )
  }

  const parts: string[] = []
  for (const [op, operand] of Object.entries(value)) {
    if (operand === undefined) continue
    const filter = relationFilterValue(operand, op, ctx)

    switch (op) {
      case RelationFilters.SOME:
        parts.push(`${SQL_TEMPLATES.EXISTS} (${buildExistsSubquery(relation, filter, false, ctx)})`)
        break
      case RelationFilters.NONE:
        parts.push(`${SQL_TEMPLATES.NOT_EXISTS} (${buildExistsSubquery(relation, filter, false, ctx)})`)
        break
      case RelationFilters.EVERY:
        if (!filter || Object.keys(filter).length === 0) break
        parts.push(`${SQL_TEMPLATES.NOT_EXISTS} (${buildExistsSubquery(relation, filter, true, ctx)})`)
        break
      default:
        throw createError(
          `Unsupported list relation operator '${op}'`,
          { field: relation.name, operator: op, path: ctx.path, modelName: ctx.model.name },
          'INVALID_OPERATOR',
        )
    }
  }
  return andAll(parts)
}

function buildToOneCondition(
  relation: RelationInfo,
  value: unknown,
  ctx: BuildContext,
): string {
  if (value === null) {
    return `${SQL_TEMPLATES.NOT_EXISTS} (${buildExistsSubquery(relation, undefined, false, ctx)})`
  }

  if (!isPlainObject(value)) {
    throw createError(
      `Filter on relation '${relation.name}' must be an object or null`,
      { field: relation.name, path: ctx.path, modelName: ctx.model.name },
      'INVALID_VALUE',
    )
  }

  const hasIsKeys =
    RelationFilters.IS in value || RelationFilters.IS_NOT in value
  if (!hasIsKeys) {
    return `${SQL_TEMPLATES.EXISTS} (${buildExistsSubquery(relation, value, false, ctx)})`
  }

  const parts: string[] = []
  const is = value[RelationFilters.IS]
  const isNot = value[RelationFilters.IS_NOT]

  if (is === null) {
    parts.push(`${SQL_TEMPLATES.NOT_EXISTS} (${buildExistsSubquery(relation, undefined, false, ctx)})`)
  } else if (is !== undefined) {
    const filter = relationFilterValue(is, RelationFilters.IS, ctx)
    parts.push(`${SQL_TEMPLATES.EXISTS} (${buildExistsSubquery(relation, filter, false, ctx)})`)
  }

  if (isNot === null) {
    parts.push(`${SQL_TEMPLATES.EXISTS} (${buildExistsSubquery(relation, undefined, false, ctx)})`)
  } else if (isNot !== undefined) {
    const filter = relationFilterValue(isNot, RelationFilters.IS_NOT, ctx)
    parts.push(`${SQL_TEMPLATES.NOT_EXISTS} (${buildExistsSubquery(relation, filter, false, ctx)})`)
  }

  return andAll(parts)
}

function buildFieldCondition(
  key: string,
  value: unknown,
  ctx: BuildContext,
): string {
  const relation = ctx.schema.findRelation(ctx.model.name, key)
  if (relation) {
    return relation.isList
      ? buildToManyCondition(relation, value, ctx)
      : buildToOneCondition(relation, value, ctx)
  }

  const field = getFieldInfo(ctx.model, key)
  if (!field) {
    throw createError(
      `Unknown field '${key}' in filter on model ${ctx.model.name}`,
      {
        field: key,
        path: ctx.path,
        modelName: ctx.model.name,
        availableFields: ctx.model.fields.map((f) => f.name),
      },
      'FIELD_NOT_FOUND',
    )
  }

  return buildScalarCondition(field, value, ctx)
}

function buildLogical(
  key: string,
  value: unknown,
  ctx: BuildContext,
): string {
  const entries = toWhereList(value, key, ctx)
  const compiled = entries.map((entry, i) =>
    buildWhereClause(entry, nested(ctx, `${key}[${i}]`)),
  )

  if (key === LogicalOps.AND) return andAll(compiled)

  if (key === LogicalOps.OR) {
    if (compiled.length === 0) return EMPTY_WHERE_CLAUSE
    if (compiled.some((c) => c.length === 0)) return ''
    return compiled.length === 1
      ? compiled[0]
      : compiled.map((c) => `(${c})`).join(SQL_SEPARATORS.CONDITION_OR)
  }

  const inner = andAll(compiled)
  return inner ? `${SQL_TEMPLATES.NOT} (${inner})` : ''
}

/**
 * Compiles a Prisma-style `where` object against `ctx.alias`. Returns an
 * empty string when the filter matches every row.
 */
export function buildWhereClause(where: WhereInput, ctx: BuildContext): string {
  const parts: string[] = []

  for (const [key, value] of Object.entries(where)) {
    if (value === undefined) continue

    if (
      key === LogicalOps.AND ||
      key === LogicalOps.OR ||
      key === LogicalOps.NOT
    ) {
      parts.push(buildLogical(key, value, ctx))
      continue
    }

    parts.push(buildFieldCondition(key, value, ctx))
  }

  return andAll(parts)
}
