import type { Model, WhereInput } from '../types'
import type { RelationInfo, RelationKind } from '../schema'
import type { JoinPlan, JoinStep, SqlTarget } from './shared/types'
import { buildTableReference, col, quote } from './shared/sql-utils'
import { createError, createResolutionError } from './shared/errors'
import { LIMITS, SQL_TEMPLATES } from './shared/constants'

/** Filter attached to a relation, to be compiled against `alias`. */
export interface PendingFilter {
  readonly model: Model
  readonly alias: string
  readonly where: WhereInput
}

export interface ExpandedJoinPlan extends JoinPlan {
  readonly filters: readonly PendingFilter[]
}

export interface ResolvedRelationPath {
  readonly kind: Exclude<RelationKind, 'many-to-one'>
  readonly relation: string
  readonly parentModel: Model
  readonly targetModel: Model
  readonly targetAlias: string
  readonly joins: readonly JoinStep[]
  readonly filters: readonly PendingFilter[]
  readonly groupByEntity: string
  readonly groupByColumn: string
  readonly groupByExpr: string
  readonly parentKeyField: string
  readonly requiresDistinct: boolean
  readonly builtinFilter?: WhereInput
}

export function tableRef(target: SqlTarget, model: Model): string {
  return buildTableReference(target.schemaName, model.tableName, target.dialect)
}

export function renderJoins(joins: readonly JoinStep[]): string {
  return joins
    .map((j) => `${SQL_TEMPLATES.INNER_JOIN} ${j.table} AS ${j.alias} ON ${j.on}`)
    .join(' ')
}

export function renderFrom(
  target: SqlTarget,
  model: Model,
  alias: string,
  joins: readonly JoinStep[],
): string {
  const base = `${SQL_TEMPLATES.FROM} ${tableRef(target, model)} AS ${alias}`
  return joins.length > 0 ? `${base} ${renderJoins(joins)}` : base
}

function keyEquality(
  leftAlias: string,
  leftFields: readonly string[],
  leftModel: Model,
  rightAlias: string,
  rightFields: readonly string[],
  rightModel: Model,
): string {
  if (leftFields.length !== rightFields.length || leftFields.length === 0) {
    throw createError(
      `Key mismatch between ${leftModel.name} and ${rightModel.name}`,
      { modelName: leftModel.name },
      'RELATION_ERROR',
    )
  }
  return leftFields
    .map(
      (f, i) =>
        `${col(leftAlias, f, leftModel)} = ${col(rightAlias, rightFields[i], rightModel)}`,
    )
    .join(' AND ')
}

function withFilter(
  filters: readonly PendingFilter[],
  relation: RelationInfo,
  alias: string,
): readonly PendingFilter[] {
  if (!relation.filter) return filters
  return [...filters, { model: relation.target, alias, where: relation.filter }]
}

/**
 * Joins needed to walk `relationName` forward from `fromAlias`. Built-in
 * relation filters met on the way come back as pending filters.
 */
export function expandRelationJoins(
  target: SqlTarget,
  model: Model,
  fromAlias: string,
  relationName: string,
  depth = 0,
): ExpandedJoinPlan {
  if (depth > LIMITS.MAX_QUERY_DEPTH) {
    throw createError(
      `Relation path too deep (max ${LIMITS.MAX_QUERY_DEPTH} hops)`,
      { modelName: model.name, relation: relationName },
      'RELATION_ERROR',
    )
  }

  const relation = target.schema.getRelation(model.name, relationName)

  switch (relation.kind) {
    case 'one-to-many':
    case 'many-to-one': {
      const alias = target.aliasGen.next(relation.target.tableName)
      const on = keyEquality(
        alias,
        relation.targetFields,
        relation.target,
        fromAlias,
        relation.localFields,
        model,
      )
      return {
        joins: [{ table: tableRef(target, relation.target), alias, on }],
        alias,
        model: relation.target,
        filters: withFilter([], relation, alias),
      }
    }
    case 'many-to-many': {
      const joinAlias = target.aliasGen.next(relation.joinTable)
      const alias = target.aliasGen.next(relation.target.tableName)
      return {
        joins: [
          {
            table: buildTableReference(
              target.schemaName,
              relation.joinTable,
              target.dialect,
            ),
            alias: joinAlias,
            on: `${joinAlias}.${quote(relation.localColumn)} = ${col(fromAlias, relation.localFields[0], model)}`,
          },
          {
            table: tableRef(target, relation.target),
            alias,
            on: `${col(alias, relation.targetFields[0], relation.target)} = ${joinAlias}.${quote(relation.targetColumn)}`,
          },
        ],
        alias,
        model: relation.target,
        filters: withFilter([], relation, alias),
      }
    }
    case 'through': {
      const first = expandRelationJoins(
        target,
        model,
        fromAlias,
        relation.through,
        depth + 1,
      )
      const second = expandRelationJoins(
        target,
        first.model,
        first.alias,
        relation.source,
        depth + 1,
      )
      return {
        joins: [...first.joins, ...second.joins],
        alias: second.alias,
        model: second.model,
        filters: withFilter(
          [...first.filters, ...second.filters],
          relation,
          second.alias,
        ),
      }
    }
  }
}

/**
 * Adds the chain's `joins` relations to a resolved path. Each is walked
 * from the target alias, so joined rows multiply the target rows.
 */
export function joinScopeRelations(
  target: SqlTarget,
  path: ResolvedRelationPath,
  relations: readonly string[],
): ResolvedRelationPath {
  if (relations.length === 0) return path

  const joins = [...path.joins]
  const filters = [...path.filters]
  for (const name of relations) {
    const plan = expandRelationJoins(target, path.targetModel, path.targetAlias, name)
    joins.push(...plan.joins)
    filters.push(...plan.filters)
  }
  return { ...path, joins, filters }
}

function singleKey(
  fields: readonly string[],
  model: Model,
  relation: string,
): string {
  if (fields.length !== 1) {
    throw createResolutionError(
      `Grouped aggregation needs a single-column key, got (${fields.join(', ')})`,
      { modelName: model.name, relation },
    )
  }
  return fields[0]
}

/**
 * Works out how one grouped query reaches `relationName` for a batch of
 * `parentModel` rows: the table and column to group on, the joins from the
 * target table to that column, and whether rows must be deduplicated first.
 */
export function resolveRelationPath(
  target: SqlTarget,
  parentModel: Model,
  relationName: string,
): ResolvedRelationPath {
  const relation = target.schema.getRelation(parentModel.name, relationName)
  const ctx = { modelName: parentModel.name, relation: relationName }
  const targetModel = relation.target
  const targetAlias = target.aliasGen.next(targetModel.tableName)

  switch (relation.kind) {
    case 'one-to-many': {
      const groupByColumn = singleKey(relation.targetFields, targetModel, relationName)
      return {
        kind: 'one-to-many',
        relation: relationName,
        parentModel,
        targetModel,
        targetAlias,
        joins: [],
        filters: [],
        groupByEntity: targetModel.tableName,
        groupByColumn,
        groupByExpr: col(targetAlias, groupByColumn, targetModel),
        parentKeyField: singleKey(relation.localFields, parentModel, relationName),
        requiresDistinct: false,
        builtinFilter: relation.filter,
      }
    }
    case 'many-to-many': {
      const joinAlias = target.aliasGen.next(relation.joinTable)
      const targetKey = singleKey(relation.targetFields, targetModel, relationName)
      return {
        kind: 'many-to-many',
        relation: relationName,
        parentModel,
        targetModel,
        targetAlias,
        joins: [
          {
            table: buildTableReference(
              target.schemaName,
              relation.joinTable,
              target.dialect,
            ),
            alias: joinAlias,
            on: `${joinAlias}.${quote(relation.targetColumn)} = ${col(targetAlias, targetKey, targetModel)}`,
          },
        ],
        filters: [],
        groupByEntity: relation.joinTable,
        groupByColumn: relation.localColumn,
        groupByExpr: `${joinAlias}.${quote(relation.localColumn)}`,
        parentKeyField: singleKey(relation.localFields, parentModel, relationName),
        requiresDistinct: false,
        builtinFilter: relation.filter,
      }
    }
    case 'through': {
      const hop = target.schema.getRelation(parentModel.name, relation.through)
      if (hop.kind !== 'one-to-many') {
        throw createResolutionError(
          `Through relation '${relationName}' must pass through a one-to-many relation, '${relation.through}' is ${hop.kind}`,
          ctx,
        )
      }

      const intermediate = hop.target
      const connecting = target.schema
        .relationsOf(targetModel.name)
        .find((r) => r.target.name === intermediate.name)

      if (!connecting) {
        throw createResolutionError(
          `Could not find relation from ${targetModel.name} to ${intermediate.name}`,
          ctx,
        )
      }

      const plan = expandRelationJoins(
        target,
        targetModel,
        targetAlias,
        connecting.name,
      )
      const groupByColumn = singleKey(hop.targetFields, intermediate, relationName)
      const source = target.schema.getRelation(intermediate.name, relation.source)

      const filters: PendingFilter[] = [...plan.filters]
      if (hop.filter) {
        filters.push({ model: intermediate, alias: plan.alias, where: hop.filter })
      }
      if (source.filter) {
        filters.push({ model: targetModel, alias: targetAlias, where: source.filter })
      }

      return {
        kind: 'through',
        relation: relationName,
        parentModel,
        targetModel,
        targetAlias,
        joins: plan.joins,
        filters,
        groupByEntity: intermediate.tableName,
        groupByColumn,
        groupByExpr: col(plan.alias, groupByColumn, intermediate),
        parentKeyField: singleKey(hop.localFields, parentModel, relationName),
        requiresDistinct: true,
        builtinFilter: relation.filter,
      }
    }
    case 'many-to-one':
      throw createResolutionError(
        `Relation '${relationName}' is to-one; batched aggregates need a to-many relation`,
        ctx,
      )
  }
}
