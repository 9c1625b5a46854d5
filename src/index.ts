import type {
  EagerAggregatesConfig,
  FindArgs,
  FindEachOptions,
  LoaderContext,
  Model,
  Row,
  WhereInput,
} from './types'
import { createSchema, type SchemaRegistry } from './schema'
import { createQueryRunner, type DatabaseClient } from './executor'
import { AggregationLoader, createLoader } from './loader'
import type { AggregationProxy } from './aggregation-proxy'
import { buildModelSelectSql } from './builder/select'
import { orderByInputToTerms } from './builder/scope'
import { createError } from './builder/shared/errors'
import {
  LIMITS,
  LogicalOps,
  SQL_TEMPLATES,
} from './builder/shared/constants'
import { isNonNegativeInteger } from './builder/shared/validators/type-guards'

export interface AggregatingRecord<T extends Row = Row> {
  readonly record: T
  relation(name: string): AggregationProxy
}

export type FindEachCallback = (
  item: AggregatingRecord,
) => void | Promise<void>

export interface EagerAggregatesClient {
  readonly schema: SchemaRegistry
  loaderFor(
    model: string,
    records: readonly Row[],
    parentKey?: (record: Row) => unknown,
  ): AggregationLoader
  findWithAggregations(
    model: string,
    args?: FindArgs,
  ): Promise<AggregatingRecord[]>
  findEachWithAggregations(
    model: string,
    options: FindEachOptions,
    callback: FindEachCallback,
  ): Promise<void>
}

function resolveDatabase(config: EagerAggregatesConfig): DatabaseClient {
  const { postgres, sqlite } = config

  if (postgres && sqlite) {
    throw new Error('createEagerAggregates cannot use both postgres and sqlite clients')
  }
  if (postgres) return { dialect: 'postgres', client: postgres }
  if (sqlite) return { dialect: 'sqlite', client: sqlite }

  throw new Error('createEagerAggregates requires either postgres or sqlite client')
}

function wrap(loader: AggregationLoader): AggregatingRecord[] {
  return loader.records.map((record) => ({
    record,
    relation: (name: string) => loader.proxyFor(record, name),
  }))
}

function singlePrimaryKey(schema: SchemaRegistry, model: Model): string {
  const pk = schema.primaryKey(model)
  if (pk.length !== 1) {
    throw createError(
      `Batched iteration needs a single-column primary key, ${model.name} has (${pk.join(', ')})`,
      { modelName: model.name },
    )
  }
  return pk[0]
}

function pageWhere(
  pk: string,
  options: FindEachOptions,
  after: unknown,
): WhereInput {
  const descending = options.order === 'desc'
  const bounds: WhereInput[] = []

  if (options.where) bounds.push(options.where)
  if (options.start !== undefined) {
    bounds.push({ [pk]: { [descending ? 'lte' : 'gte']: options.start } })
  }
  if (options.finish !== undefined) {
    bounds.push({ [pk]: { [descending ? 'gte' : 'lte']: options.finish } })
  }
  if (after !== undefined) {
    bounds.push({ [pk]: { [descending ? 'lt' : 'gt']: after } })
  }

  return { [LogicalOps.AND]: bounds }
}

export function createEagerAggregates(
  config: EagerAggregatesConfig,
): EagerAggregatesClient {
  const {
    schemaName = SQL_TEMPLATES.PUBLIC_SCHEMA,
    debug = false,
    onQuery,
  } = config

  const database = resolveDatabase(config)
  const schema = createSchema(config)
  const runQuery = createQueryRunner(database, { debug, onQuery })

  const context: LoaderContext = {
    schema,
    dialect: database.dialect,
    schemaName,
    runQuery,
  }

  async function selectRows(
    model: Model,
    args: FindArgs,
  ): Promise<Row[]> {
    const query = buildModelSelectSql({
      schema,
      dialect: database.dialect,
      schemaName,
      model,
      where: args.where,
      orderBy: orderByInputToTerms(model, args.orderBy),
      take: args.take,
      skip: args.skip,
    })
    return runQuery(query, { model: model.name, method: 'findMany' })
  }

  function loaderFor(
    model: string,
    records: readonly Row[],
    parentKey?: (record: Row) => unknown,
  ): AggregationLoader {
    return createLoader({ model, records, parentKey }, context)
  }

  async function findWithAggregations(
    model: string,
    args: FindArgs = {},
  ): Promise<AggregatingRecord[]> {
    const m = schema.getModel(model)
    const records = await selectRows(m, args)
    return wrap(createLoader({ model: m, records }, context))
  }

  async function findEachWithAggregations(
    model: string,
    options: FindEachOptions,
    callback: FindEachCallback,
  ): Promise<void> {
    const m = schema.getModel(model)
    const pk = singlePrimaryKey(schema, m)
    const batchSize = options.batchSize ?? LIMITS.DEFAULT_BATCH_SIZE

    if (!isNonNegativeInteger(batchSize) || batchSize === 0) {
      throw createError(
        `batchSize must be a positive integer, got ${String(batchSize)}`,
        { modelName: m.name, value: batchSize },
        'INVALID_VALUE',
      )
    }

    let after: unknown = undefined

    for (;;) {
      const records = await selectRows(m, {
        where: pageWhere(pk, options, after),
        orderBy: { [pk]: options.order ?? 'asc' },
        take: batchSize,
      })
      if (records.length === 0) return

      for (const item of wrap(createLoader({ model: m, records }, context))) {
        await callback(item)
      }

      if (records.length < batchSize) return
      after = records[records.length - 1][pk]
    }
  }

  return {
    schema,
    loaderFor,
    findWithAggregations,
    findEachWithAggregations,
  }
}

export { createSchema, convertDMMFToModels, SchemaRegistry } from './schema'
export type {
  RelationInfo,
  RelationKind,
  KeyedRelation,
  JoinTableRelation,
  ThroughRelationInfo,
} from './schema'
export { AggregationLoader, createLoader } from './loader'
export type { ParentBatch } from './loader'
export {
  AggregationProxy,
  AGGREGATE_FUNCTIONS,
  classifyCall,
} from './aggregation-proxy'
export type { ProxyCall } from './aggregation-proxy'
export { DeferredValue, resolveAll } from './deferred-value'
export type { DeferredState } from './deferred-value'
export { FilterChain } from './filter-chain'
export type { ChainEntry, ChainIdentityEntry } from './filter-chain'
export {
  ALL_COLUMNS,
  createDescriptor,
  descriptorKey,
  descriptorsEqual,
} from './descriptor'
export type { AggregationDescriptor } from './descriptor'
export { ResultCache, lookupAggregate } from './result-cache'
export type { ResultCacheStats } from './result-cache'
export { ScopeBuilder } from './builder/scope'
export type { ScopeState, OrderByTerm } from './builder/scope'
export {
  buildGroupedAggregateSql,
  executeGroupedAggregate,
} from './builder/grouped-aggregate'
export type { GroupedAggregateInput } from './builder/grouped-aggregate'
export { resolveRelationPath } from './builder/relation-path'
export type { ResolvedRelationPath } from './builder/relation-path'
export { computeInMemory } from './in-memory'
export { createQueryRunner } from './executor'
export type { DatabaseClient } from './executor'
export {
  SqlBuilderError,
  ResolutionError,
  createError,
} from './builder/shared/errors'
export type { SqlBuilderErrorCode } from './builder/shared/errors'
export { toSqliteParams, type SqlDialect } from './sql-builder-dialect'
export type * from './types'
