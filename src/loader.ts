import type {
  AggregateFunction,
  AggregateValue,
  LoaderContext,
  Model,
  Row,
  RowCompute,
} from './types'
import type { ResultCacheStats } from './result-cache'
import { ResultCache, lookupAggregate } from './result-cache'
import { FilterChain } from './filter-chain'
import { ALL_COLUMNS, createDescriptor } from './descriptor'
import { ScopeBuilder, type ScopeState } from './builder/scope'
import { executeGroupedAggregate } from './builder/grouped-aggregate'
import { buildRelationRowsSql } from './builder/select'
import { computeInMemory } from './in-memory'
import { AggregationProxy } from './aggregation-proxy'

export interface ParentBatch {
  readonly model: string | Model
  readonly records: readonly Row[]
  /** Overrides how a record's id is read; defaults to the relation's key field. */
  readonly parentKey?: (record: Row) => unknown
}

/**
 * Serves every aggregate read for one batch of parent records. Results are
 * cached per aggregation for the loader's lifetime and never shared with
 * another loader.
 */
export class AggregationLoader {
  readonly model: Model
  readonly records: readonly Row[]
  readonly #context: LoaderContext
  readonly #parentKey?: (record: Row) => unknown
  readonly #cache = new ResultCache()

  constructor(batch: ParentBatch, context: LoaderContext) {
    this.model =
      typeof batch.model === 'string'
        ? context.schema.getModel(batch.model)
        : batch.model
    this.records = batch.records
    this.#context = context
    this.#parentKey = batch.parentKey
  }

  proxyFor(record: Row, relation: string): AggregationProxy {
    this.#context.schema.getRelation(this.model.name, relation)
    return new AggregationProxy(this, record, relation)
  }

  async aggregate(
    fn: AggregateFunction,
    record: Row,
    relation: string,
    chain: FilterChain = FilterChain.EMPTY,
    column: string | RowCompute = ALL_COLUMNS,
  ): Promise<AggregateValue> {
    if (typeof column === 'function' || chain.hasBlocks) {
      const rows = await this.materialize(record, relation, chain)
      return computeInMemory(fn, rows, column)
    }

    const descriptor = createDescriptor(this.model, relation, chain, fn, column)
    const mapping = await this.#cache.getOrCompute(descriptor, () =>
      executeGroupedAggregate(
        {
          ...this.#target(),
          parentModel: this.model,
          relation,
          scope: this.#scope(relation, chain),
          fn,
          column,
          parentKey: this.#parentKey,
          parents: this.records,
        },
        this.#context.runQuery,
      ),
    )

    const parentId = this.#parentKey
      ? this.#parentKey(record)
      : record[mapping.parentKeyField]
    return lookupAggregate(mapping, fn, parentId)
  }

  /** Loads this parent's related rows; never cached. */
  async materialize(
    record: Row,
    relation: string,
    chain: FilterChain = FilterChain.EMPTY,
  ): Promise<Row[]> {
    const scope = this.#scope(relation, chain)
    const query = buildRelationRowsSql({
      ...this.#target(),
      parentModel: this.model,
      relation,
      scope,
      parent: record,
      parentKey: this.#parentKey,
    })
    const rows = await this.#context.runQuery(query, {
      model: this.model.name,
      relation,
      method: 'findMany',
    })
    if (scope.predicates.length === 0) return rows
    return rows.filter((row) => scope.predicates.every((p) => p(row)))
  }

  get cacheStats(): ResultCacheStats {
    return this.#cache.stats
  }

  #target() {
    const { schema, dialect, schemaName } = this.#context
    return { schema, dialect, schemaName }
  }

  #scope(relation: string, chain: FilterChain): ScopeState {
    const { schema } = this.#context
    const target = schema.getRelation(this.model.name, relation).target
    return chain.materialize(ScopeBuilder.for(schema, target))
  }
}

export function createLoader(
  batch: ParentBatch,
  context: LoaderContext,
): AggregationLoader {
  return new AggregationLoader(batch, context)
}
