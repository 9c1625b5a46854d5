import type {
  AggregateFunction,
  AggregateValue,
  OrderByInput,
  Row,
  RowCompute,
  RowPredicate,
  ScopeArg,
  WhereInput,
} from './types'
import type { AggregationLoader } from './loader'
import { FilterChain } from './filter-chain'
import { DeferredValue } from './deferred-value'
import { ALL_COLUMNS } from './descriptor'
import { createError } from './builder/shared/errors'

export const AGGREGATE_FUNCTIONS: readonly AggregateFunction[] = [
  'count',
  'sum',
  'avg',
  'max',
  'min',
  'exists',
]

const DEFERRED_PREFIX = 'async'

export type ProxyCall =
  | { kind: 'aggregate'; fn: AggregateFunction; column: string }
  | { kind: 'fallback'; fn: AggregateFunction; compute: RowCompute }
  | { kind: 'deferred'; fn: AggregateFunction; column: string | RowCompute }
  | {
      kind: 'chain'
      operation: string
      args: readonly unknown[]
      block?: RowPredicate
    }

function asAggregateFunction(name: string): AggregateFunction | undefined {
  return AGGREGATE_FUNCTIONS.find((fn) => fn === name)
}

function isRowFunction(value: unknown): value is (row: Row) => unknown {
  return typeof value === 'function'
}

function columnArg(
  fn: AggregateFunction,
  value: unknown,
): string | RowCompute {
  if (value === undefined) return ALL_COLUMNS
  if (typeof value === 'string' || isRowFunction(value)) return value
  throw createError(
    `${fn}() takes a column name or a row function`,
    { operator: fn, value },
    'INVALID_VALUE',
  )
}

/** Sorts a call by name and arguments into the path that serves it. */
export function classifyCall(name: string, args: readonly unknown[]): ProxyCall {
  const fn = asAggregateFunction(name)
  if (fn) {
    const column = columnArg(fn, args[0])
    return typeof column === 'function'
      ? { kind: 'fallback', fn, compute: column }
      : { kind: 'aggregate', fn, column }
  }

  if (name.startsWith(DEFERRED_PREFIX)) {
    const deferred = asAggregateFunction(
      name.slice(DEFERRED_PREFIX.length).toLowerCase(),
    )
    if (deferred) {
      return { kind: 'deferred', fn: deferred, column: columnArg(deferred, args[0]) }
    }
  }

  const last = args[args.length - 1]
  if (isRowFunction(last)) {
    return {
      kind: 'chain',
      operation: name,
      args: args.slice(0, -1),
      block: (row) => Boolean(last(row)),
    }
  }
  return { kind: 'chain', operation: name, args }
}

/**
 * Stands in for one parent's relation. Chain calls record operations and
 * return a new proxy; aggregate calls go through the loader, so the same
 * aggregation read from every parent of a batch runs one query.
 */
export class AggregationProxy implements AsyncIterable<Row> {
  constructor(
    private readonly loader: AggregationLoader,
    readonly record: Row,
    readonly relation: string,
    readonly filterChain: FilterChain = FilterChain.EMPTY,
  ) {}

  where(input: WhereInput): AggregationProxy {
    return this.chain('where', input)
  }

  scope(name: string, ...args: ScopeArg[]): AggregationProxy {
    return this.chain('scope', name, ...args)
  }

  orderBy(order: OrderByInput | OrderByInput[] | string): AggregationProxy {
    return this.chain('orderBy', order)
  }

  take(count: number): AggregationProxy {
    return this.chain('take', count)
  }

  skip(count: number): AggregationProxy {
    return this.chain('skip', count)
  }

  joins(...relations: string[]): AggregationProxy {
    return this.chain('joins', ...relations)
  }

  filter(predicate: RowPredicate): AggregationProxy {
    return this.#append('filter', [], predicate)
  }

  /** Records any operation; a trailing function becomes the row block. */
  chain(operation: string, ...args: unknown[]): AggregationProxy {
    const call = classifyCall(operation, args)
    if (call.kind !== 'chain') {
      throw createError(
        `'${operation}' is an aggregate, not a chain operation`,
        { operator: operation, relation: this.relation },
        'INVALID_OPERATOR',
      )
    }
    return this.#append(call.operation, call.args, call.block)
  }

  count(column?: string | RowCompute): Promise<AggregateValue> {
    return this.#aggregate('count', column)
  }

  sum(column: string | RowCompute): Promise<AggregateValue> {
    return this.#aggregate('sum', column)
  }

  avg(column: string | RowCompute): Promise<AggregateValue> {
    return this.#aggregate('avg', column)
  }

  max(column: string | RowCompute): Promise<AggregateValue> {
    return this.#aggregate('max', column)
  }

  min(column: string | RowCompute): Promise<AggregateValue> {
    return this.#aggregate('min', column)
  }

  exists(column?: string | RowCompute): Promise<AggregateValue> {
    return this.#aggregate('exists', column)
  }

  asyncCount(column?: string | RowCompute): DeferredValue<AggregateValue> {
    return this.#deferred('count', column)
  }

  asyncSum(column: string | RowCompute): DeferredValue<AggregateValue> {
    return this.#deferred('sum', column)
  }

  asyncAvg(column: string | RowCompute): DeferredValue<AggregateValue> {
    return this.#deferred('avg', column)
  }

  asyncMax(column: string | RowCompute): DeferredValue<AggregateValue> {
    return this.#deferred('max', column)
  }

  asyncMin(column: string | RowCompute): DeferredValue<AggregateValue> {
    return this.#deferred('min', column)
  }

  asyncExists(column?: string | RowCompute): DeferredValue<AggregateValue> {
    return this.#deferred('exists', column)
  }

  /** Dispatches a call by name, for callers that build calls at run time. */
  call(
    name: string,
    ...args: unknown[]
  ): Promise<AggregateValue> | DeferredValue<AggregateValue> | AggregationProxy {
    const call = classifyCall(name, args)
    switch (call.kind) {
      case 'aggregate':
        return this.#aggregate(call.fn, call.column)
      case 'fallback':
        return this.#aggregate(call.fn, call.compute)
      case 'deferred':
        return this.#deferred(call.fn, call.column)
      case 'chain':
        return this.#append(call.operation, call.args, call.block)
    }
  }

  findMany(): Promise<Row[]> {
    return this.loader.materialize(this.record, this.relation, this.filterChain)
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Row> {
    const rows = await this.findMany()
    yield* rows
  }

  #append(
    operation: string,
    args: readonly unknown[],
    block?: RowPredicate,
  ): AggregationProxy {
    return new AggregationProxy(
      this.loader,
      this.record,
      this.relation,
      this.filterChain.append(operation, args, block),
    )
  }

  #aggregate(
    fn: AggregateFunction,
    column: string | RowCompute | undefined,
  ): Promise<AggregateValue> {
    return this.loader.aggregate(
      fn,
      this.record,
      this.relation,
      this.filterChain,
      column ?? ALL_COLUMNS,
    )
  }

  #deferred(
    fn: AggregateFunction,
    column: string | RowCompute | undefined,
  ): DeferredValue<AggregateValue> {
    return new DeferredValue(() => this.#aggregate(fn, column))
  }
}
