import type {
  Model,
  OrderByInput,
  RowPredicate,
  SortOrder,
  WhereInput,
} from '../types'
import type { SchemaRegistry } from '../schema'
import { createError } from './shared/errors'
import {
  isNonNegativeInteger,
  isPlainObject,
  isScopeArg,
  isSortOrder,
} from './shared/validators/type-guards'

export interface OrderByTerm {
  readonly field: string
  readonly direction: SortOrder
}

export interface ScopeState {
  readonly where: readonly WhereInput[]
  /** Relations of the target model to INNER JOIN, in chain order. */
  readonly joins: readonly string[]
  readonly orderBy: readonly OrderByTerm[]
  readonly take?: number
  readonly skip?: number
  readonly predicates: readonly RowPredicate[]
}

export const SCOPE_OPERATIONS = [
  'where',
  'scope',
  'orderBy',
  'take',
  'skip',
  'joins',
  'filter',
] as const

export type ScopeOperation = (typeof SCOPE_OPERATIONS)[number]

export function isScopeOperation(name: string): name is ScopeOperation {
  return SCOPE_OPERATIONS.some((op) => op === name)
}

const EMPTY_STATE: ScopeState = {
  where: [],
  joins: [],
  orderBy: [],
  predicates: [],
}

function parseOrderBy(model: Model, value: unknown): OrderByTerm[] {
  const entries = Array.isArray(value) ? value : [value]
  const terms: OrderByTerm[] = []

  for (const entry of entries) {
    if (typeof entry === 'string') {
      terms.push({ field: entry, direction: 'asc' })
      continue
    }
    if (!isPlainObject(entry)) {
      throw createError(
        'orderBy expects a field name or { field: "asc" | "desc" }',
        { modelName: model.name, value: entry },
        'INVALID_VALUE',
      )
    }
    for (const [field, direction] of Object.entries(entry)) {
      if (!isSortOrder(direction)) {
        throw createError(
          `orderBy direction for '${field}' must be "asc" or "desc"`,
          { field, modelName: model.name, value: direction },
          'INVALID_VALUE',
        )
      }
      terms.push({ field, direction })
    }
  }

  return terms
}

/**
 * Immutable accumulator for relation-level query operations. Each `apply`
 * returns a new builder; the state of the receiver never changes.
 */
export class ScopeBuilder {
  private constructor(
    private readonly schema: SchemaRegistry,
    readonly model: Model,
    readonly state: ScopeState,
  ) {}

  static for(schema: SchemaRegistry, model: Model): ScopeBuilder {
    return new ScopeBuilder(schema, model, EMPTY_STATE)
  }

  apply(
    operation: string,
    args: readonly unknown[],
    block?: RowPredicate,
  ): ScopeBuilder {
    if (!isScopeOperation(operation)) {
      throw createError(
        `Unknown chain operation '${operation}' on ${this.model.name}`,
        { operator: operation, modelName: this.model.name },
        'INVALID_OPERATOR',
      )
    }

    switch (operation) {
      case 'where':
        return this.with({ where: [...this.state.where, this.whereArg(args[0])] })
      case 'scope':
        return this.with({
          where: [...this.state.where, this.resolveScope(args)],
        })
      case 'orderBy':
        return this.with({
          orderBy: [...this.state.orderBy, ...parseOrderBy(this.model, args[0])],
        })
      case 'take':
        return this.with({ take: this.countArg('take', args[0]) })
      case 'skip':
        return this.with({ skip: this.countArg('skip', args[0]) })
      case 'joins':
        return this.with({
          joins: [...this.state.joins, ...this.relationArgs(args)],
        })
      case 'filter':
        if (!block) {
          throw createError(
            'filter needs a row predicate',
            { operator: operation, modelName: this.model.name },
            'INVALID_VALUE',
          )
        }
        return this.with({ predicates: [...this.state.predicates, block] })
    }
  }

  private with(patch: Partial<ScopeState>): ScopeBuilder {
    return new ScopeBuilder(this.schema, this.model, { ...this.state, ...patch })
  }

  private whereArg(value: unknown): WhereInput {
    if (isPlainObject(value)) return value
    throw createError(
      'where expects an object',
      { operator: 'where', modelName: this.model.name, value },
      'INVALID_VALUE',
    )
  }

  private countArg(operation: string, value: unknown): number {
    if (isNonNegativeInteger(value)) return value
    throw createError(
      `${operation} expects a non-negative integer`,
      { operator: operation, modelName: this.model.name, value },
      'INVALID_VALUE',
    )
  }

  private relationArgs(args: readonly unknown[]): string[] {
    if (args.length === 0) {
      throw createError(
        'joins expects at least one relation name',
        { operator: 'joins', modelName: this.model.name },
        'INVALID_VALUE',
      )
    }
    return args.map((name) => {
      if (typeof name !== 'string') {
        throw createError(
          'joins expects relation names',
          { operator: 'joins', modelName: this.model.name, value: name },
          'INVALID_VALUE',
        )
      }
      this.schema.getRelation(this.model.name, name)
      return name
    })
  }

  private resolveScope(args: readonly unknown[]): WhereInput {
    const [name, ...rest] = args
    if (typeof name !== 'string') {
      throw createError(
        'scope expects a scope name',
        { operator: 'scope', modelName: this.model.name, value: name },
        'INVALID_VALUE',
      )
    }

    const definition = this.schema.scope(this.model, name)
    if (!definition) {
      throw createError(
        `Unknown scope '${name}' on ${this.model.name}`,
        {
          operator: 'scope',
          modelName: this.model.name,
          availableFields: Object.keys(this.model.scopes ?? {}),
        },
        'INVALID_OPERATOR',
      )
    }

    if (typeof definition !== 'function') return definition

    const scopeArgs = rest.filter(isScopeArg)
    if (scopeArgs.length !== rest.length) {
      throw createError(
        `Arguments to scope '${name}' must be scalar values`,
        { operator: 'scope', modelName: this.model.name },
        'INVALID_VALUE',
      )
    }
    return definition(...scopeArgs)
  }
}

export function orderByInputToTerms(
  model: Model,
  orderBy: OrderByInput | OrderByInput[] | undefined,
): OrderByTerm[] {
  return orderBy === undefined ? [] : parseOrderBy(model, orderBy)
}
