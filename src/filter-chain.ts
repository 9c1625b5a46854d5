import type { RowPredicate } from './types'
import type { ScopeBuilder, ScopeState } from './builder/scope'

export interface ChainEntry {
  readonly operation: string
  readonly args: readonly unknown[]
  /** In-memory row predicate; never part of the chain's identity. */
  readonly block?: RowPredicate
}

export interface ChainIdentityEntry {
  readonly operation: string
  readonly args: readonly unknown[]
}

/**
 * Ordered, immutable list of relation operations recorded by a proxy.
 * Two chains describe the same aggregation when their identities match
 * element by element.
 */
export class FilterChain {
  static readonly EMPTY = new FilterChain([])

  private constructor(readonly entries: readonly ChainEntry[]) {}

  get length(): number {
    return this.entries.length
  }

  get hasBlocks(): boolean {
    return this.entries.some((e) => e.block !== undefined)
  }

  append(
    operation: string,
    args: readonly unknown[],
    block?: RowPredicate,
  ): FilterChain {
    const entry: ChainEntry = block
      ? { operation, args: Object.freeze([...args]), block }
      : { operation, args: Object.freeze([...args]) }
    return new FilterChain(Object.freeze([...this.entries, entry]))
  }

  identity(): ChainIdentityEntry[] {
    return this.entries.map((e) => ({ operation: e.operation, args: e.args }))
  }

  materialize(base: ScopeBuilder): ScopeState {
    return this.entries.reduce(
      (scope, entry) => scope.apply(entry.operation, entry.args, entry.block),
      base,
    ).state
  }
}
