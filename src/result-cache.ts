import type {
  AggregateFunction,
  AggregateValue,
  ResultMapping,
} from './types'
import type { AggregationDescriptor } from './descriptor'
import { descriptorKey } from './descriptor'
import { ABSENT_VALUES } from './result-transformers'
import { toLookupKey } from './utils/normalize-value'

export interface ResultCacheStats {
  hits: number
  misses: number
  executions: number
  size: number
}

/**
 * One loader's memo of aggregation results. Each descriptor key computes at
 * most once while its promise is pending or fulfilled; a rejected compute is
 * dropped so the next read starts over.
 */
export class ResultCache {
  #entries = new Map<string, Promise<ResultMapping>>()
  #hits = 0
  #misses = 0
  #executions = 0

  getOrCompute(
    descriptor: AggregationDescriptor,
    compute: () => Promise<ResultMapping>,
  ): Promise<ResultMapping> {
    const key = descriptorKey(descriptor)
    const existing = this.#entries.get(key)
    if (existing) {
      this.#hits++
      return existing
    }

    this.#misses++
    const pending = Promise.resolve().then(() => {
      this.#executions++
      return compute()
    })

    const tracked = pending.catch((error: unknown) => {
      if (this.#entries.get(key) === tracked) {
        this.#entries.delete(key)
      }
      throw error
    })

    this.#entries.set(key, tracked)
    return tracked
  }

  has(descriptor: AggregationDescriptor): boolean {
    return this.#entries.has(descriptorKey(descriptor))
  }

  get stats(): ResultCacheStats {
    return Object.freeze({
      hits: this.#hits,
      misses: this.#misses,
      executions: this.#executions,
      size: this.#entries.size,
    })
  }
}

export function lookupAggregate(
  mapping: ResultMapping,
  fn: AggregateFunction,
  parentId: unknown,
): AggregateValue {
  const value = mapping.values.get(toLookupKey(parentId))
  if (fn === 'exists') return value !== undefined
  return value === undefined ? ABSENT_VALUES[fn] : value
}
