export type DeferredState = 'pending' | 'resolved' | 'rejected'

/**
 * A value that is computed on the first `value()` call and memoized from
 * then on, rejections included.
 */
export class DeferredValue<T> {
  #promise: Promise<T> | undefined
  #state: DeferredState = 'pending'

  constructor(private readonly resolver: () => Promise<T>) {}

  value(): Promise<T> {
    if (!this.#promise) {
      this.#promise = Promise.resolve()
        .then(this.resolver)
        .then(
          (result) => {
            this.#state = 'resolved'
            return result
          },
          (error: unknown) => {
            this.#state = 'rejected'
            throw error
          },
        )
    }
    return this.#promise
  }

  get state(): DeferredState {
    return this.#state
  }

  get settled(): boolean {
    return this.#state !== 'pending'
  }
}

export function resolveAll<T>(
  values: readonly DeferredValue<T>[],
): Promise<T[]> {
  return Promise.all(values.map((v) => v.value()))
}
