import { normalizeValue } from '../../utils/normalize-value'

export interface ParamStore {
  add(value: unknown): string
  snapshot(): readonly unknown[]
  readonly index: number
}

const MAX_PARAM_INDEX = 65535

const POSITION_CACHE: string[] = []
for (let i = 1; i <= 500; i++) {
  POSITION_CACHE.push(`$${i}`)
}

function formatPosition(position: number): string {
  return position <= POSITION_CACHE.length
    ? POSITION_CACHE[position - 1]
    : `$${position}`
}

/**
 * Params are always numbered `$n` while a statement is assembled; SQLite
 * statements are renumbered to `?` afterwards (see `toSqliteParams`), so
 * fragments can be composed in any order.
 */
export function createParamStore(startIndex = 1): ParamStore {
  if (!Number.isInteger(startIndex) || startIndex < 1) {
    throw new Error(`Start index must be integer >= 1, got ${startIndex}`)
  }

  let index = startIndex
  const params: unknown[] = []

  return {
    add(value: unknown): string {
      if (index > MAX_PARAM_INDEX) {
        throw new Error(
          `CRITICAL: Cannot add param - statement exceeds ${MAX_PARAM_INDEX} parameters`,
        )
      }
      params.push(normalizeValue(value))
      return formatPosition(index++)
    },
    snapshot(): readonly unknown[] {
      return params.slice()
    },
    get index() {
      return index
    },
  }
}
