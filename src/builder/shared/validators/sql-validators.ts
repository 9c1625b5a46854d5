import { REGEX_CACHE, SQL_KEYWORDS } from '../constants'
import { isNonEmptyString } from './type-guards'

export function needsQuoting(id: string): boolean {
  if (!isNonEmptyString(id)) return true

  const isKeyword = SQL_KEYWORDS.has(id.toLowerCase())
  if (isKeyword) return true

  const isValidIdentifier = REGEX_CACHE.VALID_IDENTIFIER.test(id)
  return !isValidIdentifier
}

function sqlPreview(sql: string): string {
  return `${sql.substring(0, 100)}...`
}

/**
 * Placeholders must cover 1..N exactly; a gap or an out-of-range
 * reference means a fragment was composed with the wrong store.
 */
export function validateParamConsistency(
  sql: string,
  params: readonly unknown[],
): void {
  const seen = new Set<number>()
  for (const match of sql.matchAll(REGEX_CACHE.PARAM_PLACEHOLDER)) {
    seen.add(Number(match[1]))
  }

  for (const index of seen) {
    if (index < 1 || index > params.length) {
      throw new Error(
        `CRITICAL: Parameter mismatch - SQL references $${index} but ${params.length} params provided. SQL: ${sqlPreview(sql)}`,
      )
    }
  }

  for (let i = 1; i <= params.length; i++) {
    if (!seen.has(i)) {
      throw new Error(
        `CRITICAL: Parameter $${i} is never referenced. SQL: ${sqlPreview(sql)}`,
      )
    }
  }
}
