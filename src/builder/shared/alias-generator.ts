import { AliasGenerator } from './types'
import { ALIAS_FORBIDDEN_KEYWORDS } from './constants'

const MAX_ALIAS_LENGTH = 63

function toSafeSqlIdentifier(input: string): string {
  let out = input.replace(/[^A-Za-z0-9_]/g, '_')

  if (out.length === 0) out = '_t'
  if (!/^[A-Za-z_]/.test(out)) out = `_${out}`

  const lowered = out.toLowerCase()
  return ALIAS_FORBIDDEN_KEYWORDS.has(lowered) ? `_${lowered}` : lowered
}

/**
 * Aliases are `<table>_<n>`, unique per generator. One generator is shared by
 * everything rendered into the same statement, subqueries included.
 */
export function createAliasGenerator(
  maxAliases: number = 1000,
): AliasGenerator {
  let counter = 0

  return {
    next(baseName: string): string {
      if (counter >= maxAliases) {
        throw new Error(
          `Alias generator exceeded maximum of ${maxAliases} aliases. ` +
            `This indicates a relation cycle or a runaway filter.`,
        )
      }

      const suffix = `_${counter}`
      const base = toSafeSqlIdentifier(baseName)
      const baseMax = Math.max(1, MAX_ALIAS_LENGTH - suffix.length)
      counter += 1

      return `${base.slice(0, baseMax)}${suffix}`
    },
  }
}
