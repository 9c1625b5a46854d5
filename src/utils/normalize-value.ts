/**
 * Normalize values for SQL params: dates become ISO strings, bigints become
 * strings, arrays and plain objects are normalized recursively.
 */
export function normalizeValue(
  value: unknown,
  seen = new WeakSet<object>(),
): unknown {
  if (value instanceof Date) {
    if (!Number.isFinite(value.getTime())) {
      throw new Error('Invalid Date value in SQL params')
    }
    return value.toISOString()
  }

  if (typeof value === 'bigint') {
    return value.toString()
  }

  if (Array.isArray(value)) {
    if (seen.has(value)) {
      throw new Error('Circular reference in SQL params')
    }
    seen.add(value)
    const out = value.map((v) => normalizeValue(v, seen))
    seen.delete(value)
    return out
  }

  if (value && typeof value === 'object') {
    if (value instanceof Uint8Array) return value

    const proto = Object.getPrototypeOf(value)
    if (proto !== Object.prototype && proto !== null) return value

    if (seen.has(value)) {
      throw new Error('Circular reference in SQL params')
    }
    seen.add(value)

    const out: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      out[k] = normalizeValue(v, seen)
    }
    seen.delete(value)
    return out
  }

  return value
}

/**
 * Lookup key for parent identifiers. Drivers disagree on how they hand back
 * integer keys (number, bigint, numeric string), so every key is compared
 * through its string form.
 */
export function toLookupKey(value: unknown): string {
  if (value instanceof Date) return value.toISOString()
  if (typeof value === 'object' && value !== null) return JSON.stringify(value)
  return String(value)
}
