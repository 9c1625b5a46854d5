// src/builder/shared/validators/type-guards.ts

/**
 * Type Guards and Checks
 * Pure type checking with no business logic
 */

import type { ScalarValue, ScopeArg, Row } from '../../../types'

// ═══════════════════════════════════════════════════════════════
// Basic Type Guards
// ═══════════════════════════════════════════════════════════════

export function isNotNullish<T>(
  value: T | null | undefined,
): value is NonNullable<T> {
  return value !== null && value !== undefined
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0
}

export function isEmptyString(value: unknown): boolean {
  return typeof value === 'string' && value.trim().length === 0
}

export function isNonEmptyArray<T>(value: unknown): value is T[] {
  return Array.isArray(value) && value.length > 0
}

export function isPlainObject(val: unknown): val is Record<string, unknown> {
  if (!isNotNullish(val)) return false
  if (Array.isArray(val)) return false
  if (typeof val !== 'object') return false
  return Object.prototype.toString.call(val) === '[object Object]'
}

export function isRow(val: unknown): val is Row {
  return isPlainObject(val)
}

export function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0
}

// ═══════════════════════════════════════════════════════════════
// Value Checks
// ═══════════════════════════════════════════════════════════════

export function isScalarValue(value: unknown): value is ScalarValue {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean' ||
    value instanceof Date
  )
}

export function isScopeArg(value: unknown): value is ScopeArg {
  return value === null || isScalarValue(value)
}

export function isSortOrder(value: unknown): value is 'asc' | 'desc' {
  return value === 'asc' || value === 'desc'
}
