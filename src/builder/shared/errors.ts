import { ErrorContext } from './types'
import { isNonEmptyArray, isNotNullish } from './validators/type-guards'

export type SqlBuilderErrorCode =
  | 'FIELD_NOT_FOUND'
  | 'INVALID_OPERATOR'
  | 'INVALID_VALUE'
  | 'RELATION_ERROR'
  | 'RESOLUTION_ERROR'
  | 'VALIDATION_ERROR'

export class SqlBuilderError extends Error {
  public readonly code: SqlBuilderErrorCode
  public readonly context?: ErrorContext

  constructor(
    message: string,
    code: SqlBuilderErrorCode,
    context?: ErrorContext,
  ) {
    super(message)
    this.name = 'SqlBuilderError'
    this.code = code
    this.context = context
  }
}

/**
 * Raised when a relation path cannot be turned into a grouped query,
 * e.g. a through relation whose target declares no relation back to the
 * intermediate model. Configuration problem; never retried.
 */
export class ResolutionError extends SqlBuilderError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'RESOLUTION_ERROR', context)
    this.name = 'ResolutionError'
  }
}

function formatMessage(message: string, ctx: ErrorContext): string {
  const parts = [message]

  if (isNonEmptyArray(ctx.path)) {
    parts.push(`Path: ${ctx.path.join('.')}`)
  }

  if (isNotNullish(ctx.modelName)) {
    parts.push(`Model: ${ctx.modelName}`)
  }

  if (isNotNullish(ctx.relation)) {
    parts.push(`Relation: ${ctx.relation}`)
  }

  if (isNonEmptyArray(ctx.availableFields)) {
    parts.push(`Available fields: ${ctx.availableFields.join(', ')}`)
  }

  return parts.join('\n')
}

export function createError(
  message: string,
  ctx: ErrorContext,
  code: SqlBuilderErrorCode = 'VALIDATION_ERROR',
): SqlBuilderError {
  return new SqlBuilderError(formatMessage(message, ctx), code, ctx)
}

export function createResolutionError(
  message: string,
  ctx: ErrorContext,
): ResolutionError {
  return new ResolutionError(formatMessage(message, ctx), ctx)
}
