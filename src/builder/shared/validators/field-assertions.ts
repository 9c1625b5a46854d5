import type { Field, Model } from '../../../types'
import { createError } from '../errors'
import { getFieldInfo } from '../model-field-cache'

const NUMERIC_TYPES = new Set(['Int', 'Float', 'Decimal', 'BigInt'])

export function assertScalarField(
  model: Model,
  fieldName: string,
  context: string,
): Field {
  const field = getFieldInfo(model, fieldName)

  if (!field) {
    throw createError(
      `${context} references unknown field '${fieldName}' on model ${model.name}`,
      {
        field: fieldName,
        modelName: model.name,
        availableFields: model.fields.map((f) => f.name),
      },
      'FIELD_NOT_FOUND',
    )
  }

  if (field.isRelation) {
    throw createError(
      `${context} does not support relation field '${fieldName}'`,
      { field: fieldName, modelName: model.name },
    )
  }

  return field
}

export function assertNumericField(
  model: Model,
  fieldName: string,
  context: string,
): Field {
  const field = assertScalarField(model, fieldName, context)

  if (!isNumericType(field.type)) {
    throw createError(
      `${context} requires numeric field, got '${field.type}'`,
      { field: fieldName, modelName: model.name },
    )
  }

  return field
}

export function isNumericType(fieldType: string): boolean {
  const baseType = fieldType.replace(/\[\]|\?/g, '')
  return NUMERIC_TYPES.has(baseType)
}
