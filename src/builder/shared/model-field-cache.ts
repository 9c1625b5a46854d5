import type { Model, Field } from '../../types'
import { quote } from './sql-utils'

interface FieldIndices {
  scalarFields: ReadonlyMap<string, Field>
  relationFields: ReadonlyMap<string, Field>
  scalarNames: readonly string[]
  relationNames: readonly string[]
  pkFields: readonly string[]
  columnMap: ReadonlyMap<string, string>
  quotedColumns: ReadonlyMap<string, string>
}

const FIELD_INDICES_CACHE = new WeakMap<Model, FieldIndices>()

export function getFieldIndices(model: Model): FieldIndices {
  let cached = FIELD_INDICES_CACHE.get(model)
  if (cached) return cached

  const scalarFields = new Map<string, Field>()
  const relationFields = new Map<string, Field>()
  const scalarNames: string[] = []
  const relationNames: string[] = []
  const pkFields: string[] = []
  const columnMap = new Map<string, string>()
  const quotedColumns = new Map<string, string>()

  for (const field of model.fields) {
    if (field.isRelation) {
      relationFields.set(field.name, field)
      relationNames.push(field.name)
      continue
    }

    scalarFields.set(field.name, field)
    scalarNames.push(field.name)

    if (field.isId) {
      pkFields.push(field.name)
    }

    if (field.dbName && field.dbName !== field.name) {
      columnMap.set(field.name, field.dbName)
    }

    const columnName = field.dbName || field.name
    quotedColumns.set(field.name, quote(columnName))
  }

  cached = Object.freeze({
    scalarFields,
    relationFields,
    scalarNames,
    relationNames,
    pkFields:
      model.primaryKey && model.primaryKey.length > 0
        ? [...model.primaryKey]
        : pkFields,
    columnMap,
    quotedColumns,
  })

  FIELD_INDICES_CACHE.set(model, cached)
  return cached
}

export function getFieldInfo(model: Model, fieldName: string): Field | undefined {
  const indices = getFieldIndices(model)
  return (
    indices.scalarFields.get(fieldName) ?? indices.relationFields.get(fieldName)
  )
}

export function getScalarFieldNames(model: Model): string[] {
  return [...getFieldIndices(model).scalarNames]
}

export function getPrimaryKeyFields(model: Model): readonly string[] {
  return getFieldIndices(model).pkFields
}

export function getColumnMap(model: Model): ReadonlyMap<string, string> {
  return getFieldIndices(model).columnMap
}

export function getQuotedColumn(
  model: Model,
  fieldName: string,
): string | undefined {
  return getFieldIndices(model).quotedColumns.get(fieldName)
}
