import type { DMMF } from '@prisma/generator-helper'
import { convertDMMFToModels as parseDatamodel } from '@dee-wan/schema-parser'
import type {
  Field,
  Model,
  RelationFilter,
  SchemaConfig,
  ScopeDefinition,
  ThroughRelation,
  WhereInput,
} from './types'
import { createError } from './builder/shared/errors'
import { getPrimaryKeyFields } from './builder/shared/model-field-cache'

export type RelationKind =
  | 'one-to-many'
  | 'many-to-one'
  | 'many-to-many'
  | 'through'

interface RelationBase {
  readonly name: string
  readonly model: Model
  readonly target: Model
  readonly isList: boolean
  readonly filter?: WhereInput
}

/**
 * Relation joined on key columns. `localFields[i]` on `model` pairs with
 * `targetFields[i]` on `target`, whichever side holds the foreign key.
 */
export interface KeyedRelation extends RelationBase {
  readonly kind: 'one-to-many' | 'many-to-one'
  readonly localFields: readonly string[]
  readonly targetFields: readonly string[]
}

/** Implicit many-to-many through Prisma's `_<RelationName>` table. */
export interface JoinTableRelation extends RelationBase {
  readonly kind: 'many-to-many'
  readonly localFields: readonly string[]
  readonly targetFields: readonly string[]
  readonly joinTable: string
  readonly localColumn: string
  readonly targetColumn: string
}

export interface ThroughRelationInfo extends RelationBase {
  readonly kind: 'through'
  readonly through: string
  readonly source: string
}

export type RelationInfo = KeyedRelation | JoinTableRelation | ThroughRelationInfo

function enrichField(
  name: string,
  dbName: string,
  isRelation: boolean,
  field: DMMF.Field,
): Field {
  const foreignKey = field.relationFromFields ? [...field.relationFromFields] : []
  const references = field.relationToFields ? [...field.relationToFields] : []

  return {
    name,
    dbName,
    type: field.type,
    isRequired: field.isRequired,
    isList: field.isList,
    isRelation,
    isId: field.isId,
    relatedModel: isRelation ? field.type : undefined,
    relationName: field.relationName ?? undefined,
    foreignKey: foreignKey.length > 0 ? foreignKey : undefined,
    references: references.length > 0 ? references : undefined,
    isForeignKeyLocal: isRelation ? foreignKey.length > 0 : undefined,
  }
}

/**
 * Models from the schema parser, with list flags, relation names and
 * composite ids read back from the datamodel.
 */
export function convertDMMFToModels(datamodel: DMMF.Datamodel): Model[] {
  const sources = new Map(datamodel.models.map((m) => [m.name, m]))

  return parseDatamodel(datamodel).map((parsed) => {
    const source = sources.get(parsed.name)
    if (!source) {
      throw createError(
        `Model ${parsed.name} is missing from the datamodel`,
        { modelName: parsed.name },
        'VALIDATION_ERROR',
      )
    }
    const sourceFields = new Map(source.fields.map((f) => [f.name, f]))

    const fields = parsed.fields.map((f) => {
      const field = sourceFields.get(f.name)
      if (!field) {
        throw createError(
          `Field ${parsed.name}.${f.name} is missing from the datamodel`,
          { modelName: parsed.name, field: f.name },
          'VALIDATION_ERROR',
        )
      }
      return enrichField(f.name, f.dbName || f.name, f.isRelation === true, field)
    })

    return {
      name: parsed.name,
      tableName: parsed.tableName,
      fields,
      primaryKey: source.primaryKey ? [...source.primaryKey.fields] : undefined,
    }
  })
}

function requirePrimaryKey(model: Model): readonly string[] {
  const pk = getPrimaryKeyFields(model)
  if (pk.length === 0) {
    throw createError(`Model ${model.name} has no primary key`, {
      modelName: model.name,
    })
  }
  return pk
}

function findOppositeField(
  model: Model,
  field: Field,
  target: Model,
): Field | undefined {
  return target.fields.find(
    (f) =>
      f.isRelation &&
      f.relationName === field.relationName &&
      (target !== model || f.name !== field.name),
  )
}

function classifyFieldRelation(
  model: Model,
  field: Field,
  models: ReadonlyMap<string, Model>,
): KeyedRelation | JoinTableRelation {
  const ctx = { modelName: model.name, relation: field.name }
  const target = field.relatedModel ? models.get(field.relatedModel) : undefined
  if (!target) {
    throw createError(
      `Relation '${field.name}' points at unknown model '${field.relatedModel}'`,
      ctx,
      'RELATION_ERROR',
    )
  }

  if (field.foreignKey && field.foreignKey.length > 0) {
    return {
      kind: 'many-to-one',
      name: field.name,
      model,
      target,
      isList: false,
      localFields: field.foreignKey,
      targetFields: field.references ?? requirePrimaryKey(target),
    }
  }

  const opposite = findOppositeField(model, field, target)
  if (!opposite) {
    throw createError(
      `Relation '${field.name}' has no opposite field on ${target.name}`,
      ctx,
      'RELATION_ERROR',
    )
  }

  if (opposite.foreignKey && opposite.foreignKey.length > 0) {
    return {
      kind: 'one-to-many',
      name: field.name,
      model,
      target,
      isList: field.isList,
      localFields: opposite.references ?? requirePrimaryKey(model),
      targetFields: opposite.foreignKey,
    }
  }

  if (field.isList && opposite.isList && target !== model) {
    const modelIsA = model.name < target.name
    return {
      kind: 'many-to-many',
      name: field.name,
      model,
      target,
      isList: true,
      localFields: requirePrimaryKey(model),
      targetFields: requirePrimaryKey(target),
      joinTable: `_${field.relationName}`,
      localColumn: modelIsA ? 'A' : 'B',
      targetColumn: modelIsA ? 'B' : 'A',
    }
  }

  throw createError(
    `Relation '${field.name}' declares no foreign key on either side`,
    ctx,
    'RELATION_ERROR',
  )
}

function combineFilters(
  a: WhereInput | undefined,
  b: WhereInput | undefined,
): WhereInput | undefined {
  if (!a) return b
  if (!b) return a
  return { AND: [a, b] }
}

export class SchemaRegistry {
  readonly #models = new Map<string, Model>()
  readonly #relations = new Map<string, Map<string, RelationInfo>>()

  constructor(
    models: readonly Model[],
    through: readonly ThroughRelation[] = [],
    relationFilters: readonly RelationFilter[] = [],
  ) {
    for (const model of models) {
      if (this.#models.has(model.name)) {
        throw createError(`Duplicate model '${model.name}'`, {
          modelName: model.name,
        })
      }
      this.#models.set(model.name, model)
    }

    for (const model of models) {
      const relations = new Map<string, RelationInfo>()
      for (const field of model.fields) {
        if (!field.isRelation) continue
        relations.set(field.name, classifyFieldRelation(model, field, this.#models))
      }
      this.#relations.set(model.name, relations)
    }

    this.#registerThrough(through)

    for (const rf of relationFilters) {
      const relation = this.getRelation(rf.model, rf.relation)
      this.#relationMap(rf.model).set(rf.relation, {
        ...relation,
        filter: combineFilters(relation.filter, rf.where),
      })
    }
  }

  #relationMap(modelName: string): Map<string, RelationInfo> {
    const relations = this.#relations.get(modelName)
    if (!relations) {
      throw createError(
        `Model '${modelName}' not found. Available: ${[...this.#models.keys()].join(', ')}`,
        { modelName },
      )
    }
    return relations
  }

  // Through relations may build on each other in any declaration order.
  #registerThrough(through: readonly ThroughRelation[]): void {
    let pending = [...through]

    while (pending.length > 0) {
      const deferred: ThroughRelation[] = []

      for (const t of pending) {
        const model = this.getModel(t.model)
        const relations = this.#relationMap(t.model)
        if (relations.has(t.name) || model.fields.some((f) => f.name === t.name)) {
          throw createError(
            `Through relation '${t.name}' clashes with an existing field`,
            { modelName: t.model, relation: t.name },
          )
        }

        const hop = relations.get(t.through)
        const source = hop
          ? this.#relationMap(hop.target.name).get(t.source ?? t.name)
          : undefined

        if (!hop || !source) {
          deferred.push(t)
          continue
        }

        relations.set(t.name, {
          kind: 'through',
          name: t.name,
          model,
          target: source.target,
          isList: true,
          through: t.through,
          source: t.source ?? t.name,
          filter: t.filter,
        })
      }

      if (deferred.length === pending.length) {
        const t = deferred[0]
        throw createError(
          `Through relation '${t.name}' cannot be resolved: '${t.through}' or its source '${t.source ?? t.name}' does not exist`,
          { modelName: t.model, relation: t.name },
          'RELATION_ERROR',
        )
      }
      pending = deferred
    }
  }

  get models(): readonly Model[] {
    return [...this.#models.values()]
  }

  findModel(name: string): Model | undefined {
    return this.#models.get(name)
  }

  getModel(name: string): Model {
    const model = this.#models.get(name)
    if (!model) {
      throw createError(
        `Model '${name}' not found. Available: ${[...this.#models.keys()].join(', ')}`,
        { modelName: name },
      )
    }
    return model
  }

  findRelation(modelName: string, name: string): RelationInfo | undefined {
    return this.#relations.get(modelName)?.get(name)
  }

  getRelation(modelName: string, name: string): RelationInfo {
    const relations = this.#relationMap(modelName)
    const relation = relations.get(name)
    if (!relation) {
      throw createError(
        `Unknown relation '${name}' on model ${modelName}`,
        { modelName, relation: name, availableFields: [...relations.keys()] },
        'RELATION_ERROR',
      )
    }
    return relation
  }

  relationsOf(modelName: string): readonly RelationInfo[] {
    return [...this.#relationMap(modelName).values()]
  }

  primaryKey(model: Model): readonly string[] {
    return requirePrimaryKey(model)
  }

  scope(model: Model, name: string): ScopeDefinition | undefined {
    const scopes = model.scopes
    if (!scopes || !Object.prototype.hasOwnProperty.call(scopes, name)) {
      return undefined
    }
    return scopes[name]
  }
}

export function createSchema(config: SchemaConfig): SchemaRegistry {
  if (config.models && config.dmmf) {
    throw new Error('Pass either models or dmmf, not both')
  }

  const models =
    config.models ??
    (config.dmmf ? convertDMMFToModels(config.dmmf.datamodel) : undefined)

  if (!models) {
    throw new Error('Either models or dmmf is required')
  }

  return new SchemaRegistry(models, config.through, config.relationFilters)
}
