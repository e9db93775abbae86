import type { EntityManager, EntityMetadata, EntityName } from '@mikro-orm/core'

/**
 * What the CRUD helpers need to know about a mapped entity: its name for
 * messages, which fields can be filtered or sorted on, and the primary key
 * shape.
 */
export type EntityDescription = {
  name: string
  fields: readonly string[]
  primaryKeys: readonly string[]
}

export function describeMetadata<T>(meta: EntityMetadata<T>): EntityDescription {
  return {
    name: meta.className,
    fields: meta.props.map((prop) => prop.name),
    primaryKeys: [...meta.primaryKeys],
  }
}

export function describeEntity<T extends object>(em: EntityManager, entity: EntityName<T>): EntityDescription {
  return describeMetadata(em.getMetadata(entity))
}

export function hasField(description: EntityDescription, field: string): boolean {
  return description.fields.includes(field)
}
