import { SortDir, type OrderByInput, type Sort } from '../query/types'
import { hasField, type EntityDescription } from './entity'
import { ValidationError } from './errors'

export function parseOrderField(raw: string): Sort {
  if (raw.startsWith('-')) return { field: raw.slice(1), dir: SortDir.Desc }
  return { field: raw, dir: SortDir.Asc }
}

/**
 * Sort terms in the given sequence; the first entry is the primary key of the sort.
 */
export function buildOrdering(entity: EntityDescription, orderBy: OrderByInput): Array<Record<string, SortDir>> {
  return orderBy.map((raw) => {
    const { field, dir } = parseOrderField(raw)
    if (!hasField(entity, field)) {
      throw new ValidationError(`Order field '${field}' not found`)
    }
    return { [field]: dir }
  })
}
