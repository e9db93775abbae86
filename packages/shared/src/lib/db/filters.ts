import { FILTER_OPERATORS, type FilterClause, type FilterInput, type FilterOp, type WhereOps } from '../query/types'
import { hasField, type EntityDescription } from './entity'
import { ValidationError } from './errors'

const OPERATOR_SEPARATOR = '__'

type ConditionBuilder = (value: unknown, rawKey: string) => WhereOps

function likeOperand(value: unknown, rawKey: string): string {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'bigint') return String(value)
  throw new ValidationError(`Value for '${rawKey}' must be a string`)
}

const conditionBuilders: Record<FilterOp, ConditionBuilder> = {
  eq: (value) => ({ $eq: value }),
  ne: (value) => ({ $ne: value }),
  lt: (value) => ({ $lt: value }),
  lte: (value) => ({ $lte: value }),
  gt: (value) => ({ $gt: value }),
  gte: (value) => ({ $gte: value }),
  in: (value, rawKey) => {
    if (Array.isArray(value)) return { $in: [...value] }
    if (value instanceof Set) return { $in: Array.from(value) }
    throw new ValidationError(`Value for '${rawKey}' must be an array or a set for __in`)
  },
  contains: (value, rawKey) => ({ $like: `%${likeOperand(value, rawKey)}%` }),
  like: (value, rawKey) => ({ $like: likeOperand(value, rawKey) }),
}

export function isFilterOp(value: string): value is FilterOp {
  return FILTER_OPERATORS.some((op) => op === value)
}

export function parseFilterKey(rawKey: string): { field: string; op: string } {
  const at = rawKey.indexOf(OPERATOR_SEPARATOR)
  if (at === -1) return { field: rawKey, op: 'eq' }
  return { field: rawKey.slice(0, at), op: rawKey.slice(at + OPERATOR_SEPARATOR.length) }
}

/**
 * Turns `{ field__op: value }` entries into one clause each, in insertion order.
 * The clauses are meant to be AND-ed; there is no OR or nesting.
 */
export function buildFilterClauses(entity: EntityDescription, filters: FilterInput): FilterClause[] {
  const clauses: FilterClause[] = []
  for (const [rawKey, value] of Object.entries(filters)) {
    const { field, op } = parseFilterKey(rawKey)
    if (!hasField(entity, field)) {
      throw new ValidationError(`Field '${field}' not found on ${entity.name}`)
    }
    if (!isFilterOp(op)) {
      throw new ValidationError(`Unsupported filter operation: ${op}`)
    }
    clauses.push({ [field]: conditionBuilders[op](value, rawKey) })
  }
  return clauses
}
