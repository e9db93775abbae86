export const FILTER_OPERATORS = ['eq', 'ne', 'lt', 'lte', 'gt', 'gte', 'in', 'contains', 'like'] as const

export type FilterOp = (typeof FILTER_OPERATORS)[number]

export enum SortDir {
  Asc = 'asc',
  Desc = 'desc',
}

// Keys are `field` or `field__op`, e.g. { name__contains: 'fern', height__gte: 10 }
export type FilterInput = Record<string, unknown>

// Mongo-style operator object understood by the ORM
export type WhereOps = {
  $eq?: unknown
  $ne?: unknown
  $gt?: unknown
  $gte?: unknown
  $lt?: unknown
  $lte?: unknown
  $in?: unknown[]
  $like?: string
}

// One predicate against one field; a list of these is AND-ed
export type FilterClause = Record<string, WhereOps>

export type Sort = { field: string; dir: SortDir }

// Field names, `-name` for descending
export type OrderByInput = readonly string[]
