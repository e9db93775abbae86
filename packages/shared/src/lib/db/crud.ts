import type { EntityName, FilterQuery, QueryOrderMap, RequiredEntityData } from '@mikro-orm/core'
import type { FilterClause, FilterInput, OrderByInput, SortDir } from '../query/types'
import { describeEntity, hasField, type EntityDescription } from './entity'
import { AmbiguousResultError, NotFoundError, ValidationError } from './errors'
import { buildFilterClauses } from './filters'
import { buildOrdering } from './ordering'
import { normalizeDbErrors, type Session } from './transactions'

export type PrimaryKeyValue = string | number | bigint

// Scalar key, or the values of a composite key in primary-key order
export type EntityIdentifier = PrimaryKeyValue | PrimaryKeyValue[]

export type GetOptions = {
  filters?: FilterInput | null
  orderBy?: OrderByInput | null
  oneOrNone?: boolean
}

export type Projection<T, K extends keyof T & string> = {
  entity: EntityName<T>
  fields: readonly K[]
}

export type ProjectedRow<T, K extends keyof T> = Partial<Pick<T, K>>

// Only the fields that were set; undefined means "leave as is"
export type EntityPatch<T> = Partial<T>

type IdentityWhere = Record<string, PrimaryKeyValue>

// The ORM types its where/orderBy per entity; clauses here are built from
// field names checked against the entity metadata.
function toWhere<T extends object>(where: { $and: FilterClause[] } | IdentityWhere | Record<string, never>): FilterQuery<T> {
  return where as unknown as FilterQuery<T>
}

function toOrderBy<T extends object>(ordering: Array<Record<string, SortDir>>): QueryOrderMap<T>[] {
  return ordering as unknown as QueryOrderMap<T>[]
}

function isPrimaryKeyValue(value: unknown): value is PrimaryKeyValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint'
}

export function toIdentifier(value: unknown): EntityIdentifier {
  if (isPrimaryKeyValue(value)) return value
  if (Array.isArray(value) && value.length > 0 && value.every(isPrimaryKeyValue)) return [...value]
  throw new ValidationError('Identifier must be a string, a number or a list of them')
}

function identityWhere(description: EntityDescription, id: EntityIdentifier): IdentityWhere {
  const values = Array.isArray(id) ? id : [id]
  if (values.length !== description.primaryKeys.length) {
    throw new ValidationError(
      `${description.name} primary key expects ${description.primaryKeys.length} value(s), got ${values.length}`
    )
  }
  const where: IdentityWhere = {}
  description.primaryKeys.forEach((key, index) => {
    where[key] = values[index]
  })
  return where
}

function isProjection<T, K extends keyof T & string>(target: EntityName<T> | Projection<T, K>): target is Projection<T, K> {
  return typeof target === 'object' && target !== null && 'fields' in target && Array.isArray(target.fields)
}

function pickFields<T, K extends keyof T & string>(row: T, fields: readonly K[]): ProjectedRow<T, K> {
  const picked: ProjectedRow<T, K> = {}
  for (const field of fields) picked[field] = row[field]
  return picked
}

// Removed in this session but not flushed yet: the identity map still returns it
function isPendingRemoval(session: Session, entity: object): boolean {
  return session.getUnitOfWork().getRemoveStack().has(entity)
}

async function findRows<T extends object>(session: Session, entity: EntityName<T>, options: GetOptions): Promise<T[]> {
  const description = describeEntity(session, entity)
  const clauses = options.filters ? buildFilterClauses(description, options.filters) : []
  const ordering = options.orderBy && options.orderBy.length ? buildOrdering(description, options.orderBy) : []
  const found: T[] = await session.find(entity, toWhere<T>(clauses.length ? { $and: clauses } : {}), {
    ...(ordering.length ? { orderBy: toOrderBy<T>(ordering) } : {}),
    // two rows are enough to tell "one" from "more than one"
    ...(options.oneOrNone ? { limit: 2 } : {}),
  })
  const rows = found.filter((row) => !isPendingRemoval(session, row))
  if (options.oneOrNone && rows.length > 1) {
    throw new AmbiguousResultError(`Multiple ${description.name} rows match the given filters`)
  }
  return rows
}

/**
 * Lists rows of an entity (or a projection of some of its fields), filtered
 * and ordered. With `oneOrNone` the single match or `null` is returned.
 */
export function get<T extends object>(
  session: Session,
  entity: EntityName<T>,
  options: GetOptions & { oneOrNone: true }
): Promise<T | null>
export function get<T extends object>(
  session: Session,
  entity: EntityName<T>,
  options?: GetOptions & { oneOrNone?: false }
): Promise<T[]>
export function get<T extends object, K extends keyof T & string>(
  session: Session,
  projection: Projection<T, K>,
  options: GetOptions & { oneOrNone: true }
): Promise<ProjectedRow<T, K> | null>
export function get<T extends object, K extends keyof T & string>(
  session: Session,
  projection: Projection<T, K>,
  options?: GetOptions & { oneOrNone?: false }
): Promise<ProjectedRow<T, K>[]>
export function get<T extends object, K extends keyof T & string>(
  session: Session,
  target: EntityName<T> | Projection<T, K>,
  options: GetOptions = {}
): Promise<T[] | T | ProjectedRow<T, K>[] | ProjectedRow<T, K> | null> {
  return normalizeDbErrors(async () => {
    if (!isProjection(target)) {
      const rows = await findRows(session, target, options)
      return options.oneOrNone ? rows[0] ?? null : rows
    }
    const description = describeEntity(session, target.entity)
    for (const field of target.fields) {
      if (!hasField(description, field)) {
        throw new ValidationError(`Field '${field}' not found on ${description.name}`)
      }
    }
    const rows = await findRows(session, target.entity, options)
    const projected = rows.map((row) => pickFields(row, target.fields))
    return options.oneOrNone ? projected[0] ?? null : projected
  })
}

/** Primary-key lookup; a missing row is not an error here. */
export function getById<T extends object>(session: Session, entity: EntityName<T>, id: EntityIdentifier): Promise<T | null> {
  return normalizeDbErrors(async () => {
    const description = describeEntity(session, entity)
    const found: T | null = await session.findOne(entity, toWhere<T>(identityWhere(description, id)))
    return found && !isPendingRemoval(session, found) ? found : null
  })
}

async function loadOrFail<T extends object>(session: Session, entity: EntityName<T>, id: EntityIdentifier) {
  const description = describeEntity(session, entity)
  const found: T | null = await session.findOne(entity, toWhere<T>(identityWhere(description, id)))
  if (!found || isPendingRemoval(session, found)) throw new NotFoundError(`${description.name} not found`)
  return { description, found }
}

/**
 * Persists one instance or a list, flushing and refreshing each so generated
 * columns (ids, defaults) are populated. Returns what it was given: an
 * instance for an instance, a list for a list.
 */
export function save<T extends object>(session: Session, instances: T[]): Promise<T[]>
export function save<T extends object>(session: Session, instance: T): Promise<T>
export function save<T extends object>(session: Session, input: T | T[]): Promise<T | T[]> {
  return normalizeDbErrors(async () => {
    const items: T[] = Array.isArray(input) ? input : [input]
    session.persist(items)
    await session.flush()
    for (const item of items) {
      await session.refresh(item)
    }
    return Array.isArray(input) ? items : input
  })
}

export function saveAll<T extends object>(session: Session, instances: T[]): Promise<T[]> {
  return save(session, instances)
}

/**
 * Partial update by id: only fields present in `patch` are written and
 * primary-key fields are never overwritten.
 */
export function update<T extends object>(
  session: Session,
  entity: EntityName<T>,
  id: EntityIdentifier,
  patch: EntityPatch<T>
): Promise<T> {
  return normalizeDbErrors(async () => {
    const { description, found } = await loadOrFail(session, entity, id)
    for (const field of description.fields) {
      if (description.primaryKeys.includes(field)) continue
      if (!Object.prototype.hasOwnProperty.call(patch, field)) continue
      const value: unknown = Reflect.get(patch, field)
      if (value === undefined) continue
      Reflect.set(found, field, value)
    }
    session.persist(found)
    await session.flush()
    await session.refresh(found)
    return found
  })
}

/** Marks the row for deletion; the flush or commit removes it. */
export function remove<T extends object>(session: Session, entity: EntityName<T>, id: EntityIdentifier): Promise<true> {
  return normalizeDbErrors(async () => {
    const { found } = await loadOrFail(session, entity, id)
    session.remove(found)
    return true as const
  })
}

export { remove as deleteById }

function hasBlankFilterValue(filters: FilterInput): boolean {
  return Object.values(filters).some((value) => value === null || value === undefined || value === '')
}

async function findExisting<T extends object>(session: Session, entity: EntityName<T>, filters: FilterInput): Promise<T | null> {
  if ('id' in filters) return getById(session, entity, toIdentifier(filters.id))
  return get(session, entity, { filters, oneOrNone: true })
}

/**
 * Returns the row matching `filters`, creating it from `values` when there is
 * none. Blank filter values (null, undefined, '') short-circuit to `null`.
 */
export function getOrCreate<T extends object>(
  session: Session,
  entity: EntityName<T>,
  values: RequiredEntityData<T>,
  filters: FilterInput
): Promise<T | null> {
  return normalizeDbErrors(async () => {
    if (hasBlankFilterValue(filters)) return null
    const existing = await findExisting(session, entity, filters)
    if (existing) return existing
    return save(session, session.create(entity, values, { persist: false }))
  })
}

/**
 * Same lookup as `getOrCreate`, but a miss yields a transient instance that
 * is not persisted.
 */
export function getOrConvert<T extends object>(
  session: Session,
  entity: EntityName<T>,
  values: RequiredEntityData<T>,
  filters: FilterInput
): Promise<T | null> {
  return normalizeDbErrors(async () => {
    if (hasBlankFilterValue(filters)) return null
    const existing = await findExisting(session, entity, filters)
    if (existing) return existing
    return session.create(entity, values, { persist: false })
  })
}
