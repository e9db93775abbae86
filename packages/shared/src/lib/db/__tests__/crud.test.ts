import type { MikroORM } from '@mikro-orm/core'
import { get, getById, getOrConvert, getOrCreate, remove, deleteById, save, saveAll, toIdentifier, update } from '../crud'
import { AmbiguousResultError, DatabaseError, NotFoundError, ValidationError } from '../errors'
import { withCommit, type Session } from '../transactions'
import type { FilterInput } from '../../query/types'
import { Pairing, Widget } from './support/entities'
import { createTestOrm, seedWidgets } from './support/orm'

const names = (rows: Widget[]) => rows.map((row) => row.name)

describe('crud against sqlite', () => {
  let orm: MikroORM
  let em: Session
  let seeded: Record<string, Widget>

  beforeAll(async () => {
    orm = await createTestOrm()
  })

  afterAll(async () => {
    await orm.close(true)
  })

  beforeEach(async () => {
    const setup = orm.em.fork()
    await setup.nativeDelete(Widget, {})
    await setup.nativeDelete(Pairing, {})
    seeded = await seedWidgets(setup)
    em = orm.em.fork()
  })

  afterEach(() => {
    em.clear()
  })

  describe('get', () => {
    it('lists every row without filters', async () => {
      const rows = await get(em, Widget, { orderBy: ['name'] })
      expect(names(rows)).toEqual(['anchor', 'banana', 'cog', 'dynamo'])
    })

    const filterCases: Array<[FilterInput, string[]]> = [
      [{ color: 'red' }, ['anchor', 'dynamo']],
      [{ color__eq: 'yellow' }, ['banana']],
      [{ size__gt: 2, size__lte: 5 }, ['anchor', 'banana', 'dynamo']],
      [{ size__lt: 3 }, ['cog']],
      [{ size__gte: 5 }, ['banana']],
      [{ size__in: [1, 5] }, ['banana', 'cog']],
      [{ name__in: new Set(['cog', 'anchor']) }, ['anchor', 'cog']],
      [{ name__contains: 'an' }, ['anchor', 'banana']],
      [{ name__like: 'd%' }, ['dynamo']],
      [{ color__ne: 'red' }, ['banana']],
      [{ color: null }, ['cog']],
    ]

    it.each(filterCases)('filters %j', async (filters, expected) => {
      const rows = await get(em, Widget, { filters, orderBy: ['name'] })
      expect(names(rows)).toEqual(expected)
    })

    it('orders by several fields left to right', async () => {
      expect(names(await get(em, Widget, { orderBy: ['-size', 'name'] }))).toEqual(['banana', 'anchor', 'dynamo', 'cog'])
      expect(names(await get(em, Widget, { orderBy: ['-size', '-name'] }))).toEqual(['banana', 'dynamo', 'anchor', 'cog'])
    })

    it('returns the single match or null with oneOrNone', async () => {
      const cog = await get(em, Widget, { filters: { name: 'cog' }, oneOrNone: true })
      expect(cog?.id).toBe(seeded.cog.id)
      await expect(get(em, Widget, { filters: { name: 'zeppelin' }, oneOrNone: true })).resolves.toBeNull()
    })

    it('refuses to pick one of several matches', async () => {
      await expect(get(em, Widget, { filters: { color: 'red' }, oneOrNone: true })).rejects.toBeInstanceOf(AmbiguousResultError)
    })

    it('projects the requested fields', async () => {
      const rows = await get(em, { entity: Widget, fields: ['name', 'size'] }, { filters: { size: 3 }, orderBy: ['name'] })
      expect(rows).toEqual([
        { name: 'anchor', size: 3 },
        { name: 'dynamo', size: 3 },
      ])
      const one = await get(em, { entity: Widget, fields: ['color'] }, { filters: { name: 'banana' }, oneOrNone: true })
      expect(one).toEqual({ color: 'yellow' })
    })

    it('reports bad input as validation errors', async () => {
      await expect(get(em, Widget, { filters: { weight: 1 } })).rejects.toThrow(new ValidationError("Field 'weight' not found on Widget"))
      await expect(get(em, Widget, { filters: { size__between: [1, 2] } })).rejects.toBeInstanceOf(ValidationError)
      await expect(get(em, Widget, { orderBy: ['-weight'] })).rejects.toThrow("Order field 'weight' not found")
    })
  })

  describe('getById', () => {
    it('finds by scalar key', async () => {
      const found = await getById(em, Widget, seeded.banana.id)
      expect(found).toMatchObject({ id: seeded.banana.id, name: 'banana', size: 5, color: 'yellow' })
    })

    it('returns null for a missing key', async () => {
      await expect(getById(em, Widget, 987654)).resolves.toBeNull()
    })

    it('finds by composite key in primary-key order', async () => {
      const setup = orm.em.fork()
      setup.create(Pairing, { owner: 'anchor', partner: 'cog', note: 'spare' })
      await setup.flush()
      const found = await getById(em, Pairing, ['anchor', 'cog'])
      expect(found?.note).toBe('spare')
      await expect(getById(em, Pairing, ['cog', 'anchor'])).resolves.toBeNull()
    })

    it('rejects a key of the wrong arity', async () => {
      await expect(getById(em, Pairing, 'anchor')).rejects.toThrow('Pairing primary key expects 2 value(s), got 1')
    })
  })

  describe('save', () => {
    it('persists and returns the instance with generated columns', async () => {
      const eel = await save(em, em.create(Widget, { name: 'eel' }, { persist: false }))
      expect(typeof eel.id).toBe('number')
      expect(eel.size).toBe(0)

      const reloaded = await getById(orm.em.fork(), Widget, eel.id)
      expect(reloaded).toMatchObject({ id: eel.id, name: 'eel', size: 0, color: null })
    })

    it('returns a list for a list', async () => {
      const saved = await saveAll(em, [
        em.create(Widget, { name: 'fan', size: 2 }, { persist: false }),
        em.create(Widget, { name: 'gear', size: 4 }, { persist: false }),
      ])
      expect(saved.map((row) => row.name)).toEqual(['fan', 'gear'])
      expect(saved.every((row) => typeof row.id === 'number')).toBe(true)
    })

    it('wraps engine failures in DatabaseError', async () => {
      const broken = em.create(Pairing, { owner: 'a', partner: 'b' }, { persist: false })
      await save(em, broken)
      em.clear()
      const duplicate = em.create(Pairing, { owner: 'a', partner: 'b' }, { persist: false })
      const err = await save(em, duplicate).catch((e: unknown) => e)
      expect(err).toBeInstanceOf(DatabaseError)
      expect(err).not.toBeInstanceOf(NotFoundError)
    })
  })

  describe('update', () => {
    it('changes only the fields present in the patch', async () => {
      const updated = await update(em, Widget, seeded.anchor.id, { size: 10 })
      expect(updated).toMatchObject({ id: seeded.anchor.id, name: 'anchor', size: 10, color: 'red' })
    })

    it('never overwrites the primary key', async () => {
      const updated = await update(em, Widget, seeded.cog.id, { id: seeded.cog.id + 100, name: 'sprocket' })
      expect(updated.id).toBe(seeded.cog.id)
      const reloaded = await getById(orm.em.fork(), Widget, seeded.cog.id)
      expect(reloaded?.name).toBe('sprocket')
    })

    it('ignores undefined and writes null', async () => {
      const updated = await update(em, Widget, seeded.dynamo.id, { color: null, name: undefined })
      expect(updated).toMatchObject({ name: 'dynamo', color: null })
    })

    it('fails with NotFoundError for a missing id', async () => {
      await expect(update(em, Widget, 987654, { size: 1 })).rejects.toThrow(new NotFoundError('Widget not found'))
    })
  })

  describe('remove', () => {
    it('returns true and the row is gone after flush', async () => {
      await expect(remove(em, Widget, seeded.cog.id)).resolves.toBe(true)
      await em.flush()
      await expect(getById(orm.em.fork(), Widget, seeded.cog.id)).resolves.toBeNull()
    })

    it('is also exported as deleteById', async () => {
      await expect(deleteById(em, Widget, 987654)).rejects.toBeInstanceOf(NotFoundError)
    })

    it('hides a removed row from lookups on the same session before flush', async () => {
      await expect(getById(em, Widget, seeded.cog.id)).resolves.toMatchObject({ name: 'cog' })
      await remove(em, Widget, seeded.cog.id)
      await expect(getById(em, Widget, seeded.cog.id)).resolves.toBeNull()
      expect(names(await get(em, Widget, { filters: { size__lt: 3 } }))).toEqual([])
      await expect(get(em, Widget, { filters: { name: 'cog' }, oneOrNone: true })).resolves.toBeNull()
    })

    it('refuses to update or remove a row already removed on the same session', async () => {
      await remove(em, Widget, seeded.cog.id)
      await expect(update(em, Widget, seeded.cog.id, { size: 9 })).rejects.toThrow(new NotFoundError('Widget not found'))
      await expect(remove(em, Widget, seeded.cog.id)).rejects.toThrow(new NotFoundError('Widget not found'))
    })

    it('keeps the row gone after a committed delete on the same session', async () => {
      await withCommit(em, (session) => remove(session, Widget, seeded.cog.id))
      await expect(getById(em, Widget, seeded.cog.id)).resolves.toBeNull()
      expect(await orm.em.fork().count(Widget, { id: seeded.cog.id })).toBe(0)
    })
  })

  describe('withCommit', () => {
    it('leaves no row behind when the operation fails after writing', async () => {
      const pending = withCommit(em, async (session) => {
        await save(session, session.create(Widget, { name: 'ghost' }, { persist: false }))
        throw new Error('late failure')
      })
      await expect(pending).rejects.toThrow('late failure')
      expect(em.isInTransaction()).toBe(false)
      expect(await orm.em.fork().count(Widget, { name: 'ghost' })).toBe(0)
    })

    it('makes a committed write visible to another session', async () => {
      const created = await withCommit(em, (session) =>
        save(session, session.create(Widget, { name: 'ghost', size: 7 }, { persist: false }))
      )
      const other = orm.em.fork()
      await expect(getById(other, Widget, created.id)).resolves.toMatchObject({ name: 'ghost', size: 7 })
      expect(await other.count(Widget, {})).toBe(5)
    })

    it('commits nested writes once with the outer transaction', async () => {
      await expect(
        withCommit(em, async (outer) => {
          await withCommit(outer, (inner) => update(inner, Widget, seeded.anchor.id, { size: 30 }))
          throw new Error('outer failure')
        })
      ).rejects.toThrow('outer failure')
      await expect(getById(orm.em.fork(), Widget, seeded.anchor.id)).resolves.toMatchObject({ size: 3 })
    })
  })

  describe('getOrCreate', () => {
    it('creates exactly one row for repeated calls', async () => {
      const first = await getOrCreate(em, Widget, { name: 'hinge', size: 6 }, { name: 'hinge' })
      const second = await getOrCreate(orm.em.fork(), Widget, { name: 'hinge', size: 99 }, { name: 'hinge' })
      expect(first?.id).toBeDefined()
      expect(second?.id).toBe(first?.id)
      expect(second?.size).toBe(6)
      expect(await orm.em.fork().count(Widget, { name: 'hinge' })).toBe(1)
    })

    it('returns the existing row by id when the filters carry one', async () => {
      const found = await getOrCreate(em, Widget, { name: 'ignored' }, { id: seeded.banana.id })
      expect(found?.name).toBe('banana')
    })

    it('returns null and creates nothing for blank filter values', async () => {
      await expect(getOrCreate(em, Widget, { name: '' }, { name: '' })).resolves.toBeNull()
      await expect(getOrCreate(em, Widget, { name: 'x' }, { name: null })).resolves.toBeNull()
      expect(await orm.em.fork().count(Widget, {})).toBe(4)
    })
  })

  describe('getOrConvert', () => {
    it('returns the existing row', async () => {
      const found = await getOrConvert(em, Widget, { name: 'anchor' }, { name: 'anchor' })
      expect(found?.id).toBe(seeded.anchor.id)
    })

    it('builds an unsaved instance on a miss', async () => {
      const draft = await getOrConvert(em, Widget, { name: 'lever', size: 2 }, { name: 'lever' })
      expect(draft).toBeInstanceOf(Widget)
      expect(draft?.id).toBeUndefined()
      expect(draft?.name).toBe('lever')
      await em.flush()
      await expect(get(orm.em.fork(), Widget, { filters: { name: 'lever' }, oneOrNone: true })).resolves.toBeNull()
    })
  })
})

describe('toIdentifier', () => {
  it('accepts scalars and non-empty key lists', () => {
    expect(toIdentifier(5)).toBe(5)
    expect(toIdentifier(['a', 2])).toEqual(['a', 2])
  })

  it('rejects anything else', () => {
    expect(() => toIdentifier({ id: 1 })).toThrow(ValidationError)
    expect(() => toIdentifier([])).toThrow('Identifier must be a string, a number or a list of them')
  })
})
