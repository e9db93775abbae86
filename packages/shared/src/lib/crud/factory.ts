import { Hono } from 'hono'
import { z } from 'zod'
import type { EntityClass, RequiredEntityData } from '@mikro-orm/core'
import { createRequestContainer, type AppContainer } from '../di/container'
import { get, getById, remove, update, save, type EntityPatch, type PrimaryKeyValue } from '../db/crud'
import { isDatabaseError } from '../db/errors'
import { withCommit, type Session } from '../db/transactions'

export type CrudSchemas<TCreate, TRead, TUpdate> = {
  create: z.ZodType<TCreate, z.ZodTypeDef, unknown>
  read: z.ZodType<TRead, z.ZodTypeDef, unknown>
  update: z.ZodType<TUpdate, z.ZodTypeDef, unknown>
}

export type CrudRouterOptions<T extends object, TCreate, TRead, TUpdate> = {
  entity: EntityClass<T>
  schemas: CrudSchemas<TCreate, TRead, TUpdate>
  prefix: string
  tags?: string[]
  // Parses one path segment into a key value; numeric segments become numbers by default
  idSchema?: z.ZodType<PrimaryKeyValue, z.ZodTypeDef, string>
  // Falls back to the process-wide container
  container?: AppContainer
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

export type CrudRoute = {
  method: HttpMethod
  path: string
  status: number
  summary: string
}

export type CrudRouter = {
  prefix: string
  tags: string[]
  routes: CrudRoute[]
  app: Hono
}

// Digit strings become numbers only when the round trip is exact ('007' and 2^53+ stay strings)
export function parseIdSegment(raw: string): PrimaryKeyValue {
  const asNumber = Number(raw)
  return Number.isSafeInteger(asNumber) && String(asNumber) === raw ? asNumber : raw
}

export const defaultIdSchema = z.string().min(1).transform(parseIdSegment)

function json(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  })
}

function methodNotAllowed(allowed: HttpMethod[]): Response {
  return json({ error: 'Method not allowed' }, 405, { allow: allowed.join(', ') })
}

export function handleError(err: unknown): Response {
  if (err instanceof z.ZodError) return json({ error: 'Invalid input', details: err.issues }, 400)
  if (isDatabaseError(err)) {
    if (err.statusCode >= 500) console.error('[crud] database error', { name: err.name, message: err.message })
    return json({ error: err.message }, err.statusCode)
  }
  const message = err instanceof Error ? err.message : undefined
  const stack = err instanceof Error ? err.stack : undefined
  console.error('[crud] unexpected error', { message, stack })
  return json({ error: 'Internal server error' }, 500)
}

function normalizePrefix(prefix: string): string {
  const trimmed = prefix.replace(/\/+$/, '')
  if (!trimmed) return '/'
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`
}

async function readBody(request: Request): Promise<unknown> {
  const body: unknown = await request.json().catch(() => ({}))
  return body
}

/**
 * Builds list/get/create/update/delete endpoints for one entity as a Hono
 * sub-app, meant to be mounted under `prefix`. Writes run inside `withCommit`.
 */
export function makeCrudRouter<T extends object, TCreate extends RequiredEntityData<T>, TRead, TUpdate extends EntityPatch<T>>(
  opts: CrudRouterOptions<T, TCreate, TRead, TUpdate>
): CrudRouter {
  const prefix = normalizePrefix(opts.prefix)
  const tags = opts.tags ?? []
  const idSchema = opts.idSchema ?? defaultIdSchema
  const { schemas, entity } = opts
  const base = prefix === '/' ? '' : prefix
  const root = base || '/'

  const routes: CrudRoute[] = [
    { method: 'GET', path: root, status: 200, summary: 'List all' },
    { method: 'GET', path: `${base}/{id}`, status: 200, summary: 'Get by id' },
    { method: 'GET', path: `${base}/{id}/{id2}`, status: 200, summary: 'Get by composite id' },
    { method: 'POST', path: root, status: 201, summary: 'Create' },
    { method: 'PUT', path: `${base}/{id}`, status: 200, summary: 'Update' },
    { method: 'DELETE', path: `${base}/{id}`, status: 204, summary: 'Delete' },
  ]

  const toRead = (row: T): TRead => schemas.read.parse(row)

  async function withScope(run: (em: Session) => Promise<Response>): Promise<Response> {
    try {
      const scope = await createRequestContainer(opts.container)
      try {
        return await run(scope.resolve('em'))
      } finally {
        await scope.dispose()
      }
    } catch (err) {
      return handleError(err)
    }
  }

  function getOne(rawIds: string[]): Promise<Response> {
    return withScope(async (em) => {
      const ids = rawIds.map((raw) => idSchema.parse(raw))
      const found = await getById(em, entity, ids.length === 1 ? ids[0] : ids)
      if (!found) return json({ error: `${entity.name} not found` }, 404)
      return json(toRead(found))
    })
  }

  const app = new Hono()

  app.get('/', () =>
    withScope(async (em) => {
      const rows = await get(em, entity)
      return json(rows.map(toRead))
    })
  )

  app.post('/', (c) =>
    withScope(async (em) => {
      const input = schemas.create.parse(await readBody(c.req.raw))
      const created = await withCommit(em, (session) => save(session, session.create(entity, input, { persist: false })))
      return json(toRead(created), 201)
    })
  )

  app.get('/:id', (c) => getOne([c.req.param('id')]))

  app.get('/:id/:id2', (c) => getOne([c.req.param('id'), c.req.param('id2')]))

  app.put('/:id', (c) =>
    withScope(async (em) => {
      const id = idSchema.parse(c.req.param('id'))
      const patch = schemas.update.parse(await readBody(c.req.raw))
      const updated = await withCommit(em, (session) => update(session, entity, id, patch))
      return json(toRead(updated))
    })
  )

  app.delete('/:id', (c) =>
    withScope(async (em) => {
      const id = idSchema.parse(c.req.param('id'))
      await withCommit(em, (session) => remove(session, entity, id))
      return new Response(null, { status: 204 })
    })
  )

  // registered last: only reached when no method above matched
  app.all('/', () => methodNotAllowed(['GET', 'POST']))
  app.all('/:id', () => methodNotAllowed(['GET', 'PUT', 'DELETE']))
  app.all('/:id/:id2', () => methodNotAllowed(['GET']))

  return { prefix, tags, routes, app }
}

/** Mounts every router under its prefix on one app; unknown paths answer a JSON 404. */
export function createCrudApp(routers: readonly CrudRouter[]): Hono {
  const app = new Hono()
  for (const router of routers) app.route(router.prefix, router.app)
  app.notFound(() => json({ error: 'Not found' }, 404))
  return app
}
