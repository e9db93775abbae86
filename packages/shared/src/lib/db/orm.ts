import { MikroORM, type Logger, type Options } from '@mikro-orm/core'
import { PostgreSqlDriver } from '@mikro-orm/postgresql'
import { LibSqlDriver } from '@mikro-orm/libsql'
import { getDatabaseUrl, isEchoEnabled, parseDatabaseUrl } from './config'
import { DatabaseError, errorMessage } from './errors'
import type { Session } from './transactions'

export type DatabaseOptions = {
  entities: NonNullable<Options['entities']>
  url?: string
  echo?: boolean
}

function createMinimalLogger(echo: boolean): Logger {
  return {
    log: (_namespace, message) => {
      if (echo) console.log(`[db] ${message}`)
    },
    error: (_namespace, message) => console.error(`[db] ${message}`),
    warn: (_namespace, message) => console.warn(`[db] ${message}`),
    logQuery: (context) => {
      if (echo && context.query) console.log(`[db] ${context.query}`)
    },
    setDebugMode: () => {},
    isEnabled: (namespace) => echo && namespace === 'query',
  }
}

export function createOrmOptions(options: DatabaseOptions): Options {
  const echo = options.echo ?? isEchoEnabled()
  const parsed = parseDatabaseUrl(options.url ?? getDatabaseUrl())
  const common: Options = {
    entities: options.entities,
    debug: echo ? ['query'] : false,
    loggerFactory: () => createMinimalLogger(echo),
    discovery: { warnWhenNoEntities: false },
  }
  if (parsed.driver === 'sqlite') {
    // one connection, shared by every session; ':memory:' would otherwise be per-connection
    return { ...common, driver: LibSqlDriver, dbName: parsed.dbName, pool: { min: 1, max: 1 } }
  }
  return { ...common, driver: PostgreSqlDriver, clientUrl: parsed.clientUrl, pool: { min: 1, max: 10 } }
}

let ormPromise: Promise<MikroORM> | null = null

/**
 * Creates the process-wide engine once. Later calls return the same instance
 * until `disposeOrm` runs.
 */
export function initOrm(options: DatabaseOptions): Promise<MikroORM> {
  if (!ormPromise) {
    ormPromise = MikroORM.init(createOrmOptions(options)).catch((err: unknown) => {
      ormPromise = null
      throw err
    })
  }
  return ormPromise
}

export async function getOrm(): Promise<MikroORM> {
  if (!ormPromise) throw new DatabaseError('Database is not initialized; call initOrm first')
  return ormPromise
}

export async function openSession(): Promise<Session> {
  const orm = await getOrm()
  return orm.em.fork()
}

/** Rolls back whatever the session left open and detaches its entities. */
export async function releaseSession(session: Session): Promise<void> {
  if (session.isInTransaction()) {
    try {
      await session.rollback()
    } catch (err) {
      console.warn('[db] rollback on release failed', { error: errorMessage(err) })
    }
  }
  session.clear()
}

/** Opens a session for the duration of `fn` and releases it on every exit path. */
export async function withSession<TResult>(fn: (session: Session) => Promise<TResult>): Promise<TResult> {
  const session = await openSession()
  try {
    return await fn(session)
  } finally {
    await releaseSession(session)
  }
}

/** Creates missing tables and columns for every registered entity; nothing is dropped. */
export async function createDbAndTables(orm?: MikroORM): Promise<void> {
  const target = orm ?? (await getOrm())
  await target.getSchemaGenerator().updateSchema({ safe: true })
}

export async function disposeOrm(): Promise<void> {
  if (!ormPromise) return
  const pending = ormPromise
  ormPromise = null
  const orm = await pending
  await orm.close(true)
}

/**
 * Startup/shutdown wrapper for a long-running process: tables exist before
 * `run` starts and the engine is closed once it settles.
 */
export async function lifespan<TResult>(options: DatabaseOptions, run: (orm: MikroORM) => Promise<TResult>): Promise<TResult> {
  const orm = await initOrm(options)
  await createDbAndTables(orm)
  try {
    return await run(orm)
  } finally {
    console.log('[db] shutting down')
    await disposeOrm()
  }
}
