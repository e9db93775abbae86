/**
 * Database URL resolution.
 *
 * Every package that needs a connection string should import from here
 * instead of reading env vars directly.
 *
 * The `prefix` parameter lets a subsystem define its own override:
 *   getDatabaseUrl('TEST')  → TEST_DATABASE_URL > DATABASE_URL > sqlite:///./database.db
 *   getDatabaseUrl()        → DATABASE_URL > sqlite:///./database.db
 */
import { DatabaseError } from './errors'

export const DEFAULT_DATABASE_URL = 'sqlite:///./database.db'

export type ParsedDatabaseUrl =
  | { driver: 'sqlite'; dbName: string; url: string }
  | { driver: 'postgresql'; clientUrl: string; url: string }

export function getDatabaseUrl(prefix?: string): string {
  if (prefix) {
    const prefixed = process.env[`${prefix}_DATABASE_URL`]
    if (prefixed) return prefixed
  }
  return process.env.DATABASE_URL || DEFAULT_DATABASE_URL
}

/**
 * Accepts `sqlite:///relative/or/absolute.db`, `sqlite://:memory:` and
 * `postgres://` / `postgresql://` URLs.
 */
export function parseDatabaseUrl(url: string): ParsedDatabaseUrl {
  if (url.startsWith('sqlite:')) {
    const rest = url.slice('sqlite:'.length).replace(/^\/\//, '')
    if (rest === ':memory:' || rest === '' || rest === '/') return { driver: 'sqlite', dbName: ':memory:', url }
    // sqlite:///./file.db → ./file.db, sqlite:////var/db.sqlite → /var/db.sqlite
    return { driver: 'sqlite', dbName: rest.startsWith('/') ? rest.slice(1) : rest, url }
  }
  if (url.startsWith('postgres://') || url.startsWith('postgresql://')) {
    return { driver: 'postgresql', clientUrl: url, url }
  }
  throw new DatabaseError(`Unsupported database URL scheme: ${url.split(':')[0]}`)
}

export function isEchoEnabled(): boolean {
  const raw = (process.env.DB_ECHO ?? '').trim().toLowerCase()
  return raw === '1' || raw === 'true' || raw === 'yes'
}
