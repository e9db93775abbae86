import type { EntityManager } from '@mikro-orm/core'
import { DatabaseError, errorMessage, isDatabaseError } from './errors'

export type Session = EntityManager

/**
 * Runs an async operation so callers only ever see taxonomy errors:
 * a `DatabaseError` (or subtype) is rethrown untouched, anything else
 * becomes a generic `DatabaseError` carrying the original message.
 */
export async function normalizeDbErrors<TResult>(operation: () => Promise<TResult>): Promise<TResult> {
  try {
    return await operation()
  } catch (err) {
    if (isDatabaseError(err)) throw err
    throw new DatabaseError(errorMessage(err))
  }
}

export function withDbErrors<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => Promise<TResult>
): (...args: TArgs) => Promise<TResult> {
  return (...args: TArgs) => normalizeDbErrors(() => fn(...args))
}

async function rollbackQuietly(session: Session, cause: unknown): Promise<void> {
  try {
    await session.rollback()
  } catch (rollbackErr) {
    // the original failure is what the caller needs to see
    console.warn('[db] rollback failed', { rollbackError: errorMessage(rollbackErr), cause: errorMessage(cause) })
  }
}

/**
 * Runs `operation` as a unit of work on `session`: commit on success, one
 * rollback attempt on failure, then the original error is rethrown.
 *
 * When the session is already inside a transaction the operation joins it and
 * the outer owner decides; only pending changes are flushed.
 */
export async function withCommit<TResult>(
  session: Session,
  operation: (session: Session) => Promise<TResult>
): Promise<TResult> {
  if (session.isInTransaction()) {
    const result = await operation(session)
    await session.flush()
    return result
  }
  await session.begin()
  let result: TResult
  try {
    result = await operation(session)
  } catch (err) {
    await rollbackQuietly(session, err)
    throw err
  }
  try {
    await session.commit()
  } catch (err) {
    await rollbackQuietly(session, err)
    throw err
  }
  return result
}

/**
 * Higher-order form of `withCommit` for functions taking the session first.
 */
export function dbCommit<TArgs extends unknown[], TResult>(
  fn: (session: Session, ...args: TArgs) => Promise<TResult>
): (session: Session, ...args: TArgs) => Promise<TResult> {
  return (session: Session, ...args: TArgs) => withCommit(session, (active) => fn(active, ...args))
}
