/**
 * Error taxonomy for the data layer.
 *
 * Every CRUD helper surfaces one of these; `statusCode` is what the HTTP
 * boundary answers with.
 */
export class DatabaseError extends Error {
  readonly statusCode: number

  constructor(message: string, statusCode = 500) {
    super(message)
    this.name = 'DatabaseError'
    this.statusCode = statusCode
  }
}

/** A lookup that requires an existing row found nothing. */
export class NotFoundError extends DatabaseError {
  constructor(message: string) {
    super(message, 404)
    this.name = 'NotFoundError'
  }
}

/** Malformed filter, ordering or identifier input. */
export class ValidationError extends DatabaseError {
  constructor(message: string) {
    super(message, 400)
    this.name = 'ValidationError'
  }
}

/** A single-result lookup matched more than one row. */
export class AmbiguousResultError extends DatabaseError {
  constructor(message: string) {
    super(message, 500)
    this.name = 'AmbiguousResultError'
  }
}

export function isDatabaseError(value: unknown): value is DatabaseError {
  return value instanceof DatabaseError
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
