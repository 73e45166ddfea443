/**
 * Error types shared by the store, the controllers and the API routes.
 * Each carries the HTTP status the API answers with.
 */

export class OperatorError extends Error {
  readonly status: number

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.status = status
  }
}

// Malformed request body
export class BadRequestError extends OperatorError {
  readonly details: string[]

  constructor(message: string, details: string[] = []) {
    super(message, 400)
    this.details = details
  }
}

export class NotFoundError extends OperatorError {
  constructor(kind: string, namespace: string, name: string) {
    super(`${kind} ${namespace}/${name} not found`, 404)
  }
}

// Stale write or name collision
export class ConflictError extends OperatorError {
  constructor(message: string) {
    super(message, 409)
  }
}

export class ValidationError extends OperatorError {
  readonly details: string[]

  constructor(details: string[]) {
    super(details.join('; '), 422)
    this.details = details
  }
}

export class ImmutableError extends OperatorError {
  constructor(message: string) {
    super(message, 409)
  }
}

export class ForbiddenError extends OperatorError {
  constructor(message: string) {
    super(message, 403)
  }
}

export class IndexNotSyncedError extends OperatorError {
  constructor() {
    super('reference index has not been synced yet', 503)
  }
}

export class TransientError extends OperatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503, options)
  }
}

export function isNotFound(err: unknown): err is NotFoundError {
  return err instanceof NotFoundError
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error'
}
