import type { ErrorHandler } from 'hono'
import { HTTPException } from 'hono/http-exception'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { BadRequestError, OperatorError, ValidationError } from '../services/errors'
import { createLogger } from '../services/logger'

const log = createLogger('API')

function toStatus(status: number): ContentfulStatusCode {
  switch (status) {
    case 400: return 400
    case 403: return 403
    case 404: return 404
    case 409: return 409
    case 422: return 422
    case 502: return 502
    case 503: return 503
    default: return status >= 500 ? 502 : 400
  }
}

// Maps thrown errors to `{ error, details? }` JSON responses
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof HTTPException) {
    return err.getResponse()
  }

  if (err instanceof ValidationError || err instanceof BadRequestError) {
    return c.json({ error: err.message, details: err.details }, toStatus(err.status))
  }

  if (err instanceof OperatorError) {
    if (err.status >= 500) {
      log.warn(err.message, { path: c.req.path })
    }
    return c.json({ error: err.message }, toStatus(err.status))
  }

  log.error('Unhandled error', { method: c.req.method, path: c.req.path, error: err })
  return c.json({ error: 'Internal server error' }, 500)
}
