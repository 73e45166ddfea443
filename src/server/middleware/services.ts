import type { MiddlewareHandler } from 'hono'
import type { ResourceStore } from '../db/store'
import type { AttachmentGuard } from '../services/attachment-guard'
import type { HostEventRecorder } from '../services/events'
import type { ReferenceIndex } from '../services/reference-index'

export interface ApiServices {
  store: ResourceStore
  guard: AttachmentGuard
  events: HostEventRecorder
  index: ReferenceIndex
}

declare module 'hono' {
  interface ContextVariableMap {
    services: ApiServices
  }
}

export function servicesMiddleware(services: ApiServices): MiddlewareHandler {
  return async (c, next) => {
    c.set('services', services)
    await next()
  }
}
