import { Hono } from 'hono'
import { logger } from 'hono/logger'
import { errorHandler } from './middleware/errors'
import { servicesMiddleware, type ApiServices } from './middleware/services'
import { attachmentsRoutes } from './routes/attachments'
import { hostsRoutes } from './routes/hosts'
import { switchesRoutes } from './routes/switches'
import { secretsRoutes } from './routes/secrets'

export interface AppOptions {
  // Request logging; off in tests
  requestLog?: boolean
}

export function createApp(services: ApiServices, options: AppOptions = {}) {
  const app = new Hono()

  // Middleware
  if (options.requestLog ?? true) {
    app.use('*', logger())
  }
  app.onError(errorHandler)

  // API routes
  const api = new Hono()

  api.get('/healthz', (c) => c.json({ status: 'ok', indexSynced: services.index.isSynced }))

  api.use('/*', servicesMiddleware(services))
  api.route('/attachments', attachmentsRoutes)
  api.route('/hosts', hostsRoutes)
  api.route('/switches', switchesRoutes)
  api.route('/secrets', secretsRoutes)

  app.route('/api', api)

  return app
}
