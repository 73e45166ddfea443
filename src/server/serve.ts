import { serve } from '@hono/node-server'
import { loadConfig } from './config'
import { createDb, openSqlite } from './db/client'
import { migrate } from './db/migrate'
import { createOperator } from './operator'
import { createLogger } from './services/logger'

const log = createLogger('Server')

async function main() {
  const config = loadConfig()

  const sqlite = openSqlite(config.databasePath)
  migrate(sqlite)

  const operator = createOperator(createDb(sqlite), config)
  await operator.start()

  const server = serve({ fetch: operator.app.fetch, port: config.port }, (info) => {
    log.success(`Server running on http://localhost:${info.port}`)
    log.info('Ironic endpoint', { endpoint: config.ironic.endpoint })
  })

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down`)
    server.close()
    operator.stop()
      .then(() => sqlite.close())
      .catch(err => {
        log.error('Shutdown failed', { error: err })
        process.exitCode = 1
      })
  }

  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch(err => {
  log.error('Failed to start', { error: err })
  process.exit(1)
})
