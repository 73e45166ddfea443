import type { Config } from './config'
import type { Db } from './db/client'
import { ResourceStore } from './db/store'
import { createApp } from './index'
import { AttachmentGuard } from './services/attachment-guard'
import { HostController } from './services/controllers/host'
import { SwitchController } from './services/controllers/switch'
import { HostEventRecorder } from './services/events'
import { IronicClient } from './services/ironic/client'
import { PortReconciler } from './services/ironic/ports'
import { NodeRegistrar } from './services/ironic/register'
import { createLogger, type Logger } from './services/logger'
import { ReferenceIndex } from './services/reference-index'

export interface OperatorOptions {
  // Transport for the Ironic client
  fetch?: typeof fetch
  logger?: (scope: string) => Logger
  requestLog?: boolean
}

// Wires the store, the controllers and the HTTP API around one database
export function createOperator(db: Db, config: Config, options: OperatorOptions = {}) {
  const log = options.logger ?? createLogger

  const store = new ResourceStore(db)
  const index = new ReferenceIndex()
  const events = new HostEventRecorder(db, log('Events'))
  const guard = new AttachmentGuard(index, store, log('AttachmentGuard'))

  const ironic = new IronicClient({ ...config.ironic, fetch: options.fetch })
  const ports = new PortReconciler(ironic, log('Ports'))
  const registrar = new NodeRegistrar(ironic, ports, events, log('Registrar'), {
    networkInterface: config.ironic.networkInterface,
  })

  const hostController = new HostController(
    { store, index, registrar, ports, events, log: log('HostController') },
    config.reconcile,
  )
  const switchController = new SwitchController(
    { store, log: log('SwitchController') },
    {
      concurrency: config.reconcile.concurrency,
      errorRequeueDelayMs: config.reconcile.errorRequeueDelayMs,
      ...config.switches,
    },
  )

  const app = createApp({ store, guard, events, index }, { requestLog: options.requestLog })

  return {
    app,
    store,
    index,
    events,
    hostController,
    switchController,

    async start() {
      await hostController.start()
      await switchController.start()
    },

    async stop() {
      await hostController.stop()
      await switchController.stop()
    },
  }
}

export type Operator = ReturnType<typeof createOperator>
