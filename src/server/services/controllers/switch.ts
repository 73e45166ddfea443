import type { ResourceStore } from '../../db/store'
import { WorkQueue, type ReconcileResult } from '../concurrency'
import type { Logger } from '../logger'
import { publishSwitchConfig } from '../switches/config'
import type { Secret, SwitchDevice } from '../types'
import { objectKey, parseObjectKey } from './host'

export interface SwitchControllerOptions {
  concurrency: number
  errorRequeueDelayMs: number
  configsSecretName: string
  credentialsSecretName: string
  credentialsPath: string
}

export interface SwitchControllerDeps {
  store: ResourceStore
  log: Logger
}

// Keys of the switches whose credentials live in the given secret
export function switchesForSecret(switches: SwitchDevice[], secret: Secret): string[] {
  return switches
    .filter(sw => sw.namespace === secret.namespace && sw.spec.credentials.secretName === secret.name)
    .map(objectKey)
}

/**
 * Regenerates the namespace's switch config whenever a switch, or a secret
 * holding switch credentials, changes. A deleted switch still triggers the
 * pass so its section disappears.
 */
export class SwitchController {
  readonly queue: WorkQueue
  private unwatch: Array<() => void> = []

  constructor(private deps: SwitchControllerDeps, private options: SwitchControllerOptions) {
    this.queue = new WorkQueue(key => this.reconcile(key), {
      concurrency: options.concurrency,
      errorDelayMs: options.errorRequeueDelayMs,
      log: deps.log,
    })
  }

  async start(): Promise<void> {
    const { store, log } = this.deps

    this.unwatch.push(store.watch('switches', event => {
      this.queue.enqueue(objectKey(event.object))
    }))

    this.unwatch.push(store.watch('secrets', event => {
      if (this.isTargetSecret(event.object.name)) return
      this.findSwitchesForSecret(event.object)
        .then(keys => keys.forEach(key => this.queue.enqueue(key)))
        .catch(err => log.error('failed to map secret to switches', { secret: objectKey(event.object), error: err }))
    }))

    const switches = await store.list('switches')
    for (const sw of switches) {
      this.queue.enqueue(objectKey(sw))
    }
    log.info('switch controller started', { switches: switches.length })
  }

  async stop(): Promise<void> {
    for (const unwatch of this.unwatch) unwatch()
    this.unwatch = []
    await this.queue.shutdown()
  }

  async findSwitchesForSecret(secret: Secret): Promise<string[]> {
    const switches = await this.deps.store.list('switches', secret.namespace)
    return switchesForSecret(switches, secret)
  }

  async reconcile(key: string): Promise<ReconcileResult> {
    const { namespace } = parseObjectKey(key)
    const result = await publishSwitchConfig(this.deps.store, {
      namespace,
      configsSecretName: this.options.configsSecretName,
      credentialsSecretName: this.options.credentialsSecretName,
      credentialsPath: this.options.credentialsPath,
    })

    this.deps.log.info('switch config reconciled', {
      switch: key,
      switches: result.switchCount,
      configUpdated: result.configUpdated,
      credentialsUpdated: result.credentialsUpdated,
    })
    return {}
  }

  // Writes to the generated secrets must not loop back into this controller
  private isTargetSecret(name: string): boolean {
    return name === this.options.configsSecretName || name === this.options.credentialsSecretName
  }
}
