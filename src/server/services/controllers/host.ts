/**
 * Host reconciliation
 *
 * One pass per host key: register the node when needed, validate declared
 * interfaces against discovered NICs, and push switch port configuration to the
 * node's ports when the declared interfaces drifted from what was applied.
 * Every failure reschedules the whole pass.
 */

import type { ResourceStore, WatchEvent } from '../../db/store'
import { resolveSwitchPortConfigs } from '../attachments'
import { WorkQueue, type ReconcileResult } from '../concurrency'
import { findCondition, CONDITION_NETWORK_INTERFACES_VALID } from '../conditions'
import { needsUpdate, updatesPermitted } from '../drift'
import { errorMessage, isNotFound } from '../errors'
import type { EventPublisher } from '../events'
import { validateNetworkInterfaces } from '../interfaces'
import { isTransient } from '../ironic/client'
import type { PortReconciler } from '../ironic/ports'
import type { NodeRegistrar } from '../ironic/register'
import type { Logger } from '../logger'
import type { ReferenceIndex } from '../reference-index'
import type { Host, NamespacedName, ProvisioningState, SwitchPortConfigMap } from '../types'

export interface HostControllerOptions {
  concurrency: number
  provisionRequeueDelayMs: number
  errorRequeueDelayMs: number
  portUpdateStates: ReadonlySet<ProvisioningState>
}

export interface HostControllerDeps {
  store: ResourceStore
  index: ReferenceIndex
  registrar: NodeRegistrar
  ports: PortReconciler
  events: EventPublisher
  log: Logger
}

export function objectKey(obj: NamespacedName): string {
  return `${obj.namespace}/${obj.name}`
}

export function parseObjectKey(key: string): NamespacedName {
  const slash = key.indexOf('/')
  if (slash <= 0 || slash === key.length - 1) {
    throw new Error(`invalid object key: ${key}`)
  }
  return { namespace: key.slice(0, slash), name: key.slice(slash + 1) }
}

/**
 * Whether a host mutation changed anything a pass reads. Status fields the
 * controller writes itself (node id, conditions, applied interfaces, error
 * message) are left out so its own writes do not re-trigger it.
 */
export function hostChangeNeedsReconcile(event: WatchEvent<Host>): boolean {
  const { type, object, previous } = event
  if (type === 'deleted') return false
  if (type === 'added' || !previous) return true

  return JSON.stringify(previous.spec) !== JSON.stringify(object.spec)
    || previous.status.provisioningState !== object.status.provisioningState
    || JSON.stringify(previous.status.hardwareDetails) !== JSON.stringify(object.status.hardwareDetails)
}

export class HostController {
  readonly queue: WorkQueue
  private unwatch: (() => void) | null = null

  constructor(private deps: HostControllerDeps, private options: HostControllerOptions) {
    this.queue = new WorkQueue(key => this.reconcile(key), {
      concurrency: options.concurrency,
      errorDelayMs: options.errorRequeueDelayMs,
      log: deps.log,
    })
  }

  // Syncs the reference index from a full listing, then follows host mutations
  async start(): Promise<void> {
    const { store, index, log } = this.deps
    const hosts = await store.list('hosts')
    index.sync(hosts)

    this.unwatch = store.watch('hosts', event => {
      if (event.type === 'deleted') {
        index.removeHost(event.object)
        return
      }
      index.upsertHost(event.object)
      if (hostChangeNeedsReconcile(event)) {
        this.queue.enqueue(objectKey(event.object))
      }
    })

    for (const host of hosts) {
      this.queue.enqueue(objectKey(host))
    }
    log.info('host controller started', { hosts: hosts.length })
  }

  async stop(): Promise<void> {
    this.unwatch?.()
    this.unwatch = null
    await this.queue.shutdown()
  }

  async reconcile(key: string): Promise<ReconcileResult> {
    const { store, registrar, log } = this.deps
    const { namespace, name } = parseObjectKey(key)

    let host: Host
    try {
      host = await store.get('hosts', namespace, name)
    } catch (err) {
      // Deleted since it was queued
      if (isNotFound(err)) return {}
      throw err
    }

    const nodeId = host.status.nodeId
    if (!nodeId) {
      return this.register(host)
    }

    if (host.spec.bmc) {
      await registrar.syncDriverInfo(nodeId, host.spec.bmc)
    }

    if (validateNetworkInterfaces(host)) {
      const condition = findCondition(host.status.conditions, CONDITION_NETWORK_INTERFACES_VALID)
      if (condition) {
        this.deps.events.publish(host, condition.status === 'True' ? 'info' : 'warn', condition.reason, condition.message)
      }
      await store.updateHostStatus(host)
      return { requeueAfter: 0 }
    }

    const drift = needsUpdate(host)
    if (!drift.needed) {
      return {}
    }

    if (!updatesPermitted(host, this.options.portUpdateStates)) {
      log.info('port update deferred, node is busy', {
        host: key,
        state: host.status.provisioningState,
        reason: drift.reason,
      })
      return { requeueAfter: this.options.provisionRequeueDelayMs }
    }

    return this.applyPorts(host, nodeId, drift.reason === 'NetworkInterfacesRemoved')
  }

  private async register(host: Host): Promise<ReconcileResult> {
    const { store, registrar, log } = this.deps

    // Config for the boot interface, if one is declared
    const configs = await resolveSwitchPortConfigs(store, host, log)
    const result = await registrar.register(host, configs)
    if (result.status === 'busy') {
      return { requeueAfter: this.options.provisionRequeueDelayMs }
    }

    host.status.nodeId = result.nodeId
    delete host.status.errorMessage
    await store.updateHostStatus(host)
    return { requeueAfter: 0 }
  }

  private async applyPorts(host: Host, nodeId: string, removed: boolean): Promise<ReconcileResult> {
    const { store, ports, events, log } = this.deps

    const configs: SwitchPortConfigMap = removed
      ? new Map()
      : await resolveSwitchPortConfigs(store, host, log)

    try {
      await ports.ensurePorts({
        nodeId,
        bootMACAddress: host.spec.bootMACAddress,
        hardwareDetails: host.status.hardwareDetails,
        switchPortConfigs: configs,
      })
    } catch (err) {
      const message = errorMessage(err)
      if (isTransient(err)) {
        log.warn('port update failed, service unavailable, rescheduling', { host: objectKey(host), error: message })
        return { requeueAfter: this.options.errorRequeueDelayMs }
      }
      events.publish(host, 'error', 'PortConfigurationFailed', message)
      host.status.errorMessage = message
      await store.updateHostStatus(host)
      return { requeueAfter: this.options.errorRequeueDelayMs }
    }

    if (removed) {
      delete host.status.appliedNetworkInterfaces
    } else {
      host.status.appliedNetworkInterfaces = structuredClone(host.spec.networkInterfaces)
    }
    delete host.status.errorMessage
    events.publish(
      host,
      'success',
      'PortsConfigured',
      removed ? 'Cleared switch port configuration' : `Applied switch port configuration to ${configs.size} interface(s)`,
    )
    await store.updateHostStatus(host)
    return {}
  }
}
