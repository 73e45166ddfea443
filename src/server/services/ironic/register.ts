import { errorMessage } from '../errors'
import type { EventPublisher } from '../events'
import type { Logger } from '../logger'
import { normalizeMac } from '../nics'
import type { BMCDetails, Host, SwitchPortConfigMap } from '../types'
import { isConflict, type CreateNodeOpts, type NodeApi, type PatchOp } from './client'
import { normalizeConfigKeys, type PortReconciler } from './ports'
import { bmcAddressMatches, isAddressKey } from './switchport'

// Hardware type for hosts enrolled without BMC details
export const DEFAULT_NODE_DRIVER = 'fake-hardware'

export type RegistrationResult =
  | { status: 'registered'; nodeId: string }
  | { status: 'busy' }

// Remote node name for a host, unique across namespaces
export function nodeName(host: Host): string {
  return `${host.namespace}~${host.name}`
}

export function driverInfoFor(bmc: BMCDetails | undefined): Record<string, unknown> {
  if (!bmc) return {}
  return { [`${bmc.driver}_address`]: bmc.address }
}

export interface RegistrarOptions {
  networkInterface?: string
}

/**
 * Enrolls hosts as nodes with the hardware-management service and keeps
 * their BMC address current.
 */
export class NodeRegistrar {
  constructor(
    private nodes: NodeApi,
    private ports: PortReconciler,
    private events: EventPublisher,
    private log: Logger,
    private options: RegistrarOptions = {},
  ) {}

  async register(host: Host, configs: SwitchPortConfigMap): Promise<RegistrationResult> {
    const opts: CreateNodeOpts = {
      name: nodeName(host),
      driver: host.spec.bmc?.driver ?? DEFAULT_NODE_DRIVER,
      driver_info: driverInfoFor(host.spec.bmc),
    }
    if (this.options.networkInterface) {
      opts.network_interface = this.options.networkInterface
    }

    let nodeId: string
    try {
      const node = await this.nodes.createNode(opts)
      nodeId = node.uuid
    } catch (err) {
      if (isConflict(err)) {
        this.log.info('node creation conflicted, another actor is registering it', { node: opts.name })
        return { status: 'busy' }
      }
      throw new Error(`failed to register node ${opts.name}: ${errorMessage(err)}`, { cause: err })
    }

    this.log.success('registered node', { host: `${host.namespace}/${host.name}`, node: nodeId })

    // The boot port is opportunistic; a failure is left to the port pass to fix
    const bootMAC = host.spec.bootMACAddress
    if (bootMAC) {
      try {
        await this.ports.createPXEPort(nodeId, bootMAC, normalizeConfigKeys(configs).get(normalizeMac(bootMAC)))
      } catch (err) {
        this.events.publish(host, 'warn', 'BootPortFailed', `Failed to create PXE port for ${bootMAC}: ${errorMessage(err)}`)
      }
    }

    this.events.publish(host, 'success', 'Registered', `Registered new host as node ${nodeId}`)
    return { status: 'registered', nodeId }
  }

  // Points the node at the BMC address in the host spec; returns whether it patched
  async syncDriverInfo(nodeId: string, bmc: BMCDetails): Promise<boolean> {
    const node = await this.nodes.getNode(nodeId)
    const wanted = driverInfoFor(bmc)
    if (bmcAddressMatches(node.driver_info, wanted)) {
      return false
    }

    // Address entries of another driver go, so the node keeps a single one
    const current = node.driver_info ?? {}
    const patch: PatchOp[] = Object.keys(current)
      .filter(key => isAddressKey(key) && !(key in wanted))
      .map((key): PatchOp => ({ op: 'remove', path: `/driver_info/${key}` }))
    for (const [key, value] of Object.entries(wanted)) {
      patch.push({ op: key in current ? 'replace' : 'add', path: `/driver_info/${key}`, value })
    }
    await this.nodes.updateNode(nodeId, patch)
    this.log.info('updated node BMC address', { node: nodeId, address: bmc.address })
    return true
  }
}
