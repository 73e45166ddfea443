import { TransientError, errorMessage } from '../errors'
import type { Logger } from '../logger'
import { buildLinkLayer, deduplicateByMAC, normalizeMac } from '../nics'
import type { DiscoveredNIC, HardwareDetails, SwitchPortConfig, SwitchPortConfigMap } from '../types'
import { isTransient, type CreatePortOpts, type IronicPort, type PatchOp, type PortApi } from './client'
import { switchPortConfigsEqual, toSwitchportPayload } from './switchport'

// Failures named in the aggregate error; the rest are only counted
const MAX_REPORTED_FAILURES = 3

export interface PortContext {
  nodeId: string | undefined
  bootMACAddress?: string
  hardwareDetails?: HardwareDetails
  switchPortConfigs: SwitchPortConfigMap
}

// Lower-cases keys so lookups by interface name or MAC ignore case
export function normalizeConfigKeys(configs: SwitchPortConfigMap): SwitchPortConfigMap {
  const out: SwitchPortConfigMap = new Map()
  for (const [key, config] of configs) {
    out.set(key.toLowerCase(), config)
  }
  return out
}

function isEmpty(value: Record<string, unknown> | null | undefined): boolean {
  return !value || Object.keys(value).length === 0
}

// JSON-patch operations bringing an existing port in line, empty when nothing diverges
export function portPatch(
  port: IronicPort,
  nic: DiscoveredNIC,
  pxeEnabled: boolean,
  config: SwitchPortConfig | undefined,
): PatchOp[] {
  const ops: PatchOp[] = []

  if ((port.pxe_enabled ?? false) !== pxeEnabled) {
    ops.push({ op: 'replace', path: '/pxe_enabled', value: pxeEnabled })
  }

  const current = port.extra?.switchport
  if (config) {
    if (!switchPortConfigsEqual(current, config)) {
      ops.push({ op: current === undefined ? 'add' : 'replace', path: '/extra/switchport', value: toSwitchportPayload(config) })
    }
  } else if (current !== undefined) {
    ops.push({ op: 'remove', path: '/extra/switchport' })
  }

  // Link-layer data already on the port wins over what inspection reported
  const llc = buildLinkLayer(nic)
  if (llc && isEmpty(port.local_link_connection)) {
    ops.push({ op: 'replace', path: '/local_link_connection', value: llc })
  }

  return ops
}

/**
 * Keeps the hardware-management service's port records in line with the NICs
 * discovered on a host and the switch port configs resolved for it.
 *
 * Ports are created and updated, never deleted. Removing ports for NICs that
 * disappeared from the hardware report is left to a future extension.
 */
export class PortReconciler {
  constructor(private api: PortApi, private log: Logger) {}

  async ensurePorts(ctx: PortContext): Promise<void> {
    const nodeId = ctx.nodeId
    if (!nodeId) {
      throw new Error('node not registered')
    }

    const configs = normalizeConfigKeys(ctx.switchPortConfigs)

    // Before inspection only the boot interface is known
    if (!ctx.hardwareDetails) {
      this.log.info('no stored hardware details available, ensuring boot MAC port only', { node: nodeId })
      if (ctx.bootMACAddress) {
        await this.ensurePxePort(nodeId, ctx.bootMACAddress, configs)
      }
      return
    }

    const uniqueNICs = deduplicateByMAC(ctx.hardwareDetails.nics)
    this.log.info('ensuring ports for all network interfaces', { count: uniqueNICs.length, node: nodeId })

    let existingPorts: IronicPort[]
    try {
      existingPorts = await this.api.listPorts({ nodeId })
    } catch (err) {
      const message = `failed to list existing ports: ${errorMessage(err)}`
      throw isTransient(err) ? new TransientError(message, { cause: err }) : new Error(message, { cause: err })
    }

    const portsByMAC = new Map<string, IronicPort>()
    for (const port of existingPorts) {
      portsByMAC.set(normalizeMac(port.address), port)
    }

    const bootMAC = ctx.bootMACAddress ? normalizeMac(ctx.bootMACAddress) : ''
    const failures: string[] = []
    let allTransient = true
    let successCount = 0

    for (const nic of uniqueNICs) {
      const mac = normalizeMac(nic.mac)
      const isPXEPort = nic.pxe || mac === bootMAC
      // Interface name first, then MAC
      const config = (nic.name ? configs.get(nic.name.toLowerCase()) : undefined) ?? configs.get(mac)

      try {
        await this.ensurePort(nodeId, nic, isPXEPort, config, portsByMAC.get(mac))
        successCount++
      } catch (err) {
        this.log.error('failed to ensure port for interface', { interface: nic.name, mac: nic.mac, error: err })
        failures.push(`${nic.name}(${nic.mac}): ${errorMessage(err)}`)
        allTransient = allTransient && isTransient(err)
      }
    }

    if (failures.length > 0) {
      this.log.warn('port reconciliation completed with failures', {
        successful: successCount,
        failed: failures.length,
        total: uniqueNICs.length,
      })
      const reported = failures.slice(0, MAX_REPORTED_FAILURES)
      const message = `failed to ensure ${failures.length}/${uniqueNICs.length} ports: ${reported.join('; ')}`
      // Only worth a quiet retry when every failure was the service's, not the request's
      throw allTransient ? new TransientError(message) : new Error(message)
    }

    this.log.success('successfully ensured all ports', { count: successCount, node: nodeId })
  }

  // Creates the port when absent, patches it when it diverges
  async ensurePort(
    nodeId: string,
    nic: DiscoveredNIC,
    pxeEnabled: boolean,
    config: SwitchPortConfig | undefined,
    existing: IronicPort | undefined,
  ): Promise<void> {
    if (!existing) {
      const opts: CreatePortOpts = {
        address: nic.mac,
        node_uuid: nodeId,
        pxe_enabled: pxeEnabled,
      }
      if (config) opts.extra = { switchport: toSwitchportPayload(config) }
      const llc = buildLinkLayer(nic)
      if (llc) opts.local_link_connection = llc

      const port = await this.api.createPort(opts)
      this.log.info('created port', { interface: nic.name, mac: nic.mac, port: port.uuid, pxe: pxeEnabled })
      return
    }

    const patch = portPatch(existing, nic, pxeEnabled, config)
    if (patch.length === 0) return

    await this.api.updatePort(existing.uuid, patch)
    this.log.info('updated port', { interface: nic.name, mac: nic.mac, port: existing.uuid, fields: patch.map(p => p.path).join(',') })
  }

  // A single PXE port for the boot MAC, unless some port already holds that address
  async ensurePxePort(nodeId: string, bootMAC: string, configs: SwitchPortConfigMap): Promise<void> {
    const mac = normalizeMac(bootMAC)

    const nodePorts = await this.api.listPorts({ nodeId })
    const existing = nodePorts.find(port => normalizeMac(port.address) === mac)
    if (existing) {
      // Left as is, unless no interface declares a config any more
      if (configs.size === 0 && existing.extra?.switchport !== undefined) {
        await this.api.updatePort(existing.uuid, [{ op: 'remove', path: '/extra/switchport' }])
        this.log.info('cleared switch port config from boot port', { mac: bootMAC, port: existing.uuid })
      }
      return
    }

    // Another node may hold the address; creating a duplicate would conflict
    const allocated = await this.api.listPorts({ address: bootMAC })
    if (allocated.length > 0) {
      this.log.warn('boot MAC already allocated to another port', { mac: bootMAC, port: allocated[0].uuid })
      return
    }

    await this.createPXEPort(nodeId, bootMAC, configs.get(mac))
  }

  async createPXEPort(nodeId: string, mac: string, config: SwitchPortConfig | undefined): Promise<IronicPort> {
    const opts: CreatePortOpts = { address: mac, node_uuid: nodeId, pxe_enabled: true }
    if (config) opts.extra = { switchport: toSwitchportPayload(config) }

    const port = await this.api.createPort(opts)
    this.log.info('created PXE port', { mac, port: port.uuid, node: nodeId })
    return port
  }
}
