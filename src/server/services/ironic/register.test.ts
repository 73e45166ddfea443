import { beforeEach, describe, expect, it } from 'vitest'
import { createFakeIronic, type FakeIronic } from '../../test/fake-ironic'
import type { EventPublisher } from '../events'
import { silentLogger } from '../logger'
import type { Host, LogLevel } from '../types'
import { IronicClient } from './client'
import { PortReconciler } from './ports'
import { NodeRegistrar, driverInfoFor, nodeName } from './register'

interface PublishedEvent {
  level: LogLevel
  reason: string
  message: string
}

function host(spec: Partial<Host['spec']> = {}): Host {
  return {
    namespace: 'metal',
    name: 'worker-0',
    spec: { networkInterfaces: [], ...spec },
    status: { provisioningState: 'registering', conditions: [] },
  }
}

describe('NodeRegistrar', () => {
  let ironic: FakeIronic
  let events: PublishedEvent[]
  let registrar: NodeRegistrar

  beforeEach(() => {
    ironic = createFakeIronic()
    events = []
    const publisher: EventPublisher = {
      publish: (_host, level, reason, message) => {
        events.push({ level, reason, message })
      },
    }
    const client = new IronicClient({ endpoint: 'http://ironic.test', timeoutMs: 1000, fetch: ironic.fetch })
    registrar = new NodeRegistrar(client, new PortReconciler(client, silentLogger), publisher, silentLogger, {
      networkInterface: 'neutron',
    })
  })

  it('names nodes after namespace and host', () => {
    expect(nodeName(host())).toBe('metal~worker-0')
    expect(driverInfoFor({ driver: 'redfish', address: 'https://10.0.0.5' })).toEqual({ redfish_address: 'https://10.0.0.5' })
    expect(driverInfoFor(undefined)).toEqual({})
  })

  it('creates the node and a PXE port for the boot MAC', async () => {
    const result = await registrar.register(
      host({ bootMACAddress: '11:22:33:44:55:66', bmc: { driver: 'ipmi', address: '10.0.0.5' } }),
      new Map([['11:22:33:44:55:66', { mode: 'access', nativeVLAN: 30, allowedVLANs: [] }]]),
    )

    expect(result).toEqual({ status: 'registered', nodeId: 'node-1' })
    expect(ironic.nodes.get('node-1')).toEqual({
      uuid: 'node-1',
      name: 'metal~worker-0',
      driver: 'ipmi',
      driver_info: { ipmi_address: '10.0.0.5' },
      network_interface: 'neutron',
      provision_state: 'enroll',
    })
    expect([...ironic.ports.values()]).toEqual([{
      uuid: 'port-2',
      address: '11:22:33:44:55:66',
      node_uuid: 'node-1',
      pxe_enabled: true,
      local_link_connection: {},
      extra: { switchport: { mode: 'access', native_vlan: 30 } },
    }])
    expect(events).toEqual([{ level: 'success', reason: 'Registered', message: 'Registered new host as node node-1' }])
  })

  it('backs off when another actor is registering the node', async () => {
    ironic.failNext('POST', '/v1/nodes', 409)

    expect(await registrar.register(host(), new Map())).toEqual({ status: 'busy' })
    expect(ironic.nodes.size).toBe(0)
    expect(events).toEqual([])
  })

  it('still registers when the boot port cannot be created', async () => {
    ironic.failNext('POST', '/v1/ports', 500)

    const result = await registrar.register(host({ bootMACAddress: '11:22:33:44:55:66' }), new Map())

    expect(result).toEqual({ status: 'registered', nodeId: 'node-1' })
    expect(events.map(e => e.reason)).toEqual(['BootPortFailed', 'Registered'])
  })

  it('patches the BMC address only when it moved', async () => {
    const node = ironic.addNode({
      name: 'metal~worker-0',
      driver: 'ipmi',
      driver_info: { ipmi_address: '10.0.0.5', ipmi_username: 'admin' },
      provision_state: 'manageable',
    })

    expect(await registrar.syncDriverInfo(node.uuid, { driver: 'ipmi', address: '10.0.0.5' })).toBe(false)
    expect(await registrar.syncDriverInfo(node.uuid, { driver: 'ipmi', address: '10.0.0.6' })).toBe(true)
    expect(ironic.nodes.get(node.uuid)?.driver_info).toEqual({ ipmi_address: '10.0.0.6', ipmi_username: 'admin' })
  })

  it('swaps the address entry when the BMC driver changes', async () => {
    const node = ironic.addNode({
      name: 'metal~worker-0',
      driver: 'ipmi',
      driver_info: { ipmi_address: '10.0.0.5', ipmi_username: 'admin' },
      provision_state: 'manageable',
    })
    const bmc = { driver: 'redfish', address: 'https://10.0.0.9' }

    expect(await registrar.syncDriverInfo(node.uuid, bmc)).toBe(true)
    expect(ironic.nodes.get(node.uuid)?.driver_info).toEqual({
      ipmi_username: 'admin',
      redfish_address: 'https://10.0.0.9',
    })

    // Settled: the next pass finds the address in place
    const patches = ironic.mutations().length
    expect(await registrar.syncDriverInfo(node.uuid, bmc)).toBe(false)
    expect(ironic.mutations().length).toBe(patches)
  })
})
