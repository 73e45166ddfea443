import { beforeEach, describe, expect, it } from 'vitest'
import { createFakeIronic, type FakeIronic } from '../../test/fake-ironic'
import { TransientError } from '../errors'
import { silentLogger } from '../logger'
import type { SwitchPortConfigMap } from '../types'
import { IronicClient } from './client'
import { portPatch, PortReconciler } from './ports'

const NODE = 'node-a'

describe('portPatch', () => {
  const nic = { name: 'eth0', mac: 'aa:bb:cc:00:00:01', pxe: true, lldp: { switchID: 'sw-1', portID: 'Gi1/0/1' } }
  const config = { mode: 'access', nativeVLAN: 30, allowedVLANs: [] }

  it('is empty when the port already matches', () => {
    const port = {
      uuid: 'port-1',
      address: nic.mac,
      pxe_enabled: true,
      local_link_connection: { switch_id: 'sw-1', port_id: 'Gi1/0/1' },
      extra: { switchport: { mode: 'access', native_vlan: 30 } },
    }
    expect(portPatch(port, nic, true, config)).toEqual([])
  })

  it('patches only the diverging fields', () => {
    const port = {
      uuid: 'port-1',
      address: nic.mac,
      pxe_enabled: false,
      local_link_connection: {},
      extra: {},
    }
    expect(portPatch(port, nic, true, config)).toEqual([
      { op: 'replace', path: '/pxe_enabled', value: true },
      { op: 'add', path: '/extra/switchport', value: { mode: 'access', native_vlan: 30 } },
      { op: 'replace', path: '/local_link_connection', value: { switch_id: 'sw-1', port_id: 'Gi1/0/1' } },
    ])
  })

  it('removes switchport config that no longer resolves', () => {
    const port = {
      uuid: 'port-1',
      address: nic.mac,
      pxe_enabled: true,
      local_link_connection: { switch_id: 'sw-1' },
      extra: { switchport: { mode: 'access', native_vlan: 30 } },
    }
    expect(portPatch(port, nic, true, undefined)).toEqual([{ op: 'remove', path: '/extra/switchport' }])
  })

  it('leaves existing link-layer data alone', () => {
    const port = {
      uuid: 'port-1',
      address: nic.mac,
      pxe_enabled: true,
      local_link_connection: { switch_id: 'sw-other' },
      extra: { switchport: { mode: 'access', native_vlan: 30 } },
    }
    expect(portPatch(port, nic, true, config)).toEqual([])
  })
})

describe('PortReconciler', () => {
  let ironic: FakeIronic
  let reconciler: PortReconciler

  beforeEach(() => {
    ironic = createFakeIronic()
    const client = new IronicClient({ endpoint: 'http://ironic.test', timeoutMs: 1000, fetch: ironic.fetch })
    reconciler = new PortReconciler(client, silentLogger)
  })

  it('refuses to run for an unregistered node', async () => {
    await expect(reconciler.ensurePorts({ nodeId: undefined, switchPortConfigs: new Map() }))
      .rejects.toThrow('node not registered')
  })

  describe('before inspection', () => {
    it('creates one PXE port for the boot MAC, then does nothing', async () => {
      const ctx = { nodeId: NODE, bootMACAddress: '11:22:33:44:55:66', switchPortConfigs: new Map() }

      await reconciler.ensurePorts(ctx)
      expect([...ironic.ports.values()]).toEqual([{
        uuid: expect.any(String),
        address: '11:22:33:44:55:66',
        node_uuid: NODE,
        pxe_enabled: true,
        local_link_connection: {},
        extra: {},
      }])

      const before = ironic.mutations().length
      await reconciler.ensurePorts(ctx)
      expect(ironic.ports.size).toBe(1)
      expect(ironic.mutations().length).toBe(before)
    })

    it('uses the config registered for the boot MAC', async () => {
      const configs: SwitchPortConfigMap = new Map([
        ['11:22:33:44:55:66', { mode: 'access', nativeVLAN: 30, allowedVLANs: [] }],
      ])

      await reconciler.ensurePorts({ nodeId: NODE, bootMACAddress: '11:22:33:44:55:66', switchPortConfigs: configs })

      const [port] = [...ironic.ports.values()]
      expect(port.extra).toEqual({ switchport: { mode: 'access', native_vlan: 30 } })
    })

    it('clears the boot port config once no interface declares one', async () => {
      const port = ironic.addPort({
        address: '11:22:33:44:55:66',
        node_uuid: NODE,
        pxe_enabled: true,
        local_link_connection: {},
        extra: { switchport: { mode: 'access', native_vlan: 30 } },
      })
      const ctx = { nodeId: NODE, bootMACAddress: '11:22:33:44:55:66' }

      await reconciler.ensurePorts({ ...ctx, switchPortConfigs: new Map([['eth0', { mode: 'access', nativeVLAN: 30, allowedVLANs: [] }]]) })
      expect(ironic.mutations()).toEqual([])

      await reconciler.ensurePorts({ ...ctx, switchPortConfigs: new Map() })
      expect(ironic.mutations()).toEqual([{
        method: 'PATCH',
        path: `/v1/ports/${port.uuid}`,
        body: [{ op: 'remove', path: '/extra/switchport' }],
      }])
      expect(ironic.ports.get(port.uuid)?.extra).toEqual({})
    })

    it('leaves a boot MAC held by another node alone', async () => {
      ironic.addPort({
        address: '11:22:33:44:55:66',
        node_uuid: 'node-other',
        pxe_enabled: true,
        local_link_connection: {},
        extra: {},
      })

      await reconciler.ensurePorts({ nodeId: NODE, bootMACAddress: '11:22:33:44:55:66', switchPortConfigs: new Map() })
      expect(ironic.ports.size).toBe(1)
      expect(ironic.mutations()).toEqual([])
    })
  })

  describe('after inspection', () => {
    const hardwareDetails = {
      nics: [
        { name: 'eth0', mac: 'AA:BB:CC:00:00:01', pxe: false, lldp: { switchID: 'sw-1', portID: 'Gi1/0/1' } },
        { name: 'eth1', mac: 'aa:bb:cc:00:00:02', pxe: false },
        { name: 'eth0-dup', mac: 'aa:bb:cc:00:00:01', pxe: false },
      ],
    }

    it('creates a port per unique NIC, configs by name then MAC', async () => {
      const configs: SwitchPortConfigMap = new Map([
        ['ETH0', { mode: 'access', nativeVLAN: 30, allowedVLANs: [] }],
        ['aa:bb:cc:00:00:02', { mode: 'trunk', nativeVLAN: 1, allowedVLANs: [10, 20], mtu: 9000 }],
      ])

      await reconciler.ensurePorts({
        nodeId: NODE,
        bootMACAddress: 'aa:bb:cc:00:00:02',
        hardwareDetails,
        switchPortConfigs: configs,
      })

      const ports = [...ironic.ports.values()].map(({ uuid: _uuid, ...rest }) => rest)
      expect(ports).toEqual([
        {
          address: 'AA:BB:CC:00:00:01',
          node_uuid: NODE,
          pxe_enabled: false,
          local_link_connection: { switch_id: 'sw-1', port_id: 'Gi1/0/1' },
          extra: { switchport: { mode: 'access', native_vlan: 30 } },
        },
        {
          address: 'aa:bb:cc:00:00:02',
          node_uuid: NODE,
          pxe_enabled: true,
          local_link_connection: {},
          extra: { switchport: { mode: 'trunk', native_vlan: 1, allowed_vlans: [10, 20], mtu: 9000 } },
        },
      ])
    })

    it('converges existing ports and makes no call when nothing diverges', async () => {
      const existing = ironic.addPort({
        address: 'aa:bb:cc:00:00:01',
        node_uuid: NODE,
        pxe_enabled: true,
        local_link_connection: {},
        extra: { switchport: { mode: 'trunk', native_vlan: 5 } },
      })
      const ctx = { nodeId: NODE, hardwareDetails, switchPortConfigs: new Map() }

      await reconciler.ensurePorts(ctx)
      expect(ironic.ports.get(existing.uuid)).toEqual({
        uuid: existing.uuid,
        address: 'aa:bb:cc:00:00:01',
        node_uuid: NODE,
        pxe_enabled: false,
        local_link_connection: { switch_id: 'sw-1', port_id: 'Gi1/0/1' },
        extra: {},
      })

      const before = ironic.mutations().length
      await reconciler.ensurePorts(ctx)
      expect(ironic.mutations().length).toBe(before)
    })

    it('keeps going past a failing NIC and reports it', async () => {
      ironic.failNext('POST', '/v1/ports', 500)

      await expect(reconciler.ensurePorts({ nodeId: NODE, hardwareDetails, switchPortConfigs: new Map() }))
        .rejects.toThrow(/^failed to ensure 1\/2 ports: eth0\(AA:BB:CC:00:00:01\): Ironic POST \/v1\/ports failed: 500/)

      expect([...ironic.ports.values()].map(port => port.address)).toEqual(['aa:bb:cc:00:00:02'])
    })

    it('marks the aggregate transient only when every failure was', async () => {
      ironic.failNext('POST', '/v1/ports', 500)
      const transient = await reconciler.ensurePorts({ nodeId: NODE, hardwareDetails, switchPortConfigs: new Map() })
        .catch((err: unknown) => err)
      expect(transient).toBeInstanceOf(TransientError)

      ironic.ports.clear()
      ironic.failNext('POST', '/v1/ports', 400)
      const rejected = await reconciler.ensurePorts({ nodeId: NODE, hardwareDetails, switchPortConfigs: new Map() })
        .catch((err: unknown) => err)
      expect(rejected).toBeInstanceOf(Error)
      expect(rejected).not.toBeInstanceOf(TransientError)
    })
  })
})
