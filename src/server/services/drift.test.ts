import { describe, expect, it } from 'vitest'
import { CONDITION_NETWORK_INTERFACES_VALID } from './conditions'
import { DEFAULT_PORT_UPDATE_STATES, needsUpdate, updatesPermitted } from './drift'
import type { Condition, Host, HostInterfaceRef, ProvisioningState } from './types'

const valid: Condition = {
  type: CONDITION_NETWORK_INTERFACES_VALID,
  status: 'True',
  reason: 'AllInterfacesValid',
  message: 'All network interfaces are valid',
  lastTransitionTime: '2026-01-01T00:00:00.000Z',
}

function host(
  declared: HostInterfaceRef[],
  applied: HostInterfaceRef[] | undefined,
  conditions: Condition[] = [valid],
  provisioningState: ProvisioningState = 'available',
): Host {
  return {
    namespace: 'metal',
    name: 'worker-0',
    spec: { networkInterfaces: declared },
    status: {
      provisioningState,
      conditions,
      ...(applied !== undefined ? { appliedNetworkInterfaces: applied } : {}),
    },
  }
}

const eth0 = { name: 'eth0', attachment: { name: 'storage' } }
const eth1 = { name: 'eth1', attachment: { name: 'uplink' } }

describe('needsUpdate', () => {
  it('clears remote config once interfaces are removed', () => {
    expect(needsUpdate(host([], [eth0]))).toEqual({ needed: true, reason: 'NetworkInterfacesRemoved' })
  })

  it('does nothing without declared or applied interfaces', () => {
    expect(needsUpdate(host([], undefined))).toEqual({ needed: false })
    expect(needsUpdate(host([], []))).toEqual({ needed: false })
  })

  it('waits for interface validation', () => {
    expect(needsUpdate(host([eth0], undefined, []))).toEqual({ needed: false })
    expect(needsUpdate(host([eth0], undefined, [{ ...valid, status: 'False' }]))).toEqual({ needed: false })
  })

  it('applies the first configuration', () => {
    expect(needsUpdate(host([eth0], undefined))).toEqual({ needed: true, reason: 'InitialConfiguration' })
  })

  it('settles after an apply and re-triggers on any spec change', () => {
    expect(needsUpdate(host([eth0, eth1], [eth0, eth1]))).toEqual({ needed: false })
    expect(needsUpdate(host([eth1, eth0], [eth0, eth1]))).toEqual({ needed: true, reason: 'NetworkInterfaceSpecChanged' })
    expect(needsUpdate(host([{ ...eth0, attachment: { name: 'other' } }], [eth0]))).toEqual({
      needed: true,
      reason: 'NetworkInterfaceSpecChanged',
    })
  })

  it('treats an empty attachment namespace like an unset one', () => {
    const withEmpty = { name: 'eth0', attachment: { name: 'storage', namespace: '' } }
    expect(needsUpdate(host([withEmpty], [eth0]))).toEqual({ needed: false })
  })
})

describe('updatesPermitted', () => {
  it('allows updates only in the quiet states', () => {
    expect(updatesPermitted(host([eth0], undefined, [valid], 'available'))).toBe(true)
    expect(updatesPermitted(host([eth0], undefined, [valid], 'inspecting'))).toBe(true)
    expect(updatesPermitted(host([eth0], undefined, [valid], 'provisioning'))).toBe(false)
    expect(updatesPermitted(host([eth0], undefined, [valid], 'provisioned'))).toBe(false)
  })

  it('honours a configured allow-list', () => {
    const states = new Set<ProvisioningState>(['provisioned'])
    expect(updatesPermitted(host([eth0], undefined, [valid], 'provisioned'), states)).toBe(true)
    expect(updatesPermitted(host([eth0], undefined, [valid], 'available'), states)).toBe(false)
  })

  it('defaults to registering, preparing, available and inspecting', () => {
    expect([...DEFAULT_PORT_UPDATE_STATES]).toEqual(['registering', 'preparing', 'available', 'inspecting'])
  })
})
