import { describe, expect, it } from 'vitest'
import { CONDITION_NETWORK_INTERFACES_VALID, findCondition } from './conditions'
import { validateNetworkInterfaces } from './interfaces'
import type { Host, HostInterfaceRef } from './types'

const nics = [
  { name: 'eth1', mac: 'aa:bb:cc:00:00:02', pxe: false },
  { name: 'eth0', mac: 'aa:bb:cc:00:00:01', pxe: true },
]

function host(networkInterfaces: HostInterfaceRef[], discovered = true): Host {
  return {
    namespace: 'metal',
    name: 'worker-0',
    spec: { networkInterfaces },
    status: {
      provisioningState: 'inspecting',
      conditions: [],
      ...(discovered ? { hardwareDetails: { nics } } : {}),
    },
  }
}

const storage = { name: 'storage' }

describe('validateNetworkInterfaces', () => {
  it('marks names and MACs of discovered NICs as valid', () => {
    const h = host([
      { name: 'eth0', attachment: storage },
      { macAddress: 'aa:bb:cc:00:00:02', attachment: storage },
    ])

    expect(validateNetworkInterfaces(h)).toBe(true)
    expect(findCondition(h.status.conditions, CONDITION_NETWORK_INTERFACES_VALID)).toMatchObject({
      status: 'True',
      reason: 'AllInterfacesValid',
      message: 'All network interfaces are valid',
    })
  })

  it('lists invalid keys and the sorted available names', () => {
    const h = host([
      { name: 'eth9', attachment: storage },
      { name: 'eth0', attachment: storage },
    ])

    expect(validateNetworkInterfaces(h)).toBe(true)
    expect(findCondition(h.status.conditions, CONDITION_NETWORK_INTERFACES_VALID)).toMatchObject({
      status: 'False',
      reason: 'InvalidInterfaceNames',
      message: 'Invalid interface names: eth9. Available interfaces: eth0, eth1',
    })
  })

  it('says so when no NIC was discovered', () => {
    const h = host([{ name: 'eth0', attachment: storage }])
    h.status.hardwareDetails = { nics: [] }

    validateNetworkInterfaces(h)
    expect(findCondition(h.status.conditions, CONDITION_NETWORK_INTERFACES_VALID)?.message).toBe(
      'Invalid interface names: eth0. No network interfaces discovered on this host.',
    )
  })

  it('is not dirty the second time on an unchanged host', () => {
    const h = host([{ name: 'eth0', attachment: storage }])

    expect(validateNetworkInterfaces(h)).toBe(true)
    expect(validateNetworkInterfaces(h)).toBe(false)
  })

  it('clears the condition before hardware discovery completes', () => {
    const h = host([{ name: 'eth0', attachment: storage }], false)
    h.status.conditions.push({
      type: CONDITION_NETWORK_INTERFACES_VALID,
      status: 'True',
      reason: 'AllInterfacesValid',
      message: 'All network interfaces are valid',
      lastTransitionTime: '2026-01-01T00:00:00.000Z',
    })

    expect(validateNetworkInterfaces(h)).toBe(true)
    expect(h.status.conditions).toEqual([])
    expect(validateNetworkInterfaces(h)).toBe(false)
  })

  it('is not dirty without declared interfaces and no condition', () => {
    expect(validateNetworkInterfaces(host([]))).toBe(false)
  })
})
