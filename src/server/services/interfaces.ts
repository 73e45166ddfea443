import {
  CONDITION_NETWORK_INTERFACES_VALID,
  findCondition,
  removeCondition,
  setCondition,
} from './conditions'
import type { ConditionStatus, DiscoveredNIC, Host } from './types'
import { interfaceKey } from './types'

export const REASON_ALL_INTERFACES_VALID = 'AllInterfacesValid'
export const REASON_INVALID_INTERFACE_NAMES = 'InvalidInterfaceNames'

// Sorted, non-empty NIC names
export function availableNicNames(nics: DiscoveredNIC[]): string[] {
  return nics.map(nic => nic.name).filter(Boolean).sort()
}

function setValidation(host: Host, status: ConditionStatus, reason: string, message: string): boolean {
  const existing = findCondition(host.status.conditions, CONDITION_NETWORK_INTERFACES_VALID)
  if (existing && existing.status === status && existing.reason === reason) {
    return false
  }
  setCondition(host.status.conditions, { type: CONDITION_NETWORK_INTERFACES_VALID, status, reason, message })
  return true
}

function clearValidation(host: Host): boolean {
  return removeCondition(host.status.conditions, CONDITION_NETWORK_INTERFACES_VALID)
}

/**
 * Checks the host's declared interfaces against the NICs inspection discovered,
 * recording the outcome as the NetworkInterfacesValid condition.
 *
 * Every discovered NIC contributes both its name and its MAC as a valid key.
 * Without declared interfaces, or before discovery completes, the condition is
 * cleared instead. Returns true when host status was changed.
 */
export function validateNetworkInterfaces(host: Host): boolean {
  if (host.spec.networkInterfaces.length === 0) {
    return clearValidation(host)
  }

  const details = host.status.hardwareDetails
  if (!details) {
    // Hardware discovery incomplete, nothing to judge against yet
    return clearValidation(host)
  }

  const validKeys = new Set<string>()
  for (const nic of details.nics) {
    if (nic.name) validKeys.add(nic.name)
    if (nic.mac) validKeys.add(nic.mac)
  }

  const invalid = host.spec.networkInterfaces
    .map(interfaceKey)
    .filter(key => !validKeys.has(key))

  if (invalid.length > 0) {
    const available = availableNicNames(details.nics)
    const message = available.length === 0
      ? `Invalid interface names: ${invalid.join(', ')}. No network interfaces discovered on this host.`
      : `Invalid interface names: ${invalid.join(', ')}. Available interfaces: ${available.join(', ')}`
    return setValidation(host, 'False', REASON_INVALID_INTERFACE_NAMES, message)
  }

  return setValidation(host, 'True', REASON_ALL_INTERFACES_VALID, 'All network interfaces are valid')
}
