import { CONDITION_NETWORK_INTERFACES_VALID, isConditionTrue } from './conditions'
import type { Host, HostInterfaceRef, ProvisioningState } from './types'

export type DriftReason = 'NetworkInterfacesRemoved' | 'InitialConfiguration' | 'NetworkInterfaceSpecChanged'

export interface DriftResult {
  needed: boolean
  reason?: DriftReason
}

// States in which the remote node accepts port changes (enroll, manageable, available, inspecting)
export const DEFAULT_PORT_UPDATE_STATES: ReadonlySet<ProvisioningState> =
  new Set<ProvisioningState>(['registering', 'preparing', 'available', 'inspecting'])

function interfaceRefEqual(a: HostInterfaceRef, b: HostInterfaceRef): boolean {
  return (a.name ?? '') === (b.name ?? '')
    && (a.macAddress ?? '') === (b.macAddress ?? '')
    && a.attachment.name === b.attachment.name
    && (a.attachment.namespace ?? '') === (b.attachment.namespace ?? '')
}

// Order-sensitive; absent and empty-string fields compare equal
export function interfaceListsEqual(a: HostInterfaceRef[], b: HostInterfaceRef[]): boolean {
  return a.length === b.length && a.every((ref, i) => interfaceRefEqual(ref, b[i]))
}

/**
 * Decides whether switch port configuration has to be (re)applied.
 *
 * A failed apply never advances appliedNetworkInterfaces, so the drift it
 * leaves behind re-triggers the work on the next pass.
 */
export function needsUpdate(host: Host): DriftResult {
  const declared = host.spec.networkInterfaces
  const applied = host.status.appliedNetworkInterfaces

  if (declared.length === 0) {
    if (applied && applied.length > 0) {
      return { needed: true, reason: 'NetworkInterfacesRemoved' }
    }
    return { needed: false }
  }

  if (!isConditionTrue(host.status.conditions, CONDITION_NETWORK_INTERFACES_VALID)) {
    return { needed: false }
  }

  if (applied === undefined) {
    return { needed: true, reason: 'InitialConfiguration' }
  }

  if (!interfaceListsEqual(declared, applied)) {
    return { needed: true, reason: 'NetworkInterfaceSpecChanged' }
  }

  return { needed: false }
}

// Outside the allowed states the update is deferred, not dropped
export function updatesPermitted(
  host: Host,
  allowedStates: ReadonlySet<ProvisioningState> = DEFAULT_PORT_UPDATE_STATES,
): boolean {
  return allowedStates.has(host.status.provisioningState)
}
