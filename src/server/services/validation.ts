import type { NetworkAttachmentSpec } from './types'

export const VLAN_MIN = 1
export const VLAN_MAX = 4094
export const MTU_MIN = 68
export const MTU_MAX = 9000

function validateVlanId(vlan: number): string | null {
  if (!Number.isInteger(vlan) || vlan < VLAN_MIN || vlan > VLAN_MAX) {
    return `VLAN ID ${vlan} is out of range (${VLAN_MIN}-${VLAN_MAX})`
  }
  return null
}

// First out-of-range entry wins
function validateVlanList(vlans: number[]): string | null {
  for (const vlan of vlans) {
    const err = validateVlanId(vlan)
    if (err) return err
  }
  return null
}

function validateSwitchportMode(spec: NetworkAttachmentSpec): string | null {
  const allowed = spec.allowedVLANs ?? []

  switch (spec.mode) {
    case 'access':
      if (allowed.length > 0) {
        return 'allowedVlans cannot be specified for access mode'
      }
      return null
    case 'trunk':
    case 'hybrid': {
      const err = validateVlanList(allowed)
      return err ? `invalid allowedVlans: ${err}` : null
    }
    default:
      return `invalid switchport mode: ${spec.mode}`
  }
}

function validateMtu(spec: NetworkAttachmentSpec): string | null {
  if (spec.mtu === undefined) return null
  if (!Number.isInteger(spec.mtu) || spec.mtu < MTU_MIN || spec.mtu > MTU_MAX) {
    return `MTU ${spec.mtu} is out of range (${MTU_MIN}-${MTU_MAX})`
  }
  return null
}

/**
 * Field-level validation of an attachment spec. Returns every violation found:
 * the mode check, the native VLAN range and the MTU range are independent.
 */
export function validateAttachment(spec: NetworkAttachmentSpec): string[] {
  const errors: string[] = []

  const modeErr = validateSwitchportMode(spec)
  if (modeErr) errors.push(modeErr)

  const nativeErr = validateVlanId(spec.nativeVLAN)
  if (nativeErr) errors.push(`invalid nativeVlan: ${nativeErr}`)

  const mtuErr = validateMtu(spec)
  if (mtuErr) errors.push(mtuErr)

  return errors
}
