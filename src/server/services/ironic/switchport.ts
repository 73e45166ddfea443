import type { SwitchPortConfig } from '../types'

// Wire shape of a port's extra.switchport field
export interface SwitchportPayload {
  mode: string
  native_vlan?: number
  allowed_vlans?: number[]
  mtu?: number
}

export function toSwitchportPayload(config: SwitchPortConfig): SwitchportPayload {
  const payload: SwitchportPayload = { mode: config.mode }
  if (config.nativeVLAN !== 0) payload.native_vlan = config.nativeVLAN
  if (config.allowedVLANs.length > 0) payload.allowed_vlans = [...config.allowedVLANs]
  if (config.mtu !== undefined) payload.mtu = config.mtu
  return payload
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// Numbers arrive as JSON numbers, but tolerate numeric strings written by other tools
function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value)
  return undefined
}

/**
 * Normalizes a stored extra.switchport value into its typed form.
 * Absent, null and empty fields all come back as undefined; anything that is
 * not an object with a string mode yields undefined.
 */
export function normalizeSwitchportPayload(value: unknown): SwitchportPayload | undefined {
  if (!isRecord(value) || typeof value.mode !== 'string') return undefined

  const payload: SwitchportPayload = { mode: value.mode }

  const nativeVlan = toNumber(value.native_vlan)
  if (nativeVlan !== undefined && nativeVlan !== 0) payload.native_vlan = nativeVlan

  if (Array.isArray(value.allowed_vlans) && value.allowed_vlans.length > 0) {
    const vlans = value.allowed_vlans.map(toNumber)
    // An unreadable entry keeps the list as NaN so it never compares equal
    payload.allowed_vlans = vlans.map(v => v ?? Number.NaN)
  }

  const mtu = toNumber(value.mtu)
  if (mtu !== undefined) payload.mtu = mtu

  return payload
}

/**
 * Field-by-field comparison of a stored extra.switchport value against the
 * desired config. Allowed VLAN lists are order-sensitive.
 */
export function switchPortConfigsEqual(existing: unknown, desired: SwitchPortConfig): boolean {
  const current = normalizeSwitchportPayload(existing)
  if (!current) return false

  const wanted = toSwitchportPayload(desired)
  const currentVlans = current.allowed_vlans ?? []
  const wantedVlans = wanted.allowed_vlans ?? []

  return current.mode === wanted.mode
    && current.native_vlan === wanted.native_vlan
    && current.mtu === wanted.mtu
    && currentVlans.length === wantedVlans.length
    && currentVlans.every((vlan, i) => vlan === wantedVlans[i])
}

export function isAddressKey(key: string): boolean {
  return key.endsWith('_address')
}

// Value of the single "*_address" entry of a driver_info map
function driverAddress(driverInfo: Record<string, unknown> | null | undefined): unknown {
  if (!driverInfo) return undefined
  return Object.entries(driverInfo).find(([key]) => isAddressKey(key))?.[1]
}

// Whether a node's stored BMC address matches the one we would write; key names are not compared
export function bmcAddressMatches(
  nodeDriverInfo: Record<string, unknown> | null | undefined,
  driverInfo: Record<string, unknown>,
): boolean {
  return driverAddress(nodeDriverInfo) === driverAddress(driverInfo)
}
