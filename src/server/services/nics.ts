import type { DiscoveredNIC } from './types'

export type LocalLinkConnection = {
  switch_id?: string
  port_id?: string
  switch_info?: string
}

export function normalizeMac(mac: string): string {
  return mac.trim().toLowerCase()
}

// One NIC per MAC (case-insensitive), first seen wins. NICs without a MAC are dropped.
export function deduplicateByMAC(nics: DiscoveredNIC[]): DiscoveredNIC[] {
  const seen = new Set<string>()
  const unique: DiscoveredNIC[] = []

  for (const nic of nics) {
    const mac = normalizeMac(nic.mac)
    if (!mac || seen.has(mac)) continue
    seen.add(mac)
    unique.push(nic)
  }

  return unique
}

// Link-layer connection info for a port record, or null when the NIC reported no LLDP data
export function buildLinkLayer(nic: DiscoveredNIC): LocalLinkConnection | null {
  const lldp = nic.lldp
  if (!lldp) return null

  const llc: LocalLinkConnection = {}
  if (lldp.switchID) llc.switch_id = lldp.switchID
  if (lldp.portID) llc.port_id = lldp.portID
  if (lldp.switchSystemName) llc.switch_info = lldp.switchSystemName

  return Object.keys(llc).length > 0 ? llc : null
}
