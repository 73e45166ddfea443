// Shared types for server services

export type LogLevel = 'info' | 'success' | 'warn' | 'error'

export interface ObjectMeta {
  namespace: string
  name: string
  resourceVersion?: string
  createdAt?: string
}

// Network attachments

export type SwitchportMode = 'access' | 'trunk' | 'hybrid'

export interface NetworkAttachmentSpec {
  mode: string  // Validated against SwitchportMode, may hold anything an admin submitted
  nativeVLAN: number
  allowedVLANs?: number[]
  mtu?: number
}

export interface NetworkAttachment extends ObjectMeta {
  spec: NetworkAttachmentSpec
}

// Hosts

export interface AttachmentRef {
  name: string
  namespace?: string  // Defaults to the host namespace
}

export interface HostInterfaceRef {
  name?: string
  macAddress?: string
  attachment: AttachmentRef
}

export interface LLDP {
  switchID?: string
  portID?: string
  switchSystemName?: string
}

export interface DiscoveredNIC {
  name: string
  mac: string
  ip?: string
  pxe: boolean
  lldp?: LLDP
}

export interface HardwareDetails {
  nics: DiscoveredNIC[]
}

export type ConditionStatus = 'True' | 'False' | 'Unknown'

export interface Condition {
  type: string
  status: ConditionStatus
  reason: string
  message: string
  lastTransitionTime: string
}

export type ProvisioningState =
  | 'unmanaged'
  | 'registering'
  | 'inspecting'
  | 'preparing'
  | 'available'
  | 'provisioning'
  | 'provisioned'
  | 'deprovisioning'
  | 'externally-provisioned'
  | 'powering-off-before-delete'
  | 'deleting'

export interface BMCDetails {
  driver: string   // Ironic hardware type, e.g. "ipmi" or "redfish"
  address: string
}

export interface HostSpec {
  bootMACAddress?: string
  bmc?: BMCDetails
  networkInterfaces: HostInterfaceRef[]
}

export interface HostStatus {
  provisioningState: ProvisioningState
  nodeId?: string
  hardwareDetails?: HardwareDetails
  // Interface list last applied to the remote ports; unset when nothing is applied
  appliedNetworkInterfaces?: HostInterfaceRef[]
  conditions: Condition[]
  errorMessage?: string
}

export interface Host extends ObjectMeta {
  spec: HostSpec
  status: HostStatus
}

// Resolved switch port configuration, keyed by interface key
export interface SwitchPortConfig {
  mode: string
  nativeVLAN: number
  allowedVLANs: number[]
  mtu?: number
}

export type SwitchPortConfigMap = Map<string, SwitchPortConfig>

// Switches

export type SwitchCredentialType = 'password' | 'publickey'

export interface SwitchSpec {
  address: string
  macAddress: string
  deviceType: string
  driver?: string
  port?: number
  disableCertificateVerification?: boolean
  credentials: {
    type: SwitchCredentialType
    secretName: string
  }
}

export interface SwitchDevice extends ObjectMeta {
  spec: SwitchSpec
}

// Secrets

export type SecretData = Record<string, Buffer>

export interface Secret extends ObjectMeta {
  data: SecretData
}

export interface ResourceKinds {
  attachments: NetworkAttachment
  hosts: Host
  switches: SwitchDevice
  secrets: Secret
}

export type ResourceKind = keyof ResourceKinds

export interface NamespacedName {
  namespace: string
  name: string
}

// Returns the key a declared interface is matched by: its name, else its MAC
export function interfaceKey(iface: HostInterfaceRef): string {
  return iface.name || iface.macAddress || ''
}

export function attachmentNamespace(iface: HostInterfaceRef, hostNamespace: string): string {
  return iface.attachment.namespace || hostNamespace
}
