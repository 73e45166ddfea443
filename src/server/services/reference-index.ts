import { IndexNotSyncedError } from './errors'
import { attachmentNamespace, type Host, type NamespacedName } from './types'

export function attachmentKey(namespace: string, name: string): string {
  return `${namespace}/${name}`
}

function hostKey(host: NamespacedName): string {
  return `${host.namespace}/${host.name}`
}

// Attachment keys a host's declared interfaces point at
export function referencedAttachmentKeys(host: Host): string[] {
  const keys = new Set<string>()
  for (const iface of host.spec.networkInterfaces) {
    if (!iface.attachment.name) continue
    keys.add(attachmentKey(attachmentNamespace(iface, host.namespace), iface.attachment.name))
  }
  return [...keys]
}

/**
 * Secondary index from "<attachmentNamespace>/<attachmentName>" to the hosts
 * referencing it. Kept current by whatever watches host mutations; lookups
 * fail until the first full sync so callers can refuse rather than guess.
 */
export class ReferenceIndex {
  private byAttachment = new Map<string, Map<string, NamespacedName>>()
  private byHost = new Map<string, string[]>()
  private synced = false

  // Rebuilds the index from a complete host listing
  sync(hosts: Host[]): void {
    this.byAttachment.clear()
    this.byHost.clear()
    for (const host of hosts) {
      this.upsertHost(host)
    }
    this.synced = true
  }

  get isSynced(): boolean {
    return this.synced
  }

  upsertHost(host: Host): void {
    this.removeHost(host)

    const id = hostKey(host)
    const keys = referencedAttachmentKeys(host)
    for (const key of keys) {
      let hosts = this.byAttachment.get(key)
      if (!hosts) {
        hosts = new Map()
        this.byAttachment.set(key, hosts)
      }
      hosts.set(id, { namespace: host.namespace, name: host.name })
    }
    if (keys.length > 0) {
      this.byHost.set(id, keys)
    }
  }

  removeHost(host: NamespacedName): void {
    const id = hostKey(host)
    for (const key of this.byHost.get(id) ?? []) {
      const hosts = this.byAttachment.get(key)
      if (!hosts) continue
      hosts.delete(id)
      if (hosts.size === 0) {
        this.byAttachment.delete(key)
      }
    }
    this.byHost.delete(id)
  }

  // Hosts referencing an attachment, sorted by namespace/name
  lookup(namespace: string, name: string): NamespacedName[] {
    if (!this.synced) {
      throw new IndexNotSyncedError()
    }
    const hosts = this.byAttachment.get(attachmentKey(namespace, name))
    if (!hosts) return []
    return [...hosts.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, host]) => host)
  }
}
