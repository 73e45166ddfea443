import { errorMessage, isNotFound } from './errors'
import type { Logger } from './logger'
import {
  attachmentNamespace,
  interfaceKey,
  type Host,
  type NetworkAttachment,
  type SwitchPortConfigMap,
} from './types'

export interface AttachmentReader {
  get(kind: 'attachments', namespace: string, name: string): Promise<NetworkAttachment>
}

/**
 * Resolves the attachments referenced by a host's declared interfaces into
 * per-interface switch port configs, keyed by interface key (name, else MAC).
 *
 * A missing attachment skips its interface: attachments are routinely deleted
 * while a host is being torn down. Any other read failure aborts the whole
 * resolution so no partial map is ever applied.
 */
export async function resolveSwitchPortConfigs(
  reader: AttachmentReader,
  host: Host,
  log: Logger,
): Promise<SwitchPortConfigMap> {
  const configs: SwitchPortConfigMap = new Map()

  for (const iface of host.spec.networkInterfaces) {
    const namespace = attachmentNamespace(iface, host.namespace)
    const ref = `${namespace}/${iface.attachment.name}`
    const key = interfaceKey(iface)

    let attachment: NetworkAttachment
    try {
      attachment = await reader.get('attachments', namespace, iface.attachment.name)
    } catch (err) {
      if (isNotFound(err)) {
        log.warn('network attachment not found, skipping interface', { interface: key, attachment: ref })
        continue
      }
      throw new Error(`failed to get network attachment ${ref}: ${errorMessage(err)}`, { cause: err })
    }

    configs.set(key, {
      mode: attachment.spec.mode,
      nativeVLAN: attachment.spec.nativeVLAN,
      allowedVLANs: [...(attachment.spec.allowedVLANs ?? [])],
      ...(attachment.spec.mtu !== undefined ? { mtu: attachment.spec.mtu } : {}),
    })
  }

  return configs
}
