import { ForbiddenError, ImmutableError, OperatorError, ValidationError, errorMessage, isNotFound } from './errors'
import type { Logger } from './logger'
import type { ReferenceIndex } from './reference-index'
import { attachmentNamespace, interfaceKey, type Host, type NetworkAttachment, type NetworkAttachmentSpec } from './types'
import { validateAttachment } from './validation'

export interface HostReader {
  get(kind: 'hosts', namespace: string, name: string): Promise<Host>
}

export interface AdmissionResult {
  warnings: string[]
}

// Raised when references cannot be determined; the mutation is refused
export class ReferenceCheckError extends OperatorError {
  constructor(message: string, cause: unknown) {
    super(message, 503, { cause })
  }
}

export function attachmentSpecEqual(a: NetworkAttachmentSpec, b: NetworkAttachmentSpec): boolean {
  const av = a.allowedVLANs ?? []
  const bv = b.allowedVLANs ?? []
  return a.mode === b.mode
    && a.nativeVLAN === b.nativeVLAN
    && a.mtu === b.mtu
    && av.length === bv.length
    && av.every((vlan, i) => vlan === bv[i])
}

/**
 * Admission checks for network attachments: field validation on every write,
 * and immutability while any host interface references the attachment.
 */
export class AttachmentGuard {
  constructor(
    private index: ReferenceIndex,
    private hosts: HostReader,
    private log: Logger,
  ) {}

  validateCreate(attachment: NetworkAttachment): AdmissionResult {
    this.log.info('validate create', { namespace: attachment.namespace, name: attachment.name })
    const errors = validateAttachment(attachment.spec)
    if (errors.length > 0) {
      throw new ValidationError(errors)
    }
    return { warnings: [] }
  }

  async validateUpdate(oldAttachment: NetworkAttachment, newAttachment: NetworkAttachment): Promise<AdmissionResult> {
    this.log.info('validate update', { namespace: newAttachment.namespace, name: newAttachment.name })

    // Metadata-only change
    if (attachmentSpecEqual(oldAttachment.spec, newAttachment.spec)) {
      return { warnings: [] }
    }

    const errors = validateAttachment(newAttachment.spec)

    let references: string[]
    try {
      references = await this.findReferences(oldAttachment)
    } catch (err) {
      throw new ReferenceCheckError(
        `failed to check host references, cannot safely allow update: ${errorMessage(err)}`,
        err,
      )
    }

    if (references.length > 0) {
      errors.push(`NetworkAttachment spec is immutable while referenced by host interfaces: ${references.join(', ')}`)
      throw new ImmutableError(errors.join('; '))
    }

    if (errors.length > 0) {
      throw new ValidationError(errors)
    }

    return { warnings: ['NetworkAttachment modified successfully. No host references found.'] }
  }

  async validateDelete(attachment: NetworkAttachment): Promise<AdmissionResult> {
    this.log.info('validate delete', { namespace: attachment.namespace, name: attachment.name })

    let references: string[]
    try {
      references = await this.findReferences(attachment)
    } catch (err) {
      throw new ReferenceCheckError(`failed to check host references: ${errorMessage(err)}`, err)
    }

    if (references.length > 0) {
      throw new ForbiddenError(
        `cannot delete attachment while referenced by host interfaces: ${references.join(', ')}`,
      )
    }

    return { warnings: [] }
  }

  // "<hostNamespace>/<hostName>[<interfaceKey>]" for every referencing interface
  async findReferences(attachment: NetworkAttachment): Promise<string[]> {
    const references: string[] = []

    for (const ref of this.index.lookup(attachment.namespace, attachment.name)) {
      let host: Host
      try {
        host = await this.hosts.get('hosts', ref.namespace, ref.name)
      } catch (err) {
        // Deleted since it was indexed
        if (isNotFound(err)) continue
        throw err
      }

      for (const iface of host.spec.networkInterfaces) {
        if (iface.attachment.name === attachment.name
          && attachmentNamespace(iface, host.namespace) === attachment.namespace) {
          references.push(`${host.namespace}/${host.name}[${interfaceKey(iface)}]`)
        }
      }
    }

    return references
  }
}
