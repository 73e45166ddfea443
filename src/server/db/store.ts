import { and, asc, eq } from 'drizzle-orm'
import { nanoid } from 'nanoid'
import type { Db } from './client'
import { attachments, hosts, switches, secrets } from './schema'
import type { AttachmentRow, HostRow, SwitchRow, SecretRow } from './schema'
import { ConflictError, NotFoundError } from '../services/errors'
import type {
  Host,
  NetworkAttachment,
  ResourceKind,
  ResourceKinds,
  Secret,
  SecretData,
  SwitchDevice,
} from '../services/types'

export type WatchEventType = 'added' | 'modified' | 'deleted'

export interface WatchEvent<T> {
  type: WatchEventType
  object: T
  previous?: T
}

export type WatchListener<T> = (event: WatchEvent<T>) => void

// Row-level operations for one resource kind. update/remove report whether a row matched.
interface KindAdapter<T> {
  get(namespace: string, name: string): T | undefined
  list(namespace?: string): T[]
  insert(obj: T, version: string, createdAt: string): void
  update(obj: T, expectedVersion: string, version: string): boolean
  remove(namespace: string, name: string): boolean
}

function encodeSecretData(data: SecretData): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(data)) {
    out[key] = value.toString('base64')
  }
  return out
}

function decodeSecretData(data: Record<string, string>): SecretData {
  const out: SecretData = {}
  for (const [key, value] of Object.entries(data)) {
    out[key] = Buffer.from(value, 'base64')
  }
  return out
}

function attachmentFromRow(row: AttachmentRow): NetworkAttachment {
  return {
    namespace: row.namespace,
    name: row.name,
    resourceVersion: row.resourceVersion,
    createdAt: row.createdAt,
    spec: {
      mode: row.mode,
      nativeVLAN: row.nativeVlan,
      ...(row.allowedVlans ? { allowedVLANs: row.allowedVlans } : {}),
      ...(row.mtu !== null ? { mtu: row.mtu } : {}),
    },
  }
}

function hostFromRow(row: HostRow): Host {
  return {
    namespace: row.namespace,
    name: row.name,
    resourceVersion: row.resourceVersion,
    createdAt: row.createdAt,
    spec: row.spec,
    status: row.status,
  }
}

function switchFromRow(row: SwitchRow): SwitchDevice {
  return {
    namespace: row.namespace,
    name: row.name,
    resourceVersion: row.resourceVersion,
    createdAt: row.createdAt,
    spec: row.spec,
  }
}

function secretFromRow(row: SecretRow): Secret {
  return {
    namespace: row.namespace,
    name: row.name,
    resourceVersion: row.resourceVersion,
    createdAt: row.createdAt,
    data: decodeSecretData(row.data),
  }
}

function attachmentAdapter(db: Db): KindAdapter<NetworkAttachment> {
  const key = (namespace: string, name: string) =>
    and(eq(attachments.namespace, namespace), eq(attachments.name, name))

  return {
    get: (namespace, name) => {
      const row = db.select().from(attachments).where(key(namespace, name)).get()
      return row ? attachmentFromRow(row) : undefined
    },
    list: (namespace) =>
      db.select().from(attachments)
        .where(namespace ? eq(attachments.namespace, namespace) : undefined)
        .orderBy(asc(attachments.namespace), asc(attachments.name))
        .all()
        .map(attachmentFromRow),
    insert: (obj, version, createdAt) => {
      db.insert(attachments).values({
        namespace: obj.namespace,
        name: obj.name,
        resourceVersion: version,
        createdAt,
        mode: obj.spec.mode,
        nativeVlan: obj.spec.nativeVLAN,
        allowedVlans: obj.spec.allowedVLANs ?? null,
        mtu: obj.spec.mtu ?? null,
      }).run()
    },
    update: (obj, expectedVersion, version) =>
      db.update(attachments)
        .set({
          resourceVersion: version,
          mode: obj.spec.mode,
          nativeVlan: obj.spec.nativeVLAN,
          allowedVlans: obj.spec.allowedVLANs ?? null,
          mtu: obj.spec.mtu ?? null,
        })
        .where(and(key(obj.namespace, obj.name), eq(attachments.resourceVersion, expectedVersion)))
        .run().changes === 1,
    remove: (namespace, name) => db.delete(attachments).where(key(namespace, name)).run().changes === 1,
  }
}

function hostAdapter(db: Db): KindAdapter<Host> {
  const key = (namespace: string, name: string) =>
    and(eq(hosts.namespace, namespace), eq(hosts.name, name))

  return {
    get: (namespace, name) => {
      const row = db.select().from(hosts).where(key(namespace, name)).get()
      return row ? hostFromRow(row) : undefined
    },
    list: (namespace) =>
      db.select().from(hosts)
        .where(namespace ? eq(hosts.namespace, namespace) : undefined)
        .orderBy(asc(hosts.namespace), asc(hosts.name))
        .all()
        .map(hostFromRow),
    insert: (obj, version, createdAt) => {
      db.insert(hosts).values({
        namespace: obj.namespace,
        name: obj.name,
        resourceVersion: version,
        createdAt,
        spec: obj.spec,
        status: obj.status,
      }).run()
    },
    // Spec only; status goes through updateHostStatus
    update: (obj, expectedVersion, version) =>
      db.update(hosts)
        .set({ resourceVersion: version, spec: obj.spec })
        .where(and(key(obj.namespace, obj.name), eq(hosts.resourceVersion, expectedVersion)))
        .run().changes === 1,
    remove: (namespace, name) => db.delete(hosts).where(key(namespace, name)).run().changes === 1,
  }
}

function switchAdapter(db: Db): KindAdapter<SwitchDevice> {
  const key = (namespace: string, name: string) =>
    and(eq(switches.namespace, namespace), eq(switches.name, name))

  return {
    get: (namespace, name) => {
      const row = db.select().from(switches).where(key(namespace, name)).get()
      return row ? switchFromRow(row) : undefined
    },
    list: (namespace) =>
      db.select().from(switches)
        .where(namespace ? eq(switches.namespace, namespace) : undefined)
        .orderBy(asc(switches.namespace), asc(switches.name))
        .all()
        .map(switchFromRow),
    insert: (obj, version, createdAt) => {
      db.insert(switches).values({
        namespace: obj.namespace,
        name: obj.name,
        resourceVersion: version,
        createdAt,
        spec: obj.spec,
      }).run()
    },
    update: (obj, expectedVersion, version) =>
      db.update(switches)
        .set({ resourceVersion: version, spec: obj.spec })
        .where(and(key(obj.namespace, obj.name), eq(switches.resourceVersion, expectedVersion)))
        .run().changes === 1,
    remove: (namespace, name) => db.delete(switches).where(key(namespace, name)).run().changes === 1,
  }
}

function secretAdapter(db: Db): KindAdapter<Secret> {
  const key = (namespace: string, name: string) =>
    and(eq(secrets.namespace, namespace), eq(secrets.name, name))

  return {
    get: (namespace, name) => {
      const row = db.select().from(secrets).where(key(namespace, name)).get()
      return row ? secretFromRow(row) : undefined
    },
    list: (namespace) =>
      db.select().from(secrets)
        .where(namespace ? eq(secrets.namespace, namespace) : undefined)
        .orderBy(asc(secrets.namespace), asc(secrets.name))
        .all()
        .map(secretFromRow),
    insert: (obj, version, createdAt) => {
      db.insert(secrets).values({
        namespace: obj.namespace,
        name: obj.name,
        resourceVersion: version,
        createdAt,
        data: encodeSecretData(obj.data),
      }).run()
    },
    update: (obj, expectedVersion, version) =>
      db.update(secrets)
        .set({ resourceVersion: version, data: encodeSecretData(obj.data) })
        .where(and(key(obj.namespace, obj.name), eq(secrets.resourceVersion, expectedVersion)))
        .run().changes === 1,
    remove: (namespace, name) => db.delete(secrets).where(key(namespace, name)).run().changes === 1,
  }
}

const kindNames: Record<ResourceKind, string> = {
  attachments: 'NetworkAttachment',
  hosts: 'Host',
  switches: 'SwitchDevice',
  secrets: 'Secret',
}

/**
 * Declarative resource store with optimistic concurrency.
 *
 * Every write issues a new resourceVersion. An update carrying a version other than
 * the stored one is rejected with ConflictError, so the writer has to re-read and retry.
 * Listeners registered with watch() see each successful mutation after it commits.
 */
export class ResourceStore {
  private adapters: { [K in ResourceKind]: KindAdapter<ResourceKinds[K]> }
  private listeners: { [K in ResourceKind]: Set<WatchListener<ResourceKinds[K]>> } = {
    attachments: new Set(),
    hosts: new Set(),
    switches: new Set(),
    secrets: new Set(),
  }

  constructor(private db: Db) {
    this.adapters = {
      attachments: attachmentAdapter(db),
      hosts: hostAdapter(db),
      switches: switchAdapter(db),
      secrets: secretAdapter(db),
    }
  }

  async get<K extends ResourceKind>(kind: K, namespace: string, name: string): Promise<ResourceKinds[K]> {
    const obj = this.adapters[kind].get(namespace, name)
    if (!obj) {
      throw new NotFoundError(kindNames[kind], namespace, name)
    }
    return obj
  }

  async list<K extends ResourceKind>(kind: K, namespace?: string): Promise<ResourceKinds[K][]> {
    return this.adapters[kind].list(namespace)
  }

  async create<K extends ResourceKind>(kind: K, obj: ResourceKinds[K]): Promise<ResourceKinds[K]> {
    const adapter = this.adapters[kind]
    if (adapter.get(obj.namespace, obj.name)) {
      throw new ConflictError(`${kindNames[kind]} ${obj.namespace}/${obj.name} already exists`)
    }

    adapter.insert(obj, nanoid(), new Date().toISOString())
    const created = await this.get(kind, obj.namespace, obj.name)
    this.emit(kind, { type: 'added', object: created })
    return created
  }

  async update<K extends ResourceKind>(kind: K, obj: ResourceKinds[K]): Promise<ResourceKinds[K]> {
    const adapter = this.adapters[kind]
    const previous = await this.get(kind, obj.namespace, obj.name)
    const expected = obj.resourceVersion ?? ''

    if (!adapter.update(obj, expected, nanoid())) {
      throw this.staleWrite(kind, obj.namespace, obj.name)
    }

    const updated = await this.get(kind, obj.namespace, obj.name)
    this.emit(kind, { type: 'modified', object: updated, previous })
    return updated
  }

  // An unchanged status is not written and raises no watch event
  async updateHostStatus(host: Host): Promise<Host> {
    const previous = await this.get('hosts', host.namespace, host.name)
    if (previous.resourceVersion === host.resourceVersion
      && JSON.stringify(previous.status) === JSON.stringify(host.status)) {
      return previous
    }

    const changed = this.db.update(hosts)
      .set({ resourceVersion: nanoid(), status: host.status })
      .where(and(
        eq(hosts.namespace, host.namespace),
        eq(hosts.name, host.name),
        eq(hosts.resourceVersion, host.resourceVersion ?? ''),
      ))
      .run().changes === 1

    if (!changed) {
      throw this.staleWrite('hosts', host.namespace, host.name)
    }

    const updated = await this.get('hosts', host.namespace, host.name)
    this.emit('hosts', { type: 'modified', object: updated, previous })
    return updated
  }

  async delete<K extends ResourceKind>(kind: K, namespace: string, name: string): Promise<ResourceKinds[K]> {
    const previous = await this.get(kind, namespace, name)
    if (!this.adapters[kind].remove(namespace, name)) {
      throw new NotFoundError(kindNames[kind], namespace, name)
    }
    this.emit(kind, { type: 'deleted', object: previous })
    return previous
  }

  watch<K extends ResourceKind>(kind: K, listener: WatchListener<ResourceKinds[K]>): () => void {
    const set: Set<WatchListener<ResourceKinds[K]>> = this.listeners[kind]
    set.add(listener)
    return () => {
      set.delete(listener)
    }
  }

  private emit<K extends ResourceKind>(kind: K, event: WatchEvent<ResourceKinds[K]>) {
    const set: Set<WatchListener<ResourceKinds[K]>> = this.listeners[kind]
    for (const listener of set) {
      listener(event)
    }
  }

  private staleWrite(kind: ResourceKind, namespace: string, name: string): ConflictError {
    return new ConflictError(
      `${kindNames[kind]} ${namespace}/${name} has been modified; re-read it and apply your changes again`,
    )
  }
}
