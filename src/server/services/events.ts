import { and, asc, desc, eq, lte } from 'drizzle-orm'
import type { Db } from '../db/client'
import { hostEvents, type HostEvent } from '../db/schema'
import type { Logger } from './logger'
import type { LogLevel, NamespacedName } from './types'

export interface EventPublisher {
  publish(host: NamespacedName, level: LogLevel, reason: string, message: string): void
}

// Events kept per host; older ones are dropped
export const MAX_EVENTS_PER_HOST = 100

// Persists host events and mirrors them to the console
export class HostEventRecorder implements EventPublisher {
  constructor(private db: Db, private log: Logger, private maxPerHost = MAX_EVENTS_PER_HOST) {}

  publish(host: NamespacedName, level: LogLevel, reason: string, message: string): void {
    this.log[level](`${reason}: ${message}`, { host: `${host.namespace}/${host.name}` })

    // A recurring outcome is stored once, until something else happens
    const latest = this.db.select()
      .from(hostEvents)
      .where(this.forHost(host))
      .orderBy(desc(hostEvents.id))
      .limit(1)
      .get()
    if (latest && latest.level === level && latest.reason === reason && latest.message === message) {
      return
    }

    this.db.insert(hostEvents).values({
      hostNamespace: host.namespace,
      hostName: host.name,
      timestamp: new Date().toISOString(),
      level,
      reason,
      message,
    }).run()

    const oldestKept = this.db.select({ id: hostEvents.id })
      .from(hostEvents)
      .where(this.forHost(host))
      .orderBy(desc(hostEvents.id))
      .limit(1)
      .offset(this.maxPerHost)
      .get()
    if (oldestKept) {
      this.db.delete(hostEvents)
        .where(and(this.forHost(host), lte(hostEvents.id, oldestKept.id)))
        .run()
    }
  }

  list(host: NamespacedName): HostEvent[] {
    return this.db.select()
      .from(hostEvents)
      .where(this.forHost(host))
      .orderBy(asc(hostEvents.id))
      .all()
  }

  clear(host: NamespacedName): void {
    this.db.delete(hostEvents)
      .where(this.forHost(host))
      .run()
  }

  private forHost(host: NamespacedName) {
    return and(eq(hostEvents.hostNamespace, host.namespace), eq(hostEvents.hostName, host.name))
  }
}
