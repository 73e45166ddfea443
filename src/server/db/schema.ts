import { sqliteTable, text, integer, index, primaryKey } from 'drizzle-orm/sqlite-core'
import type { HostSpec, HostStatus, SwitchSpec } from '../services/types'

// Network attachments (switchport policy referenced by host interfaces)
export const attachments = sqliteTable('attachments', {
  namespace: text('namespace').notNull(),
  name: text('name').notNull(),
  resourceVersion: text('resource_version').notNull(),
  createdAt: text('created_at').notNull(),
  mode: text('mode').notNull(),
  nativeVlan: integer('native_vlan').notNull(),
  allowedVlans: text('allowed_vlans', { mode: 'json' }).$type<number[]>(),  // NULL when none declared
  mtu: integer('mtu'),
}, (table) => [
  primaryKey({ columns: [table.namespace, table.name] }),
])

// Bare-metal hosts (spec is admin-owned, status is controller-owned)
export const hosts = sqliteTable('hosts', {
  namespace: text('namespace').notNull(),
  name: text('name').notNull(),
  resourceVersion: text('resource_version').notNull(),
  createdAt: text('created_at').notNull(),
  spec: text('spec', { mode: 'json' }).$type<HostSpec>().notNull(),
  status: text('status', { mode: 'json' }).$type<HostStatus>().notNull(),
}, (table) => [
  primaryKey({ columns: [table.namespace, table.name] }),
])

// Switch devices
export const switches = sqliteTable('switches', {
  namespace: text('namespace').notNull(),
  name: text('name').notNull(),
  resourceVersion: text('resource_version').notNull(),
  createdAt: text('created_at').notNull(),
  spec: text('spec', { mode: 'json' }).$type<SwitchSpec>().notNull(),
}, (table) => [
  primaryKey({ columns: [table.namespace, table.name] }),
])

// Secrets (values base64-encoded)
export const secrets = sqliteTable('secrets', {
  namespace: text('namespace').notNull(),
  name: text('name').notNull(),
  resourceVersion: text('resource_version').notNull(),
  createdAt: text('created_at').notNull(),
  data: text('data', { mode: 'json' }).$type<Record<string, string>>().notNull(),
}, (table) => [
  primaryKey({ columns: [table.namespace, table.name] }),
])

// Host events (persisted reconciliation outcomes)
export const hostEvents = sqliteTable('host_events', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  hostNamespace: text('host_namespace').notNull(),
  hostName: text('host_name').notNull(),
  timestamp: text('timestamp').notNull(),
  level: text('level', { enum: ['info', 'success', 'warn', 'error'] }).notNull(),
  reason: text('reason').notNull(),
  message: text('message').notNull(),
}, (table) => [
  index('idx_host_events_host').on(table.hostNamespace, table.hostName),
])

// Type exports for use in application
export type AttachmentRow = typeof attachments.$inferSelect
export type HostRow = typeof hosts.$inferSelect
export type SwitchRow = typeof switches.$inferSelect
export type SecretRow = typeof secrets.$inferSelect
export type HostEvent = typeof hostEvents.$inferSelect
export type NewHostEvent = typeof hostEvents.$inferInsert
