import Database from 'better-sqlite3'
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import * as schema from './schema'
import { mkdirSync } from 'fs'
import { dirname } from 'path'

export type Db = BetterSQLite3Database<typeof schema>

export function openSqlite(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    // Ensure data directory exists
    mkdirSync(dirname(dbPath), { recursive: true })
  }

  const sqlite = new Database(dbPath)
  sqlite.pragma('journal_mode = WAL')
  return sqlite
}

export function createDb(sqlite: Database.Database): Db {
  return drizzle(sqlite, { schema })
}
