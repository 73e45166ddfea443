import type BetterSqlite3 from 'better-sqlite3'
import { readdirSync, readFileSync } from 'fs'
import { dirname, join } from 'path'
import { fileURLToPath, pathToFileURL } from 'url'
import { openSqlite } from './client'
import { loadConfig } from '../config'
import { createLogger, type Logger } from '../services/logger'

const migrationsDir = join(dirname(fileURLToPath(import.meta.url)), 'migrations')

// Applies pending migrations from ./migrations, returns the names applied
export function migrate(sqlite: BetterSqlite3.Database, log: Logger = createLogger('Migrate')): string[] {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS __drizzle_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      hash TEXT NOT NULL,
      created_at INTEGER NOT NULL
    )
  `)

  const applied = sqlite.prepare<[], { hash: string }>('SELECT hash FROM __drizzle_migrations').all()
  const appliedHashes = new Set(applied.map(m => m.hash))

  const files = readdirSync(migrationsDir).filter(f => f.endsWith('.sql')).sort()
  const record = sqlite.prepare('INSERT INTO __drizzle_migrations (hash, created_at) VALUES (?, ?)')
  const done: string[] = []

  for (const file of files) {
    const hash = file.replace('.sql', '')
    if (appliedHashes.has(hash)) continue

    const sql = readFileSync(join(migrationsDir, file), 'utf-8')
    const statements = sql.split('--> statement-breakpoint').map(s => s.trim()).filter(Boolean)

    // One transaction per file so a failed file leaves nothing behind
    sqlite.transaction(() => {
      for (const statement of statements) {
        sqlite.exec(statement)
      }
      record.run(hash, Date.now())
    })()

    log.info(`Applied ${file}`)
    done.push(hash)
  }

  return done
}

// Run directly: npm run db:migrate
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const log = createLogger('Migrate')
  const sqlite = openSqlite(loadConfig().databasePath)
  try {
    const applied = migrate(sqlite, log)
    log.success(applied.length > 0 ? 'Migrations complete!' : 'Nothing to migrate')
  } catch (err) {
    log.error('Migration failed', { error: err })
    process.exitCode = 1
  } finally {
    sqlite.close()
  }
}
