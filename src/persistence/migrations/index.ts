/**
 * Migration runner for the SQLite run store.
 *
 *  - Ensures the `schema_migrations` table exists
 *  - Applies pending migrations in version order, each in its own transaction
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { migration001RunStore } from './001-run-store.js'

const logger = createLogger('persistence:migrations')

export interface Migration {
  /** Unique version number (integer) */
  version: number
  name: string
  /** Execute the migration — must be idempotent */
  up(db: BetterSqlite3Database): void
}

// Add new migrations here in version order
const MIGRATIONS: Migration[] = [migration001RunStore]

const VersionRowSchema = z.object({ version: z.number().int() })

/**
 * Ensure `schema_migrations` exists and run any pending migrations.
 * Safe to call multiple times.
 */
export function runMigrations(db: BetterSqlite3Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT    NOT NULL,
      applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const appliedVersions = new Set<number>(
    z
      .array(VersionRowSchema)
      .parse(db.prepare('SELECT version FROM schema_migrations').all())
      .map((row) => row.version)
  )

  const pending = MIGRATIONS.filter((m) => !appliedVersions.has(m.version)).sort(
    (a, b) => a.version - b.version
  )
  if (pending.length === 0) {
    logger.debug('No pending migrations')
    return
  }

  const insertMigration = db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
  for (const migration of pending) {
    const applyMigration = db.transaction(() => {
      migration.up(db)
      insertMigration.run(migration.version, migration.name)
    })
    applyMigration()
    logger.info({ version: migration.version, name: migration.name }, 'Migration applied')
  }
}
