/**
 * DatabaseWrapper — thin wrapper around better-sqlite3.
 *
 *  - Opens a SQLite database with the required PRAGMAs (WAL mode, etc.)
 *  - Applies pending migrations on open
 *  - Exposes the raw BetterSqlite3.Database instance to query modules
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
  }

  /**
   * Open the database, apply PRAGMAs and run migrations.
   * Idempotent — calling open() when already open is a no-op.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    logger.debug({ path: this._path }, 'Opening SQLite database')
    const db = new BetterSqlite3(this._path)

    const journalMode: unknown = db.pragma('journal_mode = WAL', { simple: true })
    if (journalMode !== 'wal') {
      // in-memory databases report "memory"
      logger.debug({ journalMode }, 'WAL journal mode not available')
    }
    db.pragma('busy_timeout = 5000')
    db.pragma('synchronous = NORMAL')
    db.pragma('foreign_keys = ON')

    runMigrations(db)
    this._db = db
  }

  /**
   * Close the database. Idempotent.
   */
  close(): void {
    if (this._db === null) {
      return
    }
    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'SQLite database closed')
  }

  /**
   * @throws {Error} if the database has not been opened yet.
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  get isOpen(): boolean {
    return this._db !== null
  }
}

/** Open (and migrate) a database at `path`; use ':memory:' for a throwaway store */
export function openDatabase(path: string): DatabaseWrapper {
  const wrapper = new DatabaseWrapper(path)
  wrapper.open()
  return wrapper
}
