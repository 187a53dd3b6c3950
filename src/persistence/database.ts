/**
 * SQLite connection for the `sqlite` storage backend.
 *
 * The connection opens lazily on first use with WAL journaling, so CLI
 * readers never block an orchestrator committing to the same file. It is
 * migrated to the latest schema before any query runs.
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

/** Applied in order on every open; busy_timeout covers a second process holding the write lock */
const CONNECTION_PRAGMAS: readonly string[] = ['busy_timeout = 5000', 'synchronous = NORMAL', 'foreign_keys = ON']

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  /** @param databasePath - file path, or ':memory:' for a private in-memory store */
  constructor(databasePath: string) {
    this._path = databasePath
  }

  /** Open and migrate; a second call while open does nothing */
  open(): void {
    if (this._db !== null) return

    const db = new BetterSqlite3(this._path)
    // In-memory databases report 'memory' and cannot use WAL
    const journalMode: unknown = db.pragma('journal_mode = WAL', { simple: true })
    if (journalMode !== 'wal') {
      logger.warn({ path: this._path, journalMode }, 'SQLite store is not in WAL mode')
    }
    for (const pragma of CONNECTION_PRAGMAS) db.pragma(pragma)

    runMigrations(db)
    this._db = db
    logger.debug({ path: this._path }, 'SQLite plan store opened')
  }

  close(): void {
    if (this._db === null) return
    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'SQLite plan store closed')
  }

  /** @throws {Error} before open() or after close() */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error(`SQLite plan store at ${this._path} is not open`)
    }
    return this._db
  }

  get isOpen(): boolean {
    return this._db !== null
  }
}
