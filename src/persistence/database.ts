/**
 * SQLite connection for the debate document store.
 *
 * A file database lives at `global.database_path` and is created on first
 * use together with its directory; `:memory:` gives each connection a
 * private store for tests.
 */

import { mkdirSync } from 'fs'
import { dirname } from 'path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

export const IN_MEMORY_DATABASE = ':memory:'

/** Connection settings applied to every database this module opens */
const CONNECTION_PRAGMAS: readonly string[] = ['busy_timeout = 5000', 'synchronous = NORMAL']

/**
 * Open a database with the store's pragmas. Concurrent debates share one
 * connection, so a file database runs in WAL mode; in-memory ones cannot.
 */
export function openDatabase(databasePath: string): BetterSqlite3Database {
  const inMemory = databasePath === IN_MEMORY_DATABASE
  if (!inMemory) mkdirSync(dirname(databasePath), { recursive: true })

  const db = new BetterSqlite3(databasePath)
  if (!inMemory) {
    const mode: unknown = db.pragma('journal_mode = WAL', { simple: true })
    if (mode !== 'wal') logger.warn({ path: databasePath, mode }, 'WAL journal mode unavailable')
  }
  for (const pragma of CONNECTION_PRAGMAS) db.pragma(pragma)
  return db
}

/**
 * Database handle owned by one `colloquy run`.
 */
export interface DatabaseService {
  /** Open the connection and bring the schema up to date; returns the migration versions applied */
  initialize(): Promise<number[]>
  shutdown(): Promise<void>
  readonly isOpen: boolean
  /** Throws until initialize() has run */
  readonly db: BetterSqlite3Database
}

class SqliteDatabaseService implements DatabaseService {
  private _db: BetterSqlite3Database | null = null

  constructor(private readonly _path: string) {}

  get isOpen(): boolean {
    return this._db !== null
  }

  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error(`Database ${this._path} is not open; call initialize() first`)
    }
    return this._db
  }

  async initialize(): Promise<number[]> {
    if (this._db !== null) return []

    const db = openDatabase(this._path)
    this._db = db
    const applied = runMigrations(db)
    logger.info({ path: this._path, applied }, 'Document store ready')
    return applied
  }

  async shutdown(): Promise<void> {
    if (this._db === null) return
    this._db.close()
    this._db = null
    logger.info({ path: this._path }, 'Document store closed')
  }
}

export function createDatabaseService(databasePath: string): DatabaseService {
  return new SqliteDatabaseService(databasePath)
}
