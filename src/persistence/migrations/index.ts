/**
 * Schema migrations for the document store.
 *
 * Applied versions are recorded in `schema_migrations`; each migration runs
 * in its own transaction together with its bookkeeping row.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../../utils/logger.js'
import { documentStoreMigration } from './001-document-store.js'

const logger = createLogger('persistence:migrations')

export interface Migration {
  version: number
  name: string
  /** Must tolerate objects that already exist */
  up(db: BetterSqlite3Database): void
}

/** Every migration the store knows, oldest first */
export const MIGRATIONS: readonly Migration[] = [documentStoreMigration]

const BOOKKEEPING_DDL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    version    INTEGER PRIMARY KEY,
    name       TEXT    NOT NULL,
    applied_at TEXT    NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )
`

function appliedVersions(db: BetterSqlite3Database): Set<number> {
  const rows: unknown[] = db.prepare('SELECT version FROM schema_migrations').pluck().all()
  return new Set(rows.filter((row): row is number => typeof row === 'number'))
}

/**
 * Bring `db` up to date and return the versions this call applied, ascending.
 * Two migrations sharing a version is a programming error and throws before
 * anything is applied.
 */
export function runMigrations(
  db: BetterSqlite3Database,
  migrations: readonly Migration[] = MIGRATIONS,
): number[] {
  const versions = migrations.map((m) => m.version)
  const duplicate = versions.find((v, i) => versions.indexOf(v) !== i)
  if (duplicate !== undefined) {
    throw new Error(`Duplicate migration version ${String(duplicate)}`)
  }

  db.exec(BOOKKEEPING_DDL)
  const done = appliedVersions(db)
  const pending = [...migrations].filter((m) => !done.has(m.version)).sort((a, b) => a.version - b.version)

  const record = db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
  for (const migration of pending) {
    db.transaction(() => {
      migration.up(db)
      record.run(migration.version, migration.name)
    })()
    logger.info({ version: migration.version, name: migration.name }, 'Migration applied')
  }

  return pending.map((m) => m.version)
}
