/**
 * Migration 001: document store.
 *
 * One table holds every collection. A document is keyed by
 * (collection, id) and its body is stored as JSON text.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const documentStoreMigration: Migration = {
  version: 1,
  name: '001-document-store',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        collection  TEXT NOT NULL,
        id          TEXT NOT NULL,
        body        TEXT NOT NULL CHECK(json_valid(body)),
        created_at  TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        updated_at  TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        PRIMARY KEY (collection, id)
      );

      CREATE INDEX IF NOT EXISTS idx_documents_run
        ON documents(collection, json_extract(body, '$.run_id'));
    `)
  },
}
