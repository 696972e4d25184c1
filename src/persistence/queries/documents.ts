/**
 * Document store query functions for the SQLite persistence layer.
 *
 * Every function takes the raw better-sqlite3 handle. Bodies are JSON
 * objects; keys are validated before they reach SQL.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  DocumentBodySchema,
  DocumentKeySchema,
  DocumentRowSchema,
  type DocumentBody,
  type StoredDocument,
} from '../schemas/documents.js'

export type { DocumentBody, StoredDocument }

function decodeRow(row: unknown): StoredDocument | undefined {
  if (row === undefined) return undefined
  const parsed = DocumentRowSchema.parse(row)
  const body: unknown = JSON.parse(parsed.body)
  return {
    collection: parsed.collection,
    id: parsed.id,
    body: DocumentBodySchema.parse(body),
    createdAt: parsed.created_at,
    updatedAt: parsed.updated_at,
  }
}

/**
 * Insert a document, or replace the body of an existing (collection, id).
 * `created_at` survives a replace.
 */
export function upsertDocument(
  db: BetterSqlite3Database,
  collection: string,
  id: string,
  body: object,
): void {
  db.prepare(
    `
    INSERT INTO documents (collection, id, body)
    VALUES (?, ?, ?)
    ON CONFLICT(collection, id) DO UPDATE SET
      body = excluded.body,
      updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
  `,
  ).run(DocumentKeySchema.parse(collection), DocumentKeySchema.parse(id), JSON.stringify(body))
}

export function getDocument(
  db: BetterSqlite3Database,
  collection: string,
  id: string,
): StoredDocument | undefined {
  return decodeRow(
    db.prepare('SELECT * FROM documents WHERE collection = ? AND id = ?').get(collection, id),
  )
}

/**
 * Shallow-merge `fields` into an existing document body.
 *
 * @returns the updated document, or undefined when (collection, id) does not exist
 */
export function updateDocumentFields(
  db: BetterSqlite3Database,
  collection: string,
  id: string,
  fields: object,
): StoredDocument | undefined {
  const apply = db.transaction((): StoredDocument | undefined => {
    const existing = getDocument(db, collection, id)
    if (existing === undefined) return undefined

    const merged: DocumentBody = { ...existing.body, ...fields }
    db.prepare(
      `
      UPDATE documents
      SET body = ?, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
      WHERE collection = ? AND id = ?
    `,
    ).run(JSON.stringify(merged), collection, id)
    return getDocument(db, collection, id)
  })
  return apply()
}

export interface ListDocumentsFilter {
  /** Only documents whose body.run_id equals this value */
  runId?: string
}

/**
 * List a collection in insertion order.
 */
export function listDocuments(
  db: BetterSqlite3Database,
  collection: string,
  filter: ListDocumentsFilter = {},
): StoredDocument[] {
  const rows =
    filter.runId === undefined
      ? db.prepare('SELECT * FROM documents WHERE collection = ? ORDER BY rowid ASC').all(collection)
      : db
          .prepare(
            `SELECT * FROM documents
             WHERE collection = ? AND json_extract(body, '$.run_id') = ?
             ORDER BY rowid ASC`,
          )
          .all(collection, filter.runId)

  const documents: StoredDocument[] = []
  for (const row of rows) {
    const doc = decodeRow(row)
    if (doc !== undefined) documents.push(doc)
  }
  return documents
}
