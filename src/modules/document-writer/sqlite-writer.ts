/**
 * SqliteDocumentWriter: DocumentWriter backed by the SQLite document store.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { DocumentNotFoundError } from '../../core/errors.js'
import { generateId } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import {
  getDocument,
  listDocuments,
  updateDocumentFields,
  upsertDocument,
} from '../../persistence/queries/documents.js'
import type {
  CollectionDocumentMap,
  CollectionName,
  DocumentPatch,
  DocumentReader,
  DocumentWriter,
} from './types.js'

const logger = createLogger('document-writer')

export interface SqliteDocumentWriterOptions {
  /** Source of ids for documents written without one (default: generateId) */
  idGenerator?: () => string
}

export class SqliteDocumentWriter implements DocumentWriter, DocumentReader {
  private readonly _db: BetterSqlite3Database
  private readonly _idGenerator: () => string

  constructor(db: BetterSqlite3Database, options: SqliteDocumentWriterOptions = {}) {
    this._db = db
    this._idGenerator = options.idGenerator ?? generateId
  }

  async write<C extends CollectionName>(
    collection: C,
    document: CollectionDocumentMap[C],
    documentId?: string,
  ): Promise<string> {
    const id = documentId ?? this._idGenerator()
    upsertDocument(this._db, collection, id, document)
    logger.debug({ collection, documentId: id }, 'Document written')
    return id
  }

  async update<C extends CollectionName>(
    collection: C,
    documentId: string,
    fields: DocumentPatch<C>,
  ): Promise<void> {
    const updated = updateDocumentFields(this._db, collection, documentId, fields)
    if (updated === undefined) {
      throw new DocumentNotFoundError(collection, documentId)
    }
    logger.debug({ collection, documentId, fields: Object.keys(fields) }, 'Document updated')
  }

  async read(collection: CollectionName, documentId: string): Promise<Record<string, unknown> | undefined> {
    return getDocument(this._db, collection, documentId)?.body
  }

  /** All bodies of one collection, optionally scoped to a run */
  async list(collection: CollectionName, runId?: string): Promise<Record<string, unknown>[]> {
    return listDocuments(this._db, collection, { runId }).map((doc) => doc.body)
  }
}
