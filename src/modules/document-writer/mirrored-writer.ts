/**
 * MirroredDocumentWriter: decorates a DocumentWriter with a per-document
 * JSON audit copy on disk:
 *
 *   <outputDir>/<run_id>/<agent_id>/<problem_id>/<collection>/<document_id>.json
 *
 * The store stays the source of truth. A mirror failure is logged and never
 * fails the write.
 */

import { mkdir, writeFile } from 'fs/promises'
import { join } from 'path'
import { describeError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type {
  CollectionDocumentMap,
  CollectionName,
  DocumentPatch,
  DocumentReader,
  DocumentWriter,
} from './types.js'

const logger = createLogger('document-writer:mirror')

/** Agent segment used for documents not owned by one agent (Runs) */
export const SESSION_SEGMENT = '_session'

/** Fields naming the owning agent, in lookup order */
const AGENT_FIELDS = ['llm_id', 'solver_llm_model_id', 'reviewer_id'] as const

function stringField(document: object, key: string): string | undefined {
  const value: unknown = Reflect.get(document, key)
  return typeof value === 'string' && value !== '' ? value : undefined
}

/**
 * Relative mirror path of a document, or null when it lacks a run or problem id.
 */
export function mirrorPath(
  collection: CollectionName,
  documentId: string,
  document: object,
): string | null {
  const runId = stringField(document, 'run_id')
  const problemId = stringField(document, 'problem_id')
  if (runId === undefined || problemId === undefined) return null

  let agentId = SESSION_SEGMENT
  for (const field of AGENT_FIELDS) {
    const value = stringField(document, field)
    if (value !== undefined) {
      agentId = value
      break
    }
  }
  return join(runId, agentId, problemId, collection, `${documentId}.json`)
}

export interface MirroredDocumentWriterOptions {
  outputDir: string
}

export class MirroredDocumentWriter implements DocumentWriter {
  private readonly _inner: DocumentWriter & DocumentReader
  private readonly _outputDir: string

  constructor(inner: DocumentWriter & DocumentReader, options: MirroredDocumentWriterOptions) {
    this._inner = inner
    this._outputDir = options.outputDir
  }

  async write<C extends CollectionName>(
    collection: C,
    document: CollectionDocumentMap[C],
    documentId?: string,
  ): Promise<string> {
    const id = await this._inner.write(collection, document, documentId)
    await this._mirror(collection, id, document)
    return id
  }

  async update<C extends CollectionName>(
    collection: C,
    documentId: string,
    fields: DocumentPatch<C>,
  ): Promise<void> {
    await this._inner.update(collection, documentId, fields)
    const merged = await this._inner.read(collection, documentId)
    if (merged !== undefined) {
      await this._mirror(collection, documentId, merged)
    }
  }

  private async _mirror(collection: CollectionName, documentId: string, document: object): Promise<void> {
    const relative = mirrorPath(collection, documentId, document)
    if (relative === null) {
      logger.warn({ collection, documentId }, 'Document has no run_id/problem_id; mirror skipped')
      return
    }
    const filePath = join(this._outputDir, relative)
    try {
      await mkdir(join(filePath, '..'), { recursive: true })
      await writeFile(filePath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8')
    } catch (err) {
      logger.warn({ collection, documentId, filePath, error: describeError(err) }, 'Mirror write failed')
    }
  }
}
