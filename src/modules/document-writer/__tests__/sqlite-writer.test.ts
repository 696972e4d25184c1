/**
 * Unit tests for SqliteDocumentWriter.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from '../../../persistence/migrations/index.js'
import { SqliteDocumentWriter } from '../sqlite-writer.js'
import { COLLECTIONS, type RunDocument, type SolutionDocument } from '../types.js'
import { DocumentNotFoundError } from '../../../core/errors.js'

const SOLUTION: SolutionDocument = {
  run_id: 'run-1',
  solution_id: 'sol-1',
  problem_id: 'p1',
  solver_llm_model_id: 'agent-a',
  time_elapsed_sec: 1.5,
  answer: '12',
  reasoning: ['step one', 'step two'],
}

const RUN: RunDocument = {
  run_id: 'run-1',
  problem_id: 'p1',
  status: 'running',
  agent_ids: ['a', 'b', 'c'],
  started_at: '2026-01-01T00:00:00.000Z',
}

let db: BetterSqlite3Database
let writer: SqliteDocumentWriter

beforeEach(() => {
  db = new BetterSqlite3(':memory:')
  runMigrations(db)
  let counter = 0
  writer = new SqliteDocumentWriter(db, { idGenerator: () => `generated-${String(++counter)}` })
})

describe('SqliteDocumentWriter.write', () => {
  it('stores under the given id and resolves to it', async () => {
    await expect(writer.write(COLLECTIONS.solutions, SOLUTION, 'sol-1')).resolves.toBe('sol-1')
    await expect(writer.read(COLLECTIONS.solutions, 'sol-1')).resolves.toEqual(SOLUTION)
  })

  it('generates an id when none is given', async () => {
    await expect(writer.write(COLLECTIONS.solutions, SOLUTION)).resolves.toBe('generated-1')
    await expect(writer.write(COLLECTIONS.solutions, SOLUTION)).resolves.toBe('generated-2')
    await expect(writer.list(COLLECTIONS.solutions)).resolves.toHaveLength(2)
  })

  it('is idempotent for a repeated id', async () => {
    await writer.write(COLLECTIONS.solutions, SOLUTION, 'sol-1')
    await writer.write(COLLECTIONS.solutions, { ...SOLUTION, answer: '13' }, 'sol-1')

    const all = await writer.list(COLLECTIONS.solutions)
    expect(all).toHaveLength(1)
    expect(all[0]?.['answer']).toBe('13')
  })
})

describe('SqliteDocumentWriter.update', () => {
  it('merges fields into the stored document', async () => {
    await writer.write(COLLECTIONS.runs, RUN, 'run-1')
    await writer.update(COLLECTIONS.runs, 'run-1', {
      status: 'completed',
      completed_at: '2026-01-01T00:05:00.000Z',
    })

    await expect(writer.read(COLLECTIONS.runs, 'run-1')).resolves.toEqual({
      ...RUN,
      status: 'completed',
      completed_at: '2026-01-01T00:05:00.000Z',
    })
  })

  it('rejects with DocumentNotFoundError for an unknown id', async () => {
    await expect(writer.update(COLLECTIONS.runs, 'nope', { status: 'failed' })).rejects.toBeInstanceOf(
      DocumentNotFoundError
    )
    await expect(writer.update(COLLECTIONS.runs, 'nope', { status: 'failed' })).rejects.toThrow(
      'Document not found: Runs/nope'
    )
  })
})

describe('SqliteDocumentWriter.list', () => {
  it('scopes to a run id', async () => {
    await writer.write(COLLECTIONS.solutions, SOLUTION, 'sol-1')
    await writer.write(COLLECTIONS.solutions, { ...SOLUTION, run_id: 'run-2' }, 'sol-2')

    const scoped = await writer.list(COLLECTIONS.solutions, 'run-2')
    expect(scoped.map((doc) => doc['solution_id'])).toEqual(['sol-2'])
  })
})
