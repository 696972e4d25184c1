/**
 * Problem dataset loader.
 *
 * Reads a JSON array of problem records, validates each with zod and maps it
 * to the `Problem` shape the debate uses. `skip`/`take` select a window of the
 * dataset in file order.
 */

import { readFile } from 'fs/promises'
import { z } from 'zod'
import { ProblemSourceError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { Problem } from '../debate/index.js'

const logger = createLogger('problem-source')

// ---------------------------------------------------------------------------
// Record schema
// ---------------------------------------------------------------------------

export const ProblemRecordSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform((id) => String(id)),
  category: z.string().min(1),
  subcategory: z.string().nullish(),
  problem_statement: z.string().min(1),
  ground_answer: z.string(),
  difficulty: z.string(),
})

export type ProblemRecord = z.infer<typeof ProblemRecordSchema>

export const ProblemDatasetSchema = z.array(ProblemRecordSchema)

export function toProblem(record: ProblemRecord): Problem {
  return {
    id: record.id,
    category: record.category,
    subcategory: record.subcategory ?? null,
    statement: record.problem_statement,
    groundAnswer: record.ground_answer,
    difficulty: record.difficulty,
  }
}

// ---------------------------------------------------------------------------
// loadProblems
// ---------------------------------------------------------------------------

export interface LoadProblemsOptions {
  /** Records to drop from the start of the dataset (default 0) */
  skip?: number
  /** Records to keep after skipping (default: all) */
  take?: number
}

/**
 * Load problems from a JSON file.
 *
 * @throws {ProblemSourceError} when the file is unreadable, not JSON, fails
 *   validation, or repeats a problem id
 */
export async function loadProblems(filePath: string, options: LoadProblemsOptions = {}): Promise<Problem[]> {
  const skip = options.skip ?? 0
  if (!Number.isInteger(skip) || skip < 0) {
    throw new ProblemSourceError(`skip must be a non-negative integer, got ${String(skip)}`, { filePath })
  }
  if (options.take !== undefined && (!Number.isInteger(options.take) || options.take < 0)) {
    throw new ProblemSourceError(`take must be a non-negative integer, got ${String(options.take)}`, {
      filePath,
    })
  }

  let raw: string
  try {
    raw = await readFile(filePath, 'utf-8')
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ProblemSourceError(`Cannot read problem dataset ${filePath}: ${message}`, { filePath })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ProblemSourceError(`Problem dataset ${filePath} is not valid JSON: ${message}`, { filePath })
  }

  const result = ProblemDatasetSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ProblemSourceError(`Problem dataset ${filePath} is invalid: ${issues}`, { filePath })
  }

  const seen = new Set<string>()
  for (const record of result.data) {
    if (seen.has(record.id)) {
      throw new ProblemSourceError(`Duplicate problem id "${record.id}" in ${filePath}`, { filePath })
    }
    seen.add(record.id)
  }

  const end = options.take === undefined ? undefined : skip + options.take
  const problems = result.data.slice(skip, end).map(toProblem)
  logger.info({ filePath, total: result.data.length, selected: problems.length, skip }, 'Problems loaded')
  return problems
}
