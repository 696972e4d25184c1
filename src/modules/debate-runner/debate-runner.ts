/**
 * DebateRunner: runs one DebateSession per problem with a bounded number of
 * sessions in flight.
 *
 * A session that fails is recorded as a failed outcome; the remaining
 * problems still run.
 */

import { describeError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { Agent } from '../agent/index.js'
import {
  createDebateSession,
  type DebateSession,
  type DebateSessionOptions,
  type Problem,
  type SessionReport,
  type StageTimeouts,
} from '../debate/index.js'
import type { DocumentWriter } from '../document-writer/index.js'

const logger = createLogger('debate-runner')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ProblemOutcome =
  | { status: 'completed'; problemId: string; runId: string; report: SessionReport }
  | { status: 'failed'; problemId: string; runId: string | null; error: { code: string; message: string } }

export interface BatchReport {
  /** One outcome per problem, in input order */
  outcomes: ProblemOutcome[]
  completed: number
  failed: number
}

export interface DebateRunnerOptions {
  agents: readonly Agent[]
  writer: DocumentWriter
  timeouts: StageTimeouts
  /** Agent calls in flight per session */
  maxConcurrency: number
  /** Sessions in flight at once (default 1) */
  maxConcurrentSessions?: number
  logIntervalSec?: number
  sessionFactory?: (options: DebateSessionOptions) => DebateSession
}

// ---------------------------------------------------------------------------
// DebateRunner
// ---------------------------------------------------------------------------

export class DebateRunner {
  private readonly _options: DebateRunnerOptions
  private readonly _maxConcurrentSessions: number
  private readonly _sessionFactory: (options: DebateSessionOptions) => DebateSession

  constructor(options: DebateRunnerOptions) {
    const maxSessions = options.maxConcurrentSessions ?? 1
    if (!Number.isInteger(maxSessions) || maxSessions < 1) {
      throw new RangeError(`maxConcurrentSessions must be a positive integer, got ${String(maxSessions)}`)
    }
    this._options = options
    this._maxConcurrentSessions = maxSessions
    this._sessionFactory = options.sessionFactory ?? createDebateSession
  }

  async runAll(problems: readonly Problem[]): Promise<BatchReport> {
    const outcomes: ProblemOutcome[] = new Array<ProblemOutcome>(problems.length)
    logger.info(
      { problems: problems.length, maxConcurrentSessions: this._maxConcurrentSessions },
      'Batch started',
    )

    // Promise pool: each in-flight promise removes itself from `running` when it settles
    const queue = problems.map((problem, index) => ({ problem, index }))
    const running: Promise<void>[] = []

    const enqueue = (): void => {
      const next = queue.shift()
      if (next === undefined) return
      const p: Promise<void> = this._runOne(next.problem).then((outcome) => {
        outcomes[next.index] = outcome
      }).finally(() => {
        const idx = running.indexOf(p)
        if (idx !== -1) running.splice(idx, 1)
      })
      running.push(p)
    }

    const initial = Math.min(this._maxConcurrentSessions, queue.length)
    for (let i = 0; i < initial; i++) {
      enqueue()
    }
    while (queue.length > 0) {
      await Promise.race(running)
      enqueue()
    }
    await Promise.all(running)

    const completed = outcomes.filter((o) => o.status === 'completed').length
    const report: BatchReport = { outcomes, completed, failed: outcomes.length - completed }
    logger.info({ completed: report.completed, failed: report.failed }, 'Batch complete')
    return report
  }

  /** Never rejects: any failure becomes a failed outcome */
  private async _runOne(problem: Problem): Promise<ProblemOutcome> {
    let runId: string | null = null
    try {
      const session = this._sessionFactory({
        problem,
        agents: this._options.agents,
        writer: this._options.writer,
        timeouts: this._options.timeouts,
        maxConcurrency: this._options.maxConcurrency,
        logIntervalSec: this._options.logIntervalSec,
      })
      runId = session.runId
      const report = await session.run()
      return { status: 'completed', problemId: problem.id, runId: report.runId, report }
    } catch (err) {
      const error = describeError(err)
      logger.error({ problemId: problem.id, runId, error }, 'Problem failed')
      return { status: 'failed', problemId: problem.id, runId, error }
    }
  }
}
