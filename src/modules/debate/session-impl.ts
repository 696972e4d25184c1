/**
 * DebateSession implementation.
 *
 * Each session owns a fresh RunContext and its own concurrency limiter; the
 * limiter is shared by all four stages. A Runs document tracks the session
 * from start to completion or failure.
 */

import { describeError, StateTransitionError } from '../../core/errors.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import { generateId } from '../../utils/helpers.js'
import { COLLECTIONS } from '../document-writer/index.js'
import { ConcurrencyLimiter } from './concurrency-limiter.js'
import { createRunDocument } from './documents.js'
import { RunContext } from './run-context.js'
import { SolverAgentContext } from './solver-agent-context.js'
import { PeerReviewStage } from './stages/peer-review-stage.js'
import { RefineStage } from './stages/refine-stage.js'
import { RoleAssignmentStage } from './stages/role-assignment-stage.js'
import { SolveStage } from './stages/solve-stage.js'
import type { StageContext } from './stages/types.js'
import type { DebateSession, DebateSessionOptions, SessionReport } from './session.js'
import type { Problem } from './types.js'

const logger = createLogger('debate:session')

export class DebateSessionImpl implements DebateSession {
  readonly runId: string
  readonly problem: Problem
  readonly runContext: RunContext
  readonly limiter: ConcurrencyLimiter

  private readonly _options: DebateSessionOptions
  private readonly _idGenerator: () => string
  private readonly _clock: () => number
  private _started = false

  constructor(options: DebateSessionOptions) {
    this._options = options
    this._idGenerator = options.idGenerator ?? generateId
    this._clock = options.clock ?? Date.now
    this.problem = options.problem
    this.runId = this._idGenerator()
    this.runContext = new RunContext(this.runId)
    this.limiter = new ConcurrencyLimiter(options.maxConcurrency)
  }

  async run(): Promise<SessionReport> {
    if (this._started) {
      throw new StateTransitionError(`Session ${this.runId} has already been run`, { runId: this.runId })
    }
    this._started = true

    const { agents, writer } = this._options
    const log = childLogger(logger, { runId: this.runId, problemId: this.problem.id })
    log.info({ agents: agents.map((a) => a.id) }, 'Session started')

    await writer.write(
      COLLECTIONS.runs,
      createRunDocument(this.runId, this.problem.id, agents.map((a) => a.id), new Date(this._clock())),
      this.runId,
    )

    try {
      const report = await this._runStages(log)
      await writer.update(COLLECTIONS.runs, this.runId, {
        status: 'completed',
        completed_at: new Date(this._clock()).toISOString(),
        judge_id: report.judgeId,
        solver_ids: report.solverIds,
        final_roles: report.roles,
      })
      log.info(
        { judgeId: report.judgeId, refinements: report.refinements.length, peakConcurrency: report.peakConcurrency },
        'Session complete',
      )
      return report
    } catch (err) {
      log.error({ error: describeError(err) }, 'Session failed')
      await this._markFailed(err, log)
      throw err
    }
  }

  private async _runStages(log: StageContext['logger']): Promise<SessionReport> {
    const { agents, timeouts, logIntervalSec } = this._options
    const ctx: StageContext = {
      problem: this.problem,
      runContext: this.runContext,
      limiter: this.limiter,
      writer: this._options.writer,
      idGenerator: this._idGenerator,
      logIntervalSec,
      logger: log,
    }

    const assignment = await new RoleAssignmentStage(ctx, agents, timeouts.roleAssessmentSec).run()

    const contexts = agents
      .filter((agent) => this.runContext.roleOf(agent.id) === 'Solver')
      .map(
        (agent) =>
          new SolverAgentContext({
            agent,
            problem: this.problem,
            runId: this.runId,
            idGenerator: this._idGenerator,
            clock: this._clock,
          }),
      )

    const solve = await new SolveStage(ctx, contexts, timeouts.solveSec).run()
    const review = await new PeerReviewStage(ctx, solve.solved, timeouts.peerReviewSec).run()
    const refine = await new RefineStage(ctx, solve.solved, timeouts.refineSec).run()

    return {
      runId: this.runId,
      problemId: this.problem.id,
      roles: this.runContext.finalRoles(),
      judgeId: assignment.judgeId,
      solverIds: assignment.solverIds,
      ranking: assignment.ranking,
      solutions: solve.solutions,
      reviews: review.reviews,
      refinements: refine.refinements,
      stages: [assignment.report, solve.report, review.report, refine.report],
      peakConcurrency: this.limiter.peak,
    }
  }

  private async _markFailed(err: unknown, log: StageContext['logger']): Promise<void> {
    try {
      await this._options.writer.update(COLLECTIONS.runs, this.runId, {
        status: 'failed',
        completed_at: new Date(this._clock()).toISOString(),
        error: describeError(err),
      })
    } catch (updateErr) {
      log.error({ error: describeError(updateErr) }, 'Could not record session failure')
    }
  }
}

/**
 * Create a session for one problem.
 *
 * @example
 * const session = createDebateSession({ problem, agents, writer, timeouts, maxConcurrency: 5 })
 * const report = await session.run()
 */
export function createDebateSession(options: DebateSessionOptions): DebateSessionImpl {
  return new DebateSessionImpl(options)
}
