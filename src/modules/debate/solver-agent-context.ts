/**
 * SolverAgentContext: one Solver's state for one problem.
 *
 * Lifecycle:
 *   created ──solve()──▶ solved ──refine()──▶ refined
 *                          │ ▲
 *                          └─┘ receiveReview()
 *
 * The context owns its solution, the reviews delivered to it, and its refined
 * solution. Identity fields on every produced record are assigned here, not
 * taken from the model.
 */

import type { Logger } from 'pino'
import {
  AgentTimeoutError,
  StateTransitionError,
  ValidationMismatchError,
} from '../../core/errors.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import { elapsedSeconds, generateId } from '../../utils/helpers.js'
import type { Agent } from '../agent/index.js'
import {
  buildPeerReviewUserPrompt,
  buildRefinementUserPrompt,
  buildSolverSystemPrompt,
  buildSolverUserPrompt,
  PEER_REVIEW_SYSTEM_PROMPT,
  REFINEMENT_SYSTEM_PROMPT,
} from './prompts.js'
import {
  RefinementOutputSchema,
  ReviewOutputSchema,
  SolutionOutputSchema,
} from './schemas.js'
import type {
  Problem,
  ProblemSolution,
  ProblemSolutionReview,
  RefinedProblemSolution,
} from './types.js'

const logger = createLogger('debate:solver-context')

/** Answer recorded for a solver whose solve call timed out */
export const TIMEOUT_ANSWER = 'TIMEOUT'
export const TIMEOUT_REASONING: readonly string[] = ['Solver timed out before producing an answer.']

export type SolverState = 'created' | 'solved' | 'refined'

export interface SolverAgentContextOptions {
  agent: Agent
  problem: Problem
  runId: string
  idGenerator?: () => string
  /** Millisecond clock used for elapsed times (default: Date.now) */
  clock?: () => number
}

export interface AgentCallOptions {
  timeoutSec: number
  logIntervalSec?: number
}

export class SolverAgentContext {
  readonly agent: Agent
  readonly problem: Problem
  readonly runId: string

  private readonly _idGenerator: () => string
  private readonly _clock: () => number
  private readonly _logger: Logger

  private _state: SolverState = 'created'
  private _inFlight = false
  private _solution: ProblemSolution | undefined
  private readonly _reviews: ProblemSolutionReview[] = []
  private _refined: RefinedProblemSolution | undefined

  constructor(options: SolverAgentContextOptions) {
    this.agent = options.agent
    this.problem = options.problem
    this.runId = options.runId
    this._idGenerator = options.idGenerator ?? generateId
    this._clock = options.clock ?? Date.now
    this._logger = childLogger(logger, {
      agentId: options.agent.id,
      problemId: options.problem.id,
      runId: options.runId,
    })
  }

  get solverId(): string {
    return this.agent.id
  }

  get state(): SolverState {
    return this._state
  }

  get solution(): ProblemSolution | undefined {
    return this._solution
  }

  /** Reviews delivered so far, in arrival order */
  get reviews(): readonly ProblemSolutionReview[] {
    return this._reviews
  }

  get refinedSolution(): RefinedProblemSolution | undefined {
    return this._refined
  }

  // -------------------------------------------------------------------------
  // solve
  // -------------------------------------------------------------------------

  /**
   * Produce this context's solution. A timeout yields the TIMEOUT placeholder
   * solution; any other failure leaves the context in `created`.
   *
   * @throws {StateTransitionError} unless the context is in `created`
   */
  async solve(options: AgentCallOptions): Promise<ProblemSolution> {
    this._requireIdle('solve', ['created'])
    this._inFlight = true
    const startedAt = this._clock()

    try {
      let answer: string
      let reasoning: string[]
      let timedOut = false
      try {
        const output = await this.agent.runStructuredCall({
          systemPrompt: buildSolverSystemPrompt(this.problem.category),
          userPrompt: buildSolverUserPrompt(this.problem),
          outputSchema: SolutionOutputSchema,
          schemaName: 'problem_solution',
          timeoutSec: options.timeoutSec,
          callType: 'solve',
          logContext: { problemId: this.problem.id, runId: this.runId },
          logIntervalSec: options.logIntervalSec,
        })
        answer = output.answer
        reasoning = output.reasoning
      } catch (err) {
        if (!(err instanceof AgentTimeoutError)) throw err
        this._logger.warn({ timeoutSec: options.timeoutSec }, 'Solver timed out; recording placeholder solution')
        answer = TIMEOUT_ANSWER
        reasoning = [...TIMEOUT_REASONING]
        timedOut = true
      }

      const solution: ProblemSolution = {
        solutionId: this._idGenerator(),
        problemId: this.problem.id,
        runId: this.runId,
        solverId: this.solverId,
        elapsedSec: elapsedSeconds(startedAt, this._clock()),
        answer,
        reasoning,
        timedOut,
      }
      this._solution = solution
      this._state = 'solved'
      return solution
    } finally {
      this._inFlight = false
    }
  }

  // -------------------------------------------------------------------------
  // Reviews
  // -------------------------------------------------------------------------

  /**
   * Review another solver's solution. Does not change this context.
   *
   * @throws {ValidationMismatchError} when `target` is this context's own
   *   solution or belongs to another problem
   */
  async generateReview(
    target: ProblemSolution,
    options: AgentCallOptions,
  ): Promise<ProblemSolutionReview> {
    if (target.solverId === this.solverId) {
      throw new ValidationMismatchError(`Solver ${this.solverId} cannot review its own solution`, {
        solverId: this.solverId,
        solutionId: target.solutionId,
      })
    }
    if (target.problemId !== this.problem.id) {
      throw new ValidationMismatchError(
        `Solution ${target.solutionId} belongs to problem ${target.problemId}, not ${this.problem.id}`,
        { solutionId: target.solutionId },
      )
    }

    const startedAt = this._clock()
    const output = await this.agent.runStructuredCall({
      systemPrompt: PEER_REVIEW_SYSTEM_PROMPT,
      userPrompt: buildPeerReviewUserPrompt(this.problem, target),
      outputSchema: ReviewOutputSchema,
      schemaName: 'problem_solution_review',
      timeoutSec: options.timeoutSec,
      callType: 'peer_review',
      logContext: { problemId: this.problem.id, runId: this.runId, revieweeId: target.solverId },
      logIntervalSec: options.logIntervalSec,
    })

    return {
      reviewId: this._idGenerator(),
      runId: this.runId,
      problemId: this.problem.id,
      reviewerId: this.solverId,
      revieweeId: target.solverId,
      evaluation: {
        strengths: output.evaluation.strengths,
        weaknesses: output.evaluation.weaknesses,
        errors: output.evaluation.errors.map((e) => ({
          location: e.location,
          errorType: e.error_type,
          description: e.description,
          severity: e.severity,
        })),
        suggestedChanges: output.evaluation.suggested_changes,
      },
      overallAssessment: output.overall_assessment,
      confidence: output.confidence_score,
      elapsedSec: elapsedSeconds(startedAt, this._clock()),
    }
  }

  /**
   * Accept a review of this context's solution.
   *
   * @throws {ValidationMismatchError} when the review targets another solver
   * @throws {StateTransitionError} unless the context is in `solved`
   */
  receiveReview(review: ProblemSolutionReview): void {
    if (review.revieweeId !== this.solverId) {
      throw new ValidationMismatchError(
        `Review intended for '${review.revieweeId}' received by solver '${this.solverId}'`,
        { reviewId: review.reviewId, revieweeId: review.revieweeId, solverId: this.solverId },
      )
    }
    if (this._state !== 'solved') {
      throw new StateTransitionError(
        `Solver ${this.solverId} cannot receive reviews in state '${this._state}'`,
        { solverId: this.solverId, state: this._state },
      )
    }
    this._reviews.push(review)
    this._logger.info(
      {
        reviewerId: review.reviewerId,
        assessment: review.overallAssessment,
        confidence: review.confidence,
      },
      'Review received',
    )
  }

  // -------------------------------------------------------------------------
  // refine
  // -------------------------------------------------------------------------

  /**
   * Produce a refined solution from the original and every review received.
   *
   * @throws {StateTransitionError} unless the context is `solved` with at
   *   least one review
   */
  async refine(options: AgentCallOptions): Promise<RefinedProblemSolution> {
    this._requireIdle('refine', ['solved'])
    const solution = this._solution
    if (solution === undefined || this._reviews.length === 0) {
      throw new StateTransitionError(`Solver ${this.solverId} has no reviews to refine with`, {
        solverId: this.solverId,
      })
    }

    this._inFlight = true
    const reviews = [...this._reviews]
    const startedAt = this._clock()
    try {
      const output = await this.agent.runStructuredCall({
        systemPrompt: REFINEMENT_SYSTEM_PROMPT,
        userPrompt: buildRefinementUserPrompt(this.problem, solution, reviews),
        outputSchema: RefinementOutputSchema,
        schemaName: 'refined_problem_solution',
        timeoutSec: options.timeoutSec,
        callType: 'refine',
        logContext: { problemId: this.problem.id, runId: this.runId },
        logIntervalSec: options.logIntervalSec,
      })

      const refined: RefinedProblemSolution = {
        refinedSolutionId: this._idGenerator(),
        parentSolutionId: solution.solutionId,
        runId: this.runId,
        problemId: this.problem.id,
        solverId: this.solverId,
        reviewIds: reviews.map((r) => r.reviewId),
        elapsedSec: elapsedSeconds(startedAt, this._clock()),
        answer: output.refined_answer,
        reasoning: output.reasoning,
      }
      this._refined = refined
      this._state = 'refined'
      return refined
    } finally {
      this._inFlight = false
    }
  }

  private _requireIdle(operation: string, allowed: SolverState[]): void {
    if (this._inFlight) {
      throw new StateTransitionError(`Solver ${this.solverId} already has a call in flight`, {
        solverId: this.solverId,
        operation,
      })
    }
    if (!allowed.includes(this._state)) {
      throw new StateTransitionError(
        `Illegal transition: ${operation}() from state '${this._state}'`,
        { solverId: this.solverId, operation, state: this._state },
      )
    }
  }
}
