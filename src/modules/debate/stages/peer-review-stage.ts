/**
 * PeerReviewStage: every Solver reviews every other Solver's solution.
 *
 * The review relation is the complete directed graph over the solvers minus
 * self-loops, built fresh as an edge list. A review reaches its reviewee only
 * after it is persisted, so a failed save keeps it out of refinement.
 */

import { COLLECTIONS } from '../../document-writer/index.js'
import { StateTransitionError } from '../../../core/errors.js'
import { toSolutionReviewDocument } from '../documents.js'
import { fanOut } from '../fan-out.js'
import type { SolverAgentContext } from '../solver-agent-context.js'
import type { ProblemSolutionReview } from '../types.js'
import { createStageReport, recordFailure, type StageContext, type StageReport } from './types.js'

export interface ReviewPair {
  reviewer: SolverAgentContext
  reviewee: SolverAgentContext
}

/**
 * All ordered (reviewer, reviewee) pairs with reviewer ≠ reviewee, grouped by
 * reviewer in input order. Yields n·(n−1) pairs.
 */
export function buildReviewPairs(solvers: readonly SolverAgentContext[]): ReviewPair[] {
  const pairs: ReviewPair[] = []
  for (const reviewer of solvers) {
    for (const reviewee of solvers) {
      if (reviewer.solverId !== reviewee.solverId) {
        pairs.push({ reviewer, reviewee })
      }
    }
  }
  return pairs
}

export interface PeerReviewStageResult {
  /** Delivered reviews, in pair order */
  reviews: ProblemSolutionReview[]
  report: StageReport
}

export class PeerReviewStage {
  private readonly _ctx: StageContext
  private readonly _solvers: readonly SolverAgentContext[]
  private readonly _timeoutSec: number

  constructor(ctx: StageContext, solvers: readonly SolverAgentContext[], timeoutSec: number) {
    this._ctx = ctx
    this._solvers = solvers
    this._timeoutSec = timeoutSec
  }

  async run(): Promise<PeerReviewStageResult> {
    const { limiter, writer, logger, logIntervalSec } = this._ctx

    if (this._solvers.length < 2) {
      logger.info({ solvers: this._solvers.length }, 'Peer review skipped: fewer than two solvers')
      const report = createStageReport('peer_review', 0)
      report.skipped = this._solvers.length
      return { reviews: [], report }
    }

    const pairs = buildReviewPairs(this._solvers)
    const report = createStageReport('peer_review', pairs.length)
    logger.info({ pairs: pairs.length }, 'Peer review stage started')

    const outcomes = await fanOut(limiter, pairs, async ({ reviewer, reviewee }) => {
      const target = reviewee.solution
      if (target === undefined) {
        throw new StateTransitionError(`Solver ${reviewee.solverId} has no solution to review`, {
          revieweeId: reviewee.solverId,
        })
      }
      const review = await reviewer.generateReview(target, { timeoutSec: this._timeoutSec, logIntervalSec })
      await writer.write(COLLECTIONS.solutionReviews, toSolutionReviewDocument(review), review.reviewId)
      reviewee.receiveReview(review)
      return review
    })

    const reviews: ProblemSolutionReview[] = []
    pairs.forEach(({ reviewer, reviewee }, index) => {
      const outcome = outcomes[index]
      if (outcome === undefined) return
      if (outcome.ok) {
        report.succeeded++
        reviews.push(outcome.value)
      } else {
        recordFailure(report, logger, outcome.error, reviewer.solverId, reviewee.solverId)
      }
    })

    logger.info({ succeeded: report.succeeded, failed: report.failed }, 'Peer review stage complete')
    return { reviews, report }
  }
}
