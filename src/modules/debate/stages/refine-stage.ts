/**
 * RefineStage: each reviewed Solver revises its solution using every review
 * it received. Solvers without reviews are skipped and produce nothing.
 */

import { COLLECTIONS } from '../../document-writer/index.js'
import { toRefinedSolutionDocument } from '../documents.js'
import { fanOut } from '../fan-out.js'
import type { SolverAgentContext } from '../solver-agent-context.js'
import type { RefinedProblemSolution } from '../types.js'
import { createStageReport, recordFailure, type StageContext, type StageReport } from './types.js'

export interface RefineStageResult {
  refinements: RefinedProblemSolution[]
  report: StageReport
}

export class RefineStage {
  private readonly _ctx: StageContext
  private readonly _solvers: readonly SolverAgentContext[]
  private readonly _timeoutSec: number

  constructor(ctx: StageContext, solvers: readonly SolverAgentContext[], timeoutSec: number) {
    this._ctx = ctx
    this._solvers = solvers
    this._timeoutSec = timeoutSec
  }

  async run(): Promise<RefineStageResult> {
    const { limiter, writer, logger, logIntervalSec } = this._ctx

    const eligible: SolverAgentContext[] = []
    for (const context of this._solvers) {
      if (context.reviews.length > 0) {
        eligible.push(context)
      } else {
        logger.info({ agentId: context.solverId }, 'Refinement skipped: no reviews received')
      }
    }

    const report = createStageReport('refine', eligible.length)
    report.skipped = this._solvers.length - eligible.length

    const outcomes = await fanOut(limiter, eligible, async (context) => {
      const refined = await context.refine({ timeoutSec: this._timeoutSec, logIntervalSec })
      await writer.write(
        COLLECTIONS.refinedSolutions,
        toRefinedSolutionDocument(refined),
        refined.refinedSolutionId,
      )
      return refined
    })

    const refinements: RefinedProblemSolution[] = []
    eligible.forEach((context, index) => {
      const outcome = outcomes[index]
      if (outcome === undefined) return
      if (outcome.ok) {
        report.succeeded++
        refinements.push(outcome.value)
      } else {
        recordFailure(report, logger, outcome.error, context.solverId)
      }
    })

    logger.info({ succeeded: report.succeeded, failed: report.failed, skipped: report.skipped }, 'Refine stage complete')
    return { refinements, report }
  }
}
