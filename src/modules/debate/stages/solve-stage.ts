/**
 * SolveStage: every Solver context produces its solution.
 *
 * A timed-out solver still yields a (placeholder) solution and stays in the
 * debate. Any other failure drops the context from the rest of the session.
 */

import { COLLECTIONS } from '../../document-writer/index.js'
import { toSolutionDocument } from '../documents.js'
import { fanOut } from '../fan-out.js'
import type { SolverAgentContext } from '../solver-agent-context.js'
import type { ProblemSolution } from '../types.js'
import { createStageReport, recordFailure, type StageContext, type StageReport } from './types.js'

export interface SolveStageResult {
  /** Contexts that reached `solved` and were persisted, in input order */
  solved: SolverAgentContext[]
  solutions: ProblemSolution[]
  report: StageReport
}

export class SolveStage {
  private readonly _ctx: StageContext
  private readonly _contexts: readonly SolverAgentContext[]
  private readonly _timeoutSec: number

  constructor(ctx: StageContext, contexts: readonly SolverAgentContext[], timeoutSec: number) {
    this._ctx = ctx
    this._contexts = contexts
    this._timeoutSec = timeoutSec
  }

  async run(): Promise<SolveStageResult> {
    const { runContext, limiter, writer, logger, logIntervalSec } = this._ctx

    const solvers = this._contexts.filter((c) => runContext.roleOf(c.solverId) === 'Solver')
    const report = createStageReport('solve', solvers.length)
    report.skipped = this._contexts.length - solvers.length
    logger.info({ solvers: solvers.length }, 'Solve stage started')

    const outcomes = await fanOut(limiter, solvers, async (context) => {
      const solution = await context.solve({ timeoutSec: this._timeoutSec, logIntervalSec })
      await writer.write(COLLECTIONS.solutions, toSolutionDocument(solution), solution.solutionId)
      return solution
    })

    const solved: SolverAgentContext[] = []
    const solutions: ProblemSolution[] = []
    solvers.forEach((context, index) => {
      const outcome = outcomes[index]
      if (outcome === undefined) return
      if (outcome.ok) {
        report.succeeded++
        solved.push(context)
        solutions.push(outcome.value)
        if (outcome.value.timedOut) {
          logger.warn({ agentId: context.solverId }, 'Solver kept in debate with placeholder solution')
        }
      } else {
        recordFailure(report, logger, outcome.error, context.solverId)
      }
    })

    logger.info({ succeeded: report.succeeded, failed: report.failed }, 'Solve stage complete')
    return { solved, solutions, report }
  }
}
