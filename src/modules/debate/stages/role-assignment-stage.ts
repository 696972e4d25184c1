/**
 * RoleAssignmentStage: every agent rates its own fit as Solver and as Judge;
 * the agent with the strongest preference for judging becomes the Judge and
 * all other assessed agents become Solvers.
 */

import { InsufficientAgentsError } from '../../../core/errors.js'
import type { Agent } from '../../agent/index.js'
import { COLLECTIONS } from '../../document-writer/index.js'
import { toRoleAssessmentDocument } from '../documents.js'
import { fanOut } from '../fan-out.js'
import { buildRoleAssessmentUserPrompt, ROLE_ASSESSMENT_SYSTEM_PROMPT } from '../prompts.js'
import { RoleAssessmentOutputSchema } from '../schemas.js'
import type { Role, RoleAssessment } from '../types.js'
import { createStageReport, recordFailure, type StageContext, type StageReport } from './types.js'

/** Fewest successful assessments a debate can proceed with */
export const MIN_ASSESSED_AGENTS = 3

export interface RankedAgent {
  agentId: string
  /** Judge score minus Solver score */
  preference: number
}

export interface RoleAssignmentResult {
  assessments: RoleAssessment[]
  ranking: RankedAgent[]
  judgeId: string
  solverIds: string[]
  report: StageReport
}

/**
 * Score the agent gave itself for `role`. Role names match case-insensitively;
 * the first matching entry wins and a missing role scores 0.
 */
export function scoreFor(assessment: RoleAssessment, role: Role): number {
  const wanted = role.toLowerCase()
  const entry = assessment.roleScores.find((s) => s.role.trim().toLowerCase() === wanted)
  return entry?.score ?? 0
}

/**
 * Order agents by judge−solver preference, highest first; ties go to the
 * lexicographically smaller agent id.
 */
export function rankAssessments(assessments: readonly RoleAssessment[]): RankedAgent[] {
  return assessments
    .map((a) => ({ agentId: a.agentId, preference: scoreFor(a, 'Judge') - scoreFor(a, 'Solver') }))
    .sort((a, b) => {
      if (b.preference !== a.preference) return b.preference - a.preference
      if (a.agentId < b.agentId) return -1
      return a.agentId > b.agentId ? 1 : 0
    })
}

export interface RoleElection {
  judgeId: string
  /** Every assessed agent's role, in the order of the assessments */
  roles: Map<string, Role>
  ranking: RankedAgent[]
}

/**
 * Elect one Judge and make every other assessed agent a Solver.
 *
 * @throws {InsufficientAgentsError} with fewer than MIN_ASSESSED_AGENTS assessments
 */
export function electRoles(assessments: readonly RoleAssessment[]): RoleElection {
  const ranking = rankAssessments(assessments)
  const top = ranking[0]
  if (assessments.length < MIN_ASSESSED_AGENTS || top === undefined) {
    throw new InsufficientAgentsError(assessments.length, MIN_ASSESSED_AGENTS, {
      assessedIds: assessments.map((a) => a.agentId),
    })
  }
  const roles = new Map<string, Role>()
  for (const assessment of assessments) {
    roles.set(assessment.agentId, assessment.agentId === top.agentId ? 'Judge' : 'Solver')
  }
  return { judgeId: top.agentId, roles, ranking }
}

export class RoleAssignmentStage {
  private readonly _ctx: StageContext
  private readonly _agents: readonly Agent[]
  private readonly _timeoutSec: number

  constructor(ctx: StageContext, agents: readonly Agent[], timeoutSec: number) {
    this._ctx = ctx
    this._agents = agents
    this._timeoutSec = timeoutSec
  }

  /**
   * Assess, persist, elect, and freeze the roles on the run context.
   *
   * @throws {InsufficientAgentsError} when fewer than three agents were assessed
   */
  async run(): Promise<RoleAssignmentResult> {
    const { runContext, limiter, logger } = this._ctx
    const report = createStageReport('role_assignment', this._agents.length)
    logger.info({ agents: this._agents.length }, 'Role assessment started')

    const outcomes = await fanOut(limiter, this._agents, (agent) => this._assess(agent))

    const assessments: RoleAssessment[] = []
    this._agents.forEach((agent, index) => {
      const outcome = outcomes[index]
      if (outcome === undefined) return
      if (outcome.ok) {
        report.succeeded++
        assessments.push(outcome.value)
      } else {
        recordFailure(report, logger, outcome.error, agent.id)
      }
    })

    const { judgeId, roles, ranking } = electRoles(assessments)
    runContext.assignRoles(roles)

    const solverIds = runContext.solverIds
    logger.info({ judgeId, solverIds, ranking }, 'Roles assigned')
    return { assessments, ranking, judgeId, solverIds, report }
  }

  private async _assess(agent: Agent): Promise<RoleAssessment> {
    const { problem, runContext, writer, idGenerator, logIntervalSec } = this._ctx
    const output = await agent.runStructuredCall({
      systemPrompt: ROLE_ASSESSMENT_SYSTEM_PROMPT,
      userPrompt: buildRoleAssessmentUserPrompt(problem),
      outputSchema: RoleAssessmentOutputSchema,
      schemaName: 'role_assessment',
      timeoutSec: this._timeoutSec,
      callType: 'role_assessment',
      logContext: { problemId: problem.id, runId: runContext.runId },
      logIntervalSec,
    })

    const assessment: RoleAssessment = {
      agentId: agent.id,
      assessmentId: idGenerator(),
      problemId: problem.id,
      runId: runContext.runId,
      roleScores: output.role_scores,
      reasoning: output.reasoning,
    }
    // A failed write fails the assessment
    await writer.write(COLLECTIONS.roleAssessments, toRoleAssessmentDocument(assessment), assessment.assessmentId)
    return assessment
  }
}
