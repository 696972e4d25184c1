/**
 * debate module: multi-agent debate over a single problem
 *
 * Public API re-exports for the debate module.
 */

export type {
  Problem,
  Role,
  RoleScore,
  RoleAssessment,
  ProblemSolution,
  ProblemSolutionReview,
  RefinedProblemSolution,
  PeerEvaluation,
  ReviewError,
  ReviewErrorType,
  ReviewSeverity,
  OverallAssessment,
} from './types.js'

export type { DebateSession, DebateSessionOptions, SessionReport, StageTimeouts } from './session.js'
export { DebateSessionImpl, createDebateSession } from './session-impl.js'

export { RunContext } from './run-context.js'
export { ConcurrencyLimiter } from './concurrency-limiter.js'
export { fanOut } from './fan-out.js'
export type { TaskOutcome } from './fan-out.js'

export {
  SolverAgentContext,
  TIMEOUT_ANSWER,
  TIMEOUT_REASONING,
} from './solver-agent-context.js'
export type { SolverState, SolverAgentContextOptions, AgentCallOptions } from './solver-agent-context.js'

export {
  RoleAssignmentStage,
  MIN_ASSESSED_AGENTS,
  electRoles,
  rankAssessments,
  scoreFor,
} from './stages/role-assignment-stage.js'
export type { RankedAgent, RoleAssignmentResult, RoleElection } from './stages/role-assignment-stage.js'
export { SolveStage } from './stages/solve-stage.js'
export type { SolveStageResult } from './stages/solve-stage.js'
export { PeerReviewStage, buildReviewPairs } from './stages/peer-review-stage.js'
export type { PeerReviewStageResult, ReviewPair } from './stages/peer-review-stage.js'
export { RefineStage } from './stages/refine-stage.js'
export type { RefineStageResult } from './stages/refine-stage.js'
export type { StageContext, StageFailure, StageName, StageReport } from './stages/types.js'

export {
  toRoleAssessmentDocument,
  toSolutionDocument,
  toSolutionReviewDocument,
  toRefinedSolutionDocument,
  createRunDocument,
} from './documents.js'
