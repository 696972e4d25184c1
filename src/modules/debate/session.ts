/**
 * DebateSession interface: one full debate over a single problem.
 *
 * Create an instance via `createDebateSession()` from session-impl.ts.
 */

import type { Agent } from '../agent/index.js'
import type { DocumentWriter } from '../document-writer/index.js'
import type { RankedAgent } from './stages/role-assignment-stage.js'
import type { StageReport } from './stages/types.js'
import type {
  Problem,
  ProblemSolution,
  ProblemSolutionReview,
  RefinedProblemSolution,
  Role,
} from './types.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Wall-clock limit of each agent call, per stage, in seconds */
export interface StageTimeouts {
  roleAssessmentSec: number
  solveSec: number
  peerReviewSec: number
  refineSec: number
}

export interface DebateSessionOptions {
  problem: Problem
  agents: readonly Agent[]
  writer: DocumentWriter
  timeouts: StageTimeouts
  /** Simultaneous agent calls allowed across all stages of the session */
  maxConcurrency: number
  logIntervalSec?: number
  /** Source of every id the session assigns, the run id included (default: generateId) */
  idGenerator?: () => string
  /** Millisecond clock for elapsed times and timestamps (default: Date.now) */
  clock?: () => number
}

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export interface SessionReport {
  runId: string
  problemId: string
  roles: Record<string, Role>
  judgeId: string
  solverIds: string[]
  ranking: RankedAgent[]
  solutions: ProblemSolution[]
  reviews: ProblemSolutionReview[]
  refinements: RefinedProblemSolution[]
  /** One entry per stage, in execution order */
  stages: StageReport[]
  /** Highest number of agent calls in flight at once */
  peakConcurrency: number
}

// ---------------------------------------------------------------------------
// DebateSession
// ---------------------------------------------------------------------------

export interface DebateSession {
  readonly runId: string
  readonly problem: Problem

  /**
   * Run role assignment, solve, peer review and refine, each stage finishing
   * before the next begins. May be called once.
   *
   * @throws {InsufficientAgentsError} when fewer than three agents were assessed
   * @throws {StateTransitionError} when the session has already been run
   */
  run(): Promise<SessionReport>
}
