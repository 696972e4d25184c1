/**
 * Domain types for a debate session.
 *
 * Identity fields (ids, run/problem stamps, elapsed time) are assigned by the
 * orchestrator, never taken from model output.
 */

// ---------------------------------------------------------------------------
// Problem
// ---------------------------------------------------------------------------

export interface Problem {
  readonly id: string
  readonly category: string
  readonly subcategory: string | null
  readonly statement: string
  /** Reference answer; never shown to agents */
  readonly groundAnswer: string
  readonly difficulty: string
}

// ---------------------------------------------------------------------------
// Roles
// ---------------------------------------------------------------------------

export type Role = 'Solver' | 'Judge'

export interface RoleScore {
  role: string
  score: number
}

export interface RoleAssessment {
  agentId: string
  assessmentId: string
  problemId: string
  runId: string
  roleScores: RoleScore[]
  reasoning: string
}

// ---------------------------------------------------------------------------
// Solutions and reviews
// ---------------------------------------------------------------------------

export interface ProblemSolution {
  solutionId: string
  problemId: string
  runId: string
  solverId: string
  elapsedSec: number
  answer: string
  reasoning: string[]
  /** True when this is the placeholder recorded for a timed-out solver */
  timedOut: boolean
}

export type ReviewErrorType =
  | 'logical_error'
  | 'missing_case'
  | 'invalid_assumption'
  | 'math_error'
  | 'inconsistency'
  | 'unclear_reasoning'

export type ReviewSeverity = 'minor' | 'major' | 'critical'

export type OverallAssessment = 'correct' | 'mostly_correct' | 'promising_but_flawed' | 'incorrect'

export interface ReviewError {
  location: string
  errorType: ReviewErrorType
  description: string
  severity: ReviewSeverity
}

export interface PeerEvaluation {
  strengths: string[]
  weaknesses: string[]
  errors: ReviewError[]
  suggestedChanges: string[]
}

export interface ProblemSolutionReview {
  reviewId: string
  runId: string
  problemId: string
  reviewerId: string
  revieweeId: string
  evaluation: PeerEvaluation
  overallAssessment: OverallAssessment
  /** Reviewer confidence in [0, 1] */
  confidence: number
  elapsedSec: number
}

export interface RefinedProblemSolution {
  refinedSolutionId: string
  parentSolutionId: string
  runId: string
  problemId: string
  solverId: string
  /** Ids of the reviews the refinement consumed, in arrival order */
  reviewIds: string[]
  elapsedSec: number
  answer: string
  reasoning: string[]
}
