/**
 * Typed constructors from debate records to their persisted documents.
 */

import type {
  RefinedSolutionDocument,
  RoleAssessmentDocument,
  RunDocument,
  SolutionDocument,
  SolutionReviewDocument,
} from '../document-writer/index.js'
import type {
  ProblemSolution,
  ProblemSolutionReview,
  RefinedProblemSolution,
  RoleAssessment,
} from './types.js'

export function toRoleAssessmentDocument(assessment: RoleAssessment): RoleAssessmentDocument {
  return {
    llm_id: assessment.agentId,
    assessment_id: assessment.assessmentId,
    problem_id: assessment.problemId,
    run_id: assessment.runId,
    role_scores: assessment.roleScores.map((s) => ({ role: s.role, score: s.score })),
    reasoning: assessment.reasoning,
  }
}

export function toSolutionDocument(solution: ProblemSolution): SolutionDocument {
  return {
    run_id: solution.runId,
    solution_id: solution.solutionId,
    problem_id: solution.problemId,
    solver_llm_model_id: solution.solverId,
    time_elapsed_sec: solution.elapsedSec,
    answer: solution.answer,
    reasoning: [...solution.reasoning],
  }
}

export function toSolutionReviewDocument(review: ProblemSolutionReview): SolutionReviewDocument {
  return {
    review_id: review.reviewId,
    run_id: review.runId,
    problem_id: review.problemId,
    reviewer_id: review.reviewerId,
    reviewee_id: review.revieweeId,
    evaluation: {
      strengths: [...review.evaluation.strengths],
      weaknesses: [...review.evaluation.weaknesses],
      errors: review.evaluation.errors.map((e) => ({
        location: e.location,
        error_type: e.errorType,
        description: e.description,
        severity: e.severity,
      })),
      suggested_changes: [...review.evaluation.suggestedChanges],
    },
    overall_assessment: review.overallAssessment,
    confidence_score: review.confidence,
    time_elapsed_sec: review.elapsedSec,
  }
}

export function toRefinedSolutionDocument(refined: RefinedProblemSolution): RefinedSolutionDocument {
  return {
    run_id: refined.runId,
    problem_id: refined.problemId,
    solver_llm_model_id: refined.solverId,
    parent_solution_id: refined.parentSolutionId,
    refined_solution_id: refined.refinedSolutionId,
    review_ids: [...refined.reviewIds],
    time_elapsed_sec: refined.elapsedSec,
    refined_answer: refined.answer,
    reasoning: [...refined.reasoning],
  }
}

export function createRunDocument(
  runId: string,
  problemId: string,
  agentIds: readonly string[],
  startedAt: Date,
): RunDocument {
  return {
    run_id: runId,
    problem_id: problemId,
    status: 'running',
    agent_ids: [...agentIds],
    started_at: startedAt.toISOString(),
  }
}
