/**
 * Prompt templates for the four debate calls.
 *
 * Templates use {{placeholder}} markers filled by `renderTemplate`. The
 * problem's ground answer is never interpolated into any prompt.
 */

import type { Problem, ProblemSolution, ProblemSolutionReview } from './types.js'

// ---------------------------------------------------------------------------
// Template rendering
// ---------------------------------------------------------------------------

/**
 * Replace each {{name}} in `template` with `values[name]`.
 * Markers without a value are left in place.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (marker, name: string) => values[name] ?? marker)
}

function numbered(lines: string[]): string {
  if (lines.length === 0) return '(none)'
  return lines.map((line, i) => `${String(i + 1)}. ${line}`).join('\n')
}

function bulleted(lines: string[]): string {
  if (lines.length === 0) return '- (none)'
  return lines.map((line) => `- ${line}`).join('\n')
}

function problemBlock(problem: Problem): string {
  const category =
    problem.subcategory === null ? problem.category : `${problem.category} / ${problem.subcategory}`
  return `Problem (${category}, difficulty: ${problem.difficulty}):\n${problem.statement}`
}

function solutionBlock(solution: ProblemSolution): string {
  return `Final answer: ${solution.answer}\n\nReasoning:\n${numbered(solution.reasoning)}`
}

// ---------------------------------------------------------------------------
// Role assessment
// ---------------------------------------------------------------------------

export const ROLE_ASSESSMENT_SYSTEM_PROMPT = `You are part of a multi-agent reasoning system.

Your task is to assess your suitability for each role below:
- Solver: independently solves the problem.
- Judge: evaluates and critiques solutions from others.

For the given problem, estimate your suitability for EACH role.
Return confidence scores between 0.0 and 1.0 in "role_scores", one entry per role,
and explain your estimate in "reasoning".
Do NOT choose a final role.`

export function buildRoleAssessmentUserPrompt(problem: Problem): string {
  return `${problemBlock(problem)}\n\nAssess your suitability for each role.`
}

// ---------------------------------------------------------------------------
// Solve
// ---------------------------------------------------------------------------

const SOLVER_SYSTEM_TEMPLATE = `You are an expert problem solver specialising in {{category}} problems.

Solve the problem on your own. Work step by step and check each step before moving on.
Return:
- "answer": the final answer only, as short as the problem allows
- "reasoning": the ordered steps that lead to it, one step per entry`

export function buildSolverSystemPrompt(category: string): string {
  return renderTemplate(SOLVER_SYSTEM_TEMPLATE, { category })
}

export function buildSolverUserPrompt(problem: Problem): string {
  return `${problemBlock(problem)}\n\nSolve the problem.`
}

// ---------------------------------------------------------------------------
// Peer review
// ---------------------------------------------------------------------------

export const PEER_REVIEW_SYSTEM_PROMPT = `You are reviewing another agent's solution to a problem you have also solved.

Evaluate the solution critically and fairly:
- list its strengths and weaknesses
- report each concrete error with its location, error_type, description and severity
- suggest specific changes that would fix it
Then give an overall_assessment (correct, mostly_correct, promising_but_flawed or incorrect)
and a confidence_score between 0.0 and 1.0 for your own review.`

const PEER_REVIEW_USER_TEMPLATE = `{{problem}}

Solution under review:
{{solution}}

Review this solution.`

export function buildPeerReviewUserPrompt(problem: Problem, solution: ProblemSolution): string {
  return renderTemplate(PEER_REVIEW_USER_TEMPLATE, {
    problem: problemBlock(problem),
    solution: solutionBlock(solution),
  })
}

// ---------------------------------------------------------------------------
// Refine
// ---------------------------------------------------------------------------

export const REFINEMENT_SYSTEM_PROMPT = `You previously solved a problem and other agents have reviewed your solution.

Read every review. Accept criticism that is correct and reject criticism that is not.
Produce an improved solution:
- "refined_answer": the final answer only
- "reasoning": the ordered steps of the refined solution, one step per entry`

const REFINEMENT_USER_TEMPLATE = `{{problem}}

Your original solution:
{{solution}}

Reviews received ({{count}}):
{{reviews}}

Refine your solution.`

function reviewBlock(review: ProblemSolutionReview, index: number): string {
  const errors = review.evaluation.errors.map(
    (e) => `[${e.severity}] ${e.errorType} at ${e.location}: ${e.description}`,
  )
  return [
    `Review ${String(index + 1)} (assessment: ${review.overallAssessment}, confidence: ${review.confidence.toFixed(2)})`,
    `Strengths:\n${bulleted(review.evaluation.strengths)}`,
    `Weaknesses:\n${bulleted(review.evaluation.weaknesses)}`,
    `Errors:\n${bulleted(errors)}`,
    `Suggested changes:\n${bulleted(review.evaluation.suggestedChanges)}`,
  ].join('\n')
}

export function buildRefinementUserPrompt(
  problem: Problem,
  solution: ProblemSolution,
  reviews: readonly ProblemSolutionReview[],
): string {
  return renderTemplate(REFINEMENT_USER_TEMPLATE, {
    problem: problemBlock(problem),
    solution: solutionBlock(solution),
    count: String(reviews.length),
    reviews: reviews.map(reviewBlock).join('\n\n'),
  })
}
