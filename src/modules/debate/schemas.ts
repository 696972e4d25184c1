/**
 * Zod schemas for the structured output of each agent call.
 *
 * These cover only what the model produces; identity fields are stamped
 * afterwards.
 */

import { z } from 'zod'

export const RoleAssessmentOutputSchema = z.object({
  role_scores: z
    .array(
      z.object({
        role: z.string().min(1),
        score: z.number().min(0).max(1),
      }),
    )
    .min(1),
  reasoning: z.string(),
})
export type RoleAssessmentOutput = z.infer<typeof RoleAssessmentOutputSchema>

export const SolutionOutputSchema = z.object({
  answer: z.string(),
  reasoning: z.array(z.string()),
})
export type SolutionOutput = z.infer<typeof SolutionOutputSchema>

export const ReviewErrorTypeSchema = z.enum([
  'logical_error',
  'missing_case',
  'invalid_assumption',
  'math_error',
  'inconsistency',
  'unclear_reasoning',
])

export const ReviewSeveritySchema = z.enum(['minor', 'major', 'critical'])

export const OverallAssessmentSchema = z.enum([
  'correct',
  'mostly_correct',
  'promising_but_flawed',
  'incorrect',
])

export const ReviewOutputSchema = z.object({
  evaluation: z.object({
    strengths: z.array(z.string()),
    weaknesses: z.array(z.string()),
    errors: z.array(
      z.object({
        location: z.string(),
        error_type: ReviewErrorTypeSchema,
        description: z.string(),
        severity: ReviewSeveritySchema,
      }),
    ),
    suggested_changes: z.array(z.string()),
  }),
  overall_assessment: OverallAssessmentSchema,
  confidence_score: z.number().min(0).max(1),
})
export type ReviewOutput = z.infer<typeof ReviewOutputSchema>

export const RefinementOutputSchema = z.object({
  refined_answer: z.string(),
  reasoning: z.array(z.string()),
})
export type RefinementOutput = z.infer<typeof RefinementOutputSchema>
