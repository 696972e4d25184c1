/**
 * Types for the document-writer module.
 *
 * Wire shapes use snake_case field names; they are what lands in the store
 * and in the mirrored JSON files.
 */

// ---------------------------------------------------------------------------
// Collections
// ---------------------------------------------------------------------------

export const COLLECTIONS = {
  roleAssessments: 'RoleAssessments',
  solutions: 'Solutions',
  solutionReviews: 'SolutionReviews',
  refinedSolutions: 'RefinedSolutions',
  runs: 'Runs',
} as const

export type CollectionName = (typeof COLLECTIONS)[keyof typeof COLLECTIONS]

// ---------------------------------------------------------------------------
// Wire documents
// ---------------------------------------------------------------------------

export type RoleAssessmentDocument = {
  llm_id: string
  assessment_id: string
  problem_id: string
  run_id: string
  role_scores: { role: string; score: number }[]
  reasoning: string
}

export type SolutionDocument = {
  run_id: string
  solution_id: string
  problem_id: string
  solver_llm_model_id: string
  time_elapsed_sec: number
  answer: string
  reasoning: string[]
}

export type ReviewErrorDocument = {
  location: string
  error_type: string
  description: string
  severity: string
}

export type SolutionReviewDocument = {
  review_id: string
  run_id: string
  problem_id: string
  reviewer_id: string
  reviewee_id: string
  evaluation: {
    strengths: string[]
    weaknesses: string[]
    errors: ReviewErrorDocument[]
    suggested_changes: string[]
  }
  overall_assessment: string
  confidence_score: number
  time_elapsed_sec: number
}

export type RefinedSolutionDocument = {
  run_id: string
  problem_id: string
  solver_llm_model_id: string
  parent_solution_id: string
  refined_solution_id: string
  review_ids: string[]
  time_elapsed_sec: number
  refined_answer: string
  reasoning: string[]
}

export type RunStatus = 'running' | 'completed' | 'failed'

export type RunDocument = {
  run_id: string
  problem_id: string
  status: RunStatus
  agent_ids: string[]
  started_at: string
  completed_at?: string
  judge_id?: string
  solver_ids?: string[]
  final_roles?: Record<string, string>
  error?: { code: string; message: string }
}

/** Document shape stored in each collection */
export type CollectionDocumentMap = {
  RoleAssessments: RoleAssessmentDocument
  Solutions: SolutionDocument
  SolutionReviews: SolutionReviewDocument
  RefinedSolutions: RefinedSolutionDocument
  Runs: RunDocument
}

/** Partial update of a document in collection C */
export type DocumentPatch<C extends CollectionName> = Partial<CollectionDocumentMap[C]> & object

// ---------------------------------------------------------------------------
// DocumentWriter
// ---------------------------------------------------------------------------

/**
 * Durable persistence for debate records.
 */
export interface DocumentWriter {
  /**
   * Upsert `document` under `documentId`, or under a generated id when none
   * is given. Writing the same id twice leaves one record.
   *
   * @returns the document id
   */
  write<C extends CollectionName>(
    collection: C,
    document: CollectionDocumentMap[C],
    documentId?: string,
  ): Promise<string>

  /**
   * Merge `fields` into an existing document.
   *
   * @throws {DocumentNotFoundError} when no document has `documentId`
   */
  update<C extends CollectionName>(
    collection: C,
    documentId: string,
    fields: DocumentPatch<C>,
  ): Promise<void>
}

/**
 * Read access to stored documents, as untyped JSON bodies.
 */
export interface DocumentReader {
  read(collection: CollectionName, documentId: string): Promise<Record<string, unknown> | undefined>
}
