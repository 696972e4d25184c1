/**
 * document-writer module: durable persistence of debate records
 */

export { COLLECTIONS } from './types.js'
export type {
  CollectionName,
  CollectionDocumentMap,
  DocumentPatch,
  DocumentReader,
  DocumentWriter,
  RoleAssessmentDocument,
  SolutionDocument,
  SolutionReviewDocument,
  ReviewErrorDocument,
  RefinedSolutionDocument,
  RunDocument,
  RunStatus,
} from './types.js'

export { SqliteDocumentWriter } from './sqlite-writer.js'
export type { SqliteDocumentWriterOptions } from './sqlite-writer.js'

export { MirroredDocumentWriter, mirrorPath, SESSION_SEGMENT } from './mirrored-writer.js'
export type { MirroredDocumentWriterOptions } from './mirrored-writer.js'
