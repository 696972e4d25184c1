/**
 * Problem source module: public API.
 */

export {
  loadProblems,
  toProblem,
  ProblemRecordSchema,
  ProblemDatasetSchema,
} from './problem-source.js'
export type { LoadProblemsOptions, ProblemRecord } from './problem-source.js'
