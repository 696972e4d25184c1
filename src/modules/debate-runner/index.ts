/**
 * Debate runner module: public API.
 */

export { DebateRunner } from './debate-runner.js'
export type { BatchReport, DebateRunnerOptions, ProblemOutcome } from './debate-runner.js'
