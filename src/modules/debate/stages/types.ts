/**
 * Shared types for the debate stages.
 */

import type { Logger } from 'pino'
import { describeError } from '../../../core/errors.js'
import type { DocumentWriter } from '../../document-writer/index.js'
import type { ConcurrencyLimiter } from '../concurrency-limiter.js'
import type { RunContext } from '../run-context.js'
import type { Problem } from '../types.js'

export type StageName = 'role_assignment' | 'solve' | 'peer_review' | 'refine'

export interface StageFailure {
  agentId: string
  /** Other agent involved (the reviewee of a failed review) */
  targetId?: string
  code: string
  message: string
}

/** Per-stage tally of dispatched tasks */
export interface StageReport {
  stage: StageName
  dispatched: number
  succeeded: number
  failed: number
  /** Participants the stage deliberately did not dispatch */
  skipped: number
  failures: StageFailure[]
}

/**
 * Collaborators every stage of one session shares.
 */
export interface StageContext {
  problem: Problem
  runContext: RunContext
  limiter: ConcurrencyLimiter
  writer: DocumentWriter
  idGenerator: () => string
  logIntervalSec?: number
  logger: Logger
}

export function createStageReport(stage: StageName, dispatched: number): StageReport {
  return { stage, dispatched, succeeded: 0, failed: 0, skipped: 0, failures: [] }
}

/**
 * Count a failed task on `report` and log it with the ids involved.
 */
export function recordFailure(
  report: StageReport,
  logger: Logger,
  err: unknown,
  agentId: string,
  targetId?: string,
): void {
  const { code, message } = describeError(err)
  report.failed++
  report.failures.push(targetId === undefined ? { agentId, code, message } : { agentId, targetId, code, message })
  logger.error({ stage: report.stage, agentId, targetId, code, err: message }, 'Stage task failed')
}
