/**
 * Shared fixtures for the debate tests: a problem, a scripted agent and a
 * deterministic id generator.
 */

import type { Agent, CallType, StructuredCallRequest } from '../../agent/index.js'
import { AgentTimeoutError, AgentTransportError, SchemaValidationError } from '../../../core/errors.js'
import { IN_MEMORY_DATABASE, openDatabase } from '../../../persistence/database.js'
import { runMigrations } from '../../../persistence/migrations/index.js'
import { sleep } from '../../../utils/helpers.js'
import { SqliteDocumentWriter } from '../../document-writer/index.js'
import type { Problem } from '../types.js'

export const PROBLEM: Problem = {
  id: 'prob-1',
  category: 'logic',
  subcategory: 'ordering',
  statement: 'Five runners finish a race. Who finished third?',
  groundAnswer: 'GROUND-TRUTH-SECRET',
  difficulty: 'medium',
}

export interface AgentScript {
  judgeScore?: number
  solverScore?: number
  /** Role assessment outcome */
  assess?: 'ok' | 'fail'
  /** Solve outcome */
  solve?: 'ok' | 'timeout' | 'fail'
  /** Reviewee ids whose review by this agent fails */
  failReviewsOf?: string[]
  refine?: 'ok' | 'fail'
  /** Yield to the timer queue before answering */
  delayMs?: number
}

export interface RecordedCall {
  callType: CallType
  revieweeId?: string
  systemPrompt: string
  userPrompt: string
}

/** Tracks how many scripted calls are in flight across agents */
export class InFlightProbe {
  current = 0
  max = 0

  enter(): void {
    this.current++
    if (this.current > this.max) this.max = this.current
  }

  leave(): void {
    this.current--
  }
}

/**
 * Agent that answers from a script. Responses go through the request's own
 * output schema, so they are typed exactly as a real agent's would be.
 */
export class ScriptedAgent implements Agent {
  readonly model = 'scripted-model'
  readonly calls: RecordedCall[] = []

  constructor(
    readonly id: string,
    private readonly _script: AgentScript = {},
    private readonly _probe?: InFlightProbe,
  ) {}

  async runStructuredCall<T>(request: StructuredCallRequest<T>): Promise<T> {
    this.calls.push({
      callType: request.callType,
      revieweeId: request.logContext.revieweeId,
      systemPrompt: request.systemPrompt,
      userPrompt: request.userPrompt,
    })
    this._probe?.enter()
    try {
      if (this._script.delayMs !== undefined) {
        await sleep(this._script.delayMs)
      }
      return request.outputSchema.parse(this._respond(request))
    } finally {
      this._probe?.leave()
    }
  }

  private _respond<T>(request: StructuredCallRequest<T>): unknown {
    const script = this._script
    switch (request.callType) {
      case 'role_assessment':
        if (script.assess === 'fail') throw new AgentTransportError(`${this.id} assessment failed`)
        return {
          role_scores: [
            { role: 'Judge', score: script.judgeScore ?? 0.2 },
            { role: 'Solver', score: script.solverScore ?? 0.8 },
          ],
          reasoning: `${this.id} self-assessment`,
        }
      case 'solve':
        if (script.solve === 'timeout') throw new AgentTimeoutError(this.id, request.timeoutSec)
        if (script.solve === 'fail') throw new SchemaValidationError(`${this.id} returned garbage`)
        return { answer: `${this.id}-answer`, reasoning: [`${this.id} step 1`, `${this.id} step 2`] }
      case 'peer_review': {
        const revieweeId = request.logContext.revieweeId ?? ''
        if (script.failReviewsOf?.includes(revieweeId)) {
          throw new AgentTransportError(`${this.id} could not review ${revieweeId}`)
        }
        return {
          evaluation: {
            strengths: [`${revieweeId} is clear`],
            weaknesses: [],
            errors: [
              {
                location: 'Step 2',
                error_type: 'math_error',
                description: 'sign flipped',
                severity: 'minor',
              },
            ],
            suggested_changes: ['recheck step 2'],
          },
          overall_assessment: 'mostly_correct',
          confidence_score: 0.75,
        }
      }
      case 'refine':
        if (script.refine === 'fail') throw new AgentTransportError(`${this.id} refine failed`)
        return { refined_answer: `${this.id}-refined`, reasoning: ['revised step'] }
    }
  }
}

export function sequentialIds(prefix = 'id'): () => string {
  let n = 0
  return () => `${prefix}-${String(++n)}`
}

export function createMemoryWriter(): SqliteDocumentWriter {
  const db = openDatabase(IN_MEMORY_DATABASE)
  runMigrations(db)
  return new SqliteDocumentWriter(db)
}
