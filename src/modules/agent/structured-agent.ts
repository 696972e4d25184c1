/**
 * StructuredAgentImpl: concrete implementation of the Agent interface.
 *
 * Wraps a ModelClient with the per-call lifecycle every debate stage relies on:
 * - a wall-clock timeout that aborts the underlying request
 * - a companion progress timer, cleared on every exit path
 * - JSON extraction and Zod validation of the response
 *
 * No retries: a failed call surfaces as a typed error to the caller.
 */

import type { Logger } from 'pino'
import {
  AgentTimeoutError,
  AgentTransportError,
  ColloquyError,
  describeError,
} from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { elapsedSeconds } from '../../utils/helpers.js'
import { parseStructuredOutput } from './structured-output.js'
import type { Agent, AgentConfig, ModelClient, StructuredCallRequest } from './types.js'

const logger = createLogger('agent')

/** Default interval between progress log lines */
export const DEFAULT_LOG_INTERVAL_SEC = 10

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface StructuredAgentOptions {
  config: AgentConfig
  client: ModelClient
  /** Default progress log interval when a request does not set one */
  logIntervalSec?: number
}

// ---------------------------------------------------------------------------
// StructuredAgentImpl
// ---------------------------------------------------------------------------

export class StructuredAgentImpl implements Agent {
  readonly id: string
  readonly model: string

  private readonly _config: AgentConfig
  private readonly _client: ModelClient
  private readonly _logIntervalSec: number
  private readonly _logger: Logger

  constructor(options: StructuredAgentOptions) {
    this._config = options.config
    this._client = options.client
    this._logIntervalSec = options.logIntervalSec ?? DEFAULT_LOG_INTERVAL_SEC
    this.id = options.config.llmId
    this.model = options.config.model
    this._logger = logger.child({ agentId: this.id, model: this.model })
  }

  async runStructuredCall<T>(request: StructuredCallRequest<T>): Promise<T> {
    const startedAt = Date.now()
    const log = this._logger.child({ callType: request.callType, ...request.logContext })
    const controller = new AbortController()

    const intervalSec = request.logIntervalSec ?? this._logIntervalSec
    const progressTimer = setInterval(() => {
      log.info({ elapsedSec: elapsedSeconds(startedAt) }, 'Waiting for agent response')
    }, intervalSec * 1000)

    let timeoutHandle: ReturnType<typeof setTimeout> | undefined
    const timedOut = new Promise<never>((_resolve, reject) => {
      timeoutHandle = setTimeout(() => {
        reject(new AgentTimeoutError(this.id, request.timeoutSec, { ...request.logContext }))
        controller.abort()
      }, request.timeoutSec * 1000)
    })

    try {
      const raw = await Promise.race([this._complete(request, controller.signal), timedOut])
      const value = parseStructuredOutput(raw, request.outputSchema, {
        agentId: this.id,
        callType: request.callType,
        ...request.logContext,
      })
      log.debug({ elapsedSec: elapsedSeconds(startedAt) }, 'Agent call completed')
      return value
    } catch (err) {
      log.warn(
        { elapsedSec: elapsedSeconds(startedAt), error: describeError(err) },
        'Agent call failed',
      )
      throw err
    } finally {
      clearInterval(progressTimer)
      if (timeoutHandle !== undefined) {
        clearTimeout(timeoutHandle)
      }
    }
  }

  private async _complete<T>(request: StructuredCallRequest<T>, signal: AbortSignal): Promise<string> {
    try {
      return await this._client.complete(
        {
          model: this._config.model,
          systemPrompt: request.systemPrompt,
          userPrompt: request.userPrompt,
          temperature: this._config.temperature,
          topP: this._config.topP,
          outputSchema: request.outputSchema,
          schemaName: request.schemaName,
          timeoutSec: request.timeoutSec,
        },
        signal,
      )
    } catch (err) {
      if (err instanceof ColloquyError) throw err
      throw new AgentTransportError(`Model client failed: ${describeError(err).message}`, {
        agentId: this.id,
        model: this.model,
      })
    }
  }
}
