/**
 * Types and interfaces for the Agent capability.
 *
 * An agent answers one structured call at a time: a system prompt and a user
 * prompt go in, a value validated against a Zod output schema comes out.
 * How the model is reached is hidden behind a ModelClient.
 */

import type { ZodType, ZodTypeAny } from 'zod'

// ---------------------------------------------------------------------------
// Call types
// ---------------------------------------------------------------------------

/** Which debate stage issued a structured call */
export type CallType = 'role_assessment' | 'solve' | 'peer_review' | 'refine'

/** Identifiers bound to the progress log lines of a call */
export interface CallLogContext {
  problemId: string
  runId?: string
  /** Solver whose solution is under review (peer_review calls only) */
  revieweeId?: string
}

// ---------------------------------------------------------------------------
// StructuredCallRequest
// ---------------------------------------------------------------------------

/**
 * Request payload for a structured agent call.
 */
export interface StructuredCallRequest<T> {
  systemPrompt: string
  userPrompt: string
  /** Zod schema the parsed response must satisfy */
  outputSchema: ZodType<T>
  /** Name of the output schema, passed to providers that support JSON-schema output */
  schemaName: string
  /** Wall-clock timeout for the whole call, in seconds */
  timeoutSec: number
  callType: CallType
  logContext: CallLogContext
  /** Interval between "still waiting" log lines; defaults to the agent's setting */
  logIntervalSec?: number
}

// ---------------------------------------------------------------------------
// Agent
// ---------------------------------------------------------------------------

/**
 * A debate participant backed by a language model.
 */
export interface Agent {
  /** Stable participant identifier (llm_id in persisted documents) */
  readonly id: string
  /** Provider model name */
  readonly model: string
  /**
   * Run a structured call.
   *
   * @throws {AgentTimeoutError} when the call exceeds `timeoutSec`
   * @throws {SchemaValidationError} when the response does not match `outputSchema`
   * @throws {AgentTransportError} when the model client fails
   */
  runStructuredCall<T>(request: StructuredCallRequest<T>): Promise<T>
}

// ---------------------------------------------------------------------------
// ModelClient
// ---------------------------------------------------------------------------

/**
 * Raw completion request handed to a ModelClient.
 */
export interface CompletionRequest {
  model: string
  systemPrompt: string
  userPrompt: string
  temperature: number
  topP: number
  outputSchema: ZodTypeAny
  schemaName: string
  /** Upper bound for the transport's own request timeout */
  timeoutSec: number
}

/**
 * Transport that turns a completion request into raw response text.
 * Implementations must honour `signal` so a timed-out call stops its request.
 */
export interface ModelClient {
  complete(request: CompletionRequest, signal: AbortSignal): Promise<string>
}

// ---------------------------------------------------------------------------
// AgentConfig
// ---------------------------------------------------------------------------

/**
 * Sampling and identity settings for one agent.
 */
export interface AgentConfig {
  llmId: string
  provider: string
  model: string
  temperature: number
  topP: number
}
