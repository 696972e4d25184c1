/**
 * Error definitions for Colloquy
 * Provides structured error hierarchy for debate sessions and their collaborators
 */

/** Base error class for all Colloquy errors */
export class ColloquyError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'ColloquyError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ColloquyError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends ColloquyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a run-level credential (API key) is not available */
export class MissingCredentialError extends ColloquyError {
  constructor(envVar: string, context: Record<string, unknown> = {}) {
    super(`Required credential is not set: ${envVar}`, 'MISSING_CREDENTIAL', {
      envVar,
      ...context,
    })
    this.name = 'MissingCredentialError'
  }
}

/** Error thrown when an agent call exceeds its wall-clock timeout */
export class AgentTimeoutError extends ColloquyError {
  constructor(agentId: string, timeoutSec: number, context: Record<string, unknown> = {}) {
    super(
      `Agent ${agentId} did not respond within ${String(timeoutSec)}s`,
      'AGENT_TIMEOUT',
      { agentId, timeoutSec, ...context }
    )
    this.name = 'AgentTimeoutError'
  }
}

/** Error thrown when an agent response cannot be parsed against its output schema */
export class SchemaValidationError extends ColloquyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'SCHEMA_VALIDATION', context)
    this.name = 'SchemaValidationError'
  }
}

/** Error thrown when the model client fails (network, HTTP status, empty response) */
export class AgentTransportError extends ColloquyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'AGENT_TRANSPORT', context)
    this.name = 'AgentTransportError'
  }
}

/** Error thrown when a review is delivered to a context that is not its reviewee */
export class ValidationMismatchError extends ColloquyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_MISMATCH', context)
    this.name = 'ValidationMismatchError'
  }
}

/** Error thrown when a solver context is driven through an illegal transition */
export class StateTransitionError extends ColloquyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'STATE_TRANSITION', context)
    this.name = 'StateTransitionError'
  }
}

/** Error thrown when too few agents completed role assessment to hold a debate */
export class InsufficientAgentsError extends ColloquyError {
  constructor(
    assessed: number,
    required: number,
    context: Record<string, unknown> = {}
  ) {
    super(
      `At least ${String(required)} assessed agents required, got ${String(assessed)}`,
      'INSUFFICIENT_AGENTS',
      { assessed, required, ...context }
    )
    this.name = 'InsufficientAgentsError'
  }
}

/** Error thrown when a partial update targets a document that does not exist */
export class DocumentNotFoundError extends ColloquyError {
  constructor(collection: string, documentId: string) {
    super(`Document not found: ${collection}/${documentId}`, 'DOCUMENT_NOT_FOUND', {
      collection,
      documentId,
    })
    this.name = 'DocumentNotFoundError'
  }
}

/** Error thrown when the problem dataset cannot be read or is malformed */
export class ProblemSourceError extends ColloquyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PROBLEM_SOURCE_ERROR', context)
    this.name = 'ProblemSourceError'
  }
}

/**
 * Extract a stable code and message from an unknown thrown value.
 */
export function describeError(err: unknown): { code: string; message: string } {
  if (err instanceof ColloquyError) {
    return { code: err.code, message: err.message }
  }
  if (err instanceof Error) {
    return { code: err.name, message: err.message }
  }
  return { code: 'UNKNOWN', message: String(err) }
}
