/**
 * agent module: language-model participants of a debate
 *
 * Public API re-exports for the agent module.
 */

export type {
  Agent,
  AgentConfig,
  CallType,
  CallLogContext,
  CompletionRequest,
  ModelClient,
  StructuredCallRequest,
} from './types.js'

export { StructuredAgentImpl, DEFAULT_LOG_INTERVAL_SEC } from './structured-agent.js'
export type { StructuredAgentOptions } from './structured-agent.js'

export { OpenAICompatibleClient } from './openai-client.js'
export type { OpenAICompatibleClientOptions } from './openai-client.js'

export { extractJsonPayload, parseStructuredOutput } from './structured-output.js'

export { createAgents } from './agent-factory.js'
export type { CreateAgentsOptions } from './agent-factory.js'
