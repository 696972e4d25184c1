/**
 * Build the agent roster from configuration.
 *
 * Agents sharing a provider share one client. Credentials are resolved from
 * the environment before any agent is created, so a missing key fails the
 * whole run up front.
 */

import { MissingCredentialError, ConfigError } from '../../core/errors.js'
import type { AgentEntry, ProviderConfig } from '../config/index.js'
import { OpenAICompatibleClient } from './openai-client.js'
import { StructuredAgentImpl } from './structured-agent.js'
import type { Agent, ModelClient } from './types.js'

export interface CreateAgentsOptions {
  providers: Record<string, ProviderConfig>
  agents: AgentEntry[]
  logIntervalSec?: number
  /** Source of API keys (default: process.env) */
  env?: NodeJS.ProcessEnv
  /** Override for the per-provider client; defaults to OpenAICompatibleClient */
  clientFactory?: (provider: ProviderConfig, apiKey: string) => ModelClient
}

function defaultClientFactory(provider: ProviderConfig, apiKey: string): ModelClient {
  return new OpenAICompatibleClient({ apiKey, baseURL: provider.base_url })
}

/**
 * @throws {ConfigError} when an agent names an unknown provider
 * @throws {MissingCredentialError} when a provider's api_key_env is unset or empty
 */
export function createAgents(options: CreateAgentsOptions): Agent[] {
  const env = options.env ?? process.env
  const clientFactory = options.clientFactory ?? defaultClientFactory
  const clients = new Map<string, ModelClient>()

  return options.agents.map((entry) => {
    let client = clients.get(entry.provider)
    if (client === undefined) {
      const provider = options.providers[entry.provider]
      if (provider === undefined) {
        throw new ConfigError(`Agent "${entry.llm_id}" references unknown provider "${entry.provider}"`, {
          llmId: entry.llm_id,
          provider: entry.provider,
        })
      }
      const apiKey = env[provider.api_key_env]
      if (apiKey === undefined || apiKey === '') {
        throw new MissingCredentialError(provider.api_key_env, { provider: entry.provider })
      }
      client = clientFactory(provider, apiKey)
      clients.set(entry.provider, client)
    }

    return new StructuredAgentImpl({
      config: {
        llmId: entry.llm_id,
        provider: entry.provider,
        model: entry.model,
        temperature: entry.temperature,
        topP: entry.top_p,
      },
      client,
      logIntervalSec: options.logIntervalSec,
    })
  })
}
