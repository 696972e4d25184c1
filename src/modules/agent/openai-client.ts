/**
 * OpenAICompatibleClient: ModelClient over the OpenAI chat completions API.
 *
 * Works against any OpenAI-compatible endpoint (OpenAI, Gemini's OpenAI
 * compatibility layer, DeepSeek) by pointing `baseURL` at the provider.
 * The expected output shape is sent as a JSON-schema response format derived
 * from the request's Zod schema.
 */

import OpenAI from 'openai'
import { zodResponseFormat } from 'openai/helpers/zod'
import { AgentTransportError } from '../../core/errors.js'
import type { CompletionRequest, ModelClient } from './types.js'

export interface OpenAICompatibleClientOptions {
  apiKey: string
  /** Provider endpoint; omitted for api.openai.com */
  baseURL?: string
}

export class OpenAICompatibleClient implements ModelClient {
  private readonly _openai: OpenAI

  constructor(options: OpenAICompatibleClientOptions) {
    this._openai = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      // Failed calls are isolated by the session, never retried
      maxRetries: 0,
    })
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
    const completion = await this._openai.chat.completions.create(
      {
        model: request.model,
        temperature: request.temperature,
        top_p: request.topP,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt },
        ],
        response_format: zodResponseFormat(request.outputSchema, request.schemaName),
      },
      { signal, timeout: request.timeoutSec * 1000 },
    )

    const content = completion.choices[0]?.message.content
    if (content === null || content === undefined || content.trim() === '') {
      throw new AgentTransportError('Model returned an empty response', {
        model: request.model,
        finishReason: completion.choices[0]?.finish_reason ?? null,
      })
    }
    return content
  }
}
