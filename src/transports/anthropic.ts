import Anthropic from '@anthropic-ai/sdk'

import type { ModelRequest, ModelTransport } from '../adapters/types.js'

export interface AnthropicTransportOptions {
  model: string
  maxTokens: number
  temperature: number
}

/**
 * Sends conversations to the Anthropic Messages API.
 *
 * Rate limits and transport failures surface as the SDK's own errors.
 */
export class AnthropicTransport
  implements ModelTransport<Anthropic.MessageParam, Anthropic.Tool, Anthropic.Message>
{
  constructor(
    private readonly client: Anthropic,
    private readonly options: AnthropicTransportOptions
  ) {}

  static fromApiKey(apiKey: string, options: AnthropicTransportOptions): AnthropicTransport {
    return new AnthropicTransport(new Anthropic({ apiKey }), options)
  }

  async send(
    request: ModelRequest<Anthropic.MessageParam, Anthropic.Tool>,
    signal?: AbortSignal
  ): Promise<Anthropic.Message> {
    return this.client.messages.create(
      {
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        temperature: this.options.temperature,
        system: request.system,
        messages: request.messages,
        tools: request.tools.length > 0 ? request.tools : undefined
      },
      { signal }
    )
  }
}
