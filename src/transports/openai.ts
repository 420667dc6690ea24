import OpenAI from 'openai'

import type { ModelRequest, ModelTransport } from '../adapters/types.js'

type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam
type ChatTool = OpenAI.Chat.ChatCompletionTool

export interface OpenAITransportOptions {
  model: string
  maxTokens: number
  temperature: number
}

/**
 * Sends conversations to the OpenAI Chat Completions API. The system prompt is sent
 * as the leading `system` message.
 */
export class OpenAITransport implements ModelTransport<ChatMessage, ChatTool, OpenAI.Chat.ChatCompletion> {
  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAITransportOptions
  ) {}

  static fromApiKey(apiKey: string, options: OpenAITransportOptions): OpenAITransport {
    return new OpenAITransport(new OpenAI({ apiKey }), options)
  }

  async send(request: ModelRequest<ChatMessage, ChatTool>, signal?: AbortSignal): Promise<OpenAI.Chat.ChatCompletion> {
    return this.client.chat.completions.create(
      {
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        temperature: this.options.temperature,
        messages: [{ role: 'system', content: request.system }, ...request.messages],
        tools: request.tools.length > 0 ? request.tools : undefined
      },
      { signal }
    )
  }
}
