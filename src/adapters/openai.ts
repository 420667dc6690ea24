import type OpenAI from 'openai'

import { AdapterCorrelationError } from '../core/errors.js'
import type { ConversationTurn, ToolCall, ToolResult, ToolSchema } from '../core/types.js'
import { assertPairing, isRecord, pairedTurns, serializeOutput, textOf, toolCallsOf, toolResultsOf } from './pairing.js'
import type { MessageRoles, VendorAdapter } from './types.js'

type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam
type ChatTool = OpenAI.Chat.ChatCompletionTool

interface RawToolCall {
  id?: string
  type?: string
  function?: { name: string; arguments: string }
}

/** The part of a Chat Completions response the adapter reads. */
export interface OpenAIResponse {
  choices: ReadonlyArray<{
    message: {
      content?: unknown
      tool_calls?: ReadonlyArray<RawToolCall> | null
    }
  }>
}

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw)
    return isRecord(parsed) ? parsed : {}
  } catch {
    // Malformed arguments reach the tool as an empty object; its own validation reports them.
    return {}
  }
}

function toToolMessage(result: ToolResult): ChatMessage {
  const text = serializeOutput(result.output)
  return {
    role: 'tool',
    tool_call_id: result.callId,
    content: result.isError ? `Error: ${text}` : text
  }
}

/**
 * OpenAI Chat Completions adapter.
 *
 * Tool invocations ride on the assistant message's `tool_calls`; every result is its own
 * `tool` message that must follow immediately, in call order.
 */
export class OpenAIAdapter implements VendorAdapter<ChatMessage, ChatTool, OpenAIResponse> {
  readonly vendor = 'openai' as const
  readonly requiredMessageRoles: MessageRoles = { toolCall: 'assistant', toolResult: 'tool' }

  formatTools(tools: readonly ToolSchema[]): ChatTool[] {
    return tools.map(
      (tool): ChatTool => ({
        type: 'function',
        function: {
          name: tool.name,
          description: tool.description,
          parameters: { ...tool.parameters }
        }
      })
    )
  }

  *extractToolCalls(response: OpenAIResponse): Generator<ToolCall, void, undefined> {
    const toolCalls = response.choices[0]?.message.tool_calls ?? []
    for (const call of toolCalls) {
      if (!call.function) continue
      if (!call.id) {
        throw new AdapterCorrelationError(`tool call for '${call.function.name}' has no id`)
      }
      yield {
        callId: call.id,
        name: call.function.name,
        arguments: parseArguments(call.function.arguments)
      }
    }
  }

  extractText(response: OpenAIResponse): string {
    const content = response.choices[0]?.message.content
    return typeof content === 'string' ? content : ''
  }

  formatToolCalls(text: string, calls: readonly ToolCall[]): ChatMessage {
    if (calls.length === 0) return { role: 'assistant', content: text }
    return {
      role: 'assistant',
      content: text || null,
      tool_calls: calls.map((call) => ({
        id: call.callId,
        type: 'function' as const,
        function: { name: call.name, arguments: JSON.stringify(call.arguments) }
      }))
    }
  }

  formatToolResults(calls: readonly ToolCall[], results: readonly ToolResult[]): ChatMessage[] {
    assertPairing(calls, results)
    return results.map(toToolMessage)
  }

  toMessages(turns: readonly ConversationTurn[]): ChatMessage[] {
    const messages: ChatMessage[] = []

    for (const { turn, pendingCalls } of pairedTurns(turns)) {
      const text = textOf(turn)

      if (turn.role === 'assistant') {
        const calls = toolCallsOf(turn)
        if (!text && calls.length === 0) continue
        messages.push(this.formatToolCalls(text, calls))
        continue
      }

      if (pendingCalls.length > 0) {
        messages.push(...this.formatToolResults(pendingCalls, toolResultsOf(turn)))
      }
      if (text) messages.push({ role: 'user', content: text })
    }

    return messages
  }
}
