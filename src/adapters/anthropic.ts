import type Anthropic from '@anthropic-ai/sdk'

import { AdapterCorrelationError } from '../core/errors.js'
import type { ContentBlock, ConversationTurn, ToolCall, ToolResult, ToolSchema } from '../core/types.js'
import { assertPairing, isRecord, pairedTurns, serializeOutput, type JsonRecord } from './pairing.js'
import type { MessageRoles, VendorAdapter } from './types.js'

/** The part of a Messages API response the adapter reads. */
export interface AnthropicResponse {
  content: ReadonlyArray<{ type: string }>
}

type RawTextBlock = { type: 'text'; text: string }
type RawToolUseBlock = { type: 'tool_use'; id?: unknown; name: string; input?: unknown }

function isTextBlock(block: unknown): block is RawTextBlock {
  if (!isRecord(block)) return false
  return block.type === 'text' && typeof block.text === 'string'
}

function isToolUseBlock(block: unknown): block is RawToolUseBlock {
  if (!isRecord(block)) return false
  return block.type === 'tool_use' && typeof block.name === 'string'
}

function toResultBlock(result: ToolResult): Anthropic.ToolResultBlockParam {
  return {
    type: 'tool_result',
    tool_use_id: result.callId,
    content: serializeOutput(result.output),
    ...(result.isError ? { is_error: true } : {})
  }
}

function toBlockParam(block: ContentBlock): Anthropic.ContentBlockParam {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text }
    case 'tool_use':
      return { type: 'tool_use', id: block.callId, name: block.name, input: block.arguments }
    case 'tool_result':
      return toResultBlock(block)
  }
}

/**
 * Anthropic Messages API adapter.
 *
 * Tool invocations are `tool_use` blocks on the assistant message; results travel back as
 * `tool_result` blocks at the start of the next user message.
 */
export class AnthropicAdapter
  implements VendorAdapter<Anthropic.MessageParam, Anthropic.Tool, AnthropicResponse>
{
  readonly vendor = 'anthropic' as const
  readonly requiredMessageRoles: MessageRoles = { toolCall: 'assistant', toolResult: 'user' }

  formatTools(tools: readonly ToolSchema[]): Anthropic.Tool[] {
    return tools.map((tool): Anthropic.Tool => ({
      name: tool.name,
      description: tool.description,
      input_schema: {
        type: 'object',
        properties: tool.parameters.properties,
        required: tool.parameters.required
      }
    }))
  }

  *extractToolCalls(response: AnthropicResponse): Generator<ToolCall, void, undefined> {
    for (const block of response.content) {
      if (!isToolUseBlock(block)) continue
      if (typeof block.id !== 'string' || !block.id) {
        throw new AdapterCorrelationError(`tool_use block for '${block.name}' has no id`)
      }
      const input: JsonRecord = isRecord(block.input) ? block.input : {}
      yield { callId: block.id, name: block.name, arguments: input }
    }
  }

  extractText(response: AnthropicResponse): string {
    return response.content
      .filter((block): block is RawTextBlock => isTextBlock(block))
      .map((block) => block.text)
      .join('')
  }

  formatToolCalls(text: string, calls: readonly ToolCall[]): Anthropic.MessageParam {
    const content: Anthropic.ContentBlockParam[] = []
    if (text) content.push({ type: 'text', text })
    for (const call of calls) {
      content.push({ type: 'tool_use', id: call.callId, name: call.name, input: call.arguments })
    }
    return { role: 'assistant', content }
  }

  formatToolResults(calls: readonly ToolCall[], results: readonly ToolResult[]): Anthropic.MessageParam[] {
    assertPairing(calls, results)
    return [{ role: 'user', content: results.map(toResultBlock) }]
  }

  toMessages(turns: readonly ConversationTurn[]): Anthropic.MessageParam[] {
    const messages: Array<{ role: 'user' | 'assistant'; content: Anthropic.ContentBlockParam[] }> = []

    for (const { turn } of pairedTurns(turns)) {
      if (turn.content.length === 0) continue
      // Results first: the API requires them to lead the user message that answers a tool_use.
      const ordered = [...turn.content].sort(
        (a, b) => Number(b.type === 'tool_result') - Number(a.type === 'tool_result')
      )
      const content = ordered.map(toBlockParam)
      const previous = messages[messages.length - 1]
      if (previous && previous.role === turn.role) {
        previous.content.push(...content)
      } else {
        messages.push({ role: turn.role, content })
      }
    }

    return messages
  }
}
